/**
 * Schedule Normalizer
 * Turns one channel's raw listing into an ordered, non-overlapping timeline
 */

import type { OverlapPolicy } from '../types/config';
import type { Channel, ChannelTimeline, EpisodeNumber, ProgramEntry, RawListing } from '../types/guide';
import { ParseError, errorMessage } from '../utils/errors';
import { Result, err, ok } from '../utils/result';
import { cleanDescription, parseEpisodeNumber, sanitizeText } from '../utils/text-sanitizer';
import { HOUR_MS, MINUTE_MS, isRepresentableInstant, resolveWallTime } from '../utils/time';
import {
  AIRING_LIVE,
  AIRING_NEW,
  UpstreamListingSchema,
  UpstreamProgram,
  UpstreamProgramSchema,
  listingRecords,
} from './upstream-schema';

export interface NormalizePolicy {
  windowHours: number;
  defaultDurationMinutes: number;
  overlapPolicy: OverlapPolicy;
  clipToFetchTime: boolean;
  /** Applied to wall-clock times when the channel declares no zone */
  sourceTimeZone: string;
}

/**
 * A program record whose times are resolved but whose end may still be unknown
 */
export interface Candidate {
  seq: number;
  title: string;
  subTitle?: string;
  description?: string;
  start: number;
  end?: number;
  categories: string[];
  episode?: EpisodeNumber;
  isNew: boolean;
  isLive: boolean;
  programId?: string;
}

export function hasDescription(candidate: Pick<Candidate, 'description'>): boolean {
  return Boolean(candidate.description && candidate.description.length > 0);
}

/**
 * Epoch seconds win over wall-clock text; anything outside the XMLTV range is unknown
 */
function resolveInstant(timestamp: number | null | undefined, text: string | null | undefined, zone: string): number | null {
  let instant: number | null = null;
  if (typeof timestamp === 'number') {
    instant = Math.round(timestamp * 1000);
  } else if (text) {
    instant = resolveWallTime(text, zone);
  }
  return instant !== null && isRepresentableInstant(instant) ? instant : null;
}

/**
 * Build a candidate from a validated upstream record; null when it has no title or start
 */
export function toCandidate(program: UpstreamProgram, seq: number, zone: string): Candidate | null {
  const title = sanitizeText(program.name ?? program.title);
  const start = resolveInstant(program.start_timestamp, program.start_time, zone);
  if (!title || start === null) {
    return null;
  }

  let end = resolveInstant(program.end_timestamp, program.end_time, zone) ?? undefined;
  if (end === undefined && program.duration) {
    end = start + Math.round(program.duration * MINUTE_MS);
  }
  if (end !== undefined && (end <= start || !isRepresentableInstant(end))) {
    end = undefined;
  }

  const attrib = program.airing_attrib ?? 0;
  const candidate: Candidate = {
    seq,
    title,
    start,
    end,
    categories: (program.genres ?? []).map((genre) => sanitizeText(genre)).filter((genre) => genre.length > 0),
    isNew: (attrib & AIRING_NEW) !== 0,
    isLive: (attrib & AIRING_LIVE) !== 0,
  };

  const subTitle = sanitizeText(program.episode_title);
  if (subTitle) {
    candidate.subTitle = subTitle;
  }

  const description = cleanDescription(program.description);
  if (description) {
    candidate.description = description;
  }

  const episode = parseEpisodeNumber(program.episode_number);
  if (episode) {
    candidate.episode = episode;
  }

  if (program.id !== null && program.id !== undefined && String(program.id).length > 0) {
    candidate.programId = String(program.id);
  }

  return candidate;
}

/**
 * Stable sort by start; equal starts keep upstream order
 */
export function sortCandidates(candidates: Candidate[]): Candidate[] {
  return [...candidates].sort((a, b) => a.start - b.start || a.seq - b.seq);
}

function overlaps(earlier: Candidate, later: Candidate): boolean {
  if (later.start === earlier.start) {
    return true;
  }
  return earlier.end !== undefined && later.start < earlier.end;
}

/**
 * Decide which of two overlapping candidates survives.
 * `earlier` never starts after `later`.
 */
export function pickSurvivor(earlier: Candidate, later: Candidate, policy: OverlapPolicy): Candidate {
  if (policy === 'prefer-description') {
    const earlierDescribed = hasDescription(earlier);
    if (earlierDescribed !== hasDescription(later)) {
      return earlierDescribed ? earlier : later;
    }
  }

  if (earlier.start < later.start) {
    return earlier;
  }
  // Same start: the most recently seen record carries the freshest data
  return later.seq > earlier.seq ? later : earlier;
}

/**
 * Walk sorted candidates and drop the loser of every overlapping pair
 */
export function resolveOverlaps(sorted: Candidate[], policy: OverlapPolicy): Candidate[] {
  const kept: Candidate[] = [];

  for (const candidate of sorted) {
    const lastIndex = kept.length - 1;
    const last = kept[lastIndex];
    if (last === undefined || !overlaps(last, candidate)) {
      kept.push(candidate);
      continue;
    }
    kept[lastIndex] = pickSurvivor(last, candidate, policy);
  }

  return kept;
}

/**
 * Fill missing ends from the next start, or a default duration for the last record
 */
export function assignEnds(resolved: Candidate[], defaultDurationMs: number, channelId: string): ProgramEntry[] {
  return resolved.map((candidate, index) => {
    const next = resolved[index + 1];
    const end = candidate.end ?? (next ? next.start : candidate.start + defaultDurationMs);

    const entry: ProgramEntry = {
      channelId,
      title: candidate.title,
      start: candidate.start,
      end,
      categories: candidate.categories,
      isNew: candidate.isNew,
      isLive: candidate.isLive,
    };
    if (candidate.subTitle) entry.subTitle = candidate.subTitle;
    if (candidate.description) entry.description = candidate.description;
    if (candidate.episode) entry.episode = candidate.episode;
    if (candidate.programId) entry.source = { programId: candidate.programId, airingStart: candidate.start };
    return entry;
  });
}

/**
 * Keep what is still on air or upcoming inside [windowStart, windowEnd)
 */
export function applyWindow(
  entries: ProgramEntry[],
  windowStart: number,
  windowEnd: number,
  clipToStart: boolean
): ProgramEntry[] {
  const windowed: ProgramEntry[] = [];

  for (const entry of entries) {
    if (entry.end <= windowStart || entry.start >= windowEnd) {
      continue;
    }
    if (clipToStart && entry.start < windowStart) {
      windowed.push({ ...entry, start: windowStart });
    } else {
      windowed.push(entry);
    }
  }

  return windowed;
}

function decodeBody(listing: RawListing): Result<unknown, ParseError> {
  try {
    return ok(JSON.parse(listing.body));
  } catch (error) {
    return err(
      new ParseError(listing.channelId, 'malformed-input', `Listing for ${listing.channelId} is not valid JSON: ${errorMessage(error)}`)
    );
  }
}

/**
 * Parse and normalize one channel's listing.
 * Empty upstream data gives an empty timeline rather than an error.
 */
export function normalizeListing(
  listing: RawListing,
  channel: Channel,
  policy: NormalizePolicy
): Result<ChannelTimeline, ParseError> {
  const decoded = decodeBody(listing);
  if (!decoded.ok) {
    return decoded;
  }

  const envelope = UpstreamListingSchema.safeParse(decoded.value);
  if (!envelope.success) {
    return err(
      new ParseError(channel.id, 'unrecognized-format', `Listing for ${channel.id} has an unrecognized shape`, {
        issues: envelope.error.issues.length,
      })
    );
  }

  const records = listingRecords(envelope.data);
  const zone = channel.timeZone ?? policy.sourceTimeZone;
  const candidates: Candidate[] = [];
  let rejected = 0;

  records.forEach((record, seq) => {
    const parsed = UpstreamProgramSchema.safeParse(record);
    const candidate = parsed.success ? toCandidate(parsed.data, seq, zone) : null;
    if (candidate) {
      candidates.push(candidate);
    } else {
      rejected++;
    }
  });

  if (records.length > 0 && candidates.length === 0) {
    return err(
      new ParseError(channel.id, 'malformed-input', `None of the ${records.length} records for ${channel.id} are usable`, {
        rejected,
      })
    );
  }
  if (rejected > 0) {
    console.warn(`Skipped ${rejected} of ${records.length} records for ${channel.id}`);
  }

  const windowStart = listing.fetchedAt;
  const windowEnd = windowStart + policy.windowHours * HOUR_MS;

  const resolved = resolveOverlaps(sortCandidates(candidates), policy.overlapPolicy);
  const withEnds = assignEnds(resolved, policy.defaultDurationMinutes * MINUTE_MS, channel.id);
  const programmes = applyWindow(withEnds, windowStart, windowEnd, policy.clipToFetchTime);

  return ok({
    channelId: channel.id,
    fetchedAt: listing.fetchedAt,
    windowStart,
    windowEnd,
    programmes,
  });
}

/**
 * Timeline for a channel that produced no listing
 */
export function emptyTimeline(channelId: string, fetchedAt: number, windowHours: number): ChannelTimeline {
  return {
    channelId,
    fetchedAt,
    windowStart: fetchedAt,
    windowEnd: fetchedAt + windowHours * HOUR_MS,
    programmes: [],
  };
}
