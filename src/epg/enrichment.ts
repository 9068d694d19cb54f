/**
 * Program Enrichment
 * Adds details, cast and crew, and airing tags from the program pages to normalized timelines
 */

import { fillTemplate } from '../api/schedule-client';
import type { FetchedDocument } from '../api/schedule-client';
import { runPool } from '../scheduler/pool';
import { CREDIT_ROLES } from '../types/guide';
import type { ChannelTimeline, Credit, CreditRole, ProgramEntry } from '../types/guide';
import { FetchError, ParseError, errorMessage } from '../utils/errors';
import { Result, err, ok } from '../utils/result';
import { cleanDescription, parseEpisodeNumber, sanitizeText } from '../utils/text-sanitizer';
import {
  AIRING_LIVE,
  AIRING_NEW,
  CAST_COMPONENT,
  CastDataSchema,
  CastPageSchema,
  ProgramDetails,
  ProgramDetailsResponseSchema,
  ScheduleTagsResponseSchema,
} from './upstream-schema';

export interface DocumentSource {
  fetchDocument(url: string, ownerId: string, signal?: AbortSignal): Promise<Result<FetchedDocument, FetchError>>;
}

export interface EnrichmentOptions {
  /** `{id}` is the upstream program id */
  detailsUrlTemplate: string;
  /** `{id}` is the show id from the program details */
  creditsUrlTemplate: string;
  /** `{start}` (unix seconds) and `{duration}` (minutes); no tags lookup when absent */
  tagsUrlTemplate?: string;
  concurrency: number;
  windowHours: number;
  tagsLookbackMinutes: number;
}

export interface EnrichmentSources {
  programs: DocumentSource;
  schedule: DocumentSource;
}

export interface EnrichmentStats {
  programmes: number;
  details: number;
  credits: number;
  tagged: number;
  failures: number;
}

export interface EnrichmentResult {
  timelines: Map<string, ChannelTimeline>;
  stats: EnrichmentStats;
}

interface ProgramExtras {
  details?: ProgramDetails;
  credits?: Credit[];
  failed: boolean;
}

/** Airing flags keyed by `${programId}@${startSeconds}` */
export type ScheduleTags = Map<string, number>;

export function tagKey(programId: string, startSeconds: number): string {
  return `${programId}@${startSeconds}`;
}

function decodeJson(body: string, ownerId: string, what: string): Result<unknown, ParseError> {
  try {
    return ok(JSON.parse(body));
  } catch (error) {
    return err(new ParseError(ownerId, 'malformed-input', `${what} for ${ownerId} is not valid JSON: ${errorMessage(error)}`));
  }
}

export function parseProgramDetails(body: string, ownerId: string): Result<ProgramDetails, ParseError> {
  const decoded = decodeJson(body, ownerId, 'Program details');
  if (!decoded.ok) {
    return decoded;
  }
  const parsed = ProgramDetailsResponseSchema.safeParse(decoded.value);
  if (!parsed.success) {
    return err(new ParseError(ownerId, 'unrecognized-format', `Program details for ${ownerId} have an unrecognized shape`));
  }
  return ok(parsed.data.data.item);
}

/**
 * Map an upstream job title onto an XMLTV credit role; null for roles XMLTV has no tag for
 */
export function creditRole(role: string | null | undefined): CreditRole | null {
  const normalized = (role ?? 'actor').trim().toLowerCase();
  if (normalized === '' || normalized === 'actor' || normalized === 'actress' || normalized === 'cast') return 'actor';
  if (normalized.includes('guest')) return 'guest';
  if (normalized.includes('director')) return 'director';
  if (normalized.includes('writer') || normalized.includes('screenplay') || normalized.includes('creator')) return 'writer';
  if (normalized.includes('producer')) return 'producer';
  if (normalized.includes('composer') || normalized.includes('music')) return 'composer';
  if (normalized.includes('host') || normalized.includes('presenter') || normalized.includes('anchor')) return 'presenter';
  return null;
}

/**
 * Read the cast and crew component from a show page. A page without it has no credits.
 */
export function parseCastAndCrew(body: string, ownerId: string): Result<Credit[], ParseError> {
  const decoded = decodeJson(body, ownerId, 'Cast page');
  if (!decoded.ok) {
    return decoded;
  }
  const page = CastPageSchema.safeParse(decoded.value);
  if (!page.success) {
    return err(new ParseError(ownerId, 'unrecognized-format', `Cast page for ${ownerId} has an unrecognized shape`));
  }

  const component = page.data.components.find((entry) => entry.meta?.componentName === CAST_COMPONENT);
  if (!component || component.data === undefined || component.data === null) {
    return ok([]);
  }
  const data = CastDataSchema.safeParse(component.data);
  if (!data.success) {
    return err(new ParseError(ownerId, 'unrecognized-format', `Cast list for ${ownerId} has an unrecognized shape`));
  }

  const credits: Credit[] = [];
  for (const member of data.data.items) {
    const role = creditRole(member.role);
    const name = sanitizeText(member.name);
    if (!role || !name) {
      continue;
    }
    const credit: Credit = { role, name };
    const character = sanitizeText(member.characterName);
    if (role === 'actor' && character) {
      credit.character = character;
    }
    credits.push(credit);
  }

  // Group by role, keeping page order inside a role
  return ok(credits.sort((a, b) => CREDIT_ROLES.indexOf(a.role) - CREDIT_ROLES.indexOf(b.role)));
}

/**
 * Index airing flags of the provider-wide schedule. Entries without flags are left out.
 */
export function parseScheduleTags(body: string, ownerId: string): Result<ScheduleTags, ParseError> {
  const decoded = decodeJson(body, ownerId, 'Schedule');
  if (!decoded.ok) {
    return decoded;
  }
  const parsed = ScheduleTagsResponseSchema.safeParse(decoded.value);
  if (!parsed.success) {
    return err(new ParseError(ownerId, 'unrecognized-format', `Schedule for ${ownerId} has an unrecognized shape`));
  }

  const tags: ScheduleTags = new Map();
  for (const item of parsed.data.data.items) {
    for (const airing of item.programSchedules) {
      if (!airing.programId || !airing.airingAttrib || typeof airing.startTime !== 'number') {
        continue;
      }
      const key = tagKey(String(airing.programId), Math.round(airing.startTime));
      tags.set(key, (tags.get(key) ?? 0) | airing.airingAttrib);
    }
  }
  return ok(tags);
}

/**
 * Fill what the listing left out from the program details.
 * A details description replaces the listing's; categories are merged.
 */
export function applyDetails(entry: ProgramEntry, details: ProgramDetails): ProgramEntry {
  const enriched: ProgramEntry = { ...entry };

  const subTitle = sanitizeText(details.episodeTitle);
  if (!enriched.subTitle && subTitle) {
    enriched.subTitle = subTitle;
  }

  const description = cleanDescription(details.description);
  if (description) {
    enriched.description = description;
  }

  const genres = (details.genres ?? []).map((genre) => sanitizeText(genre.name)).filter((name) => name.length > 0);
  if (genres.length > 0) {
    enriched.categories = [...new Set([...entry.categories, ...genres])];
  }

  if (!enriched.episode && details.seasonNumber && details.episodeNumber) {
    const episode = parseEpisodeNumber(`S${details.seasonNumber}E${details.episodeNumber}`);
    if (episode) {
      enriched.episode = episode;
    }
  }

  if (details.releaseYear) {
    enriched.date = String(details.releaseYear);
  }

  const image = details.images?.[0];
  if (image) {
    enriched.icon = {
      src: image.url,
      ...(image.width ? { width: image.width } : {}),
      ...(image.height ? { height: image.height } : {}),
    };
  }

  return enriched;
}

/**
 * Raise new/live from the schedule flags of the same airing
 */
export function applyTags(entry: ProgramEntry, tags: ScheduleTags): ProgramEntry {
  if (!entry.source) {
    return entry;
  }
  const flags = tags.get(tagKey(entry.source.programId, Math.round(entry.source.airingStart / 1000)));
  if (!flags) {
    return entry;
  }
  return {
    ...entry,
    isNew: entry.isNew || (flags & AIRING_NEW) !== 0,
    isLive: entry.isLive || (flags & AIRING_LIVE) !== 0,
  };
}

export class ProgramEnricher {
  private readonly options: EnrichmentOptions;
  private readonly sources: EnrichmentSources;

  constructor(options: EnrichmentOptions, sources: EnrichmentSources) {
    this.options = options;
    this.sources = sources;
  }

  /**
   * Enrich every programme that carries an upstream id.
   * Lookups that fail leave the programme as the listing described it.
   */
  async enrich(
    timelines: ReadonlyMap<string, ChannelTimeline>,
    startedAt: number,
    signal?: AbortSignal
  ): Promise<EnrichmentResult> {
    // One lookup per program id, however many airings share it
    const owners = new Map<string, string>();
    let programmes = 0;
    for (const timeline of timelines.values()) {
      for (const entry of timeline.programmes) {
        programmes++;
        if (entry.source && !owners.has(entry.source.programId)) {
          owners.set(entry.source.programId, timeline.channelId);
        }
      }
    }

    const ids = [...owners.keys()];
    const [extras, tags] = await Promise.all([
      runPool(ids, this.options.concurrency, (programId) => this.lookupProgram(programId, owners.get(programId) ?? programId, signal)),
      this.lookupTags(startedAt, signal),
    ]);

    const byId = new Map<string, ProgramExtras>();
    ids.forEach((programId, index) => byId.set(programId, extras[index]));

    const stats: EnrichmentStats = {
      programmes,
      details: extras.filter((extra) => extra.details).length,
      credits: extras.filter((extra) => extra.credits && extra.credits.length > 0).length,
      tagged: 0,
      failures: extras.filter((extra) => extra.failed).length + (tags.ok ? 0 : 1),
    };

    const enriched = new Map<string, ChannelTimeline>();
    for (const [channelId, timeline] of timelines) {
      const entries = timeline.programmes.map((entry) => {
        const extra = entry.source ? byId.get(entry.source.programId) : undefined;
        let result = entry;
        if (extra?.details) {
          result = applyDetails(result, extra.details);
        }
        if (extra?.credits && extra.credits.length > 0) {
          result = { ...result, credits: extra.credits };
        }
        if (tags.ok) {
          const tagged = applyTags(result, tags.value);
          if (tagged !== result) {
            stats.tagged++;
          }
          result = tagged;
        }
        return result;
      });
      enriched.set(channelId, { ...timeline, programmes: entries });
    }

    return { timelines: enriched, stats };
  }

  private async lookupProgram(programId: string, ownerId: string, signal?: AbortSignal): Promise<ProgramExtras> {
    const detailsUrl = fillTemplate(this.options.detailsUrlTemplate, { id: programId });
    const fetched = await this.sources.programs.fetchDocument(detailsUrl, ownerId, signal);
    if (!fetched.ok) {
      return { failed: true };
    }

    const details = parseProgramDetails(fetched.value.body, ownerId);
    if (!details.ok) {
      console.warn(`Ignoring details of program ${programId}: ${details.error.message}`);
      return { failed: true };
    }

    const showId = details.value.mcoId;
    if (!showId) {
      return { details: details.value, failed: false };
    }

    const creditsUrl = fillTemplate(this.options.creditsUrlTemplate, { id: showId });
    const page = await this.sources.programs.fetchDocument(creditsUrl, ownerId, signal);
    if (!page.ok) {
      return { details: details.value, failed: true };
    }

    const credits = parseCastAndCrew(page.value.body, ownerId);
    if (!credits.ok) {
      console.warn(`Ignoring cast of program ${programId}: ${credits.error.message}`);
      return { details: details.value, failed: true };
    }
    return { details: details.value, credits: credits.value, failed: false };
  }

  private async lookupTags(startedAt: number, signal?: AbortSignal): Promise<Result<ScheduleTags, FetchError | ParseError>> {
    if (!this.options.tagsUrlTemplate) {
      return ok(new Map());
    }

    const url = fillTemplate(this.options.tagsUrlTemplate, {
      start: Math.floor(startedAt / 1000) - this.options.tagsLookbackMinutes * 60,
      duration: this.options.windowHours * 60,
    });
    const fetched = await this.sources.schedule.fetchDocument(url, 'schedule', signal);
    if (!fetched.ok) {
      return fetched;
    }

    const tags = parseScheduleTags(fetched.value.body, 'schedule');
    if (!tags.ok) {
      console.warn(`Ignoring airing tags: ${tags.error.message}`);
    }
    return tags;
  }
}
