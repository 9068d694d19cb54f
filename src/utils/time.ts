/**
 * Time helpers
 * All instants inside the pipeline are epoch milliseconds
 */

import { DateTime, FixedOffsetZone } from 'luxon';

export const MINUTE_MS = 60_000;
export const HOUR_MS = 60 * MINUTE_MS;

const XMLTV_FORMAT = 'yyyyMMddHHmmss ZZZ';

/** Instants an XMLTV time can carry: years 1970 through 9999 */
export const MIN_INSTANT_MS = 0;
export const MAX_INSTANT_MS = Date.UTC(9999, 11, 31, 23, 59, 59);

export function isRepresentableInstant(epochMs: number): boolean {
  return Number.isFinite(epochMs) && epochMs >= MIN_INSTANT_MS && epochMs <= MAX_INSTANT_MS;
}

/**
 * Resolve an upstream time string to an instant.
 * An explicit offset in the string wins; otherwise the wall time is read in `zone`.
 */
export function resolveWallTime(value: string, zone: string): number | null {
  const text = value.trim();
  if (!text) {
    return null;
  }

  const candidates = [
    DateTime.fromISO(text, { zone, setZone: true }),
    DateTime.fromSQL(text, { zone, setZone: true }),
    DateTime.fromFormat(text, XMLTV_FORMAT, { zone, setZone: true }),
    DateTime.fromFormat(text, 'yyyyMMddHHmmss', { zone }),
  ];

  const parsed = candidates.find((candidate) => candidate.isValid);
  return parsed ? parsed.toMillis() : null;
}

/**
 * Format an instant as an XMLTV time: 20250915143000 -0500
 */
export function formatXmltvTime(epochMs: number, utcOffsetMinutes: number): string {
  return DateTime.fromMillis(epochMs, { zone: FixedOffsetZone.instance(utcOffsetMinutes) }).toFormat(XMLTV_FORMAT);
}

/**
 * Parse an XMLTV time; a missing offset means UTC
 */
export function parseXmltvTime(value: string): number | null {
  const text = value.trim();
  const withOffset = DateTime.fromFormat(text, XMLTV_FORMAT, { setZone: true });
  if (withOffset.isValid) {
    return withOffset.toMillis();
  }

  const bare = DateTime.fromFormat(text, 'yyyyMMddHHmmss', { zone: 'utc' });
  return bare.isValid ? bare.toMillis() : null;
}

/**
 * Parse duration string to hours
 * Examples: "30min", "1hr", "2hr", "90min"
 */
export function parseDuration(durationStr: string): number {
  let hours = 1.0;

  const normalized = durationStr.toLowerCase();

  if (normalized === 'true' || normalized === '1' || normalized === 'yes') {
    return 1.0;
  }

  const match = normalized.match(/(\d+(?:\.\d+)?)(hr|hour|hours|min|mins|minutes?)?/);
  if (match) {
    const value = parseFloat(match[1]);
    const unit = match[2] || 'hr';

    if (unit.startsWith('min')) {
      hours = value / 60.0;
    } else {
      hours = value;
    }

    // Reasonable limits
    hours = Math.max(0.5, Math.min(12, hours));
  }

  return hours;
}
