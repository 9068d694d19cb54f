import type { EpisodeNumber } from '../types/guide';

/**
 * Text Sanitization Utilities
 * Ensures upstream text is safe for XML inclusion
 */

/**
 * Sanitize text for XML
 * - Remove control characters (except tab, newline, carriage return)
 * - Remove characters XML 1.0 forbids (U+FFFE, U+FFFF, lone surrogates)
 * - Remove null bytes
 * - Normalize Unicode
 * - XML entities are handled by fast-xml-parser automatically
 */
export function sanitizeText(text: string | null | undefined): string {
  if (!text) {
    return '';
  }

  // Normalize Unicode to NFC form for consistency
  let sanitized = text.normalize('NFC');

  // Remove null bytes
  sanitized = sanitized.replace(/\0/g, '');

  // Remove control characters except tab (0x09), LF (0x0A), CR (0x0D)
  // eslint-disable-next-line no-control-regex
  sanitized = sanitized.replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F-\x9F]/g, '');

  // Remove noncharacters U+FFFE/U+FFFF and unpaired surrogates, which XML 1.0 does not allow
  sanitized = sanitized.replace(/[\uFFFE\uFFFF]|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g, '');

  // Trim whitespace
  sanitized = sanitized.trim();

  return sanitized;
}

/**
 * Clean program description text
 * Removes feature tags and episode info that listings sometimes embed
 */
export function cleanDescription(text: string | null | undefined): string {
  if (!text) {
    return '';
  }

  let cleaned = sanitizeText(text);

  // Remove feature tags: [S], [S,SL], [AD], [HD], etc.
  cleaned = cleaned.replace(/\[[A-Z,]+\]/g, '');

  // Remove season/episode information embedded in descriptions
  // Patterns: "S1 Ep3", "Ep4", "S01E05", etc.
  cleaned = cleaned.replace(/\(?[SE]?\d+\s?Ep\s?\d+[\d/]*\)?/gi, '');

  // Clean up any double spaces created by removals
  cleaned = cleaned.replace(/\s{2,}/g, ' ');

  return cleaned.trim();
}

/**
 * Parse an episode number such as "S01E05"
 * Returns xmltv_ns format: "season.episode." (0-based) plus the onscreen form
 */
export function parseEpisodeNumber(episodeNumber: string | null | undefined): EpisodeNumber | null {
  if (!episodeNumber) {
    return null;
  }

  // Match patterns like "S01E05", "S1E5", etc.
  const match = episodeNumber.match(/S(\d+)E(\d+)/i);

  if (!match) {
    return null;
  }

  const season = parseInt(match[1], 10);
  const episode = parseInt(match[2], 10);
  if (season < 1 || episode < 1) {
    return null;
  }

  // xmltv_ns uses 0-based indexing; part is left empty when unknown
  const xmltvNs = `${season - 1}.${episode - 1}.`;
  const onscreen = `S${String(season).padStart(2, '0')}E${String(episode).padStart(2, '0')}`;

  return { xmltvNs, onscreen };
}
