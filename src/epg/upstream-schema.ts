/**
 * Upstream listing payload
 * Programs are validated one at a time so a single bad record does not sink a channel
 */

import { z } from 'zod';

/** airing_attrib bit flags */
export const AIRING_LIVE = 0b1;
export const AIRING_NEW = 0b100;

const optionalText = z.string().nullish();

export const UpstreamProgramSchema = z
  .object({
    id: z.union([z.number(), z.string()]).nullish(),
    name: optionalText,
    title: optionalText,
    description: optionalText,
    episode_title: optionalText,
    episode_number: optionalText,
    genres: z.array(z.string()).nullish(),
    start_timestamp: z.number().finite().nullish(),
    end_timestamp: z.number().finite().nullish(),
    start_time: optionalText,
    end_time: optionalText,
    duration: z.number().positive().finite().nullish(), // minutes
    airing_attrib: z.number().int().nonnegative().nullish(),
  })
  .passthrough();

export type UpstreamProgram = z.infer<typeof UpstreamProgramSchema>;

/**
 * Accepted envelopes: { items: { <day>: [...] } }, { items: [...] }, a bare array,
 * or an object without items (no programs).
 */
export const UpstreamListingSchema = z.union([
  z.array(z.unknown()),
  z
    .object({
      items: z.union([z.array(z.unknown()), z.record(z.array(z.unknown()))]).nullish(),
    })
    .passthrough(),
]);

export type UpstreamListing = z.infer<typeof UpstreamListingSchema>;

/**
 * Flatten the envelope into a list of candidate records in upstream order
 */
export function listingRecords(listing: UpstreamListing): unknown[] {
  if (Array.isArray(listing)) {
    return listing;
  }

  const items = listing.items;
  if (!items) {
    return [];
  }
  if (Array.isArray(items)) {
    return items;
  }
  return Object.values(items).flat();
}

/**
 * Program details endpoint: `{ data: { item: {...} } }`
 */
export const ProgramDetailsSchema = z
  .object({
    id: z.union([z.number(), z.string()]).nullish(),
    title: optionalText,
    episodeTitle: optionalText,
    description: optionalText,
    seasonNumber: z.number().int().positive().nullish(),
    episodeNumber: z.number().int().positive().nullish(),
    releaseYear: z.number().int().min(1800).max(9999).nullish(),
    genres: z.array(z.object({ name: z.string() }).passthrough()).nullish(),
    images: z
      .array(
        z
          .object({
            url: z.string().url(),
            width: z.number().int().positive().nullish(),
            height: z.number().int().positive().nullish(),
          })
          .passthrough()
      )
      .nullish(),
    /** Key of the show's cast and crew page */
    mcoId: z.number().int().positive().nullish(),
  })
  .passthrough();

export type ProgramDetails = z.infer<typeof ProgramDetailsSchema>;

export const ProgramDetailsResponseSchema = z.object({
  data: z.object({ item: ProgramDetailsSchema }).passthrough(),
});

/** Name of the page component that carries cast and crew */
export const CAST_COMPONENT = 'tv-object-cast-and-crew';

export const CastMemberSchema = z
  .object({
    name: z.string(),
    role: optionalText,
    characterName: optionalText,
  })
  .passthrough();

export type CastMember = z.infer<typeof CastMemberSchema>;

export const CastPageSchema = z
  .object({
    components: z
      .array(
        z
          .object({
            meta: z.object({ componentName: optionalText }).passthrough().nullish(),
            data: z.unknown().optional(),
          })
          .passthrough()
      )
      .default([]),
  })
  .passthrough();

export const CastDataSchema = z
  .object({
    items: z.array(CastMemberSchema).default([]),
  })
  .passthrough();

/**
 * Provider-wide schedule: `{ data: { items: [{ programSchedules: [...] }] } }`
 */
export const ScheduleTagsResponseSchema = z.object({
  data: z
    .object({
      items: z.array(
        z
          .object({
            programSchedules: z
              .array(
                z
                  .object({
                    programId: z.union([z.number(), z.string()]).nullish(),
                    startTime: z.number().finite().nullish(), // unix seconds
                    airingAttrib: z.number().int().nonnegative().nullish(),
                  })
                  .passthrough()
              )
              .default([]),
          })
          .passthrough()
      ),
    })
    .passthrough(),
});
