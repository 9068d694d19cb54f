/**
 * Application configuration types
 */

import { ConfigError } from '../utils/errors';

export type OverlapPolicy = 'prefer-description' | 'earliest-start';

export type MissingChannelMode = 'empty' | 'omit' | 'placeholder';

export interface AppConfig {
  upstream: {
    urlTemplate: string;
    referer?: string;
    userAgent: string;
    /** Zone applied to upstream wall-clock times without an explicit offset */
    sourceTimeZone: string;
  };
  fetch: {
    concurrency: number;
    timeoutMs: number;
    timeoutIncrementMs: number;
    timeoutMaxMs: number;
    maxAttempts: number;
    retryBaseDelayMs: number;
    retryMaxDelayMs: number;
  };
  run: {
    timeoutMs: number;
  };
  guide: {
    windowHours: number;
    defaultDurationMinutes: number;
    overlapPolicy: OverlapPolicy;
    clipToFetchTime: boolean;
    missingChannels: MissingChannelMode;
    placeholder: {
      duration: string;
      title: string;
      description: string;
    };
  };
  output: {
    directory: string;
    createArchive: boolean;
    iconsBaseUrl: string;
    /** Offset in minutes used when rendering XMLTV times */
    utcOffsetMinutes: number;
  };
  generator: {
    name: string;
    url: string;
  };
  /** Optional lookups against the program pages; off unless ENRICH_PROGRAMS=true */
  enrichment: {
    enabled: boolean;
    /** `{id}` is the upstream program id */
    detailsUrlTemplate: string;
    /** `{id}` is the show id found in the program details */
    creditsUrlTemplate: string;
    /** `{start}` and `{duration}`; empty disables the airing tags lookup */
    tagsUrlTemplate?: string;
    referer?: string;
    tagsTimeoutMs: number;
    tagsTimeoutIncrementMs: number;
    tagsTimeoutMaxMs: number;
    tagsLookbackMinutes: number;
  };
  dataDir: string;
  scheduler: {
    cronSchedule: string;
    /** Run once as soon as the scheduler starts */
    runOnStart: boolean;
  };
  timezone: string;
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

type Env = Record<string, string | undefined>;

export function getConfig(env: Env = process.env): AppConfig {
  return {
    upstream: {
      urlTemplate: env.UPSTREAM_URL_TEMPLATE || 'https://epg.example.com/json/{key}.json',
      referer: env.UPSTREAM_REFERER || undefined,
      userAgent: env.UPSTREAM_USER_AGENT || DEFAULT_USER_AGENT,
      sourceTimeZone: env.SOURCE_TIMEZONE || 'America/New_York',
    },
    fetch: {
      concurrency: readInt(env, 'FETCH_CONCURRENCY', 10, 1),
      timeoutMs: readInt(env, 'FETCH_TIMEOUT_MS', 1000, 1),
      timeoutIncrementMs: readInt(env, 'FETCH_TIMEOUT_INCREMENT_MS', 1000, 0),
      timeoutMaxMs: readInt(env, 'FETCH_TIMEOUT_MAX_MS', 10000, 1),
      maxAttempts: readInt(env, 'FETCH_MAX_ATTEMPTS', 4, 1),
      retryBaseDelayMs: readInt(env, 'FETCH_RETRY_BASE_DELAY_MS', 500, 0),
      retryMaxDelayMs: readInt(env, 'FETCH_RETRY_MAX_DELAY_MS', 5000, 0),
    },
    run: {
      timeoutMs: readInt(env, 'RUN_TIMEOUT_MS', 300000, 1),
    },
    guide: {
      windowHours: readInt(env, 'GUIDE_WINDOW_HOURS', 48, 1),
      defaultDurationMinutes: readInt(env, 'DEFAULT_DURATION_MINUTES', 60, 1),
      overlapPolicy: readChoice(env, 'OVERLAP_POLICY', ['prefer-description', 'earliest-start'], 'prefer-description'),
      clipToFetchTime: env.CLIP_TO_FETCH_TIME !== 'false',
      missingChannels: readChoice(env, 'MISSING_CHANNELS', ['empty', 'omit', 'placeholder'], 'empty'),
      placeholder: {
        duration: env.PLACEHOLDER_DURATION || '1hr',
        title: env.PLACEHOLDER_TITLE || 'No Information',
        description: env.PLACEHOLDER_DESC || 'No program information is currently available for {channel}.',
      },
    },
    output: {
      directory: env.OUTPUT_DIR || './output',
      createArchive: env.CREATE_ARCHIVE !== 'false',
      iconsBaseUrl: env.ICONS_BASE_URL || 'https://epg.example.com/tvguide',
      utcOffsetMinutes: parseUtcOffset(env.OUTPUT_UTC_OFFSET || '+0000'),
    },
    generator: {
      name: env.GENERATOR_NAME || 'epg-builder',
      url: env.GENERATOR_URL || 'https://epg.example.com',
    },
    enrichment: {
      enabled: env.ENRICH_PROGRAMS === 'true',
      detailsUrlTemplate: env.ENRICH_DETAILS_URL_TEMPLATE || 'https://api.example.com/tvguide/programdetails/{id}/web',
      creditsUrlTemplate:
        env.ENRICH_CREDITS_URL_TEMPLATE || 'https://api.example.com/tvguide/pages/shows-cast/{id}/web?contentOnly=true',
      tagsUrlTemplate:
        env.ENRICH_TAGS_URL_TEMPLATE === ''
          ? undefined
          : env.ENRICH_TAGS_URL_TEMPLATE || 'https://api.example.com/tvguide/schedules/web?start={start}&duration={duration}',
      referer: env.ENRICH_REFERER || undefined,
      tagsTimeoutMs: readInt(env, 'ENRICH_TAGS_TIMEOUT_MS', 30000, 1),
      tagsTimeoutIncrementMs: readInt(env, 'ENRICH_TAGS_TIMEOUT_INCREMENT_MS', 5000, 0),
      tagsTimeoutMaxMs: readInt(env, 'ENRICH_TAGS_TIMEOUT_MAX_MS', 60000, 1),
      tagsLookbackMinutes: readInt(env, 'ENRICH_TAGS_LOOKBACK_MINUTES', 30, 0),
    },
    dataDir: env.DATA_DIR || './data',
    scheduler: {
      cronSchedule: env.CRON_SCHEDULE || '0 * * * *',
      runOnStart: env.RUN_ON_START !== 'false',
    },
    timezone: env.TZ || 'UTC',
  };
}

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`, { name, value: raw });
  }
  return value;
}

function readChoice<T extends string>(env: Env, name: string, choices: readonly T[], fallback: T): T {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }

  const match = choices.find((choice) => choice === raw);
  if (!match) {
    throw new ConfigError(`${name} must be one of ${choices.join(', ')}, got "${raw}"`, { name, value: raw });
  }
  return match;
}

/**
 * Parse "+0530" / "-05:00" / "Z" into minutes east of UTC
 */
export function parseUtcOffset(raw: string): number {
  if (raw === 'Z' || raw === 'UTC') {
    return 0;
  }

  const match = raw.match(/^([+-])(\d{2}):?(\d{2})$/);
  if (!match) {
    throw new ConfigError(`Invalid UTC offset "${raw}"`, { value: raw });
  }

  const minutes = parseInt(match[2], 10) * 60 + parseInt(match[3], 10);
  if (minutes > 14 * 60) {
    throw new ConfigError(`UTC offset out of range "${raw}"`, { value: raw });
  }
  return match[1] === '-' ? -minutes : minutes;
}
