/**
 * Guide data model
 * Shared by the fetcher, normalizer, assembler and serializer
 */

export const GUIDE_VARIANTS = ['for-dark-bg', 'for-light-bg'] as const;

export type GuideVariant = (typeof GUIDE_VARIANTS)[number];

export interface Icon {
  src: string;
  width?: number;
  height?: number;
}

export type ChannelIcon = Icon;

export interface Channel {
  readonly id: string;
  readonly name: string;
  /** Upstream listing key; null means the channel has no upstream listing */
  readonly lookupKey: string | null;
  readonly language: string;
  /** Zone for wall-clock upstream times, e.g. "America/Chicago" or "UTC-5" */
  readonly timeZone?: string;
  readonly icons: Readonly<Partial<Record<GuideVariant, ChannelIcon>>>;
}

export interface RawListing {
  channelId: string;
  body: string;
  status: number;
  fetchedAt: number; // epoch ms
}

export interface EpisodeNumber {
  xmltvNs: string;
  onscreen: string;
}

/** XMLTV credit roles, in the order <credits> lists them */
export const CREDIT_ROLES = ['director', 'actor', 'writer', 'producer', 'composer', 'presenter', 'guest'] as const;

export type CreditRole = (typeof CREDIT_ROLES)[number];

export interface Credit {
  role: CreditRole;
  name: string;
  /** Character played, actors only */
  character?: string;
}

/**
 * Upstream identity of an airing, used to join detail and tag lookups
 */
export interface ProgramSource {
  programId: string;
  /** Scheduled start before any window clipping, epoch ms */
  airingStart: number;
}

export interface ProgramEntry {
  channelId: string;
  title: string;
  subTitle?: string;
  description?: string;
  start: number; // epoch ms
  end: number; // epoch ms
  categories: string[];
  episode?: EpisodeNumber;
  /** Release year or date, e.g. "1994" */
  date?: string;
  icon?: Icon;
  credits?: Credit[];
  isNew: boolean;
  isLive: boolean;
  source?: ProgramSource;
}

export interface ChannelTimeline {
  channelId: string;
  fetchedAt: number;
  windowStart: number;
  windowEnd: number;
  programmes: ProgramEntry[];
}

export type GuideChannelStatus = 'ok' | 'no-data' | 'placeholder';

export interface GuideChannel {
  readonly id: string;
  readonly displayName: string;
  readonly language: string;
  readonly icon?: ChannelIcon;
  readonly status: GuideChannelStatus;
  readonly programmes: readonly ProgramEntry[];
}

export interface GeneratorInfo {
  name: string;
  url: string;
}

export interface GuideDocument {
  readonly variant: GuideVariant;
  readonly generatedAt: number;
  readonly generator: GeneratorInfo;
  readonly channels: readonly GuideChannel[];
}
