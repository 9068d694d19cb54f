/**
 * Guide Assembler
 * Combines the channel registry with per-channel timelines into one guide document
 */

import type { MissingChannelMode } from '../types/config';
import type {
  Channel,
  ChannelTimeline,
  GeneratorInfo,
  GuideChannel,
  GuideDocument,
  GuideVariant,
  ProgramEntry,
} from '../types/guide';
import { HOUR_MS, parseDuration } from '../utils/time';

export interface PlaceholderOptions {
  duration: string; // e.g., "30min", "1hr", "2hr"
  title: string;
  /** "{channel}" is replaced with the channel display name */
  description: string;
}

export interface AssembleOptions {
  variant: GuideVariant;
  generatedAt: number;
  generator: GeneratorInfo;
  missingChannels: MissingChannelMode;
  windowHours: number;
  placeholder?: PlaceholderOptions;
}

/**
 * Placeholder blocks covering the guide window, aligned to the hour before `from`
 */
export function placeholderProgrammes(
  channel: Channel,
  from: number,
  windowHours: number,
  options: PlaceholderOptions
): ProgramEntry[] {
  const blockMs = Math.round(parseDuration(options.duration) * HOUR_MS);
  const end = from + windowHours * HOUR_MS;
  const description = options.description.replace('{channel}', channel.name);
  const programmes: ProgramEntry[] = [];

  for (let start = Math.floor(from / HOUR_MS) * HOUR_MS; start < end; start += blockMs) {
    programmes.push({
      channelId: channel.id,
      title: options.title,
      description,
      start,
      end: start + blockMs,
      categories: [],
      isNew: false,
      isLive: false,
    });
  }

  return programmes;
}

function guideChannel(channel: Channel, variant: GuideVariant, fields: Pick<GuideChannel, 'status' | 'programmes'>): GuideChannel {
  const icon = channel.icons[variant];
  return Object.freeze({
    id: channel.id,
    displayName: channel.name,
    language: channel.language,
    ...(icon ? { icon } : {}),
    status: fields.status,
    programmes: Object.freeze([...fields.programmes]),
  });
}

/**
 * Assemble one variant of the guide. Pure: no I/O, no clock.
 * Channels keep registry order and programmes keep timeline order.
 */
export function assembleGuide(
  registry: readonly Channel[],
  timelines: ReadonlyMap<string, ChannelTimeline>,
  options: AssembleOptions
): GuideDocument {
  const channels: GuideChannel[] = [];

  for (const channel of registry) {
    const timeline = timelines.get(channel.id);
    if (timeline && timeline.programmes.length > 0) {
      channels.push(guideChannel(channel, options.variant, { status: 'ok', programmes: timeline.programmes }));
      continue;
    }

    switch (options.missingChannels) {
      case 'omit':
        break;
      case 'placeholder':
        channels.push(
          guideChannel(channel, options.variant, {
            status: 'placeholder',
            programmes: options.placeholder
              ? placeholderProgrammes(channel, options.generatedAt, options.windowHours, options.placeholder)
              : [],
          })
        );
        break;
      case 'empty':
        channels.push(guideChannel(channel, options.variant, { status: 'no-data', programmes: [] }));
        break;
    }
  }

  return Object.freeze({
    variant: options.variant,
    generatedAt: options.generatedAt,
    generator: Object.freeze({ ...options.generator }),
    channels: Object.freeze(channels),
  });
}
