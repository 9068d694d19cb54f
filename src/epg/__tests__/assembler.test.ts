import { describe, it, expect } from 'vitest';
import { assembleGuide, placeholderProgrammes } from '../assembler';
import type { AssembleOptions } from '../assembler';
import type { Channel, ChannelTimeline, ProgramEntry } from '../../types/guide';
import { HOUR_MS, MINUTE_MS } from '../../utils/time';

const T0 = Date.UTC(2024, 0, 15, 12, 0, 0);

function channel(id: string, name: string, lookupKey: string | null = id): Channel {
  return {
    id,
    name,
    lookupKey,
    language: 'en',
    icons: {
      'for-dark-bg': { src: `https://cdn.test/images/icons/channels-for-dark-bg/${id}.png`, width: 256, height: 256 },
      'for-light-bg': { src: `https://cdn.test/images/icons/channels-for-light-bg/${id}.png`, width: 256, height: 256 },
    },
  };
}

function programme(channelId: string, title: string, startOffsetHours: number): ProgramEntry {
  const start = T0 + startOffsetHours * HOUR_MS;
  return { channelId, title, start, end: start + HOUR_MS, categories: [], isNew: false, isLive: false };
}

function timeline(channelId: string, programmes: ProgramEntry[]): ChannelTimeline {
  return { channelId, fetchedAt: T0, windowStart: T0, windowEnd: T0 + 48 * HOUR_MS, programmes };
}

const registry: readonly Channel[] = [
  channel('ABC.us', 'ABC'),
  channel('CBS.us', 'CBS'),
  channel('NASATV.us', 'NASA TV', null),
];

const timelines = new Map<string, ChannelTimeline>([
  ['CBS.us', timeline('CBS.us', [programme('CBS.us', 'News', 0), programme('CBS.us', 'Weather', 1)])],
  ['ABC.us', timeline('ABC.us', [programme('ABC.us', 'Morning', 0)])],
  ['NASATV.us', timeline('NASATV.us', [])],
]);

const baseOptions: AssembleOptions = {
  variant: 'for-dark-bg',
  generatedAt: T0,
  generator: { name: 'epg-builder', url: 'https://example.test/epg' },
  missingChannels: 'empty',
  windowHours: 48,
  placeholder: { duration: '1hr', title: 'Off Air', description: '{channel} is off air' },
};

describe('assembleGuide', () => {
  it('keeps registry order and timeline order', () => {
    const doc = assembleGuide(registry, timelines, baseOptions);

    expect(doc.channels.map((c) => c.id)).toEqual(['ABC.us', 'CBS.us', 'NASATV.us']);
    expect(doc.channels[1].programmes.map((p) => p.title)).toEqual(['News', 'Weather']);
    expect(doc.generatedAt).toBe(T0);
    expect(doc.generator).toEqual({ name: 'epg-builder', url: 'https://example.test/epg' });
  });

  it('lists channels without data with no programmes in empty mode', () => {
    const doc = assembleGuide(registry, timelines, baseOptions);

    expect(doc.channels.map((c) => c.status)).toEqual(['ok', 'ok', 'no-data']);
    expect(doc.channels[2].programmes).toEqual([]);
  });

  it('treats a channel missing from the timelines like an empty one', () => {
    const doc = assembleGuide(registry, new Map([['ABC.us', timelines.get('ABC.us') ?? timeline('ABC.us', [])]]), baseOptions);

    expect(doc.channels.map((c) => [c.id, c.status])).toEqual([
      ['ABC.us', 'ok'],
      ['CBS.us', 'no-data'],
      ['NASATV.us', 'no-data'],
    ]);
  });

  it('drops channels without data in omit mode', () => {
    const doc = assembleGuide(registry, timelines, { ...baseOptions, missingChannels: 'omit' });

    expect(doc.channels.map((c) => c.id)).toEqual(['ABC.us', 'CBS.us']);
  });

  it('fills channels without data with placeholder blocks', () => {
    const doc = assembleGuide(registry, timelines, {
      ...baseOptions,
      missingChannels: 'placeholder',
      generatedAt: T0 + 30 * MINUTE_MS,
      windowHours: 3,
    });

    const nasa = doc.channels[2];
    expect(nasa.status).toBe('placeholder');
    expect(nasa.programmes.map((p) => p.start)).toEqual([T0, T0 + HOUR_MS, T0 + 2 * HOUR_MS, T0 + 3 * HOUR_MS]);
    expect(nasa.programmes[0]).toEqual({
      channelId: 'NASATV.us',
      title: 'Off Air',
      description: 'NASA TV is off air',
      start: T0,
      end: T0 + HOUR_MS,
      categories: [],
      isNew: false,
      isLive: false,
    });
  });

  it('produces variants that differ only in icons', () => {
    const dark = assembleGuide(registry, timelines, baseOptions);
    const light = assembleGuide(registry, timelines, { ...baseOptions, variant: 'for-light-bg' });

    expect(dark.channels[0].icon?.src).toBe('https://cdn.test/images/icons/channels-for-dark-bg/ABC.us.png');
    expect(light.channels[0].icon?.src).toBe('https://cdn.test/images/icons/channels-for-light-bg/ABC.us.png');

    const withoutIcons = (doc: typeof dark) => doc.channels.map(({ icon: _icon, ...rest }) => rest);
    expect(withoutIcons(light)).toEqual(withoutIcons(dark));
  });

  it('leaves the icon out when the variant has none', () => {
    const bare: Channel = { ...channel('PBS.us', 'PBS'), icons: {} };
    const doc = assembleGuide([bare], new Map([['PBS.us', timeline('PBS.us', [programme('PBS.us', 'Docs', 0)])]]), baseOptions);

    expect('icon' in doc.channels[0]).toBe(false);
  });

  it('returns a frozen document', () => {
    const doc = assembleGuide(registry, timelines, baseOptions);

    expect(Object.isFrozen(doc)).toBe(true);
    expect(Object.isFrozen(doc.channels)).toBe(true);
    expect(Object.isFrozen(doc.channels[0])).toBe(true);
    expect(Object.isFrozen(doc.channels[0].programmes)).toBe(true);
  });
});

describe('placeholderProgrammes', () => {
  it('uses the configured block length', () => {
    const blocks = placeholderProgrammes(channel('ABC.us', 'ABC'), T0, 2, {
      duration: '30min',
      title: 'Off Air',
      description: 'Nothing scheduled',
    });

    expect(blocks).toHaveLength(4);
    expect(blocks[3].start).toBe(T0 + 90 * MINUTE_MS);
    expect(blocks[3].end).toBe(T0 + 2 * HOUR_MS);
  });
});
