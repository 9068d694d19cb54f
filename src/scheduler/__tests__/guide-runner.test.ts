import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type { AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { GuideRunner, artifactFileNames } from '../guide-runner';
import type { ListingSource, TimelineEnricher } from '../guide-runner';
import { ScheduleClient } from '../../api/schedule-client';
import type { FetchedDocument } from '../../api/schedule-client';
import { ProgramEnricher } from '../../epg/enrichment';
import { scheduleClientOptions } from '../../app';
import { getConfig } from '../../types/config';
import type { AppConfig } from '../../types/config';
import type { Channel, RawListing } from '../../types/guide';
import { FetchError } from '../../utils/errors';
import type { Result } from '../../utils/result';
import { err, ok } from '../../utils/result';

const T0 = Date.UTC(2024, 0, 15, 12, 0, 0);

function channel(id: string, lookupKey: string | null = id.toLowerCase()): Channel {
  const slug = id.toLowerCase();
  return {
    id,
    name: id.replace('.us', ''),
    lookupKey,
    language: 'en',
    icons: {
      'for-dark-bg': { src: `https://cdn.test/images/icons/channels-for-dark-bg/${slug}.png`, width: 256, height: 256 },
      'for-light-bg': { src: `https://cdn.test/images/icons/channels-for-light-bg/${slug}.png`, width: 256, height: 256 },
    },
  };
}

const registry: readonly Channel[] = [channel('ABC.us'), channel('CBS.us'), channel('NASATV.us', null)];

function listingBody(title: string): string {
  const start = T0 / 1000;
  return JSON.stringify({
    items: {
      '2024-01-15': [
        { name: title, start_timestamp: start, end_timestamp: start + 3600 },
        { name: `${title} Tonight`, start_timestamp: start + 3600 },
      ],
    },
  });
}

function listingFor(target: Channel, body: string): RawListing {
  return { channelId: target.id, body, status: 200, fetchedAt: T0 };
}

/**
 * Stub source: answers from a per-channel table and records every request
 */
class StubSource implements ListingSource {
  readonly requested: string[] = [];

  constructor(private readonly answer: (target: Channel) => Result<RawListing, FetchError>) {}

  async fetchListing(target: Channel): Promise<Result<RawListing, FetchError>> {
    this.requested.push(target.id);
    return this.answer(target);
  }
}

/**
 * Source that only settles once the run cancels it
 */
class HangingSource implements ListingSource {
  fetchListing(target: Channel, signal?: AbortSignal): Promise<Result<RawListing, FetchError>> {
    return new Promise((resolve) => {
      signal?.addEventListener('abort', () => {
        resolve(err(new FetchError(target.id, 'canceled', `Fetch for ${target.id} canceled`)));
      });
    });
  }
}

describe('GuideRunner', () => {
  let outputDir: string;
  let config: AppConfig;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    outputDir = await fs.mkdtemp(path.join(os.tmpdir(), 'epg-runner-'));
    const defaults = getConfig({});
    config = {
      ...defaults,
      upstream: { ...defaults.upstream, urlTemplate: 'https://epg.test/json/{key}.json' },
      fetch: { ...defaults.fetch, retryBaseDelayMs: 0, retryMaxDelayMs: 0 },
      output: { ...defaults.output, directory: outputDir },
      generator: { name: 'epg-builder', url: 'https://example.test/epg' },
    };
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(outputDir, { recursive: true, force: true });
  });

  function runner(source: ListingSource, overrides: Partial<AppConfig> = {}, enricher?: TimelineEnricher): GuideRunner {
    return new GuideRunner({ ...config, ...overrides }, { registry, source, enricher, now: () => T0 });
  }

  it('publishes both variants with gzip companions', async () => {
    const source = new StubSource((target) => ok(listingFor(target, listingBody(target.name))));
    const report = await runner(source).run();

    expect(report.state).toBe('Done');
    expect(report.transitions).toEqual(['Start', 'Fetching', 'Normalizing', 'Assembling', 'Serializing', 'Done']);
    expect(report.artifacts).toEqual([
      path.join(outputDir, 'for-dark-bg.xml'),
      path.join(outputDir, 'for-dark-bg.xml.gz'),
      path.join(outputDir, 'for-light-bg.xml'),
      path.join(outputDir, 'for-light-bg.xml.gz'),
    ]);
    expect((await fs.readdir(outputDir)).sort()).toEqual([
      'for-dark-bg.xml',
      'for-dark-bg.xml.gz',
      'for-light-bg.xml',
      'for-light-bg.xml.gz',
    ]);
    expect(report.channels).toEqual([
      { channelId: 'ABC.us', status: 'ok', programmes: 2 },
      { channelId: 'CBS.us', status: 'ok', programmes: 2 },
      { channelId: 'NASATV.us', status: 'skipped' },
    ]);
  });

  it('never fetches a channel without a lookup key', async () => {
    const source = new StubSource((target) => ok(listingFor(target, listingBody(target.name))));
    await runner(source).run();

    expect(source.requested.sort()).toEqual(['ABC.us', 'CBS.us']);
  });

  it('writes variants that differ only in icon URLs', async () => {
    const source = new StubSource((target) => ok(listingFor(target, listingBody(target.name))));
    await runner(source).run();

    const dark = await fs.readFile(path.join(outputDir, 'for-dark-bg.xml'), 'utf-8');
    const light = await fs.readFile(path.join(outputDir, 'for-light-bg.xml'), 'utf-8');

    expect(dark).toContain('<icon src="https://cdn.test/images/icons/channels-for-dark-bg/abc.us.png"');
    expect(dark.replaceAll('channels-for-dark-bg', 'channels-for-light-bg')).toBe(light);
  });

  it('completes when only some channels fail', async () => {
    const source = new StubSource((target) =>
      target.id === 'CBS.us'
        ? err(new FetchError(target.id, 'timeout', 'Timed out fetching CBS.us'))
        : ok(listingFor(target, listingBody(target.name)))
    );
    const report = await runner(source).run();

    expect(report.state).toBe('Done');
    expect(report.artifacts).toHaveLength(4);
    expect(report.channels[1]).toEqual({
      channelId: 'CBS.us',
      status: 'failed',
      stage: 'fetch',
      kind: 'timeout',
      message: 'Timed out fetching CBS.us',
    });

    const dark = await fs.readFile(path.join(outputDir, 'for-dark-bg.xml'), 'utf-8');
    expect(dark).not.toContain('channel="CBS.us"');
    expect(dark).toContain('<channel id="CBS.us">');
  });

  it('skips out-of-range times without failing the run', async () => {
    const start = T0 / 1000;
    const extreme = [
      `{"name":"ABC Morning","start_timestamp":${start},"end_timestamp":${start + 3600}}`,
      `{"name":"Forever Show","start_timestamp":${start + 3600},"end_timestamp":1e13}`,
      `{"name":"Endless","start_timestamp":${start + 7200},"duration":1e400}`,
    ];
    const source = new StubSource((target) =>
      ok(listingFor(target, target.id === 'ABC.us' ? `{"items":[${extreme.join(',')}]}` : listingBody(target.name)))
    );

    const report = await runner(source).run();

    expect(report.state).toBe('Done');
    expect(report.artifacts).toHaveLength(4);
    expect(report.channels.slice(0, 2)).toEqual([
      { channelId: 'ABC.us', status: 'ok', programmes: 2 },
      { channelId: 'CBS.us', status: 'ok', programmes: 2 },
    ]);

    const dark = await fs.readFile(path.join(outputDir, 'for-dark-bg.xml'), 'utf-8');
    expect(dark).toContain('<programme start="20240115130000 +0000" stop="20240115140000 +0000" channel="ABC.us">');
    expect(dark).not.toContain('Endless');
  });

  it('records parse failures per channel', async () => {
    const source = new StubSource((target) =>
      ok(listingFor(target, target.id === 'ABC.us' ? 'not json' : listingBody(target.name)))
    );
    const report = await runner(source).run();

    expect(report.state).toBe('Done');
    expect(report.channels[0]).toMatchObject({ channelId: 'ABC.us', status: 'failed', stage: 'parse', kind: 'malformed-input' });
  });

  it('fails without touching existing files when no channel is usable', async () => {
    const existing = path.join(outputDir, 'for-dark-bg.xml');
    await fs.writeFile(existing, 'previous guide');
    const source = new StubSource((target) => err(new FetchError(target.id, 'network', 'Network Error')));

    const report = await runner(source).run();

    expect(report.state).toBe('Failed');
    expect(report.error?.reason).toBe('no-usable-channels');
    expect(report.transitions).toEqual(['Start', 'Fetching', 'Normalizing', 'Failed']);
    expect(report.artifacts).toEqual([]);
    expect(await fs.readFile(existing, 'utf-8')).toBe('previous guide');
    expect(await fs.readdir(outputDir)).toEqual(['for-dark-bg.xml']);
  });

  it('treats channels with empty listings as unusable', async () => {
    const source = new StubSource((target) => ok(listingFor(target, '{"items":{}}')));
    const report = await runner(source).run();

    expect(report.state).toBe('Failed');
    expect(report.error?.reason).toBe('no-usable-channels');
    expect(report.channels.map((outcome) => outcome.status)).toEqual(['empty', 'empty', 'skipped']);
  });

  it('cancels outstanding fetches when the run deadline passes', async () => {
    const report = await runner(new HangingSource(), { run: { timeoutMs: 20 } }).run();

    expect(report.state).toBe('Failed');
    expect(report.error?.reason).toBe('no-usable-channels');
    expect(report.channels.slice(0, 2).map((outcome) => (outcome.status === 'failed' ? outcome.kind : outcome.status))).toEqual([
      'canceled',
      'canceled',
    ]);
  });

  it('rejects a run while another is in progress', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const source: ListingSource = {
      async fetchListing(target) {
        await gate;
        return ok(listingFor(target, listingBody(target.name)));
      },
    };
    const guideRunner = runner(source);

    const first = guideRunner.run();
    expect(guideRunner.isRunInProgress()).toBe(true);

    const second = await guideRunner.run();
    expect(second.state).toBe('Failed');
    expect(second.error?.reason).toBe('busy');
    expect(second.transitions).toEqual(['Start', 'Failed']);

    release();
    expect((await first).state).toBe('Done');
    expect(guideRunner.isRunInProgress()).toBe(false);
  });

  it('skips gzip companions when archives are off', async () => {
    const source = new StubSource((target) => ok(listingFor(target, listingBody(target.name))));
    const report = await runner(source, { output: { ...config.output, createArchive: false } }).run();

    expect(report.artifacts.map((artifact) => path.basename(artifact))).toEqual(['for-dark-bg.xml', 'for-light-bg.xml']);
  });

  it('reports a publish failure when the output directory cannot be created', async () => {
    const blocker = path.join(outputDir, 'not-a-dir');
    await fs.writeFile(blocker, '');
    const source = new StubSource((target) => ok(listingFor(target, listingBody(target.name))));

    const report = await runner(source, { output: { ...config.output, directory: blocker } }).run();

    expect(report.state).toBe('Failed');
    expect(report.error?.reason).toBe('publish-failed');
    expect(report.transitions).toEqual(['Start', 'Fetching', 'Normalizing', 'Assembling', 'Serializing', 'Failed']);
  });

  it('writes enriched programmes and reports the lookups', async () => {
    const start = T0 / 1000;
    const body = JSON.stringify({ items: [{ id: 9001, name: 'Heist Night', start_timestamp: start, end_timestamp: start + 7200 }] });
    const documents: Record<string, string> = {
      'https://api.test/details/9001': JSON.stringify({
        data: { item: { id: 9001, releaseYear: 1994, mcoId: 555, images: [{ url: 'https://cdn.test/posters/heist.jpg' }] } },
      }),
      'https://api.test/cast/555': JSON.stringify({
        components: [
          {
            meta: { componentName: 'tv-object-cast-and-crew' },
            data: { items: [{ name: 'Pat Example', role: 'Actor', characterName: 'Vault Keeper' }] },
          },
        ],
      }),
    };
    const pages = {
      async fetchDocument(url: string, ownerId: string): Promise<Result<FetchedDocument, FetchError>> {
        const page = documents[url];
        return page === undefined
          ? err(new FetchError(ownerId, 'unexpected-status', `Failed to fetch ${url} for ${ownerId}`))
          : ok({ url, body: page, status: 200, fetchedAt: T0 });
      },
    };
    const enricher = new ProgramEnricher(
      {
        detailsUrlTemplate: 'https://api.test/details/{id}',
        creditsUrlTemplate: 'https://api.test/cast/{id}',
        concurrency: 2,
        windowHours: 48,
        tagsLookbackMinutes: 30,
      },
      { programs: pages, schedule: pages }
    );
    const source = new StubSource((target) => ok(listingFor(target, target.id === 'ABC.us' ? body : listingBody(target.name))));

    const report = await runner(source, {}, enricher).run();

    expect(report.state).toBe('Done');
    expect(report.transitions).toEqual(['Start', 'Fetching', 'Normalizing', 'Assembling', 'Serializing', 'Done']);
    expect(report.enrichment).toEqual({ programmes: 3, details: 1, credits: 1, tagged: 0, failures: 0 });

    const dark = await fs.readFile(path.join(outputDir, 'for-dark-bg.xml'), 'utf-8');
    expect(dark).toContain('<actor role="Vault Keeper">Pat Example</actor>');
    expect(dark).toContain('<date>1994</date>');
    expect(dark).toContain('<icon src="https://cdn.test/posters/heist.jpg"');
  });

  it('publishes the listings as they are when enrichment breaks', async () => {
    const source = new StubSource((target) => ok(listingFor(target, listingBody(target.name))));
    const enricher: TimelineEnricher = {
      enrich: async () => {
        throw new Error('details service unreachable');
      },
    };

    const report = await runner(source, {}, enricher).run();

    expect(report.state).toBe('Done');
    expect(report.enrichment).toBeUndefined();
    expect(report.artifacts).toHaveLength(4);
    expect(console.warn).toHaveBeenCalledWith('Enrichment skipped: details service unreachable');
  });

  it('runs end to end through the schedule client', async () => {
    const requested: string[] = [];
    const adapter = (request: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      const url = request.url ?? '';
      requested.push(url);
      const title = url.includes('/abc.us.') ? 'ABC Morning' : 'CBS Morning';
      return Promise.resolve({ data: listingBody(title), status: 200, statusText: 'OK', headers: {}, config: request });
    };
    const source = new ScheduleClient({ ...scheduleClientOptions(config), adapter, now: () => T0 });

    const report = await runner(source).run();

    expect(report.state).toBe('Done');
    expect(requested.sort()).toEqual(['https://epg.test/json/abc.us.json', 'https://epg.test/json/cbs.us.json']);

    const light = await fs.readFile(path.join(outputDir, 'for-light-bg.xml'), 'utf-8');
    expect(light).toContain('<title lang="en">ABC Morning</title>');
    expect(light).toContain('<programme start="20240115120000 +0000" stop="20240115130000 +0000" channel="ABC.us">');
  });
});

describe('artifactFileNames', () => {
  it('names the XML file and its gzip companion', () => {
    expect(artifactFileNames('for-light-bg')).toEqual({ xml: 'for-light-bg.xml', gzip: 'for-light-bg.xml.gz' });
  });
});
