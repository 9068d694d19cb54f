/**
 * Guide Run Orchestrator
 * Coordinates listing fetches, normalization, assembly, serialization and file writing
 */

import { randomUUID } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { assembleGuide } from '../epg/assembler';
import type { EnrichmentResult, EnrichmentStats } from '../epg/enrichment';
import { emptyTimeline, normalizeListing } from '../epg/normalizer';
import type { NormalizePolicy } from '../epg/normalizer';
import type { AppConfig } from '../types/config';
import { GUIDE_VARIANTS } from '../types/guide';
import type { Channel, ChannelTimeline, GuideDocument, GuideVariant, RawListing } from '../types/guide';
import { FetchError, ParseError, RunError, SerializeError, errorMessage } from '../utils/errors';
import type { Result } from '../utils/result';
import { XMLTVSerializer } from '../xmltv/serializer';
import type { SerializedGuide } from '../xmltv/serializer';
import { runPool } from './pool';

export type RunState = 'Start' | 'Fetching' | 'Normalizing' | 'Assembling' | 'Serializing' | 'Done' | 'Failed';

export interface ListingSource {
  fetchListing(channel: Channel, signal?: AbortSignal): Promise<Result<RawListing, FetchError>>;
}

export interface TimelineEnricher {
  enrich(timelines: ReadonlyMap<string, ChannelTimeline>, startedAt: number, signal?: AbortSignal): Promise<EnrichmentResult>;
}

/**
 * Everything one run needs; built fresh for every run
 */
export interface RunContext {
  runId: string;
  startedAt: number;
  signal: AbortSignal;
  config: AppConfig;
}

export type ChannelOutcome =
  | { channelId: string; status: 'ok'; programmes: number }
  | { channelId: string; status: 'empty' }
  | { channelId: string; status: 'skipped' }
  | { channelId: string; status: 'failed'; stage: 'fetch' | 'parse'; kind: string; message: string };

export interface RunReport {
  runId: string;
  state: 'Done' | 'Failed';
  transitions: RunState[];
  startedAt: number;
  finishedAt: number;
  durationMs: number;
  channels: ChannelOutcome[];
  artifacts: string[];
  enrichment?: EnrichmentStats;
  error?: RunError;
}

export interface GuideRunnerDeps {
  registry: readonly Channel[];
  source: ListingSource;
  /** Runs after normalization when present; its failures never fail the run */
  enricher?: TimelineEnricher;
  now?: () => number;
}

type FetchOutcome =
  | { channel: Channel; skipped: true }
  | { channel: Channel; skipped: false; result: Result<RawListing, FetchError> };

export function artifactFileNames(variant: GuideVariant): { xml: string; gzip: string } {
  return { xml: `${variant}.xml`, gzip: `${variant}.xml.gz` };
}

export class GuideRunner {
  private readonly config: AppConfig;
  private readonly deps: GuideRunnerDeps;
  private readonly now: () => number;
  private isRunning = false;

  constructor(config: AppConfig, deps: GuideRunnerDeps) {
    this.config = config;
    this.deps = deps;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Perform one complete run. Never throws: the outcome is in the report.
   */
  async run(): Promise<RunReport> {
    const startedAt = this.now();
    const transitions: RunState[] = ['Start'];

    // Prevent concurrent runs
    if (this.isRunning) {
      return this.finish({
        runId: randomUUID(),
        startedAt,
        transitions,
        channels: [],
        artifacts: [],
        error: new RunError('busy', 'A run is already in progress'),
      });
    }

    this.isRunning = true;
    const controller = new AbortController();
    const ctx: RunContext = {
      runId: randomUUID(),
      startedAt,
      signal: controller.signal,
      config: this.config,
    };

    const deadline = setTimeout(() => {
      console.warn(`Run timeout of ${ctx.config.run.timeoutMs}ms reached, canceling pending requests`);
      controller.abort();
    }, ctx.config.run.timeoutMs);

    const outcomes: ChannelOutcome[] = [];
    let artifacts: string[] = [];
    let enrichment: EnrichmentStats | undefined;

    try {
      console.log('========== Guide Run Started ==========');
      console.log(`Run: ${ctx.runId}`);
      console.log(`Time: ${new Date(startedAt).toISOString()}`);

      // Step 1: Fetch listings for every channel
      transitions.push('Fetching');
      console.log(
        `\n[1/4] Fetching listings for ${this.deps.registry.length} channels (concurrency ${ctx.config.fetch.concurrency})...`
      );
      const fetched = await this.fetchAll(ctx);

      // Step 2: Normalize each listing into a timeline
      transitions.push('Normalizing');
      console.log('[2/4] Normalizing listings...');
      let timelines = this.normalizeAll(ctx, fetched, outcomes);

      const usable = outcomes.filter((outcome) => outcome.status === 'ok').length;
      const failed = outcomes.filter((outcome) => outcome.status === 'failed').length;
      console.log(`Channels: ${usable} with programmes, ${failed} failed, ${outcomes.length - usable - failed} without data`);

      if (usable === 0) {
        throw new RunError('no-usable-channels', 'No channel produced a usable timeline', { failed });
      }

      if (this.deps.enricher) {
        const enriched = await this.enrich(ctx, this.deps.enricher, timelines);
        timelines = enriched.timelines;
        enrichment = enriched.stats;
      }

      // Step 3: Assemble one document per variant
      transitions.push('Assembling');
      console.log('[3/4] Assembling guide documents...');
      const documents = GUIDE_VARIANTS.map((variant) => this.assemble(ctx, variant, timelines));

      // Step 4: Serialize every variant, then write all artifacts together
      transitions.push('Serializing');
      console.log('[4/4] Serializing and writing guide files...');
      const serialized = this.serializeAll(ctx, documents);
      artifacts = await this.writeArtifacts(ctx, serialized);

      transitions.push('Done');
      const report = this.finish({ runId: ctx.runId, startedAt, transitions, channels: outcomes, artifacts, enrichment });
      console.log('\n========== Guide Run Completed ==========');
      console.log(`Duration: ${(report.durationMs / 1000).toFixed(2)} seconds`);
      for (const artifact of artifacts) {
        console.log(`Wrote: ${artifact}`);
      }
      return report;
    } catch (error) {
      const runError =
        error instanceof RunError ? error : new RunError('publish-failed', `Run aborted: ${errorMessage(error)}`);
      const report = this.finish({
        runId: ctx.runId,
        startedAt,
        transitions,
        channels: outcomes,
        artifacts: [],
        enrichment,
        error: runError,
      });
      console.error('\n========== Guide Run Failed ==========');
      console.error(`Duration: ${(report.durationMs / 1000).toFixed(2)} seconds`);
      console.error(`Error: ${runError.message}`);
      return report;
    } finally {
      clearTimeout(deadline);
      this.isRunning = false;
    }
  }

  isRunInProgress(): boolean {
    return this.isRunning;
  }

  private finish(fields: {
    runId: string;
    startedAt: number;
    transitions: RunState[];
    channels: ChannelOutcome[];
    artifacts: string[];
    enrichment?: EnrichmentStats;
    error?: RunError;
  }): RunReport {
    const finishedAt = this.now();
    const state = fields.error ? 'Failed' : 'Done';
    if (state === 'Failed') {
      fields.transitions.push('Failed');
    }
    return {
      runId: fields.runId,
      state,
      transitions: fields.transitions,
      startedAt: fields.startedAt,
      finishedAt,
      durationMs: finishedAt - fields.startedAt,
      channels: fields.channels,
      artifacts: fields.artifacts,
      ...(fields.enrichment ? { enrichment: fields.enrichment } : {}),
      error: fields.error,
    };
  }

  /**
   * Fetch every channel through the worker pool; resolves once all have settled
   */
  private fetchAll(ctx: RunContext): Promise<FetchOutcome[]> {
    return runPool(this.deps.registry, ctx.config.fetch.concurrency, async (channel): Promise<FetchOutcome> => {
      if (!channel.lookupKey) {
        return { channel, skipped: true };
      }
      const result = await this.deps.source.fetchListing(channel, ctx.signal);
      return { channel, skipped: false, result };
    });
  }

  private normalizeAll(ctx: RunContext, fetched: FetchOutcome[], outcomes: ChannelOutcome[]): Map<string, ChannelTimeline> {
    const { guide, upstream } = ctx.config;
    const policy: NormalizePolicy = {
      windowHours: guide.windowHours,
      defaultDurationMinutes: guide.defaultDurationMinutes,
      overlapPolicy: guide.overlapPolicy,
      clipToFetchTime: guide.clipToFetchTime,
      sourceTimeZone: upstream.sourceTimeZone,
    };
    const timelines = new Map<string, ChannelTimeline>();

    for (const item of fetched) {
      const channelId = item.channel.id;

      if (item.skipped) {
        timelines.set(channelId, emptyTimeline(channelId, ctx.startedAt, policy.windowHours));
        outcomes.push({ channelId, status: 'skipped' });
        continue;
      }

      if (!item.result.ok) {
        outcomes.push(this.failure('fetch', item.result.error));
        continue;
      }

      const normalized = normalizeListing(item.result.value, item.channel, policy);
      if (!normalized.ok) {
        outcomes.push(this.failure('parse', normalized.error));
        continue;
      }

      timelines.set(channelId, normalized.value);
      const count = normalized.value.programmes.length;
      outcomes.push(count > 0 ? { channelId, status: 'ok', programmes: count } : { channelId, status: 'empty' });
    }

    return timelines;
  }

  private failure(stage: 'fetch' | 'parse', error: FetchError | ParseError): ChannelOutcome {
    console.warn(`Channel ${error.channelId} failed during ${stage} (${error.kind}): ${error.message}`);
    return { channelId: error.channelId, status: 'failed', stage, kind: error.kind, message: error.message };
  }

  /**
   * Enrichment only adds detail; when it breaks, the listings go out as they are
   */
  private async enrich(
    ctx: RunContext,
    enricher: TimelineEnricher,
    timelines: Map<string, ChannelTimeline>
  ): Promise<{ timelines: Map<string, ChannelTimeline>; stats?: EnrichmentStats }> {
    console.log('Enriching programmes with details, credits and airing tags...');
    try {
      const { timelines: enriched, stats } = await enricher.enrich(timelines, ctx.startedAt, ctx.signal);
      console.log(
        `Enriched ${stats.details} of ${stats.programmes} programmes (${stats.credits} with credits, ${stats.tagged} tagged, ${stats.failures} failed lookups)`
      );
      return { timelines: new Map(enriched), stats };
    } catch (error) {
      console.warn(`Enrichment skipped: ${errorMessage(error)}`);
      return { timelines };
    }
  }

  private assemble(ctx: RunContext, variant: GuideVariant, timelines: Map<string, ChannelTimeline>): GuideDocument {
    const { guide, generator } = ctx.config;
    return assembleGuide(this.deps.registry, timelines, {
      variant,
      generatedAt: ctx.startedAt,
      generator,
      missingChannels: guide.missingChannels,
      windowHours: guide.windowHours,
      placeholder: guide.placeholder,
    });
  }

  /**
   * A failing variant does not stop the others, but any failure fails the run
   */
  private serializeAll(
    ctx: RunContext,
    documents: GuideDocument[]
  ): Array<{ variant: GuideVariant; output: SerializedGuide }> {
    const serializer = new XMLTVSerializer({
      utcOffsetMinutes: ctx.config.output.utcOffsetMinutes,
      createArchive: ctx.config.output.createArchive,
    });
    const results: Array<{ variant: GuideVariant; output: SerializedGuide }> = [];
    const failures: SerializeError[] = [];

    for (const doc of documents) {
      try {
        const output = serializer.serialize(doc);
        console.log(`Serialized ${doc.variant} (${Math.round(output.xml.length / 1024)} KB)`);
        results.push({ variant: doc.variant, output });
      } catch (error) {
        const serializeError =
          error instanceof SerializeError ? error : new SerializeError(doc.variant, errorMessage(error));
        console.error(`Serialization failed for ${doc.variant}: ${serializeError.message}`);
        failures.push(serializeError);
      }
    }

    if (failures.length > 0) {
      throw new RunError('serialize-failed', `${failures.length} of ${documents.length} variants failed to serialize`, {
        variants: failures.map((failure) => failure.variant),
      });
    }

    return results;
  }

  /**
   * Write every artifact to a temp file first, then rename them all into place
   */
  private async writeArtifacts(
    ctx: RunContext,
    serialized: Array<{ variant: GuideVariant; output: SerializedGuide }>
  ): Promise<string[]> {
    const directory = ctx.config.output.directory;
    const files: Array<{ finalPath: string; tempPath: string; data: Buffer }> = [];

    for (const { variant, output } of serialized) {
      const names = artifactFileNames(variant);
      const xmlPath = path.join(directory, names.xml);
      files.push({ finalPath: xmlPath, tempPath: `${xmlPath}.tmp`, data: output.xml });
      if (output.gzip) {
        const gzipPath = path.join(directory, names.gzip);
        files.push({ finalPath: gzipPath, tempPath: `${gzipPath}.tmp`, data: output.gzip });
      }
    }

    const pending = new Set<string>();
    try {
      await fs.mkdir(directory, { recursive: true });
      for (const file of files) {
        pending.add(file.tempPath);
        await fs.writeFile(file.tempPath, file.data);
      }
      for (const file of files) {
        await fs.rename(file.tempPath, file.finalPath);
        pending.delete(file.tempPath);
      }
    } catch (error) {
      await Promise.all(
        [...pending].map((tempPath) =>
          fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
            console.warn(`Failed to remove ${tempPath}: ${errorMessage(cleanupError)}`);
          })
        )
      );
      throw new RunError('publish-failed', `Failed to write guide files: ${errorMessage(error)}`, { directory });
    }

    return files.map((file) => file.finalPath);
  }
}
