/**
 * Wiring: config → registry, upstream client and runner
 */

import { DEFAULT_RETRYABLE, HttpDocumentClient, ScheduleClient } from './api/schedule-client';
import { loadChannelRegistry } from './channels/registry';
import { ProgramEnricher } from './epg/enrichment';
import type { AppConfig } from './types/config';
import { GuideRunner } from './scheduler/guide-runner';
import type { DocumentClientOptions, ScheduleClientOptions } from './api/schedule-client';

export interface CliOverrides {
  outputDir?: string;
  parallel?: number;
  archive?: boolean;
  dataDir?: string;
  enrich?: boolean;
}

export function applyCliOverrides(config: AppConfig, overrides: CliOverrides): AppConfig {
  return {
    ...config,
    dataDir: overrides.dataDir ?? config.dataDir,
    enrichment: {
      ...config.enrichment,
      enabled: overrides.enrich ?? config.enrichment.enabled,
    },
    fetch: {
      ...config.fetch,
      concurrency: overrides.parallel ?? config.fetch.concurrency,
    },
    output: {
      ...config.output,
      directory: overrides.outputDir ?? config.output.directory,
      createArchive: overrides.archive ?? config.output.createArchive,
    },
  };
}

function documentClientOptions(config: AppConfig): DocumentClientOptions {
  return {
    userAgent: config.upstream.userAgent,
    referer: config.upstream.referer,
    timeoutMs: config.fetch.timeoutMs,
    timeoutIncrementMs: config.fetch.timeoutIncrementMs,
    timeoutMaxMs: config.fetch.timeoutMaxMs,
    retry: {
      maxAttempts: config.fetch.maxAttempts,
      baseDelayMs: config.fetch.retryBaseDelayMs,
      maxDelayMs: config.fetch.retryMaxDelayMs,
      retryable: DEFAULT_RETRYABLE,
    },
  };
}

export function scheduleClientOptions(config: AppConfig): ScheduleClientOptions {
  return { ...documentClientOptions(config), urlTemplate: config.upstream.urlTemplate };
}

/**
 * Program pages share the listing retry policy; the schedule lookup is one large
 * document and gets its own, longer timeouts
 */
export function enrichmentClientOptions(config: AppConfig): { programs: DocumentClientOptions; schedule: DocumentClientOptions } {
  const programs: DocumentClientOptions = { ...documentClientOptions(config), referer: config.enrichment.referer };
  return {
    programs,
    schedule: {
      ...programs,
      timeoutMs: config.enrichment.tagsTimeoutMs,
      timeoutIncrementMs: config.enrichment.tagsTimeoutIncrementMs,
      timeoutMaxMs: config.enrichment.tagsTimeoutMaxMs,
    },
  };
}

export function createProgramEnricher(config: AppConfig): ProgramEnricher {
  const clients = enrichmentClientOptions(config);
  return new ProgramEnricher(
    {
      detailsUrlTemplate: config.enrichment.detailsUrlTemplate,
      creditsUrlTemplate: config.enrichment.creditsUrlTemplate,
      tagsUrlTemplate: config.enrichment.tagsUrlTemplate,
      concurrency: config.fetch.concurrency,
      windowHours: config.guide.windowHours,
      tagsLookbackMinutes: config.enrichment.tagsLookbackMinutes,
    },
    {
      programs: new HttpDocumentClient(clients.programs),
      schedule: new HttpDocumentClient(clients.schedule),
    }
  );
}

export function createGuideRunner(config: AppConfig): GuideRunner {
  const registry = loadChannelRegistry(config.dataDir, config.output.iconsBaseUrl);
  const source = new ScheduleClient(scheduleClientOptions(config));
  const enricher = config.enrichment.enabled ? createProgramEnricher(config) : undefined;
  return new GuideRunner(config, { registry, source, enricher });
}
