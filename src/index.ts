#!/usr/bin/env node
/**
 * epg-builder
 * Main entry point
 */

import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { applyCliOverrides, createGuideRunner } from './app';
import type { CliOverrides } from './app';
import { getConfig } from './types/config';
import { CronScheduler } from './scheduler/cron-scheduler';

const VERSION = '1.0.0';

interface CliOptions extends CliOverrides {
  schedule?: boolean;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

async function main(options: CliOptions) {
  console.log('========================================');
  console.log(`epg-builder v${VERSION}`);
  console.log('========================================');

  // Load configuration; --no-archive only ever turns archives off, --enrich only turns lookups on
  const config = applyCliOverrides(getConfig(), {
    ...options,
    archive: options.archive === false ? false : undefined,
    enrich: options.enrich === true ? true : undefined,
  });

  console.log('\nConfiguration:');
  console.log(`  Upstream: ${config.upstream.urlTemplate}`);
  console.log(`  Source Timezone: ${config.upstream.sourceTimeZone}`);
  console.log(`  Parallel Requests: ${config.fetch.concurrency}`);
  console.log(`  Guide Window: ${config.guide.windowHours} hours`);
  console.log(`  Output: ${config.output.directory} (archive: ${config.output.createArchive})`);
  console.log(`  Program Enrichment: ${config.enrichment.enabled ? 'on' : 'off'}`);
  console.log('');

  const runner = createGuideRunner(config);

  if (!options.schedule) {
    const report = await runner.run();
    // Non-zero exit keeps the publisher from replacing good output with a failed run
    process.exitCode = report.state === 'Done' ? 0 : 1;
    return;
  }

  const scheduler = new CronScheduler(
    {
      cronSchedule: config.scheduler.cronSchedule,
      timezone: config.timezone,
      runOnStart: config.scheduler.runOnStart,
    },
    runner
  );
  scheduler.start();

  console.log('\n========================================');
  console.log('Scheduler is running');
  console.log('Press Ctrl+C to stop');
  console.log('========================================\n');

  // Graceful shutdown
  const shutdown = () => {
    console.log('\n\nShutting down gracefully...');
    scheduler.stop();
    process.exit(0);
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

const program = new Command();

program
  .name('epg-builder')
  .description('Build XMLTV guides for the configured channel list')
  .version(VERSION, '-v, --version')
  .option('-o, --output-dir <dir>', 'Directory for the generated guide files')
  .option('-p, --parallel <n>', 'Number of parallel requests', parsePositiveInt)
  .option('--no-archive', 'Skip the gzip companions')
  .option('--data-dir <dir>', 'Directory holding channels.json and icon manifests')
  .option('--enrich', 'Look up program details, cast and crew, and airing tags')
  .option('--schedule', 'Keep running and trigger runs on CRON_SCHEDULE (plus one at start unless RUN_ON_START=false)')
  .action(async (options: CliOptions) => {
    await main(options);
  });

program.parseAsync(process.argv).catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
