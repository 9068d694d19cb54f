/**
 * Cron Scheduler
 * Triggers guide runs on a schedule when the process is kept alive
 */

import * as cron from 'node-cron';
import { errorMessage } from '../utils/errors';
import type { RunReport } from './guide-runner';

export interface ScheduledRunner {
  run(): Promise<RunReport>;
}

export interface CronSchedulerOptions {
  cronSchedule: string;
  timezone: string;
  /** Trigger one run right away instead of waiting for the first tick */
  runOnStart?: boolean;
  onReport?: (report: RunReport) => void;
}

export class CronScheduler {
  private readonly options: CronSchedulerOptions;
  private readonly runner: ScheduledRunner;
  private task: cron.ScheduledTask | null = null;

  constructor(options: CronSchedulerOptions, runner: ScheduledRunner) {
    this.options = options;
    this.runner = runner;
  }

  /**
   * Start the cron scheduler
   */
  start(): void {
    if (!cron.validate(this.options.cronSchedule)) {
      console.error(`Invalid cron schedule: ${this.options.cronSchedule}`);
      throw new Error('Invalid cron schedule format');
    }

    console.log(`Starting cron scheduler: ${this.options.cronSchedule}`);
    console.log(`Timezone: ${this.options.timezone}`);

    this.task = cron.schedule(
      this.options.cronSchedule,
      () => {
        console.log('\n========== Scheduled Guide Run Triggered ==========');
        return this.trigger('Scheduled');
      },
      {
        timezone: this.options.timezone,
      }
    );

    console.log('Cron scheduler started successfully');

    // Run initial update if configured; the schedule keeps going whatever it reports
    if (this.options.runOnStart) {
      console.log('\n========== Initial Guide Run ==========');
      void this.trigger('Initial');
    } else {
      console.log('Skipping initial guide run (RUN_ON_START=false)');
    }
  }

  /**
   * Stop the cron scheduler
   */
  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      console.log('Cron scheduler stopped');
    }
  }

  isScheduled(): boolean {
    return this.task !== null;
  }

  private trigger(label: string): Promise<void> {
    return this.runner
      .run()
      .then((report) => {
        if (report.state === 'Failed') {
          console.error(`${label} run failed:`, report.error?.message);
          console.log('Scheduler will continue running - guide will update on schedule');
        }
        this.options.onReport?.(report);
      })
      .catch((error: unknown) => {
        console.error(`${label} run error:`, errorMessage(error));
      });
  }
}
