/**
 * Update Scheduler — Daily Trigger for `updateAll(false)`
 * Layer: Application
 *
 * A croner job fires `<minute> <hour> * * *` in the configured time zone.
 * Only one update is ever in flight: croner's `protect` drops a scheduled
 * fire while the previous one runs, and `runNow()` joins the in-flight run
 * instead of starting a second one.
 *
 * The server entrypoint owns the lifecycle: it constructs the scheduler
 * through the container, calls `start()` when SCHEDULER_ENABLED is set, and on
 * shutdown calls `stop()` then awaits `whenIdle()`.
 */
import { Cron } from 'croner';
import { inject, injectable } from 'tsyringe';

import { UpdateOrchestrator } from '@application/services/UpdateOrchestrator';
import { TOKENS } from '@core/types';
import type { Logger } from '@core/logger';
import { errorDetail, ValidationError } from '@shared/errors/AppError';
import { isValidTimeZone } from '@shared/timezone';
import type { SchedulerStatus } from '@shared/types';

export interface ScheduleOptions {
  hour: number;
  minute: number;
  timezone: string;
}

const JOB_NAME = 'daily-update';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

@injectable()
export class UpdateScheduler {
  private job: Cron | null = null;
  private schedule: ScheduleOptions | null = null;
  private inFlight: Promise<void> | null = null;
  private lastRun: SchedulerStatus['lastRun'] = null;

  constructor(
    @inject(TOKENS.UpdateOrchestrator) private readonly orchestrator: UpdateOrchestrator,
    @inject(TOKENS.Logger) private readonly log: Logger,
  ) {}

  start(options: ScheduleOptions): void {
    if (this.job) {
      this.log.warn({ nextRun: this.nextRunTime()?.toISOString() }, 'Scheduler already started');
      return;
    }

    const { hour, minute, timezone } = options;
    if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
      throw new ValidationError(`Scheduler hour must be an integer 0-23, got ${hour}`);
    }
    if (!Number.isInteger(minute) || minute < 0 || minute > 59) {
      throw new ValidationError(`Scheduler minute must be an integer 0-59, got ${minute}`);
    }
    if (!isValidTimeZone(timezone)) {
      throw new ValidationError(`Unknown time zone: ${timezone}`);
    }

    this.job = new Cron(
      `${minute} ${hour} * * *`,
      {
        name: JOB_NAME,
        timezone,
        protect: () => this.log.warn('Previous scheduled update still running; skipping this fire'),
      },
      () => this.trigger('schedule'),
    );
    this.schedule = { hour, minute, timezone };

    this.log.info(
      { time: `${pad(hour)}:${pad(minute)}`, timezone, nextRun: this.nextRunTime()?.toISOString() },
      'Scheduler started',
    );
  }

  stop(): void {
    if (!this.job) return;
    this.job.stop();
    this.job = null;
    this.log.info('Scheduler stopped');
  }

  /**
   * Starts `updateAll(false)` in the background and returns at once.
   * Returns false when an update was already running (that run is joined).
   */
  runNow(): boolean {
    const alreadyRunning = this.inFlight !== null;
    void this.trigger('manual');
    return !alreadyRunning;
  }

  nextRunTime(): Date | null {
    return this.job?.nextRun() ?? null;
  }

  status(): SchedulerStatus {
    return {
      running: this.job !== null,
      updating: this.inFlight !== null,
      nextRun: this.nextRunTime()?.toISOString() ?? null,
      timezone: this.schedule?.timezone ?? null,
      scheduledTime: this.schedule ? `${pad(this.schedule.hour)}:${pad(this.schedule.minute)}` : null,
      lastRun: this.lastRun,
    };
  }

  /** Resolves once no update is in flight. */
  whenIdle(): Promise<void> {
    return this.inFlight ?? Promise.resolve();
  }

  private trigger(source: 'schedule' | 'manual'): Promise<void> {
    if (this.inFlight) {
      this.log.info({ source }, 'Update already in flight; joining it');
      return this.inFlight;
    }

    const run = this.execute(source).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return run;
  }

  /** Never rejects: failures are logged and kept on `lastRun`. */
  private async execute(source: 'schedule' | 'manual'): Promise<void> {
    const at = new Date().toISOString();
    this.log.info({ source }, 'Update triggered');

    try {
      const summary = await this.orchestrator.updateAll(false);
      this.lastRun = { at, summary, error: null };
    } catch (err) {
      this.log.error({ source, err }, 'Update run crashed');
      this.lastRun = { at, summary: null, error: errorDetail(err) };
    }
  }
}
