/**
 * Server Entry Point — HTTP, Scheduler & Graceful Shutdown
 * Layer: Entry Point (top of the dependency tree)
 *
 * This is the file that starts when you run `npm start` or `npm run dev`.
 * One process serves the HTTP API and owns the daily update trigger. It
 * does not fork a cluster: every worker would start its own scheduler and
 * the same upstream sources would be crawled once per core.
 *
 * Graceful shutdown on SIGTERM/SIGINT:
 *   1. Stop the scheduler so no new update starts.
 *   2. Stop accepting connections; in-flight requests finish.
 *   3. Wait for an in-flight update so no dataset is left mid-write.
 *   4. Exit with code 0.
 */
import { UpdateScheduler } from '@application/services/UpdateScheduler';
import { config } from '@core/config';
import { container } from '@core/container';
import { logger } from '@core/logger';
import { TOKENS } from '@core/types';
import { createApp } from '@interfaces/http/app';

const app = createApp();
const scheduler = container.resolve<UpdateScheduler>(TOKENS.UpdateScheduler);

const server = app.listen(config.port, () => {
  logger.info({ pid: process.pid, port: config.port }, `Listening on :${config.port}`);
});

if (config.scheduler.enabled) {
  scheduler.start({
    hour: config.scheduler.hour,
    minute: config.scheduler.minute,
    timezone: config.scheduler.timezone,
  });
} else {
  logger.info('Scheduler disabled (SCHEDULER_ENABLED=false)');
}

let shuttingDown = false;

const shutdown = (signal: string): void => {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ pid: process.pid, signal }, 'Graceful shutdown initiated');

  scheduler.stop();
  server.close(() => {
    scheduler
      .whenIdle()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
  });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
