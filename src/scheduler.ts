import type { ScheduleSettings } from "./config.js";
import type { ClubService } from "./service.js";
import { describeError } from "./utils/errors.js";
import type { Logger } from "./utils/logger.js";

export interface JobOptions {
  name: string;
  intervalMs: number;
  run: () => Promise<unknown> | unknown;
  logger: Logger;
  /** Defaults to true. */
  runOnStart?: boolean;
}

export interface ScheduledJob {
  name: string;
  isRunning(): boolean;
  /** Starts a run unless one is in flight. Resolves when the current run finishes. */
  runNow(): Promise<void>;
  /** Clears the timer and resolves once the in-flight run, if any, has finished. */
  stop(): Promise<void>;
}

export function scheduleJob({ name, intervalMs, run, logger, runOnStart = true }: JobOptions): ScheduledJob {
  let inFlight: Promise<void> | null = null;

  const execute = async (): Promise<void> => {
    const started = Date.now();
    try {
      await run();
      logger.info(`Job ${name} finished in ${Date.now() - started}ms`);
    } catch (error) {
      logger.error(`Job ${name} failed: ${describeError(error)}`);
    }
  };

  const tick = (): Promise<void> => {
    if (inFlight) {
      logger.warn(`Job ${name} still running, skipping this tick`);
      return inFlight;
    }
    inFlight = execute().finally(() => {
      inFlight = null;
    });
    return inFlight;
  };

  const timer = setInterval(() => {
    void tick();
  }, intervalMs);
  if (runOnStart) {
    void tick();
  }

  return {
    name,
    isRunning: () => inFlight !== null,
    runNow: tick,
    stop: async () => {
      clearInterval(timer);
      if (inFlight) {
        await inFlight;
      }
    },
  };
}

export interface Scheduler {
  jobs: ScheduledJob[];
  /** Stops every timer and waits for running jobs to drain. */
  stop(): Promise<void>;
}

/** Interval sync plus the daily trophy job. Both run once immediately. */
export function startScheduler(service: ClubService, schedule: ScheduleSettings, logger: Logger): Scheduler {
  const log = logger.child("scheduler");
  const jobs = [
    scheduleJob({
      name: "sync-all",
      intervalMs: schedule.syncIntervalMinutes * 60 * 1000,
      run: () => service.syncAll(),
      logger: log,
    }),
    scheduleJob({
      name: "weekly-trophies",
      intervalMs: schedule.trophyIntervalHours * 60 * 60 * 1000,
      run: () => service.calculateWeeklyTrophies(),
      logger: log,
    }),
  ];

  log.info(
    `Scheduler started: sync every ${schedule.syncIntervalMinutes} min, trophies every ${schedule.trophyIntervalHours} h`
  );

  return {
    jobs,
    stop: async () => {
      await Promise.all(jobs.map((job) => job.stop()));
      log.info("Scheduler stopped");
    },
  };
}
