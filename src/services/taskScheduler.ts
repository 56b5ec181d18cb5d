import type { Logger } from '../lib/logger';

export type ScheduledTask = {
  name: string;
  intervalMs: number;
  /** Returns a short summary to log, or nothing when there is nothing to say. */
  run: () => Promise<string | void> | string | void;
  /** Also runs once as soon as the scheduler starts. */
  immediate?: boolean;
};

type TaskSchedulerOptions = {
  tasks: ScheduledTask[];
  logger?: Logger;
};

const MIN_INTERVAL_MS = 1000;

const describeInterval = (intervalMs: number) =>
  intervalMs % 60_000 === 0 ? `${intervalMs / 60_000} minutes` : `${intervalMs / 1000} seconds`;

/**
 * Runs the gateway's periodic work: station index refreshes, report cache
 * sweeps and quota pruning. A task that is still running when its next turn
 * comes round is skipped for that turn.
 */
export class TaskScheduler {
  private readonly tasks: ScheduledTask[];
  private readonly logger: Logger;
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private readonly running = new Set<string>();

  constructor(options: TaskSchedulerOptions) {
    this.tasks = options.tasks;
    this.logger = options.logger ?? console;
  }

  start() {
    if (this.tasks.length === 0) {
      this.logger.info('[Scheduler] No periodic tasks enabled via configuration');
      return;
    }

    for (const task of this.tasks) {
      if (this.timers.has(task.name)) {
        continue;
      }

      const intervalMs = Math.max(task.intervalMs, MIN_INTERVAL_MS);
      this.logger.info(`[Scheduler] Scheduling ${task.name} (interval=${describeInterval(intervalMs)})`);

      if (task.immediate) {
        void this.runTask(task);
      }

      const timer = setInterval(() => {
        void this.runTask(task);
      }, intervalMs);
      timer.unref();
      this.timers.set(task.name, timer);
    }
  }

  stop() {
    if (this.timers.size === 0) {
      return;
    }

    for (const timer of this.timers.values()) {
      clearInterval(timer);
    }
    this.timers.clear();
    this.logger.info('[Scheduler] Stopped periodic tasks');
  }

  isActive(): boolean {
    return this.timers.size > 0;
  }

  scheduledTasks(): string[] {
    return Array.from(this.timers.keys());
  }

  private async runTask(task: ScheduledTask) {
    if (this.running.has(task.name)) {
      this.logger.warn(`[Scheduler] ${task.name} is still running, skipping this run`);
      return;
    }

    this.running.add(task.name);
    try {
      const summary = await task.run();
      if (summary) {
        this.logger.info(`[Scheduler] ${task.name}: ${summary}`);
      }
    } catch (error) {
      this.logger.error(`[Scheduler] ${task.name} failed`, error);
    } finally {
      this.running.delete(task.name);
    }
  }
}
