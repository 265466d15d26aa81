import { toError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { Clock } from "./models.js";

// ScheduledTask is one idempotent sweep; `run` resolves to the number of records it acted on.
export interface ScheduledTask {
  readonly name: string;
  run(now: Date): Promise<number>;
}

export type TaskReport =
  | { name: string; ok: true; acted: number }
  | { name: string; ok: false; error: string };

export type TickReport = {
  started_at: string;
  tasks: TaskReport[];
};

export interface SchedulerOptions {
  intervalMs: number;
  clock: Clock;
  logger: Logger;
}

/**
 * Runs every task once per interval, in order. A failing task is logged and the
 * rest still run; it is retried on the next tick since it committed nothing.
 */
export class Scheduler {
  private active = false;
  private done: Promise<void> | null = null;
  private timer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;

  constructor(
    private readonly tasks: readonly ScheduledTask[],
    private readonly options: SchedulerOptions,
  ) {}

  async tick(): Promise<TickReport> {
    const now = this.options.clock();
    const reports: TaskReport[] = [];
    for (const task of this.tasks) {
      try {
        const acted = await task.run(now);
        if (acted > 0) {
          this.options.logger.info(`Task ${task.name} acted on ${acted} record(s)`);
        }
        reports.push({ name: task.name, ok: true, acted });
      } catch (error) {
        this.options.logger.error(`Task ${task.name} failed`, error);
        reports.push({ name: task.name, ok: false, error: toError(error).message });
      }
    }
    return { started_at: now.toISOString(), tasks: reports };
  }

  start(): void {
    if (this.done) return;
    this.active = true;
    this.done = this.loop().catch((error) => {
      this.options.logger.error("Scheduler loop stopped", error);
    });
    this.options.logger.info("Scheduler started", { intervalMs: this.options.intervalMs, tasks: this.tasks.length });
  }

  /** Resolves once the current tick, if any, has finished. */
  async stop(): Promise<void> {
    this.active = false;
    if (this.timer) clearTimeout(this.timer);
    this.wake?.();
    await this.done;
    this.done = null;
    this.options.logger.info("Scheduler stopped");
  }

  private async loop(): Promise<void> {
    while (this.active) {
      await this.tick();
      if (!this.active) break;
      await this.pause();
    }
  }

  private pause(): Promise<void> {
    return new Promise((resolve) => {
      this.wake = resolve;
      this.timer = setTimeout(resolve, this.options.intervalMs);
    });
  }
}
