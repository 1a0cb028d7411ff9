import type { Logger } from '../core/logger.js';

interface ScheduledTask {
  timer: NodeJS.Timeout;
  running: boolean;
}

export class Scheduler {
  private readonly tasks = new Map<string, ScheduledTask>();

  constructor(private readonly logger: Logger) {}

  /**
   * Runs `task` every `everyMs`. A tick that arrives while the previous run
   * is still in flight is skipped.
   */
  add(name: string, everyMs: number, task: () => Promise<void>, opts: { runImmediately?: boolean } = {}): void {
    const entry: ScheduledTask = {
      timer: setInterval(() => this.run(name, entry, task), everyMs),
      running: false,
    };
    this.tasks.set(name, entry);
    this.logger.info('scheduled task registered', { name, everyMs });
    if (opts.runImmediately) this.run(name, entry, task);
  }

  private run(name: string, entry: ScheduledTask, task: () => Promise<void>): void {
    if (entry.running) {
      this.logger.warn('scheduled task still running, tick skipped', { name });
      return;
    }
    entry.running = true;
    void task()
      .catch((err: unknown) => {
        this.logger.error('scheduled task failed', { name, err: String(err), stack: err instanceof Error ? err.stack : undefined });
      })
      .finally(() => {
        entry.running = false;
      });
  }

  shutdown(): void {
    for (const [, entry] of this.tasks) {
      clearInterval(entry.timer);
    }
    this.tasks.clear();
    this.logger.info('scheduler shutdown complete');
  }
}
