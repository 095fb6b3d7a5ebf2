import type { AppLogger } from '@main/services/logging/Logger';

export type ScheduledTask = () => void | Promise<void>;
export type CancelScheduled = () => void;

export interface Scheduler {
  every(name: string, intervalMs: number, task: ScheduledTask): CancelScheduled;
  once(name: string, delayMs: number, task: ScheduledTask): CancelScheduled;
}

export class TimerScheduler implements Scheduler {
  private readonly active = new Set<CancelScheduled>();

  constructor(private readonly logger: AppLogger) {}

  every(name: string, intervalMs: number, task: ScheduledTask): CancelScheduled {
    const handle = setInterval(() => this.execute(name, task), normalizeDelay(intervalMs));
    return this.track(() => clearInterval(handle));
  }

  once(name: string, delayMs: number, task: ScheduledTask): CancelScheduled {
    let cancel: CancelScheduled = () => undefined;
    const handle = setTimeout(() => {
      this.active.delete(cancel);
      this.execute(name, task);
    }, normalizeDelay(delayMs));
    cancel = this.track(() => clearTimeout(handle));
    return cancel;
  }

  stopAll(): void {
    for (const cancel of Array.from(this.active)) {
      cancel();
    }
  }

  private track(clear: () => void): CancelScheduled {
    const cancel: CancelScheduled = () => {
      clear();
      this.active.delete(cancel);
    };
    this.active.add(cancel);
    return cancel;
  }

  private execute(name: string, task: ScheduledTask): void {
    try {
      const result = task();
      if (result instanceof Promise) {
        result.catch((error: unknown) => this.reportError(name, error));
      }
    } catch (error) {
      this.reportError(name, error);
    }
  }

  private reportError(name: string, error: unknown): void {
    this.logger.error('scheduler.task.error', {
      task: name,
      reason: error instanceof Error ? error.message : String(error)
    });
  }
}

function normalizeDelay(value: number): number {
  return Number.isFinite(value) ? Math.max(0, Math.trunc(value)) : 0;
}
