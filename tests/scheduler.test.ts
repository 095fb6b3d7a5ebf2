import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { TimerScheduler } from '@main/services/runtime/Scheduler';

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

describe('TimerScheduler', () => {
  it('executa tarefa periodica ate ser cancelada', () => {
    const { scheduler } = createScheduler();
    const task = vi.fn();

    const cancel = scheduler.every('telemetry.poll', 500, task);
    vi.advanceTimersByTime(1500);
    cancel();
    vi.advanceTimersByTime(1500);

    expect(task).toHaveBeenCalledTimes(3);
  });

  it('executa tarefa unica uma vez', () => {
    const { scheduler } = createScheduler();
    const task = vi.fn();

    scheduler.once('startup.check', 100, task);
    vi.advanceTimersByTime(1000);

    expect(task).toHaveBeenCalledTimes(1);
  });

  it('registra erro sincrono e rejeicao sem interromper o intervalo', async () => {
    const { scheduler, logger } = createScheduler();
    let calls = 0;

    scheduler.every('battery.refresh', 100, () => {
      calls += 1;
      if (calls === 1) {
        throw new Error('falha sincrona');
      }
      return Promise.reject(new Error('falha async'));
    });
    await vi.advanceTimersByTimeAsync(200);

    expect(calls).toBe(2);
    expect(logger.error).toHaveBeenCalledWith('scheduler.task.error', { task: 'battery.refresh', reason: 'falha sincrona' });
    expect(logger.error).toHaveBeenCalledWith('scheduler.task.error', { task: 'battery.refresh', reason: 'falha async' });
  });

  it('stopAll cancela tarefas pendentes', () => {
    const { scheduler } = createScheduler();
    const periodic = vi.fn();
    const single = vi.fn();

    scheduler.every('a', 100, periodic);
    scheduler.once('b', 100, single);
    scheduler.stopAll();
    vi.advanceTimersByTime(1000);

    expect(periodic).not.toHaveBeenCalled();
    expect(single).not.toHaveBeenCalled();
  });
});

function createScheduler() {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  };
  return { scheduler: new TimerScheduler(logger), logger };
}
