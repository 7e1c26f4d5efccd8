import { PipelineRunResult } from '@/interfaces/pipelineResult';
import { PipelineScheduler, runTask } from '@/modules/scheduler';

describe('runTask (unit)', () => {
  const noDelay = jest.fn(async (_ms: number) => undefined);

  beforeEach(() => {
    noDelay.mockImplementation(async () => undefined);
  });

  it('returns the task result on first success', async () => {
    const task = jest.fn(async () => 'done');

    await expect(runTask('extract', task, { retries: 1, retryDelayMs: 300_000 }, noDelay)).resolves.toBe('done');
    expect(task).toHaveBeenCalledTimes(1);
    expect(noDelay).not.toHaveBeenCalled();
  });

  /**
   * Purpose:
   * Verifies Recovery behavior:
   * - a failure is retried once after the configured delay
   */
  it('retries once after the retry delay', async () => {
    const task = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new Error('database is locked'))
      .mockResolvedValueOnce('done');

    await expect(runTask('load', task, { retries: 1, retryDelayMs: 300_000 }, noDelay)).resolves.toBe('done');
    expect(task).toHaveBeenCalledTimes(2);
    expect(noDelay).toHaveBeenCalledWith(300_000);
  });

  it('rethrows the last error once retries are exhausted', async () => {
    const task = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'));

    await expect(runTask('load', task, { retries: 1, retryDelayMs: 10 }, noDelay)).rejects.toThrow('second');
    expect(task).toHaveBeenCalledTimes(2);
  });

  it('does not retry when retries is zero', async () => {
    const task = jest.fn<Promise<string>, []>().mockRejectedValue(new Error('boom'));

    await expect(runTask('transform', task, { retries: 0, retryDelayMs: 10 }, noDelay)).rejects.toThrow('boom');
    expect(task).toHaveBeenCalledTimes(1);
  });
});

describe('PipelineScheduler (unit)', () => {
  const success: PipelineRunResult = {
    status: 'success',
    snapshotFile: null,
    processed: null,
    durationMs: 0,
  };

  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  /**
   * Purpose:
   * Verifies Core behavior:
   * - runs immediately on start
   * - runs again every interval
   * - stop clears the timer
   */
  it('runs on start and then every interval until stopped', async () => {
    const run = jest.fn(async () => success);
    const scheduler = new PipelineScheduler(run, 60 * 60_000);

    scheduler.start();
    await jest.advanceTimersByTimeAsync(0);
    expect(run).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(60 * 60_000);
    expect(run).toHaveBeenCalledTimes(2);

    scheduler.stop();
    await jest.advanceTimersByTimeAsync(3 * 60 * 60_000);
    expect(run).toHaveBeenCalledTimes(2);
  });

  it('skips a tick while the previous run is still in progress', async () => {
    let finish: (result: PipelineRunResult) => void = () => undefined;
    const run = jest.fn(
      () => new Promise<PipelineRunResult>(resolve => {
        finish = resolve;
      })
    );
    const scheduler = new PipelineScheduler(run, 1_000);

    const first = scheduler.tick();
    await expect(scheduler.tick()).resolves.toBeNull();
    expect(scheduler.isRunning()).toBe(true);

    finish(success);
    await expect(first).resolves.toBe(success);
    expect(scheduler.isRunning()).toBe(false);
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('survives a run that throws', async () => {
    const run = jest.fn(async (): Promise<PipelineRunResult> => {
      throw new Error('unexpected');
    });
    const scheduler = new PipelineScheduler(run, 1_000);

    await expect(scheduler.tick()).resolves.toBeNull();
    expect(scheduler.isRunning()).toBe(false);
  });
});
