import { PipelineRunResult, TaskName } from '../interfaces/pipelineResult';
import { logger } from '../logger';
import { describeError } from '../utils/errors';
import { sleep as defaultSleep } from '../utils/sleep';

export interface RetryPolicy {
  retries: number;
  retryDelayMs: number;
}

/**
 * Runs a task, retrying it `retries` times after `retryDelayMs`.
 * The last error is rethrown once the retries are used up.
 */
export async function runTask<T>(
  name: TaskName,
  task: () => Promise<T>,
  policy: RetryPolicy,
  sleep: (ms: number) => Promise<void> = defaultSleep
): Promise<T> {
  for (let attempt = 1; ; attempt++) {
    try {
      logger.info({ task: name, attempt }, 'Task started');
      const result = await task();
      logger.info({ task: name, attempt }, 'Task succeeded');
      return result;
    } catch (err) {
      if (attempt > policy.retries) {
        logger.error({ task: name, attempt, ...describeError(err) }, 'Task failed');
        throw err;
      }

      logger.warn(
        { task: name, attempt, retryInMs: policy.retryDelayMs, ...describeError(err) },
        'Task failed, retrying'
      );
      await sleep(policy.retryDelayMs);
    }
  }
}

// -------------------------------------------------
// Timer
// -------------------------------------------------

/**
 * Fires `run` immediately and then every `intervalMs`.
 * A tick that lands while a run is still going is dropped.
 */
export class PipelineScheduler {
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly run: () => Promise<PipelineRunResult>,
    private readonly intervalMs: number
  ) {}

  start(): void {
    if (this.timer) return;

    logger.info({ intervalMs: this.intervalMs }, 'Pipeline scheduler started');

    void this.tick();
    this.timer = setInterval(() => void this.tick(), this.intervalMs);
  }

  stop(): void {
    if (!this.timer) return;

    clearInterval(this.timer);
    this.timer = null;
    logger.info('Pipeline scheduler stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  async tick(): Promise<PipelineRunResult | null> {
    if (this.running) {
      logger.warn('Previous pipeline run still in progress, skipping tick');
      return null;
    }

    this.running = true;

    try {
      return await this.run();
    } catch (err) {
      logger.error({ err }, 'Pipeline run crashed');
      return null;
    } finally {
      this.running = false;
    }
  }
}
