import dotenv from 'dotenv';
import { z } from 'zod';
import { AppConfig, loadConfig } from './config';
import { logger } from './logger';
import { createPipelineStages, runPipeline } from './modules/pipeline';
import { PipelineScheduler, RetryPolicy } from './modules/scheduler';

// -------------------------------------------------
// Env
// -------------------------------------------------
dotenv.config();

const commandSchema = z
  .enum(['start', 'pipeline', 'extract', 'transform', 'load'])
  .default('start');

type Command = z.infer<typeof commandSchema>;

let config: AppConfig;

try {
  config = loadConfig();
} catch (err) {
  logger.fatal({ err }, 'Invalid configuration, aborting');
  process.exit(1);
}

const parsedCommand = commandSchema.safeParse(process.argv[2]);

if (!parsedCommand.success) {
  logger.fatal(
    { command: process.argv[2] },
    'Unknown command (expected start, pipeline, extract, transform or load)'
  );
  process.exit(1);
}

const command: Command = parsedCommand.data;

const stages = createPipelineStages(config);

const retryPolicy: RetryPolicy = {
  retries: config.taskRetries,
  retryDelayMs: config.taskRetryDelayMs,
};

// -------------------------------------------------
// One-shot runs
// -------------------------------------------------
async function runOnce(name: Exclude<Command, 'start'>): Promise<void> {
  try {
    if (name === 'pipeline') {
      const result = await runPipeline(stages, retryPolicy);
      process.exit(result.status === 'success' ? 0 : 1);
    }

    const result = await stages[name]();
    logger.info({ command: name, result }, 'Command finished');
    process.exit(0);
  } catch (err) {
    logger.error({ err, command: name }, 'Command failed');
    process.exit(1);
  }
}

// -------------------------------------------------
// Scheduled mode
// -------------------------------------------------
let isShuttingDown = false;

function startScheduler(): void {
  const scheduler = new PipelineScheduler(
    () => runPipeline(stages, retryPolicy),
    config.scheduleIntervalMs
  );

  scheduler.start();

  async function shutdown(signal: string) {
    if (isShuttingDown) return;
    isShuttingDown = true;

    logger.info(`Received ${signal}. Shutting down...`);
    scheduler.stop();

    // Let an in-flight run finish its current write before exiting
    while (scheduler.isRunning()) {
      await new Promise(res => setTimeout(res, 500));
    }

    process.exit(0);
  }

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

if (command === 'start') {
  startScheduler();
} else {
  void runOnce(command);
}
