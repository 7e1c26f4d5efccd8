import { AppConfig } from '../config';
import { TRACKED_CITIES } from '../constants/cities';
import { PipelineRunResult, TaskName, TransformResult } from '../interfaces/pipelineResult';
import { logger } from '../logger';
import { describeError } from '../utils/errors';
import { sleep as defaultSleep } from '../utils/sleep';
import { WeatherExtractor } from './extractor';
import { NominatimGeocoder } from './geocoder';
import { createHttpClient } from './httpClient';
import { WeatherLoader } from './loader';
import { OpenWeatherClient } from './openWeatherClient';
import { createRequestLimiter } from './requestLimiter';
import { RetryPolicy, runTask } from './scheduler';
import { WeatherTransformer } from './transformer';

export interface PipelineStages {
  extract: () => Promise<string | null>;
  transform: () => Promise<TransformResult | null>;
  load: () => Promise<void>;
}

/**
 * Each call builds fresh stage instances, so the geocoding cache lasts one extract run.
 */
export function createPipelineStages(config: AppConfig): PipelineStages {
  const axiosClient = createHttpClient(config.httpTimeoutMs);

  return {
    extract: () =>
      new WeatherExtractor({
        cities: TRACKED_CITIES,
        geocoder: new NominatimGeocoder({
          axiosClient,
          url: config.geocoderUrl,
          userAgent: config.geocoderUserAgent,
        }),
        weatherApi: new OpenWeatherClient({
          axiosClient,
          baseUrl: config.openWeatherBaseUrl,
          apiKey: config.apiKey,
        }),
        limiter: createRequestLimiter(config.requestDelayMs),
        outputDir: config.rawDataDir,
      }).extract(),

    transform: () =>
      new WeatherTransformer({
        inputDir: config.rawDataDir,
        outputDir: config.processedDataDir,
      }).transform(),

    load: () =>
      new WeatherLoader({
        inputDir: config.processedDataDir,
        databasePath: config.databasePath,
      }).load(),
  };
}

/**
 * extract → transform → load, each with its own retry budget.
 * A task that still fails after its retries ends the run; upstream tasks are never re-run.
 */
export async function runPipeline(
  stages: PipelineStages,
  policy: RetryPolicy,
  sleep: (ms: number) => Promise<void> = defaultSleep
): Promise<PipelineRunResult> {
  const start = Date.now();
  let current: TaskName = 'extract';

  try {
    const snapshotFile = await runTask('extract', stages.extract, policy, sleep);

    current = 'transform';
    const processed = await runTask('transform', stages.transform, policy, sleep);

    current = 'load';
    await runTask('load', stages.load, policy, sleep);

    const durationMs = Date.now() - start;
    logger.info({ snapshotFile, processed, durationMs }, 'Pipeline run complete');

    return { status: 'success', snapshotFile, processed, durationMs };
  } catch (err) {
    const durationMs = Date.now() - start;
    const { message } = describeError(err);

    logger.error({ failedTask: current, error: message, durationMs }, 'Pipeline run failed');

    return { status: 'failed', failedTask: current, error: message, durationMs };
  }
}
