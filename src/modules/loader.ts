import {
  PROCESSED_AIR_PREFIX,
  PROCESSED_EXTENSION,
  PROCESSED_WEATHER_PREFIX,
} from '../constants/files';
import { stageLogger } from '../logger';
import { findLatestFile } from '../utils/files';
import { formatDate } from '../utils/time';
import { aggregateDailyStats } from './dailyStats';
import { MeasurementStore } from './measurementStore';
import { readAirQualityCsv, readWeatherCsv } from './processedData';

const log = stageLogger('load');

export interface LoaderOptions {
  inputDir: string;
  databasePath: string;
  now?: () => Date;
}

export class WeatherLoader {
  private readonly now: () => Date;

  constructor(private readonly options: LoaderOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Appends the newest processed CSV pair and recomputes today's city stats.
   * The weather and air files are picked independently and need not share a stamp.
   */
  async load(): Promise<void> {
    const store = MeasurementStore.open(this.options.databasePath);

    try {
      store.ensureSchema();

      const weatherFile = await findLatestFile(
        this.options.inputDir,
        PROCESSED_WEATHER_PREFIX,
        PROCESSED_EXTENSION
      );
      const airQualityFile = await findLatestFile(
        this.options.inputDir,
        PROCESSED_AIR_PREFIX,
        PROCESSED_EXTENSION
      );

      if (!weatherFile || !airQualityFile) {
        log.warn({ dir: this.options.inputDir }, 'No processed data files found');
        return;
      }

      const weatherRecords = await readWeatherCsv(weatherFile);
      const airQualityRecords = await readAirQualityCsv(airQualityFile);

      const weatherInserted = store.appendWeather(weatherRecords);
      const airQualityInserted = store.appendAirQuality(airQualityRecords);

      const duplicates =
        weatherRecords.length - weatherInserted +
        (airQualityRecords.length - airQualityInserted);

      if (duplicates > 0) {
        log.warn({ duplicates }, 'Skipped measurements already loaded');
      }

      const date = formatDate(this.now());
      const stats = aggregateDailyStats(
        date,
        store.weatherSamplesFor(date),
        store.airQualitySamplesFor(date)
      );

      store.upsertDailyStats(stats);

      log.info(
        {
          weatherFile,
          airQualityFile,
          weatherInserted,
          airQualityInserted,
          date,
          citiesUpdated: stats.length,
        },
        'Processed data loaded'
      );
    } finally {
      store.close();
    }
  }
}
