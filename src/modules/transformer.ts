import fs from 'fs/promises';
import path from 'path';

import {
  PROCESSED_AIR_PREFIX,
  PROCESSED_EXTENSION,
  PROCESSED_WEATHER_PREFIX,
  RAW_SNAPSHOT_EXTENSION,
  RAW_SNAPSHOT_PREFIX,
} from '../constants/files';
import { AIR_QUALITY_COLUMNS, AirQualityRecord } from '../interfaces/airQualityRecord';
import { RawObservation } from '../interfaces/openWeather';
import { TransformResult } from '../interfaces/pipelineResult';
import { WEATHER_COLUMNS, WeatherRecord } from '../interfaces/weatherRecord';
import { stageLogger } from '../logger';
import { RawSnapshotSchema } from '../schemas/snapshot.schema';
import { toCsv } from '../utils/csv';
import { parsePayload } from '../utils/errors';
import { findLatestFile } from '../utils/files';
import { formatNaiveDateTime, formatRunStamp, fromUnixSeconds } from '../utils/time';
import { airQualityIndex, aqiCategory, pollutantIndices } from './airQualityMetrics';
import { dayLengthHours, heatIndex, temperatureCategory } from './weatherMetrics';

const log = stageLogger('transform');

// -------------------------------------------------
// Record mapping
// -------------------------------------------------

export function toWeatherRecord(observation: RawObservation): WeatherRecord {
  const { main, wind, clouds, sys } = observation.weather;
  const [condition] = observation.weather.weather;

  return {
    city: observation.city,
    latitude: observation.latitude,
    longitude: observation.longitude,
    timestamp: observation.timestamp,
    temperature: main.temp,
    feels_like: main.feels_like,
    humidity: main.humidity,
    pressure: main.pressure,
    wind_speed: wind.speed,
    wind_direction: wind.deg ?? null,
    clouds_percent: clouds.all,
    weather_main: condition.main,
    weather_description: condition.description,
    sunrise: formatNaiveDateTime(fromUnixSeconds(sys.sunrise)),
    sunset: formatNaiveDateTime(fromUnixSeconds(sys.sunset)),
    day_length: dayLengthHours(sys.sunrise, sys.sunset),
    temp_category: temperatureCategory(main.temp),
    heat_index: heatIndex(main.temp, main.humidity),
  };
}

/**
 * Only the first entry of the air-pollution list is used.
 */
export function toAirQualityRecord(observation: RawObservation): AirQualityRecord {
  const [entry] = observation.air_quality.list;
  const { co, no, no2, o3, so2, pm2_5, pm10, nh3 } = entry.components;

  const concentrations = { co, no, no2, o3, so2, pm2_5, pm10, nh3 };
  const indices = pollutantIndices(concentrations);
  const aqi = airQualityIndex(indices);

  return {
    city: observation.city,
    timestamp: observation.timestamp,
    ...concentrations,
    ...indices,
    aqi,
    aqi_category: aqiCategory(aqi),
  };
}

// -------------------------------------------------
// Stage
// -------------------------------------------------

export interface TransformerOptions {
  inputDir: string;
  outputDir: string;
  now?: () => Date;
}

export class WeatherTransformer {
  private readonly now: () => Date;

  constructor(private readonly options: TransformerOptions) {
    this.now = options.now ?? (() => new Date());
  }

  findLatestSnapshot(): Promise<string | null> {
    return findLatestFile(this.options.inputDir, RAW_SNAPSHOT_PREFIX, RAW_SNAPSHOT_EXTENSION);
  }

  async readSnapshot(file: string): Promise<RawObservation[]> {
    const text = await fs.readFile(file, 'utf8');
    return parsePayload(RawSnapshotSchema, JSON.parse(text), `Raw snapshot ${path.basename(file)}`);
  }

  /**
   * Flattens the newest raw snapshot into a weather CSV and an air-quality CSV.
   * Returns null when there is no snapshot to transform.
   */
  async transform(): Promise<TransformResult | null> {
    const inputFile = await this.findLatestSnapshot();

    if (!inputFile) {
      log.info({ dir: this.options.inputDir }, 'No weather data files found');
      return null;
    }

    const observations = await this.readSnapshot(inputFile);

    const weatherRecords = observations.map(toWeatherRecord);
    const airQualityRecords = observations.map(toAirQualityRecord);

    await fs.mkdir(this.options.outputDir, { recursive: true });

    const stamp = formatRunStamp(this.now());
    const weatherFile = path.join(
      this.options.outputDir,
      `${PROCESSED_WEATHER_PREFIX}${stamp}${PROCESSED_EXTENSION}`
    );
    const airQualityFile = path.join(
      this.options.outputDir,
      `${PROCESSED_AIR_PREFIX}${stamp}${PROCESSED_EXTENSION}`
    );

    await fs.writeFile(weatherFile, toCsv(WEATHER_COLUMNS, weatherRecords), 'utf8');
    await fs.writeFile(airQualityFile, toCsv(AIR_QUALITY_COLUMNS, airQualityRecords), 'utf8');

    log.info(
      { inputFile, weatherFile, airQualityFile, records: observations.length },
      'Processed data saved'
    );

    return { weatherFile, airQualityFile };
  }
}
