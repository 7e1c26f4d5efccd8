import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';

import { AirQualityRecord } from '../interfaces/airQualityRecord';
import { DailyCityStats } from '../interfaces/dailyCityStats';
import { WeatherRecord } from '../interfaces/weatherRecord';
import { AirQualitySample, WeatherSample } from './dailyStats';

export type MeasurementTable =
  | 'weather_measurements'
  | 'air_quality_measurements'
  | 'city_daily_stats';

// -------------------------------------------------
// Schema
// -------------------------------------------------

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS weather_measurements (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    city TEXT NOT NULL,
    latitude REAL,
    longitude REAL,
    timestamp TIMESTAMP NOT NULL,
    temperature REAL,
    feels_like REAL,
    humidity INTEGER,
    pressure INTEGER,
    wind_speed REAL,
    wind_direction REAL,
    clouds_percent INTEGER,
    weather_main TEXT,
    weather_description TEXT,
    sunrise TIMESTAMP,
    sunset TIMESTAMP,
    day_length REAL,
    temp_category TEXT,
    heat_index REAL,
    UNIQUE (city, timestamp)
  );

  CREATE TABLE IF NOT EXISTS air_quality_measurements (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    city TEXT NOT NULL,
    timestamp TIMESTAMP NOT NULL,
    co REAL,
    no REAL,
    no2 REAL,
    o3 REAL,
    so2 REAL,
    pm2_5 REAL,
    pm10 REAL,
    nh3 REAL,
    pm2_5_index REAL,
    pm10_index REAL,
    no2_index REAL,
    o3_index REAL,
    co_index REAL,
    so2_index REAL,
    aqi REAL,
    aqi_category TEXT,
    UNIQUE (city, timestamp)
  );

  CREATE TABLE IF NOT EXISTS city_daily_stats (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    city TEXT NOT NULL,
    date DATE NOT NULL,
    avg_temperature REAL,
    max_temperature REAL,
    min_temperature REAL,
    avg_humidity REAL,
    avg_aqi REAL,
    dominant_weather TEXT,
    measurements_count INTEGER,
    UNIQUE (city, date)
  );
`;

// (city, timestamp) identifies a measurement, so a reloaded file adds nothing
const INSERT_WEATHER_SQL = `
  INSERT OR IGNORE INTO weather_measurements (
    city, latitude, longitude, timestamp, temperature, feels_like, humidity,
    pressure, wind_speed, wind_direction, clouds_percent, weather_main,
    weather_description, sunrise, sunset, day_length, temp_category, heat_index
  ) VALUES (
    @city, @latitude, @longitude, @timestamp, @temperature, @feels_like, @humidity,
    @pressure, @wind_speed, @wind_direction, @clouds_percent, @weather_main,
    @weather_description, @sunrise, @sunset, @day_length, @temp_category, @heat_index
  )
`;

const INSERT_AIR_QUALITY_SQL = `
  INSERT OR IGNORE INTO air_quality_measurements (
    city, timestamp, co, no, no2, o3, so2, pm2_5, pm10, nh3,
    pm2_5_index, pm10_index, no2_index, o3_index, co_index, so2_index,
    aqi, aqi_category
  ) VALUES (
    @city, @timestamp, @co, @no, @no2, @o3, @so2, @pm2_5, @pm10, @nh3,
    @pm2_5_index, @pm10_index, @no2_index, @o3_index, @co_index, @so2_index,
    @aqi, @aqi_category
  )
`;

const UPSERT_DAILY_STATS_SQL = `
  INSERT INTO city_daily_stats (
    city, date, avg_temperature, max_temperature, min_temperature,
    avg_humidity, avg_aqi, dominant_weather, measurements_count
  ) VALUES (
    @city, @date, @avg_temperature, @max_temperature, @min_temperature,
    @avg_humidity, @avg_aqi, @dominant_weather, @measurements_count
  )
  ON CONFLICT (city, date) DO UPDATE SET
    avg_temperature = excluded.avg_temperature,
    max_temperature = excluded.max_temperature,
    min_temperature = excluded.min_temperature,
    avg_humidity = excluded.avg_humidity,
    avg_aqi = excluded.avg_aqi,
    dominant_weather = excluded.dominant_weather,
    measurements_count = excluded.measurements_count
`;

// -------------------------------------------------
// Store
// -------------------------------------------------

/**
 * SQLite persistence for measurements and the per-day rollup.
 * One instance wraps one connection; close it when the load is done.
 */
export class MeasurementStore {
  constructor(private readonly db: Database.Database) {}

  static open(filePath: string): MeasurementStore {
    if (filePath !== ':memory:') {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
    }

    return new MeasurementStore(new Database(filePath));
  }

  ensureSchema(): void {
    this.db.exec(SCHEMA_SQL);
  }

  /** Returns the number of rows actually inserted. */
  appendWeather(records: readonly WeatherRecord[]): number {
    const insert = this.db.prepare<WeatherRecord>(INSERT_WEATHER_SQL);

    return this.db.transaction((rows: readonly WeatherRecord[]) =>
      rows.reduce((inserted, row) => inserted + insert.run(row).changes, 0)
    )(records);
  }

  /** Returns the number of rows actually inserted. */
  appendAirQuality(records: readonly AirQualityRecord[]): number {
    const insert = this.db.prepare<AirQualityRecord>(INSERT_AIR_QUALITY_SQL);

    return this.db.transaction((rows: readonly AirQualityRecord[]) =>
      rows.reduce((inserted, row) => inserted + insert.run(row).changes, 0)
    )(records);
  }

  weatherSamplesFor(date: string): WeatherSample[] {
    return this.db
      .prepare<[string], WeatherSample>(
        `SELECT city, timestamp, temperature, humidity, weather_main
         FROM weather_measurements
         WHERE date(timestamp) = ?
         ORDER BY timestamp, id`
      )
      .all(date);
  }

  airQualitySamplesFor(date: string): AirQualitySample[] {
    return this.db
      .prepare<[string], AirQualitySample>(
        `SELECT city, timestamp, aqi
         FROM air_quality_measurements
         WHERE date(timestamp) = ?
         ORDER BY timestamp, id`
      )
      .all(date);
  }

  /**
   * Insert-or-update keyed by (city, date); every derived column is overwritten.
   */
  upsertDailyStats(stats: readonly DailyCityStats[]): void {
    const upsert = this.db.prepare<DailyCityStats>(UPSERT_DAILY_STATS_SQL);

    this.db.transaction((rows: readonly DailyCityStats[]) => {
      for (const row of rows) upsert.run(row);
    })(stats);
  }

  dailyStatsFor(date: string): DailyCityStats[] {
    return this.db
      .prepare<[string], DailyCityStats>(
        `SELECT city, date, avg_temperature, max_temperature, min_temperature,
                avg_humidity, avg_aqi, dominant_weather, measurements_count
         FROM city_daily_stats
         WHERE date = ?
         ORDER BY city`
      )
      .all(date);
  }

  countRows(table: MeasurementTable): number {
    const row = this.db
      .prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM ${table}`)
      .get();

    return row?.total ?? 0;
  }

  close(): void {
    this.db.close();
  }
}
