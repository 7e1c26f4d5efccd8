import fs from 'fs/promises';
import path from 'path';
import Bottleneck from 'bottleneck';

import { RAW_SNAPSHOT_EXTENSION, RAW_SNAPSHOT_PREFIX } from '../constants/files';
import { Coordinate } from '../interfaces/coordinate';
import { AirPollution, CurrentWeather, RawObservation } from '../interfaces/openWeather';
import { Geocoder, WeatherApi } from '../interfaces/weatherApi';
import { stageLogger } from '../logger';
import { describeError } from '../utils/errors';
import { formatIsoTimestamp, formatRunStamp } from '../utils/time';

const log = stageLogger('extract');

export interface ExtractorOptions {
  cities: readonly string[];
  geocoder: Geocoder;
  weatherApi: WeatherApi;
  limiter: Bottleneck;
  outputDir: string;
  now?: () => Date;
}

export class WeatherExtractor {
  // Lives as long as this instance; never written to disk
  private readonly geocodingCache = new Map<string, Coordinate>();

  private readonly now: () => Date;

  constructor(private readonly options: ExtractorOptions) {
    this.now = options.now ?? (() => new Date());
  }

  // -------------------------------------------------
  // Public API
  // -------------------------------------------------

  /**
   * Collects one observation per city and writes them as a single JSON snapshot.
   * Returns the snapshot path, or null when no city yielded both payloads.
   */
  async extract(): Promise<string | null> {
    const runStartedAt = this.now();
    const observations: RawObservation[] = [];

    // One city at a time; the limiter spaces every outbound call
    for (const city of this.options.cities) {
      log.info({ city }, 'Fetching data');

      const observation = await this.fetchObservation(city);
      if (observation) observations.push(observation);
    }

    log.info(
      {
        attempted: this.options.cities.length,
        collected: observations.length,
        skipped: this.options.cities.length - observations.length,
      },
      'Extraction finished'
    );

    if (!observations.length) {
      log.warn('No data was collected');
      return null;
    }

    await fs.mkdir(this.options.outputDir, { recursive: true });

    const file = path.join(
      this.options.outputDir,
      `${RAW_SNAPSHOT_PREFIX}${formatRunStamp(runStartedAt)}${RAW_SNAPSHOT_EXTENSION}`
    );

    await fs.writeFile(file, JSON.stringify(observations, null, 2), 'utf8');

    log.info({ file, observations: observations.length }, 'Raw snapshot saved');
    return file;
  }

  async resolveCoordinates(city: string): Promise<Coordinate | null> {
    const cached = this.geocodingCache.get(city);

    if (cached) {
      log.debug({ city }, 'Geocoding cache hit');
      return cached;
    }

    try {
      const coordinate = await this.options.limiter.schedule(() =>
        this.options.geocoder.geocode(city)
      );

      if (!coordinate) {
        log.warn({ city }, 'Could not find coordinates');
        return null;
      }

      this.geocodingCache.set(city, coordinate);
      return coordinate;
    } catch (err) {
      log.warn({ city, ...describeError(err) }, 'Error getting coordinates');
      return null;
    }
  }

  // -------------------------------------------------
  // Internals
  // -------------------------------------------------

  private async fetchObservation(city: string): Promise<RawObservation | null> {
    const coordinate = await this.resolveCoordinates(city);
    if (!coordinate) return null;

    const { latitude, longitude } = coordinate;

    const weather = await this.attempt<CurrentWeather>(city, 'weather', () =>
      this.options.weatherApi.getCurrentWeather(latitude, longitude)
    );
    if (!weather) return null;

    const airQuality = await this.attempt<AirPollution>(city, 'air quality', () =>
      this.options.weatherApi.getAirQuality(latitude, longitude)
    );
    if (!airQuality) return null;

    return {
      city: coordinate.name,
      latitude,
      longitude,
      timestamp: formatIsoTimestamp(this.now()),
      weather,
      air_quality: airQuality,
    };
  }

  private async attempt<T>(
    city: string,
    what: string,
    call: () => Promise<T>
  ): Promise<T | null> {
    try {
      return await this.options.limiter.schedule(call);
    } catch (err) {
      log.warn({ city, ...describeError(err) }, `Failed to get ${what} data`);
      return null;
    }
  }
}
