import { DailyCityStats } from '../interfaces/dailyCityStats';

export interface WeatherSample {
  city: string;
  timestamp: string;
  temperature: number;
  humidity: number;
  weather_main: string;
}

export interface AirQualitySample {
  city: string;
  timestamp: string;
  aqi: number;
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Most frequent condition; on a tie, the one observed most recently wins.
 */
export function dominantWeather(samples: readonly WeatherSample[]): string {
  const ordered = [...samples].sort((a, b) => a.timestamp.localeCompare(b.timestamp));
  const tally = new Map<string, { count: number; lastSeen: number }>();

  ordered.forEach((sample, position) => {
    const entry = tally.get(sample.weather_main) ?? { count: 0, lastSeen: -1 };
    tally.set(sample.weather_main, { count: entry.count + 1, lastSeen: position });
  });

  let best = '';
  let bestCount = 0;
  let bestLastSeen = -1;

  for (const [condition, { count, lastSeen }] of tally) {
    if (count > bestCount || (count === bestCount && lastSeen > bestLastSeen)) {
      best = condition;
      bestCount = count;
      bestLastSeen = lastSeen;
    }
  }

  return best;
}

/**
 * Aggregates one calendar date's measurement rows into one stats row per city.
 * Cities come from the weather rows; air rows only contribute avg_aqi.
 */
export function aggregateDailyStats(
  date: string,
  weather: readonly WeatherSample[],
  airQuality: readonly AirQualitySample[]
): DailyCityStats[] {
  const weatherByCity = groupByCity(weather);
  const airByCity = groupByCity(airQuality);

  return [...weatherByCity.keys()].sort().map(city => {
    const samples = weatherByCity.get(city) ?? [];
    const temperatures = samples.map(sample => sample.temperature);
    const aqiValues = (airByCity.get(city) ?? []).map(sample => sample.aqi);

    return {
      city,
      date,
      avg_temperature: mean(temperatures),
      max_temperature: Math.max(...temperatures),
      min_temperature: Math.min(...temperatures),
      avg_humidity: mean(samples.map(sample => sample.humidity)),
      avg_aqi: aqiValues.length ? mean(aqiValues) : null,
      dominant_weather: dominantWeather(samples),
      measurements_count: samples.length,
    };
  });
}

function groupByCity<T extends { city: string }>(rows: readonly T[]): Map<string, T[]> {
  const groups = new Map<string, T[]>();

  for (const row of rows) {
    const group = groups.get(row.city);
    if (group) group.push(row);
    else groups.set(row.city, [row]);
  }

  return groups;
}
