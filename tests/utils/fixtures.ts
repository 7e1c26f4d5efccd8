import { AirQualityRecord } from '@/interfaces/airQualityRecord';
import { AirPollution, CurrentWeather, RawObservation } from '@/interfaces/openWeather';
import { WeatherRecord } from '@/interfaces/weatherRecord';

/**
 * 2024-03-21: sunrise 06:00:00 UTC, sunset 18:00:00 UTC (12 h of daylight)
 */
export const SUNRISE = 1711000800;
export const SUNSET = 1711044000;

export function buildCurrentWeather(
  overrides: { temp?: number; humidity?: number; deg?: number | null; main?: string } = {}
): CurrentWeather {
  const wind: CurrentWeather['wind'] =
    overrides.deg === null ? { speed: 3.6 } : { speed: 3.6, deg: overrides.deg ?? 180 };

  return {
    coord: { lon: 139.76, lat: 35.68 },
    weather: [
      {
        id: 800,
        main: overrides.main ?? 'Clear',
        description: 'clear sky',
        icon: '01d',
      },
    ],
    main: {
      temp: overrides.temp ?? 20,
      feels_like: 19.5,
      humidity: overrides.humidity ?? 50,
      pressure: 1013,
    },
    wind,
    clouds: { all: 0 },
    sys: { sunrise: SUNRISE, sunset: SUNSET },
    dt: 1711015200,
    name: 'Test City',
  };
}

/**
 * Indices: pm2_5 10, pm10 10, no2 3, o3 25, co 10, so2 1 → aqi 25 (Good)
 */
export function buildAirPollution(
  overrides: Partial<AirPollution['list'][number]['components']> = {}
): AirPollution {
  return {
    coord: { lon: 139.76, lat: 35.68 },
    list: [
      {
        dt: 1711015200,
        main: { aqi: 2 },
        components: {
          co: 5,
          no: 0.5,
          no2: 12,
          o3: 60,
          so2: 3.5,
          pm2_5: 25,
          pm10: 43,
          nh3: 1.2,
          ...overrides,
        },
      },
      {
        dt: 1711018800,
        main: { aqi: 5 },
        components: {
          co: 50,
          no: 50,
          no2: 400,
          o3: 240,
          so2: 350,
          pm2_5: 250,
          pm10: 430,
          nh3: 50,
        },
      },
    ],
  };
}

export function buildObservation(
  city: string,
  timestamp: string,
  weather: CurrentWeather = buildCurrentWeather(),
  airQuality: AirPollution = buildAirPollution()
): RawObservation {
  return {
    city,
    latitude: 35.68,
    longitude: 139.76,
    timestamp,
    weather,
    air_quality: airQuality,
  };
}

export function buildWeatherRecord(
  city: string,
  timestamp: string,
  overrides: Partial<WeatherRecord> = {}
): WeatherRecord {
  return {
    city,
    latitude: 35.68,
    longitude: 139.76,
    timestamp,
    temperature: 20,
    feels_like: 19.5,
    humidity: 50,
    pressure: 1013,
    wind_speed: 3.6,
    wind_direction: 180,
    clouds_percent: 0,
    weather_main: 'Clear',
    weather_description: 'clear sky',
    sunrise: '2024-03-21 06:00:00',
    sunset: '2024-03-21 18:00:00',
    day_length: 12,
    temp_category: 'Mild',
    heat_index: 21,
    ...overrides,
  };
}

export function buildAirQualityRecord(
  city: string,
  timestamp: string,
  overrides: Partial<AirQualityRecord> = {}
): AirQualityRecord {
  return {
    city,
    timestamp,
    co: 5,
    no: 0.5,
    no2: 12,
    o3: 60,
    so2: 3.5,
    pm2_5: 25,
    pm10: 43,
    nh3: 1.2,
    pm2_5_index: 10,
    pm10_index: 10,
    no2_index: 3,
    o3_index: 25,
    co_index: 10,
    so2_index: 1,
    aqi: 25,
    aqi_category: 'Good',
    ...overrides,
  };
}
