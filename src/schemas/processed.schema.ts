import { z } from "zod";
import { AQI_CATEGORIES } from "../interfaces/airQualityRecord";
import { TEMPERATURE_CATEGORIES } from "../interfaces/weatherRecord";
import { naiveDateTime } from "./common.schema";

/* CSV fields arrive as strings; empty means missing */

const csvNumber = z.string().trim().min(1).pipe(z.coerce.number().finite());

const optionalCsvNumber = z
  .string()
  .trim()
  .transform(value => (value === "" ? null : value))
  .pipe(z.union([z.null(), z.coerce.number().finite()]));

export const WeatherCsvRowSchema = z.object({
  city: z.string().min(1),
  latitude: csvNumber,
  longitude: csvNumber,
  timestamp: naiveDateTime,
  temperature: csvNumber,
  feels_like: csvNumber,
  humidity: csvNumber,
  pressure: csvNumber,
  wind_speed: csvNumber,
  wind_direction: optionalCsvNumber,
  clouds_percent: csvNumber,
  weather_main: z.string(),
  weather_description: z.string(),
  sunrise: naiveDateTime,
  sunset: naiveDateTime,
  day_length: csvNumber,
  temp_category: z.enum(TEMPERATURE_CATEGORIES),
  heat_index: csvNumber,
});

export const AirQualityCsvRowSchema = z.object({
  city: z.string().min(1),
  timestamp: naiveDateTime,
  co: csvNumber,
  no: csvNumber,
  no2: csvNumber,
  o3: csvNumber,
  so2: csvNumber,
  pm2_5: csvNumber,
  pm10: csvNumber,
  nh3: csvNumber,
  pm2_5_index: csvNumber,
  pm10_index: csvNumber,
  no2_index: csvNumber,
  o3_index: csvNumber,
  co_index: csvNumber,
  so2_index: csvNumber,
  aqi: csvNumber,
  aqi_category: z.enum(AQI_CATEGORIES),
});
