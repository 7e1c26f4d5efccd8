import path from 'path';
import { z } from 'zod';

import { AirQualityRecord } from '../interfaces/airQualityRecord';
import { WeatherRecord } from '../interfaces/weatherRecord';
import { AirQualityCsvRowSchema, WeatherCsvRowSchema } from '../schemas/processed.schema';
import { readCsvRows } from '../utils/csv';
import { parsePayload } from '../utils/errors';

export async function readWeatherCsv(file: string): Promise<WeatherRecord[]> {
  const rows = await readCsvRows(file);
  return parsePayload(z.array(WeatherCsvRowSchema), rows, `Processed weather file ${path.basename(file)}`);
}

export async function readAirQualityCsv(file: string): Promise<AirQualityRecord[]> {
  const rows = await readCsvRows(file);
  return parsePayload(z.array(AirQualityCsvRowSchema), rows, `Processed air file ${path.basename(file)}`);
}
