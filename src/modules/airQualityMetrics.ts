import {
  AqiCategory,
  IndexedPollutant,
  PollutantConcentrations,
  PollutantIndices,
  POLLUTANT_REFERENCE_MAX,
} from '../interfaces/airQualityRecord';

/**
 * Concentration as a percentage of the pollutant's reference maximum, clipped to [0, 100].
 * Units are whatever the air-pollution payload reports; no conversion happens.
 */
export function pollutantIndex(pollutant: IndexedPollutant, concentration: number): number {
  const ratio = (concentration / POLLUTANT_REFERENCE_MAX[pollutant]) * 100;
  return Math.min(Math.max(ratio, 0), 100);
}

export function pollutantIndices(concentrations: PollutantConcentrations): PollutantIndices {
  return {
    pm2_5_index: pollutantIndex('pm2_5', concentrations.pm2_5),
    pm10_index: pollutantIndex('pm10', concentrations.pm10),
    no2_index: pollutantIndex('no2', concentrations.no2),
    o3_index: pollutantIndex('o3', concentrations.o3),
    co_index: pollutantIndex('co', concentrations.co),
    so2_index: pollutantIndex('so2', concentrations.so2),
  };
}

export function airQualityIndex(indices: PollutantIndices): number {
  return Math.max(
    indices.pm2_5_index,
    indices.pm10_index,
    indices.no2_index,
    indices.o3_index,
    indices.co_index,
    indices.so2_index
  );
}

// [0, 20] Very Good, then right-closed bins of width 20
export function aqiCategory(aqi: number): AqiCategory {
  if (aqi <= 20) return 'Very Good';
  if (aqi <= 40) return 'Good';
  if (aqi <= 60) return 'Moderate';
  if (aqi <= 80) return 'Poor';
  return 'Very Poor';
}
