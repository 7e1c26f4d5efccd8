export const AQI_CATEGORIES = ["Very Good", "Good", "Moderate", "Poor", "Very Poor"] as const;

export type AqiCategory = (typeof AQI_CATEGORIES)[number];

/** Pollutants that contribute to the composite index, with their reference maxima. */
export const POLLUTANT_REFERENCE_MAX = {
    pm2_5: 250,
    pm10: 430,
    no2: 400,
    o3: 240,
    co: 50,
    so2: 350,
} as const;

export type IndexedPollutant = keyof typeof POLLUTANT_REFERENCE_MAX;

export const AIR_QUALITY_COLUMNS = [
    "city",
    "timestamp",
    "co",
    "no",
    "no2",
    "o3",
    "so2",
    "pm2_5",
    "pm10",
    "nh3",
    "pm2_5_index",
    "pm10_index",
    "no2_index",
    "o3_index",
    "co_index",
    "so2_index",
    "aqi",
    "aqi_category",
] as const;

export interface PollutantConcentrations {
    co: number;
    no: number;
    no2: number;
    o3: number;
    so2: number;
    pm2_5: number;
    pm10: number;
    nh3: number;
}

export type PollutantIndices = Record<`${IndexedPollutant}_index`, number>;

export interface AirQualityRecord extends PollutantConcentrations, PollutantIndices {
    city: string;
    timestamp: string;
    aqi: number;
    aqi_category: AqiCategory;
}
