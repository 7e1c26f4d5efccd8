export const RAW_SNAPSHOT_PREFIX = "weather_data_";
export const RAW_SNAPSHOT_EXTENSION = ".json";

export const PROCESSED_WEATHER_PREFIX = "processed_weather_";
export const PROCESSED_AIR_PREFIX = "processed_air_";
export const PROCESSED_EXTENSION = ".csv";
