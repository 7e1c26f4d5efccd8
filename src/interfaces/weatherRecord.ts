export const TEMPERATURE_CATEGORIES = ["Freezing", "Cold", "Mild", "Warm", "Hot"] as const;

export type TemperatureCategory = (typeof TEMPERATURE_CATEGORIES)[number];

export const WEATHER_COLUMNS = [
    "city",
    "latitude",
    "longitude",
    "timestamp",
    "temperature",
    "feels_like",
    "humidity",
    "pressure",
    "wind_speed",
    "wind_direction",
    "clouds_percent",
    "weather_main",
    "weather_description",
    "sunrise",
    "sunset",
    "day_length",
    "temp_category",
    "heat_index",
] as const;

export interface WeatherRecord {
    city: string;
    latitude: number;
    longitude: number;
    timestamp: string;
    temperature: number;
    feels_like: number;
    humidity: number;
    pressure: number;
    wind_speed: number;
    wind_direction: number | null;
    clouds_percent: number;
    weather_main: string;
    weather_description: string;
    sunrise: string;
    sunset: string;
    day_length: number;
    temp_category: TemperatureCategory;
    heat_index: number;
}
