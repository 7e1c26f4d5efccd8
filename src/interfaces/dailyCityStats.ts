export interface DailyCityStats {
    city: string;
    date: string;
    avg_temperature: number;
    max_temperature: number;
    min_temperature: number;
    avg_humidity: number;
    avg_aqi: number | null;
    dominant_weather: string;
    measurements_count: number;
}
