import { Coordinate } from "./coordinate";
import { AirPollution, CurrentWeather } from "./openWeather";

export interface Geocoder {
  /** Resolves a place name, or null when the service knows no such place. */
  geocode(city: string): Promise<Coordinate | null>;
}

export interface WeatherApi {
  getCurrentWeather(latitude: number, longitude: number): Promise<CurrentWeather>;
  getAirQuality(latitude: number, longitude: number): Promise<AirPollution>;
}
