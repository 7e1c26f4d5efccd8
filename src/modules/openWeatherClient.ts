import { AxiosInstance } from 'axios';
import { AirPollution, CurrentWeather } from '../interfaces/openWeather';
import { WeatherApi } from '../interfaces/weatherApi';
import { AirPollutionSchema, CurrentWeatherSchema } from '../schemas/openWeather.schema';
import { parsePayload } from '../utils/errors';

export interface OpenWeatherClientOptions {
  axiosClient: AxiosInstance;
  baseUrl: string;
  apiKey: string;
}

/**
 * OpenWeather current-conditions and air-pollution endpoints (API 2.5).
 * Non-2xx responses reject through axios; payloads are validated before returning.
 */
export class OpenWeatherClient implements WeatherApi {
  constructor(private readonly options: OpenWeatherClientOptions) {}

  async getCurrentWeather(latitude: number, longitude: number): Promise<CurrentWeather> {
    const response = await this.options.axiosClient.get<unknown>(this.url('weather'), {
      params: {
        lat: latitude,
        lon: longitude,
        appid: this.options.apiKey,
        units: 'metric',
      },
    });

    return parsePayload(CurrentWeatherSchema, response.data, 'OpenWeather /weather');
  }

  async getAirQuality(latitude: number, longitude: number): Promise<AirPollution> {
    const response = await this.options.axiosClient.get<unknown>(this.url('air_pollution'), {
      params: {
        lat: latitude,
        lon: longitude,
        appid: this.options.apiKey,
      },
    });

    return parsePayload(AirPollutionSchema, response.data, 'OpenWeather /air_pollution');
  }

  private url(endpoint: string): string {
    return `${this.options.baseUrl.replace(/\/+$/, '')}/${endpoint}`;
  }
}
