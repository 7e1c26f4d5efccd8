import { AxiosInstance } from 'axios';
import { Coordinate } from '../interfaces/coordinate';
import { Geocoder } from '../interfaces/weatherApi';
import { GeocodingResponseSchema } from '../schemas/geocoding.schema';
import { parsePayload } from '../utils/errors';

export interface NominatimGeocoderOptions {
  axiosClient: AxiosInstance;
  url: string;
  userAgent: string;
}

/**
 * Free-text place lookup against a Nominatim /search endpoint.
 * Nominatim rejects requests without an identifying User-Agent.
 */
export class NominatimGeocoder implements Geocoder {
  constructor(private readonly options: NominatimGeocoderOptions) {}

  async geocode(city: string): Promise<Coordinate | null> {
    const response = await this.options.axiosClient.get<unknown>(this.options.url, {
      params: { q: city, format: 'json', limit: 1 },
      headers: { 'User-Agent': this.options.userAgent },
    });

    const places = parsePayload(GeocodingResponseSchema, response.data, 'Nominatim /search');
    const [place] = places;

    if (!place) return null;

    return {
      latitude: place.lat,
      longitude: place.lon,
      name: city,
    };
  }
}
