import { z } from "zod";

/**
 * Nominatim /search?format=json result. Coordinates arrive as strings.
 */
export const PlaceSchema = z
  .object({
    lat: z.coerce.number(),
    lon: z.coerce.number(),
    display_name: z.string().optional(),
  })
  .passthrough();

export const GeocodingResponseSchema = z.array(PlaceSchema);
