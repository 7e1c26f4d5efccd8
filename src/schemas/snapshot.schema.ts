import { z } from "zod";
import { naiveDateTime } from "./common.schema";
import { AirPollutionSchema, CurrentWeatherSchema } from "./openWeather.schema";

export const RawObservationSchema = z.object({
  city: z.string().min(1),
  latitude: z.number(),
  longitude: z.number(),
  timestamp: naiveDateTime,
  weather: CurrentWeatherSchema,
  air_quality: AirPollutionSchema,
});

export const RawSnapshotSchema = z.array(RawObservationSchema);
