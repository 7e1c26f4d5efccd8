import { z } from "zod";
import { AirPollutionSchema, CurrentWeatherSchema } from "../schemas/openWeather.schema";
import { RawObservationSchema } from "../schemas/snapshot.schema";

/* ------------------ API payloads ------------------ */

export type CurrentWeather = z.infer<typeof CurrentWeatherSchema>;
export type AirPollution = z.infer<typeof AirPollutionSchema>;

/* ------------------ Raw snapshot ------------------ */

export type RawObservation = z.infer<typeof RawObservationSchema>;
