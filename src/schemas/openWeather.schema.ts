import { z } from "zod";

/* ------------------ Current weather (/weather) ------------------ */

const ConditionSchema = z
  .object({
    id: z.number().optional(),
    main: z.string(),
    description: z.string(),
    icon: z.string().optional(),
  })
  .passthrough();

export const CurrentWeatherSchema = z
  .object({
    main: z
      .object({
        temp: z.number(),
        feels_like: z.number(),
        humidity: z.number(),
        pressure: z.number(),
      })
      .passthrough(),
    wind: z
      .object({
        speed: z.number(),
        deg: z.number().optional(),
      })
      .passthrough(),
    clouds: z.object({ all: z.number() }).passthrough(),
    weather: z.array(ConditionSchema).min(1),
    sys: z
      .object({
        sunrise: z.number(),
        sunset: z.number(),
      })
      .passthrough(),
    dt: z.number().optional(),
    name: z.string().optional(),
  })
  .passthrough();

/* ------------------ Air pollution (/air_pollution) ------------------ */

const ComponentsSchema = z
  .object({
    co: z.number(),
    no: z.number(),
    no2: z.number(),
    o3: z.number(),
    so2: z.number(),
    pm2_5: z.number(),
    pm10: z.number(),
    nh3: z.number(),
  })
  .passthrough();

export const AirPollutionSchema = z
  .object({
    coord: z.object({ lat: z.number(), lon: z.number() }).passthrough().optional(),
    list: z
      .array(
        z
          .object({
            dt: z.number().optional(),
            main: z.object({ aqi: z.number() }).passthrough().optional(),
            components: ComponentsSchema,
          })
          .passthrough()
      )
      .min(1),
  })
  .passthrough();
