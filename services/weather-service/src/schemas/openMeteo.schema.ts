import { z } from "zod";

const series = z.array(z.number().nullable());

export const OpenMeteoCurrentSchema = z.object({
  current: z.object({
    time: z.string(),
    temperature_2m: z.number(),
    apparent_temperature: z.number().optional(),
    relative_humidity_2m: z.number(),
    pressure_msl: z.number(),
    wind_speed_10m: z.number(), // km/h
    wind_direction_10m: z.number(),
    weather_code: z.number().int(),
  }),
});

export const OpenMeteoDailySchema = z.object({
  daily: z.object({
    time: z.array(z.string()),
    temperature_2m_max: series,
    temperature_2m_min: series,
    precipitation_sum: series,
    weather_code: series,
    relative_humidity_2m_mean: series.optional(),
  }),
});

export const CityCoordinatesSchema = z.record(
  z.string(),
  z.object({
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180),
  })
);

export const WmoCodesSchema = z.record(z.string(), z.string());

export type OpenMeteoDaily = z.infer<typeof OpenMeteoDailySchema>["daily"];
export type CityCoordinates = z.infer<typeof CityCoordinatesSchema>[string];
