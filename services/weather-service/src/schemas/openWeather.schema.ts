import { z } from "zod";

export const OwmConditionSchema = z.object({
  description: z.string(),
  icon: z.string(),
});

const PrecipitationSchema = z.object({
  "3h": z.number().optional(),
});

export const OwmCurrentSchema = z.object({
  name: z.string(),
  dt: z.number(),
  weather: z.array(OwmConditionSchema).min(1),
  main: z.object({
    temp: z.number(),
    feels_like: z.number(),
    pressure: z.number(),
    humidity: z.number(),
  }),
  wind: z.object({
    speed: z.number(), // m/s with units=metric
    deg: z.number().default(0),
  }),
});

export const OwmForecastStepSchema = z.object({
  dt: z.number(),
  main: z.object({
    temp: z.number(),
    humidity: z.number(),
  }),
  weather: z.array(OwmConditionSchema).min(1),
  rain: PrecipitationSchema.optional(),
  snow: PrecipitationSchema.optional(),
});

export const OwmForecastSchema = z.object({
  list: z.array(OwmForecastStepSchema),
});

export type OwmCurrent = z.infer<typeof OwmCurrentSchema>;
export type OwmForecastStep = z.infer<typeof OwmForecastStepSchema>;
