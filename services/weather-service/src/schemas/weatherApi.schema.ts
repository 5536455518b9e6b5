import { z } from "zod";

export const ConditionSchema = z.object({
  text: z.string(),
  icon: z.string(),
});

export const CurrentSchema = z.object({
  last_updated_epoch: z.number(),
  temp_c: z.number(),
  feelslike_c: z.number(),
  humidity: z.number(),
  pressure_mb: z.number(),
  wind_kph: z.number(),
  wind_degree: z.number(),
  condition: ConditionSchema,
});

export const ForecastDaySchema = z.object({
  date: z.string(),
  day: z.object({
    maxtemp_c: z.number(),
    mintemp_c: z.number(),
    avgtemp_c: z.number(),
    avghumidity: z.number(),
    totalprecip_mm: z.number(),
    condition: ConditionSchema,
  }),
});

export const WeatherApiSchema = z.object({
  location: z.object({
    name: z.string(),
  }),
  current: CurrentSchema,
  forecast: z.object({
    forecastday: z.array(ForecastDaySchema),
  }),
});

export const WeatherApiErrorSchema = z.object({
  error: z.object({
    code: z.number(),
    message: z.string(),
  }),
});

export type WeatherApiResponse = z.infer<typeof WeatherApiSchema>;
export type WeatherApiForecastDay = z.infer<typeof ForecastDaySchema>;
