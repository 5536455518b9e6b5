import { z } from 'zod';

export const CityCommandSchema = z.object({
  city: z.string().trim().min(1),
});

export type CityCommand = z.infer<typeof CityCommandSchema>;
