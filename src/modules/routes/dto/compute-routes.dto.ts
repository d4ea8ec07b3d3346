import { z } from "zod";

const coordinateSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
});

export const computeRoutesSchema = z.object({
  originLocation: coordinateSchema,
  destinationLocation: coordinateSchema,
  departureTime: z.string(),
});

export type ComputeRoutesDto = z.infer<typeof computeRoutesSchema>;
