import { z } from "zod";

export const googleRouteSchema = z.object({
  distanceMeters: z.number(),
  duration: z.string(),
  polyline: z.object({
    encodedPolyline: z.string(),
  }),
});

export const googleComputeRoutesResponseSchema = z.object({
  routes: z.array(googleRouteSchema),
});

export type GoogleRoute = z.infer<typeof googleRouteSchema>;
export type GoogleComputeRoutesResponse = z.infer<typeof googleComputeRoutesResponseSchema>;
