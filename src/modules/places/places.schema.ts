import { z } from "zod";

const latLngSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
});

export const googlePlaceSchema = z.object({
  id: z.string(),
  formattedAddress: z.string(),
  priceLevel: z.string().nullish(),
  displayName: z.object({
    text: z.string(),
    languageCode: z.string().nullish(),
  }),
  location: latLngSchema,
});

/**
 * Text Search omits `places` entirely when nothing matched.
 */
export const googleSearchTextResponseSchema = z.object({
  places: z.array(googlePlaceSchema).nullish(),
});

export type GooglePlace = z.infer<typeof googlePlaceSchema>;
export type GoogleSearchTextResponse = z.infer<typeof googleSearchTextResponseSchema>;
