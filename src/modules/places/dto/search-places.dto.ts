import { z } from "zod";
import { UNSET_QUERY_SENTINEL } from "../places.const";

export const searchPlacesSchema = z.object({
  textQuery: z
    .string()
    .min(1, "Text query is required")
    .refine((value) => !value.includes(UNSET_QUERY_SENTINEL), {
      message: "Text query is not set",
    }),
});

export type SearchPlacesDto = z.infer<typeof searchPlacesSchema>;
