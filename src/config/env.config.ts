import { z } from "zod";

export const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  HOST: z.string().min(1).default("0.0.0.0"),

  GOOGLE_MAPS_API_KEY: z.string().min(1, "GOOGLE_MAPS_API_KEY is required"),
  GOOGLE_PLACES_API_URL: z
    .url("GOOGLE_PLACES_API_URL must be a valid URL")
    .default("https://places.googleapis.com/v1/places:searchText"),
  GOOGLE_ROUTES_API_URL: z
    .url("GOOGLE_ROUTES_API_URL must be a valid URL")
    .default("https://routes.googleapis.com/directions/v2:computeRoutes"),
  GOOGLE_MAPS_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive("GOOGLE_MAPS_TIMEOUT_MS must be a positive number")
    .default(30000),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnvironment(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = z.flattenError(result.error).fieldErrors;
    console.error("❌ Environment validation failed:");

    for (const [field, messages] of Object.entries(errors)) {
      console.error(`  ${field}: ${messages?.join(", ")}`);
    }

    throw new Error("Invalid environment configuration. Please check your .env file.");
  }

  console.log("✅ Environment variables validated successfully");
  return result.data;
}
