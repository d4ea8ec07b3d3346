import { GOOGLE_API_KEY_HEADER, GOOGLE_FIELD_MASK_HEADER } from "./google-maps.const";

export function buildGoogleHeaders(apiKey: string, fieldMask: string): Record<string, string> {
  return {
    "Content-Type": "application/json",
    [GOOGLE_API_KEY_HEADER]: apiKey,
    [GOOGLE_FIELD_MASK_HEADER]: fieldMask,
  };
}
