/**
 * Configuration loaded from environment variables.
 * The Mapbox access token and endpoint settings live here, never in the geocoding code.
 */

import { z } from "zod";

const configSchema = z.object({
  // Mapbox Geocoding (required for live lookups)
  MAPBOX_ACCESS_TOKEN: z.string().min(1, "MAPBOX_ACCESS_TOKEN is required"),
  MAPBOX_BASE_URL: z.string().url().default("https://api.mapbox.com"),
  MAPBOX_ENDPOINT: z.enum(["mapbox.places", "mapbox.places-permanent"]).default("mapbox.places"),

  // Optional
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Load and validate config from process.env.
 * Throws ZodError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    MAPBOX_ACCESS_TOKEN: env.MAPBOX_ACCESS_TOKEN ?? "",
    MAPBOX_BASE_URL: env.MAPBOX_BASE_URL || undefined,
    MAPBOX_ENDPOINT: env.MAPBOX_ENDPOINT || undefined,
    HTTP_TIMEOUT_MS: env.HTTP_TIMEOUT_MS || undefined,
  };
  return configSchema.parse(raw);
}
