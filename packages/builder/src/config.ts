import { z } from "zod";
import { InvalidParameterError } from "./errors.js";
import { DEFAULT_ENDPOINT, DEFAULT_TIMEOUT } from "./ingestion/overpass/query.js";

const configSchema = z.object({
  OVERPASS_ENDPOINT: z.string().url().default(DEFAULT_ENDPOINT),
  OVERPASS_TIMEOUT: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT),
  ROADGRID_CACHE_DIR: z.string().min(1).optional(),
  ROADGRID_MIN_DISTANCE_KM: z.coerce.number().positive().optional(),
  // No default: the boundary treatment changes results and must be chosen
  ROADGRID_BOUNDARY_MODE: z.enum(["drop", "interpolate"]).optional(),
  ROADGRID_OUTPUT_DIR: z.string().min(1).default("out"),
});

export type Config = z.infer<typeof configSchema>;

let cachedConfig: Config | null = null;

/**
 * Validate an environment into a config.
 *
 * @throws InvalidParameterError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined>): Config {
  const result = configSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.issues
      .map((issue) => `  ${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new InvalidParameterError(`Configuration validation failed:\n${errors}`, "environment");
  }

  return result.data;
}

export function getConfig(): Config {
  if (cachedConfig) {
    return cachedConfig;
  }

  cachedConfig = loadConfig(process.env);
  return cachedConfig;
}

// For testing: reset cached config
export function resetConfig(): void {
  cachedConfig = null;
}
