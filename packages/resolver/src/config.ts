/**
 * @sip-provenance/resolver: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Entity index
  DUPLICATE_IDENTIFIER_POLICY: z
    .enum(["first-write-wins", "strict"])
    .default("first-write-wins"),

  // Output
  OUTPUT_LANGUAGE: z
    .string()
    .regex(/^[a-z]{2,3}(-[A-Za-z0-9]{2,8})*$/, "Expected a language tag such as \"nl\" or \"en-GB\"")
    .default("nl"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

export type DuplicateIdentifierPolicy = AppConfig["DUPLICATE_IDENTIFIER_POLICY"];

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
