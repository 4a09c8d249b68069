/**
 * @chronovault/runtime — Configuration.
 *
 * Loads and validates host configuration from environment variables
 * using Zod.
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

  // Nested invocation limit (top-level instruction is depth 1)
  MAX_INVOKE_DEPTH: z.coerce.number().int().min(1).max(16).default(4),
});

export type RuntimeConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are present but invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): RuntimeConfig {
  return ConfigSchema.parse(env);
}
