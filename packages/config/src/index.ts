import { z } from "zod";

// =============================================================================
// Helpers
// =============================================================================

/**
 * Parse string booleans from environment variables.
 * z.coerce.boolean() treats any non-empty string as true, including "false"
 */
const stringBoolean = z
  .union([z.boolean(), z.string()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    return val.toLowerCase() === "true";
  });

// =============================================================================
// Config Schema - Grouped by Domain
// =============================================================================

export const configSchema = z.object({
  // ===========================================================================
  // Environment
  // ===========================================================================
  /** Free-form: host processes bring their own values (staging, ci, ...) */
  NODE_ENV: z.string().default("development"),

  // ===========================================================================
  // Logging
  // ===========================================================================
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .catch("info"),
  /** Pretty-print log lines through pino-pretty (development only) */
  LOG_PRETTY: stringBoolean.default(false),

  // ===========================================================================
  // Fault Injection
  // ===========================================================================
  /** When false, probes pass results through and exhaustion runs degrade */
  FAULTPATH_ENABLED: stringBoolean.default(true),
  /** Initial verbosity of the process-wide injection state */
  FAULTPATH_VERBOSITY: z.enum(["none", "moderate", "extreme"]).default("moderate"),
});

// =============================================================================
// Config Loading
// =============================================================================

export type Config = z.infer<typeof configSchema>;

/**
 * Raised when the environment does not satisfy the config schema.
 */
export class ConfigError extends Error {
  constructor(public readonly issues: z.ZodIssue[]) {
    super(
      `Missing or invalid environment variables: ${issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`
    );
    this.name = "ConfigError";
  }
}

let cachedConfig: Config | null = null;

/**
 * Validate an env object. Never cached.
 */
export function parseConfig(env: NodeJS.ProcessEnv): Config {
  const result = configSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(result.error.issues);
  }

  return result.data;
}

/**
 * Config for the current process, parsed from `process.env` on first call.
 */
export function loadConfig(): Config {
  if (cachedConfig === null) {
    cachedConfig = parseConfig(process.env);
  }
  return cachedConfig;
}

/** For testing: reset cached config */
export function resetConfig(): void {
  cachedConfig = null;
}
