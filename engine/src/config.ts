/**
 * Engine Configuration
 *
 * Environment variables for the ambient parts of the engine (logging and
 * the default scheduler instance). The scheduling core itself takes no
 * configuration.
 */

import { config } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import type { LogLevel } from "@signal-scheduler/shared/logging";
import { ConfigError } from "./errors.js";
import { MAX_TIMEOUT_MS } from "./scheduler/timers.js";

// Load .env from the repository root (ESM compatible)
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
config({ path: resolve(__dirname, "../../.env") });

// ============================================
// SCHEMA
// ============================================

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform(value => value === "true" || value === "1" || value === "yes");

const EngineEnvSchema = z.object({
  NODE_ENV: z.string().optional(),
  SCHEDULER_LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).optional(),
  SCHEDULER_LOG_CONSOLE: booleanFlag.default("true"),
  SCHEDULER_WAKE_INTERVAL_MS: z.coerce.number().int().nonnegative().max(MAX_TIMEOUT_MS).default(0),
});

export interface EngineConfig {
  /** Minimum log level ("debug" outside production, "info" in production) */
  logLevel: LogLevel;
  /** Write log lines to the console */
  logToConsole: boolean;
  /** Timer cadence of the default instance's signal; 0 means manual triggers only */
  wakeIntervalMs: number;
}

// ============================================
// LOADING
// ============================================

/**
 * Parse engine settings from an environment map.
 * Throws ConfigError listing every invalid variable.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EngineEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const vars = parsed.data;
  const isProduction = vars.NODE_ENV === "production";

  return {
    logLevel: vars.SCHEDULER_LOG_LEVEL ?? (isProduction ? "info" : "debug"),
    logToConsole: vars.SCHEDULER_LOG_CONSOLE,
    wakeIntervalMs: vars.SCHEDULER_WAKE_INTERVAL_MS,
  };
}
