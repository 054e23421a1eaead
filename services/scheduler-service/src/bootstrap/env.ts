// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-service/bootstrap/env`
 * Purpose: Environment configuration with Zod validation and lazy singleton.
 * Scope: Config parsing only. No scheduler construction, no side-effects beyond the process.env read.
 * Invariants:
 * - Every key has a default except HEARTBEAT_EXPRESSION and SCHEDULER_MAX_JOBS
 * - SCHEDULER_TIMEZONE must be an IANA zone the runtime knows
 * - Fails fast with clear errors on invalid config
 * Side-effects: Reads process.env
 * Links: docs/scheduler.md
 * @internal
 */

import { isValidTimezone } from "@cadence/scheduler-engine";
import { z } from "zod";

const EnvSchema = z.object({
  /** Log level (default: info) */
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  /** Service name for logging (default: scheduler-service) */
  SERVICE_NAME: z.string().default("scheduler-service"),

  /** Health and metrics endpoint port (default: 9000) */
  HEALTH_PORT: z.coerce.number().int().min(1).max(65535).default(9000),

  /** Zone cron expressions are evaluated in (default: UTC) */
  SCHEDULER_TIMEZONE: z
    .string()
    .min(1)
    .default("UTC")
    .refine(isValidTimezone, "SCHEDULER_TIMEZONE must be an IANA timezone"),

  /** Registry capacity (optional, unbounded when unset) */
  SCHEDULER_MAX_JOBS: z.coerce
    .number()
    .int()
    .positive()
    .optional()
    .or(z.literal("").transform(() => undefined)),

  /** Seconds between heartbeats when no expression is set (default: 60) */
  HEARTBEAT_PERIOD_SECONDS: z.coerce.number().positive().default(60),

  /** Six-field cron expression for the heartbeat; overrides the period when set */
  HEARTBEAT_EXPRESSION: z
    .string()
    .min(1)
    .optional()
    .or(z.literal("").transform(() => undefined)),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Validates an environment record.
 * @throws Error listing every invalid key
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${errors}`);
  }
  return result.data;
}

let _env: Env | null = null;

/**
 * Returns validated environment singleton.
 * Parses process.env on first call, caches result.
 */
export function env(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}
