// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-service/observability/logger`
 * Purpose: Pino logger factory - JSON-only stdout emission.
 * Scope: Create configured pino loggers and flush them on exit. Does not format output.
 * Invariants: Always emits JSON to stdout; silenced under test tooling. Safe to call at module scope (no env validation).
 * Side-effects: none until a log line is written
 * Notes: Use makeLogger for the service logger; use makeNoopLogger for tests. Formatting via external pipe (pino-pretty).
 * Links: Initializes redaction paths via REDACT_PATHS; used by main and the container.
 * @public
 */

import type { Logger } from "pino";
import pino from "pino";

import { REDACT_PATHS } from "./redact";

export type { Logger } from "pino";

type Destination = ReturnType<typeof pino.destination>;

const destinations = new Set<Destination>();

export function makeLogger(
  bindings?: Record<string, unknown>,
  options: { level?: string } = {}
): Logger {
  const isVitest = process.env.VITEST === "true";
  const nodeEnv = process.env.NODE_ENV ?? "development";
  const level = options.level ?? process.env.LOG_LEVEL ?? "info";
  const serviceName = process.env.SERVICE_NAME ?? "scheduler-service";

  // Silence logs in test tooling (VITEST or NODE_ENV=test)
  const isTestTooling = isVitest || nodeEnv === "test";

  const config = {
    level,
    enabled: !isTestTooling,
    // Stable base: bindings first, then reserved keys (prevents overwrite)
    base: { ...bindings, service: serviceName },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
  };

  // Sync in dev for immediate crash visibility, async in prod
  const destination = pino.destination({
    dest: 1,
    sync: nodeEnv !== "production",
    minLength: nodeEnv === "production" ? 4096 : 0,
  });
  destinations.add(destination);

  return pino(config, destination);
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}

/**
 * Writes out buffered lines of every logger made by makeLogger. Call before process.exit().
 */
export function flushLogger(): void {
  for (const destination of destinations) {
    try {
      destination.flushSync();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      process.stderr.write(`Failed to flush logs: ${reason}\n`);
    }
  }
}
