// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-service/main`
 * Purpose: Service entry point with graceful shutdown. Starts the scheduler and its heartbeat.
 * Scope: Entry point that calls env() and wires the container. Does not contain scheduling logic.
 * Invariants:
 *   - Reads config from env (no hardcoded values)
 *   - Handles SIGTERM/SIGINT for graceful shutdown
 *   - ready=false as soon as shutdown starts; exit waits for in-flight runs
 * Side-effects: IO (HTTP listener, process signals)
 * Links: docs/scheduler.md
 * @public
 */

import client from "prom-client";

import { createContainer, registerHeartbeat } from "./bootstrap/container";
import { env } from "./bootstrap/env";
import { type HealthState, startHealthServer } from "./health";
import { flushLogger, makeLogger } from "./observability/logger";

async function main(): Promise<void> {
  // Load and validate env
  const config = env();

  // Create logger (composition root owns logger creation)
  const logger = makeLogger({}, { level: config.LOG_LEVEL });

  logger.info(
    { logLevel: config.LOG_LEVEL, timezone: config.SCHEDULER_TIMEZONE },
    "Starting scheduler service"
  );

  const container = createContainer(config, logger);
  client.collectDefaultMetrics({ register: container.metricsRegistry });

  // Health state for readiness probes
  const healthState: HealthState = { ready: false };
  const server = startHealthServer(healthState, config.HEALTH_PORT, container);
  logger.info({ port: config.HEALTH_PORT }, "Health server started");

  registerHeartbeat(container, config);

  healthState.ready = true;
  logger.info(
    { scheduledJobs: container.scheduler.listJobs().length },
    "Scheduler started, ready for traffic"
  );

  // Graceful shutdown
  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      logger.warn({ signal }, "Shutdown already in progress");
      return;
    }
    shuttingDown = true;
    healthState.ready = false; // Stop accepting new work
    logger.info({ signal }, "Received signal, shutting down");

    try {
      await container.scheduler.shutdown();
      server.close();
      logger.info({}, "Scheduler stopped");
      flushLogger();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, "Error during shutdown");
      flushLogger();
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

const bootLogger = makeLogger({ phase: "boot" });

main().catch((err: unknown) => {
  bootLogger.fatal({ err }, "Fatal error during startup");
  flushLogger();
  process.exit(1);
});
