// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-service/bootstrap/container`
 * Purpose: Composition root: wires the in-memory scheduler, its metrics and the built-in jobs.
 * Scope: All engine construction lives here. Returns a container typed against the scheduler port.
 * Invariants:
 * - Only file that constructs InMemoryScheduler
 * - The metrics registry is owned by the container, never the prom-client global
 * Side-effects: none (timers start only once a job is registered)
 * Links: @cadence/scheduler-core/ports/scheduler
 * @internal
 */

import type { SchedulerPort } from "@cadence/scheduler-core";
import {
  createSchedulerMetrics,
  InMemoryScheduler,
} from "@cadence/scheduler-engine";
import { Registry } from "prom-client";

import { HEARTBEAT_JOB_NAME, HeartbeatJob } from "../jobs/heartbeat.job";
import type { Logger } from "../observability/logger";
import type { Env } from "./env";

/**
 * Service container: all deps typed against port interfaces.
 */
export interface ServiceContainer {
  scheduler: SchedulerPort;
  metricsRegistry: Registry;
  logger: Logger;
}

/**
 * Build the service container from validated env and logger.
 */
export function createContainer(config: Env, logger: Logger): ServiceContainer {
  const metricsRegistry = new Registry();
  metricsRegistry.setDefaultLabels({ service: config.SERVICE_NAME });

  const scheduler = new InMemoryScheduler({
    logger,
    metrics: createSchedulerMetrics(metricsRegistry),
    timezone: config.SCHEDULER_TIMEZONE,
    maxJobs: config.SCHEDULER_MAX_JOBS,
  });

  return { scheduler, metricsRegistry, logger };
}

/**
 * Registers the heartbeat job: cron when HEARTBEAT_EXPRESSION is set, periodic otherwise.
 */
export function registerHeartbeat(
  container: ServiceContainer,
  config: Env
): void {
  const { scheduler } = container;
  const job = new HeartbeatJob({
    logger: container.logger.child({ component: "heartbeat" }),
    listJobs: () => scheduler.listJobs(),
  });

  if (config.HEARTBEAT_EXPRESSION !== undefined) {
    scheduler.addJob({
      name: HEARTBEAT_JOB_NAME,
      job,
      expression: config.HEARTBEAT_EXPRESSION,
      canRunConcurrently: false,
    });
    return;
  }

  scheduler.addPeriodicJob({
    name: HEARTBEAT_JOB_NAME,
    job,
    period: config.HEARTBEAT_PERIOD_SECONDS,
    canRunConcurrently: false,
  });
}
