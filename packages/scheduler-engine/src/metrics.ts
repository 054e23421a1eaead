// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-engine/metrics`
 * Purpose: Prometheus metric definitions for fires, failures, run duration and registry size.
 * Scope: Metric construction against a caller-owned registry. Does not expose an HTTP endpoint.
 * Invariants: Labels are low-cardinality (no job names or ids); repeated creation on one registry reuses metrics.
 * Side-effects: registers metrics on the given registry
 * Notes: Uses getOrCreate pattern to prevent duplicate registration errors when several schedulers share a registry.
 * @public
 */

import type { Counter, Gauge, Histogram, Registry } from "prom-client";
import client from "prom-client";

export type FireOutcome = "dispatched" | "skipped";

export interface SchedulerMetrics {
  readonly fires: Counter<"outcome">;
  readonly failures: Counter<string>;
  readonly durationMs: Histogram<string>;
  readonly scheduledJobs: Gauge<string>;
}

// =============================================================================
// Metric Factory Helpers (prevent duplicate registration)
// =============================================================================

function getOrCreateCounter<T extends string>(
  registry: Registry,
  name: string,
  help: string,
  labelNames: readonly T[] = [] as readonly T[]
): Counter<T> {
  const existing = registry.getSingleMetric(name);
  if (existing) return existing as Counter<T>;
  return new client.Counter({
    name,
    help,
    labelNames: labelNames as T[],
    registers: [registry],
  });
}

function getOrCreateGauge(
  registry: Registry,
  name: string,
  help: string
): Gauge<string> {
  const existing = registry.getSingleMetric(name);
  if (existing) return existing as Gauge<string>;
  return new client.Gauge({ name, help, registers: [registry] });
}

function getOrCreateHistogram(
  registry: Registry,
  name: string,
  help: string,
  buckets: number[]
): Histogram<string> {
  const existing = registry.getSingleMetric(name);
  if (existing) return existing as Histogram<string>;
  return new client.Histogram({ name, help, buckets, registers: [registry] });
}

export function createSchedulerMetrics(registry: Registry): SchedulerMetrics {
  return {
    fires: getOrCreateCounter(
      registry,
      "scheduler_job_fires_total",
      "Consumed fire slots, by whether the run was dispatched or skipped by the concurrency guard",
      ["outcome"] as const
    ),
    failures: getOrCreateCounter(
      registry,
      "scheduler_job_failures_total",
      "Job runs that threw or rejected"
    ),
    durationMs: getOrCreateHistogram(
      registry,
      "scheduler_job_duration_ms",
      "Job run duration in milliseconds",
      [5, 25, 100, 250, 1000, 2500, 10000, 30000, 60000, 300000]
    ),
    scheduledJobs: getOrCreateGauge(
      registry,
      "scheduler_jobs_scheduled",
      "Active entries in the job registry"
    ),
  };
}
