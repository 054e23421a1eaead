// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-engine/execution/worker-dispatcher`
 * Purpose: Starts runs of due entries behind their execution guard and isolates their failures.
 * Scope: Guard acquire/release, invocation, failure reporting, in-flight tracking. Does not compute fire times.
 * Invariants:
 * - dispatch() returns before the job starts; the job runs once the current loop cycle has finished
 * - A job failure becomes an ExecutionError that is logged and counted, never rethrown
 * - The guard is released exactly once per acquired run, whatever the outcome
 * Side-effects: runs user code
 * Links: docs/scheduler.md
 * @internal
 */

import { ExecutionError, type JobContext } from "@cadence/scheduler-core";

import { invokeUnitOfWork } from "../jobs/unit-of-work";
import type { LoggerLike } from "../logger";
import type { FireOutcome, SchedulerMetrics } from "../metrics";
import type { ScheduleEntry } from "../registry/schedule-entry";

export interface WorkerDispatcherDeps {
  logger: LoggerLike;
  metrics?: SchedulerMetrics | undefined;
}

export class WorkerDispatcher {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly deps: WorkerDispatcherDeps) {}

  /** Runs started and not yet settled, across all entries. */
  get activeRuns(): number {
    return this.inFlight.size;
  }

  /**
   * Acquires the entry's guard and starts a run, or skips the slot when the guard is held.
   */
  dispatch(entry: ScheduleEntry, scheduledFor: number): FireOutcome {
    const { logger, metrics } = this.deps;

    if (!entry.guard.tryAcquire()) {
      metrics?.fires.inc({ outcome: "skipped" });
      logger.debug?.(
        {
          jobId: entry.id,
          jobName: entry.name,
          scheduledFor: new Date(scheduledFor).toISOString(),
        },
        "Previous run still in progress, skipping fire"
      );
      return "skipped";
    }

    metrics?.fires.inc({ outcome: "dispatched" });
    const context: JobContext = {
      jobId: entry.id,
      name: entry.name,
      config: entry.config,
      scheduledFor: new Date(scheduledFor),
    };

    const run: Promise<void> = Promise.resolve()
      .then(() => this.execute(entry, context))
      .finally(() => {
        entry.guard.release();
        this.inFlight.delete(run);
      });
    this.inFlight.add(run);
    return "dispatched";
  }

  /** Resolves once every run started so far, and any started meanwhile, has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  private async execute(entry: ScheduleEntry, context: JobContext): Promise<void> {
    const { logger, metrics } = this.deps;
    const startedAt = Date.now();

    try {
      await invokeUnitOfWork(entry.unit, context);
      logger.debug?.(
        {
          jobId: entry.id,
          jobName: entry.name,
          durationMs: Date.now() - startedAt,
        },
        "Job run completed"
      );
    } catch (error) {
      const failure = new ExecutionError(entry.id, entry.name, error);
      metrics?.failures.inc();
      logger.error(
        {
          err: failure,
          jobId: entry.id,
          jobName: entry.name,
          scheduledFor: context.scheduledFor.toISOString(),
          durationMs: Date.now() - startedAt,
        },
        "Job execution failed"
      );
    } finally {
      metrics?.durationMs.observe(Date.now() - startedAt);
    }
  }
}
