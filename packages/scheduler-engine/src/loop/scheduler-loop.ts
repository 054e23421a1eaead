// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-engine/loop/scheduler-loop`
 * Purpose: The single control loop: sleeps until the earliest entry is due, fires every due entry, re-arms or retires it.
 * Scope: Timer management and per-cycle bookkeeping. Does not validate registrations.
 * Invariants:
 * - At most one timer is armed, always for the registry's earliest fire time
 * - wake() must be called after every registry mutation made outside a cycle
 * - A cycle never awaits a job; dispatch only starts runs
 * - After stop() no timer is armed and no further cycle runs
 * Side-effects: time (setTimeout)
 * Links: docs/scheduler.md
 * @internal
 */

import type { WorkerDispatcher } from "../execution/worker-dispatcher";
import type { LoggerLike } from "../logger";
import type { SchedulerMetrics } from "../metrics";
import type { JobRegistry } from "../registry/job-registry";
import type { ScheduleEntry } from "../registry/schedule-entry";
import { remainingFires } from "../triggers/evaluator";

/** Largest delay setTimeout honours; longer sleeps are split. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/** Lateness above which a fire is logged as a misfire. */
export const MISFIRE_THRESHOLD_MS = 1_000;

export interface SchedulerLoopDeps {
  registry: JobRegistry;
  dispatcher: WorkerDispatcher;
  logger: LoggerLike;
  metrics?: SchedulerMetrics | undefined;
}

export class SchedulerLoop {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private armedFor: number | null = null;
  private stopped = false;

  constructor(private readonly deps: SchedulerLoopDeps) {}

  get isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Re-evaluates the sleep against the earliest deadline: arms, re-arms or idles.
   */
  wake(): void {
    if (this.stopped) {
      return;
    }
    const next = this.deps.registry.peekNextFireTime();
    if (next === null) {
      this.clearTimer();
      return;
    }
    if (this.timer !== null && this.armedFor === next) {
      return;
    }

    this.clearTimer();
    const delay = Math.max(next - Date.now(), 0);
    const clampedDelay = Math.min(delay, MAX_TIMER_DELAY_MS);
    this.armedFor = next;
    // Keep the callback synchronous: a cycle never awaits a job.
    this.timer = setTimeout(() => this.runCycle(), clampedDelay);
    this.deps.logger.debug?.(
      { nextFireTime: new Date(next).toISOString(), delayMs: clampedDelay },
      "Scheduler timer armed"
    );
  }

  stop(): void {
    this.stopped = true;
    this.clearTimer();
  }

  private runCycle(): void {
    this.timer = null;
    this.armedFor = null;
    if (this.stopped) {
      return;
    }

    const now = Date.now();
    for (const entry of this.deps.registry.lookupDue(now)) {
      this.fire(entry, now);
    }
    this.deps.metrics?.scheduledJobs.set(this.deps.registry.size);
    this.wake();
  }

  private fire(entry: ScheduleEntry, now: number): void {
    const { registry, dispatcher, logger } = this.deps;
    const scheduledFor = entry.nextFireTime ?? now;

    const lateByMs = now - scheduledFor;
    if (lateByMs > MISFIRE_THRESHOLD_MS) {
      logger.warn(
        {
          jobId: entry.id,
          jobName: entry.name,
          scheduledFor: new Date(scheduledFor).toISOString(),
          lateByMs,
        },
        "Misfire: firing once and resuming the original cadence"
      );
    }

    const outcome = dispatcher.dispatch(entry, scheduledFor);
    const next = entry.advance(scheduledFor, now);
    const rearmed = registry.rearm(entry);

    logger.debug?.(
      {
        jobId: entry.id,
        jobName: entry.name,
        outcome,
        nextFireTime: next === null ? null : new Date(next).toISOString(),
        remaining: remainingFires(entry.plan, {
          fireCount: entry.fireCount,
          lastScheduledFor: scheduledFor,
        }),
      },
      rearmed ? "Job fired" : "Job fired for the last time, retired"
    );
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.armedFor = null;
  }
}
