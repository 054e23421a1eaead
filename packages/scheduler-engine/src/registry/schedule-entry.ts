// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-engine/registry/schedule-entry`
 * Purpose: The registry's stateful record binding a trigger, a unit of work and fire bookkeeping.
 * Scope: Entry state and snapshots. Does not schedule itself.
 * Invariants:
 * - trigger, plan, config and name are immutable
 * - nextFireTime / fire state change only through advance(), called by the loop while the entry is out of the queue
 * - once cancelled or retired, an entry never becomes active again
 * Side-effects: none
 * @internal
 */

import type {
  JobConfig,
  ScheduledJobInfo,
  ScheduleEntryState,
  Trigger,
} from "@cadence/scheduler-core";

import { ExecutionGuard } from "../execution/execution-guard";
import type { ResolvedUnitOfWork } from "../jobs/unit-of-work";
import {
  type FireState,
  INITIAL_FIRE_STATE,
  nextFireTime,
  type TriggerPlan,
} from "../triggers/evaluator";

export interface ScheduleEntryParams {
  id: string;
  name: string | null;
  seq: number;
  trigger: Trigger;
  plan: TriggerPlan;
  unit: ResolvedUnitOfWork;
  config: JobConfig;
  canRunConcurrently: boolean;
  registeredAt: number;
}

type Lifecycle = "active" | "retired" | "cancelled";

export class ScheduleEntry {
  readonly id: string;
  readonly name: string | null;
  /** Insertion order; breaks fire time ties. */
  readonly seq: number;
  readonly trigger: Trigger;
  readonly plan: TriggerPlan;
  readonly unit: ResolvedUnitOfWork;
  readonly config: JobConfig;
  readonly guard: ExecutionGuard;

  private fireState: FireState = INITIAL_FIRE_STATE;
  private next: number | null;
  private lifecycle: Lifecycle = "active";

  constructor(params: ScheduleEntryParams) {
    this.id = params.id;
    this.name = params.name;
    this.seq = params.seq;
    this.trigger = params.trigger;
    this.plan = params.plan;
    this.unit = params.unit;
    this.config = params.config;
    this.guard = new ExecutionGuard(params.canRunConcurrently);
    this.next = nextFireTime(params.plan, this.fireState, params.registeredAt);
  }

  get nextFireTime(): number | null {
    return this.next;
  }

  get fireCount(): number {
    return this.fireState.fireCount;
  }

  get state(): ScheduleEntryState {
    if (this.lifecycle !== "active") {
      return this.lifecycle;
    }
    return this.guard.isBlocked ? "blocked" : "scheduled";
  }

  get isActive(): boolean {
    return this.lifecycle === "active";
  }

  /** Label used in logs and error messages. */
  get label(): string {
    return this.name ?? this.id;
  }

  /**
   * Consumes the slot at `scheduledFor` and computes the following one.
   * @returns the new next fire time, null when the trigger is exhausted
   */
  advance(scheduledFor: number, now: number): number | null {
    this.fireState = {
      fireCount: this.fireState.fireCount + 1,
      lastScheduledFor: scheduledFor,
    };
    this.next = nextFireTime(this.plan, this.fireState, now);
    return this.next;
  }

  cancel(): void {
    if (this.lifecycle === "active") {
      this.lifecycle = "cancelled";
      this.next = null;
    }
  }

  retire(): void {
    if (this.lifecycle === "active") {
      this.lifecycle = "retired";
      this.next = null;
    }
  }

  toInfo(): ScheduledJobInfo {
    return {
      id: this.id,
      name: this.name,
      trigger: this.trigger,
      state: this.state,
      canRunConcurrently: this.guard.canRunConcurrently,
      nextFireTime: this.next === null ? null : new Date(this.next),
      fireCount: this.fireState.fireCount,
      running: this.guard.running,
    };
  }
}
