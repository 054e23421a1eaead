// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-core/types`
 * Purpose: Shared scheduling type definitions and constants (logic-free).
 * Scope: Defines job shapes, config payloads, trigger variants and entry snapshots. Does not contain logic.
 * Invariants:
 * - ONLY exports: enums (as const arrays), literal union types, and interfaces
 * - Triggers are immutable once constructed; runtime fire state lives on the engine's entries
 * Side-effects: none (constants and types only)
 * Links: docs/scheduler.md
 * @public
 */

/** Value kinds a job config may carry. */
export type JobConfigValue =
  | string
  | number
  | boolean
  | null
  | readonly JobConfigValue[];

/** Ordered string-keyed config payload handed to structured jobs on every fire. */
export type JobConfig = Readonly<Record<string, JobConfigValue>>;

/**
 * What a structured job receives when it fires.
 */
export interface JobContext {
  readonly jobId: string;
  /** null for anonymous jobs */
  readonly name: string | null;
  readonly config: JobConfig;
  /** The slot this run belongs to (may be earlier than the wall clock after a misfire). */
  readonly scheduledFor: Date;
}

/** Config-aware unit of work. */
export interface Job {
  execute(context: JobContext): void | Promise<void>;
}

/** Config-ignorant unit of work with a `run` method. */
export interface Runnable {
  run(): void | Promise<void>;
}

/** Config-ignorant plain callable. */
export type JobFunction = () => void | Promise<void>;

export type UnitOfWork = Job | Runnable | JobFunction;

export const TRIGGER_KINDS = ["cron", "periodic", "once", "repeat"] as const;

export type TriggerKind = (typeof TRIGGER_KINDS)[number];

/**
 * Time-based rule governing when a job fires.
 * "Immediate" and "immediate repeat" are `once` / `repeat` with `date` set to the registration time.
 */
export type Trigger =
  | { readonly kind: "cron"; readonly expression: string }
  | {
      readonly kind: "periodic";
      readonly periodMs: number;
      /** true: first fire one period after registration; false: at registration */
      readonly startAfterFirstPeriod: boolean;
    }
  | { readonly kind: "once"; readonly date: Date }
  | {
      readonly kind: "repeat";
      readonly date: Date;
      readonly times: number;
      readonly periodMs: number;
    };

export const SCHEDULE_ENTRY_STATES = [
  "scheduled",
  "blocked",
  "retired",
  "cancelled",
] as const;

/**
 * `blocked`: concurrency disallowed and a run is still in flight.
 * `retired`: trigger exhausted. `cancelled`: removed, replaced or shut down.
 */
export type ScheduleEntryState = (typeof SCHEDULE_ENTRY_STATES)[number];

/**
 * Read-only snapshot of a registry entry.
 */
export interface ScheduledJobInfo {
  readonly id: string;
  readonly name: string | null;
  readonly trigger: Trigger;
  readonly state: ScheduleEntryState;
  readonly canRunConcurrently: boolean;
  readonly nextFireTime: Date | null;
  /** Slots consumed so far, skipped fires included */
  readonly fireCount: number;
  /** Invocations currently in flight */
  readonly running: number;
}
