// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-core/ports/scheduler`
 * Purpose: Scheduler port: register, fire, inspect and cancel jobs.
 * Scope: Defines the contract only. Does not contain implementations.
 * Invariants:
 * - At most one active job per non-empty name; registering under a taken name replaces the old job
 * - Anonymous jobs (no name) cannot be cancelled or looked up
 * - Periods are in seconds; `times` must be > 1 for the repeat forms
 * - Validation errors are thrown synchronously, except by the two `*Repeatedly` forms which return false
 * Side-effects: none (interface definition only)
 * Links: docs/scheduler.md, InMemoryScheduler
 * @public
 */

import type {
  JobConfig,
  ScheduledJobInfo,
  UnitOfWork,
} from "../types";

interface NamedJobInput {
  /** Omit (or null) for an anonymous job; falls back to `scheduler.name` in config. */
  name?: string | null;
  job: UnitOfWork;
  config?: JobConfig;
}

export interface AddJobInput extends NamedJobInput {
  /** Six fields: seconds minutes hours day-of-month month day-of-week */
  expression: string;
  canRunConcurrently: boolean;
}

export interface AddPeriodicJobInput extends NamedJobInput {
  /** Seconds between fires; the first fire happens one period after registration. */
  period: number;
  canRunConcurrently: boolean;
}

export interface FireJobInput {
  job: UnitOfWork;
  config?: JobConfig;
}

export interface FireJobRepeatedlyInput extends FireJobInput {
  times: number;
  period: number;
}

export interface FireJobAtInput extends NamedJobInput {
  /** A date in the past fires immediately. */
  date: Date;
}

export interface FireJobAtRepeatedlyInput extends FireJobAtInput {
  times: number;
  period: number;
}

export interface ScheduleJobInput {
  job: UnitOfWork;
  /** Must carry `scheduler.expression` or `scheduler.period` */
  config: JobConfig;
}

/**
 * Function properties (not methods) for contravariant param checking.
 */
export interface SchedulerPort {
  /**
   * Schedules a cron job.
   * @throws InvalidArgumentError, SchedulingError
   */
  addJob: (input: AddJobInput) => void;

  /**
   * Schedules a periodic job, first fired after one period.
   * @throws InvalidArgumentError, SchedulingError
   */
  addPeriodicJob: (input: AddPeriodicJobInput) => void;

  /**
   * Fires an anonymous job once, immediately.
   * @throws InvalidArgumentError, SchedulingError
   */
  fireJob: (input: FireJobInput) => void;

  /** Fires an anonymous job `times` times starting now. Returns false instead of throwing. */
  fireJobRepeatedly: (input: FireJobRepeatedlyInput) => boolean;

  /**
   * Fires a job once at `date`.
   * @throws InvalidArgumentError, SchedulingError
   */
  fireJobAt: (input: FireJobAtInput) => void;

  /** Fires a job `times` times starting at `date`. Returns false instead of throwing. */
  fireJobAtRepeatedly: (input: FireJobAtRepeatedlyInput) => boolean;

  /**
   * Registers a job from the well-known `scheduler.*` config keys alone.
   * @throws InvalidArgumentError, SchedulingError
   */
  schedule: (input: ScheduleJobInput) => void;

  /**
   * Cancels future fires of a named job. Runs already dispatched are not interrupted.
   * @throws NotFoundError
   */
  removeJob: (name: string) => void;

  getJob: (name: string) => ScheduledJobInfo | null;

  /** Active entries in fire order. */
  listJobs: () => readonly ScheduledJobInfo[];

  /** Cancels every job and resolves once in-flight runs have finished. */
  shutdown: () => Promise<void>;
}
