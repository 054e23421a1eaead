// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-core`
 * Purpose: Scheduler core types, port interface and error taxonomy.
 * Scope: Pure types and interfaces for the scheduling domain. Does not contain implementations or I/O.
 * Invariants:
 * - FORBIDDEN: timers, logging, any I/O
 * - ALLOWED: types, interfaces, constants and error classes
 * Side-effects: none
 * Links: docs/scheduler.md
 * @public
 */

// Well-known config keys
export {
  SCHEDULER_CONFIG_KEYS,
  type SchedulerConfigKey,
  type SchedulerSettingName,
} from "./config-keys";
// Errors
export {
  ExecutionError,
  InvalidArgumentError,
  InvalidExpressionError,
  InvalidTimezoneError,
  isExecutionError,
  isInvalidArgumentError,
  isInvalidExpressionError,
  isInvalidTimezoneError,
  isNotFoundError,
  isSchedulingError,
  NotFoundError,
  SchedulingError,
} from "./errors";
// Ports
export type {
  AddJobInput,
  AddPeriodicJobInput,
  FireJobAtInput,
  FireJobAtRepeatedlyInput,
  FireJobInput,
  FireJobRepeatedlyInput,
  ScheduleJobInput,
  SchedulerPort,
} from "./ports";
// Types
export {
  type Job,
  type JobConfig,
  type JobConfigValue,
  type JobContext,
  type JobFunction,
  type Runnable,
  SCHEDULE_ENTRY_STATES,
  type ScheduledJobInfo,
  type ScheduleEntryState,
  TRIGGER_KINDS,
  type Trigger,
  type TriggerKind,
  type UnitOfWork,
} from "./types";
