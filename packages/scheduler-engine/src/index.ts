// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-engine`
 * Purpose: Public entry point for the in-memory scheduling engine.
 * Scope: Re-exports the scheduler, trigger helpers, config parsing and metrics. Registry, guard and loop internals stay private.
 * Side-effects: none
 * Links: docs/scheduler.md
 * @public
 */

export {
  findSettingConflicts,
  JobConfigSchema,
  parseJobConfig,
  readSchedulerSettings,
  type SchedulerSettings,
} from "./config/job-config";
export { isValidTimezone } from "./config/timezone";
export {
  InMemoryScheduler,
  type InMemorySchedulerOptions,
} from "./in-memory-scheduler";
export type { LoggerLike } from "./logger";
export {
  createSchedulerMetrics,
  type FireOutcome,
  type SchedulerMetrics,
} from "./metrics";
export { CRON_FIELD_COUNT, compileCronExpression, type CompiledCron } from "./triggers/cron";
export {
  type FireState,
  nextFireTime,
  planTrigger,
  remainingFires,
  type TriggerPlan,
} from "./triggers/evaluator";
export {
  cronTrigger,
  describeTrigger,
  immediateRepeatTrigger,
  immediateTrigger,
  onceAtTrigger,
  periodicTrigger,
  repeatAtTrigger,
} from "./triggers/trigger";
