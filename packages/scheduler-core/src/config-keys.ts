// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-core/config-keys`
 * Purpose: Well-known job config keys read by the scheduler at registration.
 * Scope: Key names only. Parsing lives in the engine.
 * Invariants: Keys are consumed at construction only, never at fire time.
 * Side-effects: none
 * @public
 */

export const SCHEDULER_CONFIG_KEYS = {
  /** Period in seconds for periodic jobs */
  period: "scheduler.period",
  /** Six-field cron expression */
  expression: "scheduler.expression",
  /** Whether runs of the job may overlap */
  concurrent: "scheduler.concurrent",
  /** Job name; makes the job cancelable */
  name: "scheduler.name",
  /** Periodic jobs only: fire at registration instead of after one period */
  immediate: "scheduler.immediate",
} as const;

export type SchedulerSettingName = keyof typeof SCHEDULER_CONFIG_KEYS;

export type SchedulerConfigKey =
  (typeof SCHEDULER_CONFIG_KEYS)[SchedulerSettingName];
