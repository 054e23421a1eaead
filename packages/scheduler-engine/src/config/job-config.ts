// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-engine/config/job-config`
 * Purpose: Zod validation of job config payloads and the well-known `scheduler.*` keys.
 * Scope: Parsing and comparison only. Does not decide precedence; callers do.
 * Invariants:
 * - Config values are string, finite number, boolean, null, or arrays of those
 * - Parsed configs are frozen copies; callers' objects are never retained
 * - Failures surface as InvalidArgumentError naming the offending path
 * Side-effects: none
 * Links: @cadence/scheduler-core/config-keys
 * @internal
 */

import {
  InvalidArgumentError,
  type JobConfig,
  type JobConfigValue,
  SCHEDULER_CONFIG_KEYS,
  type SchedulerConfigKey,
  type SchedulerSettingName,
} from "@cadence/scheduler-core";
import { z } from "zod";

const JobConfigValueSchema: z.ZodType<JobConfigValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JobConfigValueSchema),
  ])
);

export const JobConfigSchema = z.record(z.string(), JobConfigValueSchema);

const BooleanSettingSchema = z.union([
  z.boolean(),
  z.enum(["true", "false"]).transform((value) => value === "true"),
]);

const SchedulerSettingsSchema = z.object({
  [SCHEDULER_CONFIG_KEYS.period]: z
    .union([z.number(), z.string().trim().min(1)])
    .pipe(z.coerce.number().finite().positive())
    .optional(),
  [SCHEDULER_CONFIG_KEYS.expression]: z.string().trim().min(1).optional(),
  [SCHEDULER_CONFIG_KEYS.concurrent]: BooleanSettingSchema.optional(),
  [SCHEDULER_CONFIG_KEYS.name]: z.string().trim().min(1).optional(),
  [SCHEDULER_CONFIG_KEYS.immediate]: BooleanSettingSchema.optional(),
});

/** Scheduling parameters, from explicit arguments or mirrored in config. */
export interface SchedulerSettings {
  readonly period?: number | undefined;
  readonly expression?: string | undefined;
  readonly concurrent?: boolean | undefined;
  readonly name?: string | undefined;
  readonly immediate?: boolean | undefined;
}

function formatIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`)
    .join("; ");
}

/**
 * Validates a config payload. `undefined` becomes an empty config.
 * @throws InvalidArgumentError
 */
export function parseJobConfig(config: unknown): JobConfig {
  if (config === undefined) {
    return Object.freeze({});
  }
  const result = JobConfigSchema.safeParse(config);
  if (!result.success) {
    throw new InvalidArgumentError(
      `Invalid job config: ${formatIssues(result.error)}`
    );
  }
  return Object.freeze({ ...result.data });
}

/**
 * Reads the well-known `scheduler.*` keys of a validated config.
 * @throws InvalidArgumentError when a present key has the wrong shape
 */
export function readSchedulerSettings(config: JobConfig): SchedulerSettings {
  const result = SchedulerSettingsSchema.safeParse(config);
  if (!result.success) {
    throw new InvalidArgumentError(
      `Invalid scheduler config keys: ${formatIssues(result.error)}`
    );
  }
  const data = result.data;
  return {
    period: data[SCHEDULER_CONFIG_KEYS.period],
    expression: data[SCHEDULER_CONFIG_KEYS.expression],
    concurrent: data[SCHEDULER_CONFIG_KEYS.concurrent],
    name: data[SCHEDULER_CONFIG_KEYS.name],
    immediate: data[SCHEDULER_CONFIG_KEYS.immediate],
  };
}

const SETTING_NAMES: readonly SchedulerSettingName[] = [
  "period",
  "expression",
  "concurrent",
  "name",
  "immediate",
];

/**
 * Config keys whose value disagrees with an explicitly supplied parameter.
 * Keys absent from either side never conflict.
 */
export function findSettingConflicts(
  fromConfig: SchedulerSettings,
  explicit: SchedulerSettings
): SchedulerConfigKey[] {
  return SETTING_NAMES.filter((setting) => {
    const configured = fromConfig[setting];
    const given = explicit[setting];
    return configured !== undefined && given !== undefined && configured !== given;
  }).map((setting) => SCHEDULER_CONFIG_KEYS[setting]);
}
