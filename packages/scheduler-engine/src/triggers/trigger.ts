// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-engine/triggers/trigger`
 * Purpose: Validated constructors for every trigger variant.
 * Scope: Argument validation and trigger construction. Does not evaluate fire times.
 * Invariants:
 * - period > 0 (seconds, finite)
 * - times is an integer > 1 for repeat triggers
 * - dates are valid Date instances
 * Side-effects: none
 * @internal
 */

import { InvalidArgumentError, type Trigger } from "@cadence/scheduler-core";

import { compileCronExpression } from "./cron";

const MS_PER_SECOND = 1000;

function toPeriodMs(period: number): number {
  if (typeof period !== "number" || !Number.isFinite(period) || period <= 0) {
    throw new InvalidArgumentError(
      `Period must be a positive number of seconds, got ${String(period)}`
    );
  }
  return period * MS_PER_SECOND;
}

function assertTimes(times: number): void {
  if (!Number.isInteger(times) || times <= 1) {
    throw new InvalidArgumentError(
      `Times must be an integer greater than 1, got ${String(times)}`
    );
  }
}

function assertDate(date: Date): void {
  if (!(date instanceof Date) || Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError(`Invalid date: ${String(date)}`);
  }
}

export function cronTrigger(expression: string): Trigger {
  // Validate eagerly; timezone-specific compilation happens when the entry is planned.
  const compiled = compileCronExpression(expression);
  return { kind: "cron", expression: compiled.expression };
}

export function periodicTrigger(
  period: number,
  options: { startAfterFirstPeriod?: boolean } = {}
): Trigger {
  return {
    kind: "periodic",
    periodMs: toPeriodMs(period),
    startAfterFirstPeriod: options.startAfterFirstPeriod ?? true,
  };
}

export function onceAtTrigger(date: Date): Trigger {
  assertDate(date);
  return { kind: "once", date: new Date(date.getTime()) };
}

export function immediateTrigger(now: Date = new Date()): Trigger {
  return onceAtTrigger(now);
}

export function repeatAtTrigger(
  date: Date,
  times: number,
  period: number
): Trigger {
  assertDate(date);
  assertTimes(times);
  return {
    kind: "repeat",
    date: new Date(date.getTime()),
    times,
    periodMs: toPeriodMs(period),
  };
}

export function immediateRepeatTrigger(
  times: number,
  period: number,
  now: Date = new Date()
): Trigger {
  return repeatAtTrigger(now, times, period);
}

/** Short human-readable description for logs. */
export function describeTrigger(trigger: Trigger): string {
  switch (trigger.kind) {
    case "cron":
      return `cron(${trigger.expression})`;
    case "periodic":
      return `every ${trigger.periodMs / MS_PER_SECOND}s`;
    case "once":
      return `once at ${trigger.date.toISOString()}`;
    case "repeat":
      return `${trigger.times}x every ${trigger.periodMs / MS_PER_SECOND}s from ${trigger.date.toISOString()}`;
  }
}
