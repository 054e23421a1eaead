// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-engine/triggers/evaluator`
 * Purpose: Computes next fire times for planned triggers.
 * Scope: Pure functions over (plan, fire state, reference time). Does not touch timers or the registry.
 * Invariants:
 * - nextFireTime never throws; null means the trigger is exhausted
 * - Successive results for one entry never move backward
 * - Misfire: a late fire is followed by the next slot of the original cadence (no catch-up burst)
 * - A repeat trigger is exhausted after `times` consumed slots, dispatched or skipped
 * Side-effects: none
 * Links: docs/scheduler.md
 * @internal
 */

import { InvalidExpressionError, type Trigger } from "@cadence/scheduler-core";

import { type CompiledCron, compileCronExpression } from "./cron";

/**
 * Trigger resolved against its registration time.
 * Fixed-rate variants fire at `baseline + k * periodMs`.
 */
export type TriggerPlan =
  | { readonly kind: "cron"; readonly cron: CompiledCron }
  | {
      readonly kind: "periodic";
      readonly baseline: number;
      readonly periodMs: number;
      readonly firstSlot: 0 | 1;
    }
  | { readonly kind: "once"; readonly at: number }
  | {
      readonly kind: "repeat";
      readonly baseline: number;
      readonly periodMs: number;
      readonly times: number;
    };

/** Runtime fire bookkeeping of one entry. */
export interface FireState {
  /** Slots consumed so far (dispatched or skipped) */
  readonly fireCount: number;
  /** Slot time of the most recent fire; null before the first */
  readonly lastScheduledFor: number | null;
}

export const INITIAL_FIRE_STATE: FireState = {
  fireCount: 0,
  lastScheduledFor: null,
};

/**
 * Resolves a trigger against its registration time.
 * One-shot and repeat triggers dated in the past start at `registeredAt`, so they are due immediately
 * and a repeat keeps its full count and spacing.
 * @throws InvalidExpressionError when a cron trigger has no upcoming fire time
 */
export function planTrigger(
  trigger: Trigger,
  registeredAt: number,
  options: { timezone?: string } = {}
): TriggerPlan {
  switch (trigger.kind) {
    case "cron": {
      const cron = compileCronExpression(trigger.expression, options.timezone);
      if (cron.next(new Date(registeredAt)) === null) {
        throw new InvalidExpressionError(
          trigger.expression,
          "expression has no upcoming fire time"
        );
      }
      return { kind: "cron", cron };
    }
    case "periodic":
      return {
        kind: "periodic",
        baseline: registeredAt,
        periodMs: trigger.periodMs,
        firstSlot: trigger.startAfterFirstPeriod ? 1 : 0,
      };
    case "once":
      return { kind: "once", at: Math.max(trigger.date.getTime(), registeredAt) };
    case "repeat":
      return {
        kind: "repeat",
        baseline: Math.max(trigger.date.getTime(), registeredAt),
        periodMs: trigger.periodMs,
        times: trigger.times,
      };
  }
}

/**
 * First slot of the cadence strictly after max(last slot, reference time).
 */
function nextSlot(
  baseline: number,
  periodMs: number,
  lastScheduledFor: number,
  referenceTime: number
): number {
  const elapsed = Math.max(lastScheduledFor, referenceTime) - baseline;
  const slot = Math.floor(elapsed / periodMs) + 1;
  return baseline + slot * periodMs;
}

/**
 * Next fire time (epoch ms) for an entry, or null when exhausted.
 * With `lastScheduledFor === null` this is the first fire time.
 */
export function nextFireTime(
  plan: TriggerPlan,
  state: FireState,
  referenceTime: number
): number | null {
  switch (plan.kind) {
    case "cron": {
      const after =
        state.lastScheduledFor === null
          ? referenceTime
          : Math.max(state.lastScheduledFor, referenceTime);
      return plan.cron.next(new Date(after))?.getTime() ?? null;
    }
    case "once":
      return state.fireCount === 0 ? plan.at : null;
    case "periodic":
      if (state.lastScheduledFor === null) {
        return plan.baseline + plan.firstSlot * plan.periodMs;
      }
      return nextSlot(
        plan.baseline,
        plan.periodMs,
        state.lastScheduledFor,
        referenceTime
      );
    case "repeat":
      if (state.fireCount >= plan.times) {
        return null;
      }
      if (state.lastScheduledFor === null) {
        return plan.baseline;
      }
      return nextSlot(
        plan.baseline,
        plan.periodMs,
        state.lastScheduledFor,
        referenceTime
      );
  }
}

/** Remaining fires for repeat and one-shot plans; null for unbounded plans. */
export function remainingFires(
  plan: TriggerPlan,
  state: FireState
): number | null {
  switch (plan.kind) {
    case "once":
      return Math.max(1 - state.fireCount, 0);
    case "repeat":
      return Math.max(plan.times - state.fireCount, 0);
    default:
      return null;
  }
}
