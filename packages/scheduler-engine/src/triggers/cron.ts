// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-engine/triggers/cron`
 * Purpose: Six-field cron expression compilation and forward evaluation.
 * Scope: Validates an expression once and returns an evaluator. Does not track fire state.
 * Invariants:
 * - Exactly six fields: seconds minutes hours day-of-month month day-of-week
 * - compileCronExpression throws InvalidExpressionError; CompiledCron.next never throws
 * - next(after) is strictly later than `after`
 * Side-effects: none
 * Links: docs/scheduler.md
 * @internal
 */

import { InvalidExpressionError } from "@cadence/scheduler-core";
import cronParser from "cron-parser";

export const CRON_FIELD_COUNT = 6;

export interface CompiledCron {
  readonly expression: string;
  readonly timezone: string | undefined;
  /** Soonest matching instant after `after`, or null when none is reachable. */
  next(after: Date): Date | null;
}

function parserOptions(currentDate: Date, timezone: string | undefined) {
  return timezone ? { currentDate, tz: timezone } : { currentDate };
}

/**
 * Parses and validates a cron expression.
 * Field syntax is cron-parser's: wildcards, ranges, lists, steps, `?`, `L`, `#`, month and day names.
 */
export function compileCronExpression(
  expression: string,
  timezone?: string
): CompiledCron {
  if (typeof expression !== "string") {
    throw new InvalidExpressionError(
      String(expression),
      "expression must be a string"
    );
  }

  const fields = expression.trim().split(/\s+/).filter(Boolean);
  if (fields.length !== CRON_FIELD_COUNT) {
    throw new InvalidExpressionError(
      expression,
      `expected ${CRON_FIELD_COUNT} fields (seconds minutes hours day-of-month month day-of-week), got ${fields.length}`
    );
  }
  const normalized = fields.join(" ");

  try {
    cronParser.parseExpression(normalized, parserOptions(new Date(), timezone));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidExpressionError(expression, reason);
  }

  return {
    expression: normalized,
    timezone,
    next(after: Date): Date | null {
      try {
        return cronParser
          .parseExpression(normalized, parserOptions(after, timezone))
          .next()
          .toDate();
      } catch {
        // cron-parser gives up after its search limit (e.g. "0 0 0 31 2 *")
        return null;
      }
    },
  };
}
