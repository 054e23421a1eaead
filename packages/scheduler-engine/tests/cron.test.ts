// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-engine/tests/cron`
 * Purpose: Unit tests for six-field cron compilation.
 * Scope: Field count validation, parser errors, forward evaluation and timezones.
 * Invariants: Evaluation is driven by explicit dates, never the wall clock.
 * Side-effects: none
 * Links: src/triggers/cron.ts
 * @internal
 */

import { InvalidExpressionError } from "@cadence/scheduler-core";
import { describe, expect, it } from "vitest";

import { compileCronExpression } from "../src/triggers/cron";

describe("compileCronExpression", () => {
  it("finds the next matching second strictly after the given instant", () => {
    const cron = compileCronExpression("*/5 * * * * *", "UTC");

    expect(cron.next(new Date("2026-01-01T00:00:00.000Z"))).toEqual(
      new Date("2026-01-01T00:00:05.000Z")
    );
    expect(cron.next(new Date("2026-01-01T00:00:07.000Z"))).toEqual(
      new Date("2026-01-01T00:00:10.000Z")
    );
  });

  it("evaluates hours in the configured timezone", () => {
    // 09:00 in New York during winter (UTC-5) is 14:00 UTC
    const cron = compileCronExpression("0 0 9 * * *", "America/New_York");

    expect(cron.next(new Date("2026-01-15T10:30:00.000Z"))).toEqual(
      new Date("2026-01-15T14:00:00.000Z")
    );
  });

  it("normalizes whitespace between fields", () => {
    const cron = compileCronExpression("  0   0 * * *  * ");

    expect(cron.expression).toBe("0 0 * * * *");
  });

  it("rejects five-field expressions", () => {
    expect(() => compileCronExpression("0 * * * *")).toThrow(
      new InvalidExpressionError(
        "0 * * * *",
        "expected 6 fields (seconds minutes hours day-of-month month day-of-week), got 5"
      )
    );
  });

  it("rejects out-of-range field values", () => {
    expect(() => compileCronExpression("0 0 25 * * *")).toThrow(
      InvalidExpressionError
    );
  });

  it("rejects fields with invalid characters", () => {
    expect(() => compileCronExpression("x 0 0 * * *")).toThrow(
      InvalidExpressionError
    );
  });
});
