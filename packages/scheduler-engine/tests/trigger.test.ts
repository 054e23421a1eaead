// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-engine/tests/trigger`
 * Purpose: Unit tests for trigger constructors and their argument validation.
 * Side-effects: none
 * Links: src/triggers/trigger.ts
 * @internal
 */

import {
  InvalidArgumentError,
  InvalidExpressionError,
} from "@cadence/scheduler-core";
import { describe, expect, it } from "vitest";

import {
  cronTrigger,
  describeTrigger,
  onceAtTrigger,
  periodicTrigger,
  repeatAtTrigger,
} from "../src/triggers/trigger";
import { BASE_TIME } from "./fixtures";

describe("periodicTrigger", () => {
  it("converts seconds to milliseconds and waits one period by default", () => {
    expect(periodicTrigger(5)).toEqual({
      kind: "periodic",
      periodMs: 5000,
      startAfterFirstPeriod: true,
    });
  });

  it("accepts fractional periods", () => {
    expect(periodicTrigger(0.25, { startAfterFirstPeriod: false })).toEqual({
      kind: "periodic",
      periodMs: 250,
      startAfterFirstPeriod: false,
    });
  });

  it.each([0, -1, Number.NaN, Number.POSITIVE_INFINITY])(
    "rejects period %s",
    (period) => {
      expect(() => periodicTrigger(period)).toThrow(InvalidArgumentError);
    }
  );

  it("names the offending period", () => {
    expect(() => periodicTrigger(0)).toThrow(
      "Period must be a positive number of seconds, got 0"
    );
  });
});

describe("repeatAtTrigger", () => {
  it("builds a repeat trigger starting at the given date", () => {
    expect(repeatAtTrigger(BASE_TIME, 3, 2)).toEqual({
      kind: "repeat",
      date: BASE_TIME,
      times: 3,
      periodMs: 2000,
    });
  });

  it.each([1, 0, 2.5])("rejects times %s", (times) => {
    expect(() => repeatAtTrigger(BASE_TIME, times, 2)).toThrow(
      `Times must be an integer greater than 1, got ${times}`
    );
  });

  it("rejects a non-positive period", () => {
    expect(() => repeatAtTrigger(BASE_TIME, 3, 0)).toThrow(
      InvalidArgumentError
    );
  });
});

describe("onceAtTrigger", () => {
  it("rejects an invalid date", () => {
    expect(() => onceAtTrigger(new Date("not a date"))).toThrow(
      "Invalid date: Invalid Date"
    );
  });

  it("copies the date so later mutation has no effect", () => {
    const date = new Date(BASE_TIME.getTime());
    const trigger = onceAtTrigger(date);
    date.setUTCFullYear(2030);

    expect(trigger).toEqual({ kind: "once", date: BASE_TIME });
  });
});

describe("cronTrigger", () => {
  it("stores the normalized expression", () => {
    expect(cronTrigger("*/5  * * * * *")).toEqual({
      kind: "cron",
      expression: "*/5 * * * * *",
    });
  });

  it("validates eagerly", () => {
    expect(() => cronTrigger("* * * *")).toThrow(InvalidExpressionError);
  });
});

describe("describeTrigger", () => {
  it("renders each trigger kind", () => {
    expect(describeTrigger(cronTrigger("0 0 * * * *"))).toBe(
      "cron(0 0 * * * *)"
    );
    expect(describeTrigger(periodicTrigger(2.5))).toBe("every 2.5s");
    expect(describeTrigger(onceAtTrigger(BASE_TIME))).toBe(
      "once at 2026-01-01T00:00:00.000Z"
    );
    expect(describeTrigger(repeatAtTrigger(BASE_TIME, 3, 2))).toBe(
      "3x every 2s from 2026-01-01T00:00:00.000Z"
    );
  });
});
