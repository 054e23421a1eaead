// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-core/tests/errors`
 * Purpose: Verifies error messages, codes and type guards of the scheduling error taxonomy.
 * Scope: Error classes only. Does not exercise the engine.
 * Side-effects: none
 * Links: src/errors.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import {
  ExecutionError,
  InvalidArgumentError,
  InvalidExpressionError,
  InvalidTimezoneError,
  isExecutionError,
  isInvalidArgumentError,
  isInvalidExpressionError,
  isNotFoundError,
  isSchedulingError,
  NotFoundError,
  SchedulingError,
} from "../src";

describe("scheduling errors", () => {
  it("InvalidExpressionError is an InvalidArgumentError with its own code", () => {
    const error = new InvalidExpressionError("* *", "expected 6 fields, got 2");

    expect(error).toBeInstanceOf(InvalidArgumentError);
    expect(error.code).toBe("INVALID_EXPRESSION");
    expect(error.message).toBe(
      'Invalid cron expression "* *": expected 6 fields, got 2'
    );
    expect(isInvalidArgumentError(error)).toBe(true);
    expect(isInvalidExpressionError(error)).toBe(true);
  });

  it("InvalidTimezoneError counts as an argument error", () => {
    const error = new InvalidTimezoneError("Mars/Olympus");

    expect(error.message).toBe("Invalid timezone: Mars/Olympus");
    expect(error.code).toBe("INVALID_ARGUMENT");
    expect(isInvalidArgumentError(error)).toBe(true);
  });

  it("NotFoundError carries the job name", () => {
    const error = new NotFoundError("heartbeat");

    expect(error.jobName).toBe("heartbeat");
    expect(error.message).toBe("Job not found: heartbeat");
    expect(isNotFoundError(error)).toBe(true);
    expect(isInvalidArgumentError(error)).toBe(false);
  });

  it("SchedulingError keeps the underlying cause", () => {
    const cause = new Error("registry full");
    const error = new SchedulingError("Could not schedule job", { cause });

    expect(error.cause).toBe(cause);
    expect(error.code).toBe("SCHEDULING_FAILED");
    expect(isSchedulingError(error)).toBe(true);
  });

  describe("ExecutionError", () => {
    it("names the job and wraps the original failure", () => {
      const cause = new Error("boom");
      const error = new ExecutionError("job-1", "reports", cause);

      expect(error.message).toBe("Job reports failed: boom");
      expect(error.cause).toBe(cause);
      expect(error.jobId).toBe("job-1");
      expect(isExecutionError(error)).toBe(true);
    });

    it("falls back to the job id for anonymous jobs and stringifies non-errors", () => {
      const error = new ExecutionError("job-2", null, "disk full");

      expect(error.message).toBe("Job job-2 failed: disk full");
      expect(error.jobName).toBeNull();
    });
  });

  it("guards reject non-errors", () => {
    expect(isNotFoundError({ name: "NotFoundError" })).toBe(false);
    expect(isExecutionError(undefined)).toBe(false);
  });
});
