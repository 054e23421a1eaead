// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-core/errors`
 * Purpose: Error taxonomy for scheduling operations.
 * Scope: Error definitions and type guards. Does not perform I/O or contain business logic.
 * Invariants:
 * - All errors have a readonly `code` discriminant
 * - Argument errors are thrown synchronously by register calls, never at fire time
 * - ExecutionError is created by the dispatcher and never rethrown into the loop
 * Side-effects: none
 * Links: docs/scheduler.md
 * @public
 */

export class InvalidArgumentError extends Error {
  public readonly code: "INVALID_ARGUMENT" | "INVALID_EXPRESSION" =
    "INVALID_ARGUMENT";
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

/**
 * Cron expression could not be parsed into valid field constraints.
 */
export class InvalidExpressionError extends InvalidArgumentError {
  public override readonly code = "INVALID_EXPRESSION" as const;
  constructor(
    public readonly expression: string,
    public readonly reason: string
  ) {
    super(`Invalid cron expression "${expression}": ${reason}`);
    this.name = "InvalidExpressionError";
  }
}

export class InvalidTimezoneError extends InvalidArgumentError {
  constructor(public readonly timezone: string) {
    super(`Invalid timezone: ${timezone}`);
    this.name = "InvalidTimezoneError";
  }
}

export class NotFoundError extends Error {
  public readonly code = "JOB_NOT_FOUND" as const;
  constructor(public readonly jobName: string) {
    super(`Job not found: ${jobName}`);
    this.name = "NotFoundError";
  }
}

/**
 * Registry or loop refused to admit an entry for a reason other than validation.
 */
export class SchedulingError extends Error {
  public readonly code = "SCHEDULING_FAILED" as const;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SchedulingError";
  }
}

/**
 * A unit of work threw or rejected during a fire.
 */
export class ExecutionError extends Error {
  public readonly code = "EXECUTION_FAILED" as const;
  constructor(
    public readonly jobId: string,
    public readonly jobName: string | null,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Job ${jobName ?? jobId} failed: ${reason}`, { cause });
    this.name = "ExecutionError";
  }
}

// Type guards

const ARGUMENT_ERROR_NAMES: ReadonlySet<string> = new Set([
  "InvalidArgumentError",
  "InvalidExpressionError",
  "InvalidTimezoneError",
]);

export function isInvalidArgumentError(
  error: unknown
): error is InvalidArgumentError {
  return error instanceof Error && ARGUMENT_ERROR_NAMES.has(error.name);
}

export function isInvalidExpressionError(
  error: unknown
): error is InvalidExpressionError {
  return error instanceof Error && error.name === "InvalidExpressionError";
}

export function isInvalidTimezoneError(
  error: unknown
): error is InvalidTimezoneError {
  return error instanceof Error && error.name === "InvalidTimezoneError";
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof Error && error.name === "NotFoundError";
}

export function isSchedulingError(error: unknown): error is SchedulingError {
  return error instanceof Error && error.name === "SchedulingError";
}

export function isExecutionError(error: unknown): error is ExecutionError {
  return error instanceof Error && error.name === "ExecutionError";
}
