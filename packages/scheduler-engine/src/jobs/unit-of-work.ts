// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-engine/jobs/unit-of-work`
 * Purpose: Resolves a job reference into a closed variant once, at registration.
 * Scope: Shape detection and invocation. Does not catch failures; the dispatcher does.
 * Invariants:
 * - Structured jobs (`execute`) win over runnables (`run`) when an object has both
 * - Methods are invoked on their own object (`this` preserved)
 * Side-effects: none (invocation side effects belong to the job)
 * @internal
 */

import {
  InvalidArgumentError,
  type Job,
  type JobContext,
  type JobFunction,
  type Runnable,
} from "@cadence/scheduler-core";

export type ResolvedUnitOfWork =
  | { readonly kind: "job"; readonly job: Job }
  | { readonly kind: "runnable"; readonly runnable: Runnable }
  | { readonly kind: "function"; readonly fn: JobFunction };

function isJobFunction(value: unknown): value is JobFunction {
  return typeof value === "function";
}

function isJob(value: unknown): value is Job {
  return (
    typeof value === "object" &&
    value !== null &&
    "execute" in value &&
    typeof value.execute === "function"
  );
}

function isRunnable(value: unknown): value is Runnable {
  return (
    typeof value === "object" &&
    value !== null &&
    "run" in value &&
    typeof value.run === "function"
  );
}

/**
 * @throws InvalidArgumentError when the reference is neither a Job, a Runnable nor a function
 */
export function resolveUnitOfWork(candidate: unknown): ResolvedUnitOfWork {
  if (isJobFunction(candidate)) {
    return { kind: "function", fn: candidate };
  }
  if (isJob(candidate)) {
    return { kind: "job", job: candidate };
  }
  if (isRunnable(candidate)) {
    return { kind: "runnable", runnable: candidate };
  }
  const shape = candidate === null ? "null" : typeof candidate;
  throw new InvalidArgumentError(
    `Job must be a function or an object with an execute() or run() method, got ${shape}`
  );
}

/** Runs the unit of work; only structured jobs see the context. */
export async function invokeUnitOfWork(
  unit: ResolvedUnitOfWork,
  context: JobContext
): Promise<void> {
  switch (unit.kind) {
    case "job":
      await unit.job.execute(context);
      return;
    case "runnable":
      await unit.runnable.run();
      return;
    case "function":
      await unit.fn();
      return;
  }
}
