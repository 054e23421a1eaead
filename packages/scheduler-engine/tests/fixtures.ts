// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-engine/tests/fixtures`
 * Purpose: Reusable fixtures for scheduler-engine unit tests.
 * Scope: Mock logger, deferred promises and schedule entry construction.
 * Invariants: All times are derived from BASE_TIME; entries get increasing sequence numbers.
 * Side-effects: none (pure functions)
 * Links: tests/*.test.ts
 * @internal
 */

import type { JobConfig, Trigger } from "@cadence/scheduler-core";
import { vi } from "vitest";

import { parseJobConfig } from "../src/config/job-config";
import type { ResolvedUnitOfWork } from "../src/jobs/unit-of-work";
import { ScheduleEntry } from "../src/registry/schedule-entry";
import { planTrigger } from "../src/triggers/evaluator";
import { periodicTrigger } from "../src/triggers/trigger";

/** Fixed wall clock for deterministic tests. */
export const BASE_TIME = new Date("2026-01-01T00:00:00.000Z");
export const T0 = BASE_TIME.getTime();

/** Milliseconds after BASE_TIME. */
export function at(offsetMs: number): Date {
  return new Date(T0 + offsetMs);
}

export function createMockLogger() {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
  reject: (reason: unknown) => void;
}

/** Promise settled from the outside; lets a test hold a job "running". */
export function createDeferred(): Deferred {
  let resolve: () => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<void>((res, rej) => {
    resolve = () => res();
    reject = rej;
  });
  return { promise, resolve, reject };
}

let sequence = 0;

/**
 * Creates a schedule entry. Defaults: named "job-N", 1s periodic trigger registered at BASE_TIME,
 * a no-op function as unit of work, concurrency allowed.
 */
export function createEntry(overrides?: {
  name?: string | null;
  trigger?: Trigger;
  unit?: ResolvedUnitOfWork;
  config?: JobConfig;
  canRunConcurrently?: boolean;
  registeredAt?: number;
}): ScheduleEntry {
  sequence += 1;
  const trigger = overrides?.trigger ?? periodicTrigger(1);
  const registeredAt = overrides?.registeredAt ?? T0;
  return new ScheduleEntry({
    id: `00000000-0000-0000-0000-${String(sequence).padStart(12, "0")}`,
    name: overrides?.name === undefined ? `job-${sequence}` : overrides.name,
    seq: sequence,
    trigger,
    plan: planTrigger(trigger, registeredAt, { timezone: "UTC" }),
    unit: overrides?.unit ?? { kind: "function", fn: () => undefined },
    config: parseJobConfig(overrides?.config),
    canRunConcurrently: overrides?.canRunConcurrently ?? true,
    registeredAt,
  });
}
