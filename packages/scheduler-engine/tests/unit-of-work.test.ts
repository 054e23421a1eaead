// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-engine/tests/unit-of-work`
 * Purpose: Unit tests for job shape resolution and invocation.
 * Side-effects: none
 * Links: src/jobs/unit-of-work.ts
 * @internal
 */

import {
  InvalidArgumentError,
  type JobContext,
} from "@cadence/scheduler-core";
import { describe, expect, it, vi } from "vitest";

import { invokeUnitOfWork, resolveUnitOfWork } from "../src/jobs/unit-of-work";
import { BASE_TIME } from "./fixtures";

const context: JobContext = {
  jobId: "00000000-0000-0000-0000-000000000001",
  name: "report",
  config: { region: "eu" },
  scheduledFor: BASE_TIME,
};

describe("resolveUnitOfWork", () => {
  it("resolves plain functions", () => {
    const fn = () => undefined;

    expect(resolveUnitOfWork(fn)).toEqual({ kind: "function", fn });
  });

  it("prefers execute() over run() on the same object", () => {
    const job = { execute: vi.fn(), run: vi.fn() };

    expect(resolveUnitOfWork(job).kind).toBe("job");
  });

  it("resolves objects with only run()", () => {
    expect(resolveUnitOfWork({ run: () => undefined }).kind).toBe("runnable");
  });

  it.each([
    [{}, "object"],
    [null, "null"],
    [42, "number"],
    [{ execute: "not a function" }, "object"],
  ])("rejects %j", (candidate, shape) => {
    expect(() => resolveUnitOfWork(candidate)).toThrow(
      new InvalidArgumentError(
        `Job must be a function or an object with an execute() or run() method, got ${shape}`
      )
    );
  });
});

describe("invokeUnitOfWork", () => {
  it("passes the context to structured jobs", async () => {
    const execute = vi.fn();

    await invokeUnitOfWork(resolveUnitOfWork({ execute }), context);

    expect(execute).toHaveBeenCalledWith(context);
  });

  it("calls run() on its own object", async () => {
    class Counter {
      count = 0;
      run(): void {
        this.count += 1;
      }
    }
    const counter = new Counter();

    await invokeUnitOfWork(resolveUnitOfWork(counter), context);

    expect(counter.count).toBe(1);
  });

  it("propagates rejections to the caller", async () => {
    const unit = resolveUnitOfWork(async () => {
      throw new Error("boom");
    });

    await expect(invokeUnitOfWork(unit, context)).rejects.toThrow("boom");
  });
});
