// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-service/tests/heartbeat`
 * Purpose: Unit tests for the built-in heartbeat job.
 * Side-effects: none
 * Links: src/jobs/heartbeat.job.ts
 * @internal
 */

import { describe, expect, it, vi } from "vitest";

import { HeartbeatJob } from "../src/jobs/heartbeat.job";

describe("HeartbeatJob", () => {
  it("logs the slot time, beat number and registry size", () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const job = new HeartbeatJob({ logger, listJobs: () => [] });
    const context = {
      jobId: "00000000-0000-0000-0000-000000000001",
      name: "heartbeat",
      config: {},
      scheduledFor: new Date("2026-01-01T00:01:00.000Z"),
    };

    job.execute(context);
    job.execute(context);

    expect(logger.info).toHaveBeenLastCalledWith(
      {
        jobId: "00000000-0000-0000-0000-000000000001",
        scheduledFor: "2026-01-01T00:01:00.000Z",
        beat: 2,
        scheduledJobs: 0,
      },
      "Scheduler heartbeat"
    );
  });
});
