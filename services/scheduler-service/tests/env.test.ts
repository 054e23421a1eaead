// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-service/tests/env`
 * Purpose: Unit tests for environment validation.
 * Scope: parseEnv against hand-written records. Does not read process.env.
 * Side-effects: none
 * Links: src/bootstrap/env.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { parseEnv } from "../src/bootstrap/env";

describe("parseEnv", () => {
  it("applies defaults to an empty environment", () => {
    expect(parseEnv({})).toEqual({
      LOG_LEVEL: "info",
      SERVICE_NAME: "scheduler-service",
      HEALTH_PORT: 9000,
      SCHEDULER_TIMEZONE: "UTC",
      HEARTBEAT_PERIOD_SECONDS: 60,
    });
  });

  it("coerces numeric strings", () => {
    const config = parseEnv({
      HEALTH_PORT: "8080",
      SCHEDULER_MAX_JOBS: "50",
      HEARTBEAT_PERIOD_SECONDS: "2.5",
    });

    expect(config.HEALTH_PORT).toBe(8080);
    expect(config.SCHEDULER_MAX_JOBS).toBe(50);
    expect(config.HEARTBEAT_PERIOD_SECONDS).toBe(2.5);
  });

  it("treats empty optional values as unset", () => {
    const config = parseEnv({ SCHEDULER_MAX_JOBS: "", HEARTBEAT_EXPRESSION: "" });

    expect(config.SCHEDULER_MAX_JOBS).toBeUndefined();
    expect(config.HEARTBEAT_EXPRESSION).toBeUndefined();
  });

  it("rejects an unknown timezone", () => {
    expect(() => parseEnv({ SCHEDULER_TIMEZONE: "Mars/Olympus_Mons" })).toThrow(
      "Invalid environment configuration:\n  SCHEDULER_TIMEZONE: SCHEDULER_TIMEZONE must be an IANA timezone"
    );
  });

  it("rejects an unknown log level", () => {
    expect(() => parseEnv({ LOG_LEVEL: "verbose" })).toThrow(
      /^Invalid environment configuration:\n {2}LOG_LEVEL: /
    );
  });
});
