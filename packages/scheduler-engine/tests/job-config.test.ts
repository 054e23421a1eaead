// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-engine/tests/job-config`
 * Purpose: Unit tests for job config validation and the `scheduler.*` keys.
 * Side-effects: none
 * Links: src/config/job-config.ts
 * @internal
 */

import { InvalidArgumentError } from "@cadence/scheduler-core";
import { describe, expect, it } from "vitest";

import {
  findSettingConflicts,
  parseJobConfig,
  readSchedulerSettings,
} from "../src/config/job-config";

describe("parseJobConfig", () => {
  it("treats a missing config as empty", () => {
    const config = parseJobConfig(undefined);

    expect(config).toEqual({});
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("returns a frozen copy of a valid config", () => {
    const input = { region: "eu", retries: 3, dryRun: true, tags: ["a", null] };
    const config = parseJobConfig(input);

    expect(config).toEqual(input);
    expect(config).not.toBe(input);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("rejects nested objects and names the key", () => {
    expect(() => parseJobConfig({ nested: { a: 1 } })).toThrow(
      /^Invalid job config: nested: /
    );
  });

  it("rejects a payload that is not an object", () => {
    expect(() => parseJobConfig("region=eu")).toThrow(
      new InvalidArgumentError(
        "Invalid job config: (root): Expected object, received string"
      )
    );
  });
});

describe("readSchedulerSettings", () => {
  it("reads and coerces the well-known keys", () => {
    const settings = readSchedulerSettings(
      parseJobConfig({
        "scheduler.period": "2.5",
        "scheduler.concurrent": "false",
        "scheduler.name": " nightly ",
        unrelated: 1,
      })
    );

    expect(settings).toEqual({
      period: 2.5,
      concurrent: false,
      name: "nightly",
    });
  });

  it("leaves absent keys undefined", () => {
    expect(readSchedulerSettings({})).toEqual({});
  });

  it("rejects a non-positive period", () => {
    expect(() => readSchedulerSettings({ "scheduler.period": 0 })).toThrow(
      /^Invalid scheduler config keys: scheduler\.period: /
    );
  });

  it("rejects a boolean key that is not true or false", () => {
    expect(() =>
      readSchedulerSettings({ "scheduler.concurrent": "yes" })
    ).toThrow(InvalidArgumentError);
  });

  it("rejects a blank expression", () => {
    expect(() =>
      readSchedulerSettings({ "scheduler.expression": "   " })
    ).toThrow(InvalidArgumentError);
  });
});

describe("findSettingConflicts", () => {
  it("reports keys whose value disagrees with an explicit parameter", () => {
    expect(
      findSettingConflicts(
        { period: 60, name: "nightly", concurrent: true },
        { period: 5, name: "nightly", expression: "0 0 * * * *" }
      )
    ).toEqual(["scheduler.period"]);
  });

  it("ignores keys missing on either side", () => {
    expect(findSettingConflicts({ name: "a" }, { period: 5 })).toEqual([]);
  });
});
