// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-core/ports`
 * Purpose: Scheduling ports barrel export.
 * Scope: Re-exports port interfaces. Does not contain implementations.
 * Side-effects: none
 * @public
 */

export type {
  AddJobInput,
  AddPeriodicJobInput,
  FireJobAtInput,
  FireJobAtRepeatedlyInput,
  FireJobInput,
  FireJobRepeatedlyInput,
  ScheduleJobInput,
  SchedulerPort,
} from "./scheduler.port";
