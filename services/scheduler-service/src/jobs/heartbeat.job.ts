// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-service/jobs/heartbeat`
 * Purpose: Built-in job proving the scheduler loop is alive.
 * Scope: Logs one line per fire with the slot time and the registry size.
 * Invariants: Never throws; registered non-concurrent under the name "heartbeat".
 * Side-effects: IO (log line)
 * @internal
 */

import type {
  Job,
  JobContext,
  ScheduledJobInfo,
} from "@cadence/scheduler-core";
import type { LoggerLike } from "@cadence/scheduler-engine";

export const HEARTBEAT_JOB_NAME = "heartbeat";

export interface HeartbeatJobDeps {
  logger: LoggerLike;
  listJobs: () => readonly ScheduledJobInfo[];
}

export class HeartbeatJob implements Job {
  private beats = 0;

  constructor(private readonly deps: HeartbeatJobDeps) {}

  execute(context: JobContext): void {
    this.beats += 1;
    this.deps.logger.info(
      {
        jobId: context.jobId,
        scheduledFor: context.scheduledFor.toISOString(),
        beat: this.beats,
        scheduledJobs: this.deps.listJobs().length,
      },
      "Scheduler heartbeat"
    );
  }
}
