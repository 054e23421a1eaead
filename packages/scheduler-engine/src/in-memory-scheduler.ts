// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-engine/in-memory-scheduler`
 * Purpose: In-memory SchedulerPort implementation wiring registry, guard, dispatcher and loop.
 * Scope: Validates registrations, resolves config precedence, admits entries and wakes the loop.
 * Invariants:
 * - Every argument is validated before the registry is touched; a rejected call leaves it unchanged
 * - Explicit parameters win over mirrored `scheduler.*` config keys; disagreements are logged at warn
 * - fireJob / fireJobRepeatedly are anonymous whatever the config says
 * - The *Repeatedly forms never throw; they return false and log the reason
 * - After shutdown() every registration fails with SchedulingError
 * Side-effects: time (timers), runs user code
 * Links: docs/scheduler.md, @cadence/scheduler-core/ports/scheduler
 * @public
 */

import { randomUUID } from "node:crypto";

import {
  type AddJobInput,
  type AddPeriodicJobInput,
  type FireJobAtInput,
  type FireJobAtRepeatedlyInput,
  type FireJobInput,
  type FireJobRepeatedlyInput,
  InvalidArgumentError,
  InvalidTimezoneError,
  isSchedulingError,
  SCHEDULER_CONFIG_KEYS,
  type ScheduledJobInfo,
  type ScheduleJobInput,
  type SchedulerPort,
  SchedulingError,
  type Trigger,
} from "@cadence/scheduler-core";

import {
  findSettingConflicts,
  parseJobConfig,
  readSchedulerSettings,
  type SchedulerSettings,
} from "./config/job-config";
import { isValidTimezone } from "./config/timezone";
import { WorkerDispatcher } from "./execution/worker-dispatcher";
import { resolveUnitOfWork } from "./jobs/unit-of-work";
import type { LoggerLike } from "./logger";
import { SchedulerLoop } from "./loop/scheduler-loop";
import type { SchedulerMetrics } from "./metrics";
import { JobRegistry } from "./registry/job-registry";
import { ScheduleEntry } from "./registry/schedule-entry";
import { planTrigger } from "./triggers/evaluator";
import {
  cronTrigger,
  describeTrigger,
  immediateRepeatTrigger,
  immediateTrigger,
  onceAtTrigger,
  periodicTrigger,
  repeatAtTrigger,
} from "./triggers/trigger";

export interface InMemorySchedulerOptions {
  logger: LoggerLike;
  metrics?: SchedulerMetrics;
  /** IANA zone cron expressions are evaluated in (default: host zone) */
  timezone?: string;
  /** Maximum active jobs (default: unbounded) */
  maxJobs?: number;
}

interface Registration {
  job: unknown;
  config: unknown;
  /** Ignore `name` and `scheduler.name` */
  anonymous: boolean;
  explicit: SchedulerSettings;
  buildTrigger: (settings: SchedulerSettings, now: Date) => Trigger;
}

export class InMemoryScheduler implements SchedulerPort {
  private readonly logger: LoggerLike;
  private readonly metrics: SchedulerMetrics | undefined;
  private readonly timezone: string | undefined;
  private readonly registry: JobRegistry;
  private readonly dispatcher: WorkerDispatcher;
  private readonly loop: SchedulerLoop;
  private sequence = 0;
  private shutdownPromise: Promise<void> | null = null;

  constructor(options: InMemorySchedulerOptions) {
    if (options.timezone !== undefined && !isValidTimezone(options.timezone)) {
      throw new InvalidTimezoneError(options.timezone);
    }
    if (
      options.maxJobs !== undefined &&
      (!Number.isInteger(options.maxJobs) || options.maxJobs < 1)
    ) {
      throw new InvalidArgumentError(
        `maxJobs must be a positive integer, got ${options.maxJobs}`
      );
    }

    this.logger =
      options.logger.child?.({ component: "scheduler" }) ?? options.logger;
    this.metrics = options.metrics;
    this.timezone = options.timezone;
    this.registry = new JobRegistry({ capacity: options.maxJobs });
    this.dispatcher = new WorkerDispatcher({
      logger: this.logger,
      metrics: this.metrics,
    });
    this.loop = new SchedulerLoop({
      registry: this.registry,
      dispatcher: this.dispatcher,
      logger: this.logger,
      metrics: this.metrics,
    });
  }

  addJob(input: AddJobInput): void {
    this.register({
      job: input.job,
      config: input.config,
      anonymous: false,
      explicit: {
        name: input.name ?? undefined,
        expression: input.expression,
        concurrent: input.canRunConcurrently,
      },
      buildTrigger: () => cronTrigger(input.expression),
    });
  }

  addPeriodicJob(input: AddPeriodicJobInput): void {
    this.register({
      job: input.job,
      config: input.config,
      anonymous: false,
      explicit: {
        name: input.name ?? undefined,
        period: input.period,
        concurrent: input.canRunConcurrently,
      },
      buildTrigger: () => periodicTrigger(input.period),
    });
  }

  fireJob(input: FireJobInput): void {
    this.register({
      job: input.job,
      config: input.config,
      anonymous: true,
      explicit: {},
      buildTrigger: (_settings, now) => immediateTrigger(now),
    });
  }

  fireJobRepeatedly(input: FireJobRepeatedlyInput): boolean {
    return this.tryRegister({
      job: input.job,
      config: input.config,
      anonymous: true,
      explicit: { period: input.period },
      buildTrigger: (_settings, now) =>
        immediateRepeatTrigger(input.times, input.period, now),
    });
  }

  fireJobAt(input: FireJobAtInput): void {
    this.register({
      job: input.job,
      config: input.config,
      anonymous: false,
      explicit: { name: input.name ?? undefined },
      buildTrigger: () => onceAtTrigger(input.date),
    });
  }

  fireJobAtRepeatedly(input: FireJobAtRepeatedlyInput): boolean {
    return this.tryRegister({
      job: input.job,
      config: input.config,
      anonymous: false,
      explicit: { name: input.name ?? undefined, period: input.period },
      buildTrigger: () =>
        repeatAtTrigger(input.date, input.times, input.period),
    });
  }

  schedule(input: ScheduleJobInput): void {
    this.register({
      job: input.job,
      config: input.config,
      anonymous: false,
      explicit: {},
      buildTrigger: (settings) => {
        if (settings.expression !== undefined) {
          return cronTrigger(settings.expression);
        }
        if (settings.period !== undefined) {
          return periodicTrigger(settings.period, {
            startAfterFirstPeriod: settings.immediate !== true,
          });
        }
        throw new InvalidArgumentError(
          `Job config must define ${SCHEDULER_CONFIG_KEYS.expression} or ${SCHEDULER_CONFIG_KEYS.period}`
        );
      },
    });
  }

  removeJob(name: string): void {
    const entry = this.registry.remove(name);
    this.metrics?.scheduledJobs.set(this.registry.size);
    this.loop.wake();
    this.logger.info(
      { jobId: entry.id, jobName: name, running: entry.guard.running },
      "Job removed"
    );
  }

  getJob(name: string): ScheduledJobInfo | null {
    return this.registry.get(name)?.toInfo() ?? null;
  }

  listJobs(): readonly ScheduledJobInfo[] {
    return this.registry.entries().map((entry) => entry.toInfo());
  }

  /** Runs started and not yet settled. */
  get activeRuns(): number {
    return this.dispatcher.activeRuns;
  }

  shutdown(): Promise<void> {
    if (this.shutdownPromise === null) {
      this.shutdownPromise = this.performShutdown();
    }
    return this.shutdownPromise;
  }

  private async performShutdown(): Promise<void> {
    this.loop.stop();
    const cancelled = this.registry.clear();
    this.metrics?.scheduledJobs.set(0);
    this.logger.info(
      { cancelled: cancelled.length, inFlight: this.dispatcher.activeRuns },
      "Scheduler shutting down, waiting for in-flight runs"
    );
    await this.dispatcher.drain();
    this.logger.info({}, "Scheduler stopped");
  }

  private tryRegister(registration: Registration): boolean {
    try {
      this.register(registration);
      return true;
    } catch (error) {
      this.logger.warn({ err: error }, "Could not schedule repeated job");
      return false;
    }
  }

  private register(registration: Registration): ScheduleEntry {
    if (this.loop.isStopped) {
      throw new SchedulingError("Scheduler has been shut down");
    }

    const unit = resolveUnitOfWork(registration.job);
    const config = parseJobConfig(registration.config);
    const fromConfig = readSchedulerSettings(config);
    const { explicit } = registration;

    const conflicts = findSettingConflicts(fromConfig, explicit);
    if (conflicts.length > 0) {
      this.logger.warn(
        { jobName: explicit.name ?? fromConfig.name ?? null, keys: conflicts },
        "Explicit scheduling parameters override disagreeing config keys"
      );
    }

    const candidateName = registration.anonymous
      ? undefined
      : (explicit.name ?? fromConfig.name);
    const name =
      candidateName !== undefined && candidateName.length > 0
        ? candidateName
        : null;
    const canRunConcurrently =
      explicit.concurrent ?? fromConfig.concurrent ?? true;

    const now = new Date();
    const trigger = registration.buildTrigger(fromConfig, now);
    const plan = planTrigger(trigger, now.getTime(), {
      timezone: this.timezone,
    });

    this.sequence += 1;
    const entry = new ScheduleEntry({
      id: randomUUID(),
      name,
      seq: this.sequence,
      trigger,
      plan,
      unit,
      config,
      canRunConcurrently,
      registeredAt: now.getTime(),
    });

    let replaced: ScheduleEntry | null;
    try {
      replaced = this.registry.add(entry);
    } catch (error) {
      if (isSchedulingError(error)) throw error;
      throw new SchedulingError(`Could not schedule job ${entry.label}`, {
        cause: error,
      });
    }

    this.metrics?.scheduledJobs.set(this.registry.size);
    this.loop.wake();
    this.logger.info(
      {
        jobId: entry.id,
        jobName: name,
        trigger: describeTrigger(trigger),
        canRunConcurrently,
        nextFireTime:
          entry.nextFireTime === null
            ? null
            : new Date(entry.nextFireTime).toISOString(),
        ...(replaced === null ? {} : { replacedJobId: replaced.id }),
      },
      replaced === null ? "Job scheduled" : "Job scheduled, replacing previous job"
    );
    return entry;
  }
}
