// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-engine/registry/job-registry`
 * Purpose: Name index plus fire-time ordering of every active entry.
 * Scope: Admission, replacement, cancellation, retirement and due lookup. Does not run jobs or own timers.
 * Invariants:
 * - At most one active entry per name; add() under a taken name cancels the old entry before inserting
 *   the new one within one synchronous call, so no reader sees both or neither
 * - Anonymous entries are never indexed by name
 * - Queued entries are exactly the active entries with a next fire time
 * Side-effects: none
 * Links: docs/scheduler.md
 * @internal
 */

import { NotFoundError, SchedulingError } from "@cadence/scheduler-core";

import { FireQueue } from "./fire-queue";
import type { ScheduleEntry } from "./schedule-entry";

export interface JobRegistryOptions {
  /** Maximum number of active entries (default: unbounded) */
  capacity?: number;
}

export class JobRegistry {
  private readonly byName = new Map<string, ScheduleEntry>();
  private readonly queue = new FireQueue<ScheduleEntry>();
  private readonly capacity: number;

  constructor(options: JobRegistryOptions = {}) {
    this.capacity = options.capacity ?? Number.POSITIVE_INFINITY;
  }

  /** Number of active entries. */
  get size(): number {
    return this.queue.size;
  }

  /**
   * Admits an entry, replacing any active entry of the same name.
   * @returns the replaced entry, if any
   * @throws SchedulingError when the registry is full or the entry cannot fire
   */
  add(entry: ScheduleEntry): ScheduleEntry | null {
    if (!entry.isActive || entry.nextFireTime === null) {
      throw new SchedulingError(`Job ${entry.label} has no fire time to schedule`);
    }

    const previous =
      entry.name === null ? undefined : this.byName.get(entry.name);
    const growth = previous === undefined ? 1 : 0;
    if (this.queue.size + growth > this.capacity) {
      throw new SchedulingError(
        `Job registry is full (capacity ${this.capacity}); cannot add ${entry.label}`
      );
    }

    if (previous !== undefined) {
      this.detach(previous);
      previous.cancel();
    }
    if (entry.name !== null) {
      this.byName.set(entry.name, entry);
    }
    this.queue.push(entry);
    return previous ?? null;
  }

  /**
   * Cancels a named entry.
   * @throws NotFoundError when no active entry has this name
   */
  remove(name: string): ScheduleEntry {
    const entry = this.byName.get(name);
    if (entry === undefined) {
      throw new NotFoundError(name);
    }
    this.detach(entry);
    entry.cancel();
    return entry;
  }

  get(name: string): ScheduleEntry | undefined {
    return this.byName.get(name);
  }

  /** Earliest next fire time, or null when idle. */
  peekNextFireTime(): number | null {
    return this.queue.peek()?.nextFireTime ?? null;
  }

  /**
   * Takes every entry due at `now` out of the ordering, earliest first.
   * Taken entries stay indexed by name; hand each back through rearm().
   */
  lookupDue(now: number): ScheduleEntry[] {
    const due: ScheduleEntry[] = [];
    let head = this.queue.peek();
    while (head?.nextFireTime != null && head.nextFireTime <= now) {
      this.queue.pop();
      due.push(head);
      head = this.queue.peek();
    }
    return due;
  }

  /**
   * Returns a taken entry to the ordering, or retires it when it has no further fire time.
   * @returns true when the entry was re-armed
   */
  rearm(entry: ScheduleEntry): boolean {
    if (!entry.isActive) {
      return false;
    }
    if (entry.nextFireTime === null) {
      this.detach(entry);
      entry.retire();
      return false;
    }
    this.queue.push(entry);
    return true;
  }

  /** Active entries in fire order. */
  entries(): ScheduleEntry[] {
    return this.queue.toSortedArray();
  }

  /** Cancels every entry. */
  clear(): ScheduleEntry[] {
    const drained = this.queue.clear();
    this.byName.clear();
    for (const entry of drained) {
      entry.cancel();
    }
    return drained;
  }

  private detach(entry: ScheduleEntry): void {
    this.queue.remove(entry);
    if (entry.name !== null && this.byName.get(entry.name) === entry) {
      this.byName.delete(entry.name);
    }
  }
}
