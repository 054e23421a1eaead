// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@cadence/scheduler-engine/execution/execution-guard`
 * Purpose: Per-entry gate for the "can run concurrently" policy.
 * Scope: Counts in-flight runs of one entry. Does not queue or retry refused runs.
 * Invariants:
 * - canRunConcurrently: tryAcquire always succeeds
 * - otherwise: at most one holder; a refused acquire is a skipped fire
 * Side-effects: none
 * @internal
 */

export class ExecutionGuard {
  private inFlight = 0;

  constructor(public readonly canRunConcurrently: boolean) {}

  get running(): number {
    return this.inFlight;
  }

  /** A run is in flight and overlapping is not allowed. */
  get isBlocked(): boolean {
    return !this.canRunConcurrently && this.inFlight > 0;
  }

  tryAcquire(): boolean {
    if (this.isBlocked) {
      return false;
    }
    this.inFlight += 1;
    return true;
  }

  release(): void {
    if (this.inFlight > 0) {
      this.inFlight -= 1;
    }
  }
}
