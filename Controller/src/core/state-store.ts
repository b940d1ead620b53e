import type { FeedSpec, WorkerHandle } from './types.js';

export interface ReconcileDiff {
  toLaunch: string[];
  toStop: string[];
}

/**
 * Desired vs actual. Launch what is wanted and absent, mismatched or
 * degraded; stop what is running but unwanted or mismatched, and any
 * worker a previous stop failed to remove.
 */
export function computeDiff(
  desired: ReadonlyMap<string, FeedSpec>,
  actual: ReadonlyMap<string, WorkerHandle>,
): ReconcileDiff {
  const toLaunch: string[] = [];
  const toStop: string[] = [];

  for (const [name, spec] of desired) {
    const handle = actual.get(name);
    if (!handle || handle.specHash !== spec.hash || handle.status === 'degraded') {
      toLaunch.push(name);
    }
  }

  for (const [name, handle] of actual) {
    const spec = desired.get(name);
    const stopFailed = handle.status === 'degraded' && handle.runtimeId !== null;
    if (!spec || handle.specHash !== spec.hash || stopFailed) {
      toStop.push(name);
    }
  }

  return { toLaunch: toLaunch.sort(), toStop: toStop.sort() };
}

export interface StateSnapshot {
  desired: ReadonlyMap<string, FeedSpec>;
  actual: ReadonlyMap<string, Readonly<WorkerHandle>>;
  inFlight: ReadonlySet<string>;
  suspended: ReadonlySet<string>;
}

/**
 * Desired specs, worker handles, in-flight markers and suspended names.
 * Written only by the Reconciler.
 */
export class StateStore {
  readonly desired = new Map<string, FeedSpec>();
  readonly actual = new Map<string, WorkerHandle>();
  readonly inFlight = new Set<string>();
  readonly suspended = new Set<string>();

  setHandle(handle: WorkerHandle): void {
    this.actual.set(handle.feedName, handle);
  }

  /** Absent handles are not stored */
  markAbsent(feedName: string): void {
    this.actual.delete(feedName);
  }

  diff(): ReconcileDiff {
    return computeDiff(this.desired, this.actual);
  }

  snapshot(): StateSnapshot {
    return {
      desired: new Map(this.desired),
      actual: new Map([...this.actual].map(([name, handle]) => [name, { ...handle }])),
      inFlight: new Set(this.inFlight),
      suspended: new Set(this.suspended),
    };
  }
}
