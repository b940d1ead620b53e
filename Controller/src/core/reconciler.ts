/**
 * Reconciler - the single consumer of the controller's event queue.
 *
 * Every producer (config watch, runtime events, fallback tick, operation
 * completions) enqueues ControllerEvents; only this class mutates the
 * StateStore or starts/stops workers. After each event the desired and
 * actual maps are diffed and the resulting launches and stops dispatched.
 *
 * Runtime operations run concurrently across feeds but never twice for one
 * feed: an in-flight marker is set on dispatch and cleared when the
 * completion event comes back through the queue. Completions re-check the
 * current desired state, so a launch that was superseded while in flight
 * is stopped rather than committed.
 */

import { logger as rootLogger } from '@feedyard/shared/Utils/logger.js';
import { errorMessage } from '@feedyard/shared/Types/errors.js';
import { LaunchError } from '../utils/errors.js';
import { EventQueue } from './event-queue.js';
import { StateStore, type StateSnapshot } from './state-store.js';
import type { WorkerLauncher, LaunchOutcome, StopOutcome } from './worker-launcher.js';
import {
  WORKER_LABELS,
  type ChangeEvent,
  type ControllerEvent,
  type FeedSpec,
  type HealthEvent,
  type WorkerHandle,
} from './types.js';
import type { WorkerInfo } from '../runtime/types.js';

export interface ReconcilerStatus {
  desired: string[];
  workers: WorkerHandle[];
  inFlight: string[];
  suspended: string[];
  queued: number;
  shuttingDown: boolean;
}

interface Waiter {
  /** true when met, false to give up early, undefined to keep waiting */
  condition: () => boolean | undefined;
  resolve: (met: boolean) => void;
  timer: ReturnType<typeof setTimeout>;
}

export class Reconciler {
  private store = new StateStore();
  private queue = new EventQueue<ControllerEvent>();
  private loop: Promise<void> | null = null;
  private processing = false;
  private shuttingDown = false;
  private operations = new Set<Promise<void>>();
  private restartCounts = new Map<string, number>();
  private waiters = new Set<Waiter>();
  private logger = rootLogger.child('reconciler');

  constructor(private launcher: WorkerLauncher) {}

  // ─── Lifecycle ──────────────────────────────────────────────────

  /** Seed desired state from the initial scan. Only valid before start(). */
  setDesired(specs: ReadonlyMap<string, FeedSpec>): void {
    this.store.desired.clear();
    for (const [name, spec] of specs) this.store.desired.set(name, spec);
  }

  /**
   * Take over workers left by a previous controller. Running workers become
   * handles (the first diff stops the ones whose hash no longer matches);
   * leftovers that are not running are removed.
   */
  async adopt(): Promise<void> {
    const workers = await this.launcher.listWorkers();

    for (const worker of workers) {
      const feedName = worker.labels[WORKER_LABELS.feed];
      if (!feedName) {
        this.logger.warn(`Worker "${worker.name}" carries the group label but no feed label; ignoring`);
        continue;
      }

      if (worker.state !== 'running') {
        this.logger.info(`Removing leftover worker for feed "${feedName}"`, {
          runtimeId: worker.runtimeId,
          state: worker.state,
        });
        await this.launcher.discard(feedName, worker.runtimeId);
        continue;
      }

      if (this.store.actual.has(feedName)) {
        // A second running worker for the same feed: leave it to the orphan sweep
        this.logger.warn(`Duplicate worker for feed "${feedName}"`, { runtimeId: worker.runtimeId });
        continue;
      }

      const specHash = worker.labels[WORKER_LABELS.specHash] ?? '';
      const spec = this.store.desired.get(feedName);
      this.store.setHandle({
        feedName,
        runtimeId: worker.runtimeId,
        specHash,
        status: 'running',
        startedAt: worker.startedAt,
        restarts: 0,
        lastError: null,
      });

      if (spec && spec.hash === specHash) {
        this.logger.info(`Adopted running worker for feed "${feedName}"`, { runtimeId: worker.runtimeId });
      } else {
        this.logger.info(
          `Worker for feed "${feedName}" ${spec ? 'has an outdated configuration' : 'is no longer configured'}; it will be stopped`,
          { runtimeId: worker.runtimeId },
        );
      }
    }
  }

  /** Begin consuming the queue. */
  start(): void {
    if (this.loop) return;
    this.loop = this.queue.consume((event) => this.process(event));
  }

  enqueue(event: ControllerEvent): boolean {
    return this.queue.push(event);
  }

  /**
   * Stop accepting events, deliver the ones already queued, and wait for
   * outstanding runtime operations.
   */
  async close(): Promise<void> {
    this.queue.close();
    await this.loop;
    await Promise.allSettled([...this.operations]);
  }

  /** Queue drained and nothing in flight. Resolves false on timeout. */
  whenIdle(timeoutMs: number): Promise<boolean> {
    return this.waitFor(() => this.isIdle() || undefined, timeoutMs);
  }

  /**
   * Idle with no worker left (every feed Absent). Resolves false on timeout,
   * or as soon as shutdown is left with only workers whose stop failed.
   */
  whenStopped(timeoutMs: number): Promise<boolean> {
    return this.waitFor(() => {
      if (!this.isIdle()) return undefined;
      if (this.store.actual.size === 0) return true;
      return this.shuttingDown && this.stopFailures().length === this.store.actual.size
        ? false
        : undefined;
    }, timeoutMs);
  }

  snapshot(): StateSnapshot {
    return this.store.snapshot();
  }

  getStatus(): ReconcilerStatus {
    return {
      desired: [...this.store.desired.keys()].sort(),
      workers: [...this.store.actual.values()]
        .map((handle) => ({ ...handle }))
        .sort((a, b) => a.feedName.localeCompare(b.feedName)),
      inFlight: [...this.store.inFlight].sort(),
      suspended: [...this.store.suspended].sort(),
      queued: this.queue.size,
      shuttingDown: this.shuttingDown,
    };
  }

  // ─── Event handling ─────────────────────────────────────────────

  async onEvent(event: ControllerEvent): Promise<void> {
    switch (event.kind) {
      case 'config':
        this.applyChange(event.change);
        break;
      case 'health':
        this.applyHealth(event.health);
        break;
      case 'tick':
        break;
      case 'orphan':
        this.handleOrphan(event.worker, event.feedName);
        break;
      case 'launched':
        this.handleLaunched(event.feedName, event.specHash, event.outcome);
        break;
      case 'stopped':
        this.handleStopped(event.feedName, event.runtimeId, event.outcome);
        break;
      case 'shutdown':
        this.beginShutdown();
        break;
    }

    // Failed stops are retried on the fallback tick, and once more when shutdown begins
    this.reconcile(event.kind === 'tick' || event.kind === 'shutdown');
  }

  private async process(event: ControllerEvent): Promise<void> {
    this.processing = true;
    try {
      await this.onEvent(event);
    } catch (error) {
      this.logger.error(`Failed to handle ${event.kind} event`, { error });
    } finally {
      this.processing = false;
      this.checkWaiters();
    }
  }

  private applyChange(change: ChangeEvent): void {
    if (this.shuttingDown) {
      this.logger.debug(`Ignoring ${change.type} for feed "${change.name}" during shutdown`);
      return;
    }

    if (change.type === 'removed') {
      this.store.desired.delete(change.name);
      this.store.suspended.delete(change.name);
      this.restartCounts.delete(change.name);
      this.logger.info(`Feed "${change.name}" removed: ${change.reason}`);
      return;
    }

    this.store.desired.set(change.name, change.spec);
    if (this.store.suspended.delete(change.name)) {
      this.logger.info(`Feed "${change.name}" configuration re-applied; suspension lifted`);
    }
    this.logger.info(`Feed "${change.name}" ${change.type}`, { specHash: change.spec.hash });
  }

  private applyHealth(health: HealthEvent): void {
    const { feedName } = health;
    const handle = this.store.actual.get(feedName);

    if (!handle || handle.runtimeId !== health.runtimeId || handle.status !== 'running'
      || this.store.inFlight.has(feedName)) {
      this.logger.debug(`Ignoring ${health.reason} report for feed "${feedName}"`, {
        runtimeId: health.runtimeId,
        source: health.source,
      });
      return;
    }

    if (health.reason === 'unhealthy') {
      this.logger.warn(`Worker for feed "${feedName}" is unhealthy; restarting it`, {
        runtimeId: health.runtimeId,
        detail: health.detail,
      });
      this.restartCounts.set(feedName, handle.restarts + 1);
      this.dispatchStop(handle);
      return;
    }

    this.store.markAbsent(feedName);
    this.logger.warn(`Worker for feed "${feedName}" ${health.reason === 'missing' ? 'disappeared' : 'exited'}`, {
      runtimeId: health.runtimeId,
      exitCode: health.exitCode,
      detail: health.detail,
      source: health.source,
    });

    const spec = this.store.desired.get(feedName);
    if (spec?.failureIsFatal) {
      this.store.suspended.add(feedName);
      this.logger.error(
        `Feed "${feedName}" suspended: failure_is_fatal is set; re-apply its configuration to resume`,
      );
      return;
    }
    this.restartCounts.set(feedName, handle.restarts + 1);
  }

  private handleOrphan(worker: WorkerInfo, feedName: string): void {
    const handle = this.store.actual.get(feedName);
    if (handle?.runtimeId === worker.runtimeId || this.store.inFlight.has(feedName)) {
      return;
    }

    this.logger.warn(`Stopping untracked worker "${worker.name}"`, {
      feed: feedName,
      runtimeId: worker.runtimeId,
    });
    this.store.inFlight.add(feedName);
    this.track(
      this.launcher.stop(feedName, worker.runtimeId),
      (outcome) => ({ kind: 'stopped', feedName, runtimeId: worker.runtimeId, outcome }),
      (error) => ({ kind: 'stopped', feedName, runtimeId: worker.runtimeId, outcome: { ok: false, error: errorMessage(error) } }),
    );
  }

  private handleLaunched(feedName: string, specHash: string, outcome: LaunchOutcome): void {
    this.store.inFlight.delete(feedName);
    const previous = this.store.actual.get(feedName);
    const restarts = previous?.restarts ?? 0;
    const spec = this.store.desired.get(feedName);

    if (outcome.ok) {
      // Committed even when superseded: the diff then stops it like any other outdated worker
      this.store.setHandle({
        feedName,
        runtimeId: outcome.runtimeId,
        specHash,
        status: 'running',
        startedAt: outcome.startedAt,
        restarts,
        lastError: null,
      });
      if (spec?.hash === specHash && !this.shuttingDown) {
        this.logger.info(`Feed "${feedName}" running`, { runtimeId: outcome.runtimeId, restarts });
      } else {
        this.logger.info(`Launch of feed "${feedName}" was superseded; stopping it`, {
          runtimeId: outcome.runtimeId,
        });
      }
      return;
    }

    if (!spec || this.shuttingDown) {
      this.store.markAbsent(feedName);
      this.logger.info(`Launch of feed "${feedName}" failed after it was withdrawn`, {
        error: outcome.error.message,
      });
      return;
    }

    this.store.setHandle({
      feedName,
      runtimeId: null,
      specHash,
      status: 'degraded',
      startedAt: null,
      restarts,
      lastError: outcome.error.message,
    });
    this.logger.warn(`Feed "${feedName}" degraded; will retry on the next tick`, {
      error: outcome.error.message,
    });
  }

  private handleStopped(feedName: string, runtimeId: string, outcome: StopOutcome): void {
    this.store.inFlight.delete(feedName);
    const handle = this.store.actual.get(feedName);

    if (handle?.runtimeId !== runtimeId) {
      if (!outcome.ok) {
        this.logger.warn(`Failed to stop untracked worker for feed "${feedName}"`, {
          runtimeId,
          error: outcome.error,
        });
      }
      return;
    }

    if (outcome.ok) {
      this.store.markAbsent(feedName);
      return;
    }

    // The worker may still be running: keep tracking it until a stop succeeds
    this.store.setHandle({ ...handle, status: 'degraded', lastError: outcome.error });
    this.logger.warn(`Failed to stop worker for feed "${feedName}"; will retry on the next tick`, {
      runtimeId,
      error: outcome.error,
    });
  }

  private stopFailures(): WorkerHandle[] {
    return [...this.store.actual.values()].filter(
      (handle) => handle.status === 'degraded' && handle.runtimeId !== null,
    );
  }

  private beginShutdown(): void {
    if (this.shuttingDown) return;
    this.shuttingDown = true;
    this.store.desired.clear();
    this.store.suspended.clear();
    this.logger.info('Shutdown requested; stopping all workers', {
      workers: [...this.store.actual.keys()],
    });
  }

  // ─── Reconciliation ─────────────────────────────────────────────

  private reconcile(retryFailed: boolean): void {
    const { toLaunch, toStop } = this.store.diff();

    for (const name of toStop) {
      if (this.store.inFlight.has(name)) continue;
      const handle = this.store.actual.get(name);
      if (!handle) continue;

      if (handle.runtimeId === null) {
        this.store.markAbsent(name);
        this.logger.debug(`Dropped ${handle.status} handle for feed "${name}"`);
        continue;
      }
      if (handle.status === 'running' || (handle.status === 'degraded' && retryFailed)) {
        this.dispatchStop(handle);
      }
    }

    if (this.shuttingDown) return;

    for (const name of toLaunch) {
      if (this.store.inFlight.has(name) || this.store.suspended.has(name)) continue;
      const spec = this.store.desired.get(name);
      if (!spec) continue;

      const handle = this.store.actual.get(name);
      if (handle) {
        // Hash-mismatched handles are being stopped; only a degraded retry launches over a handle
        const retryable = handle.status === 'degraded' && handle.specHash === spec.hash
          && handle.runtimeId === null;
        if (!retryable || !retryFailed) continue;
      }
      this.dispatchLaunch(spec);
    }
  }

  private dispatchLaunch(spec: FeedSpec): void {
    const previous = this.store.actual.get(spec.name);
    const restarts = this.restartCounts.get(spec.name) ?? previous?.restarts ?? 0;

    this.store.inFlight.add(spec.name);
    this.store.setHandle({
      feedName: spec.name,
      runtimeId: null,
      specHash: spec.hash,
      status: 'launching',
      startedAt: null,
      restarts,
      lastError: previous?.lastError ?? null,
    });
    this.logger.info(`Launching worker for feed "${spec.name}"`, { specHash: spec.hash });

    this.track(
      this.launcher.launch(spec),
      (outcome) => ({ kind: 'launched', feedName: spec.name, specHash: spec.hash, outcome }),
      (error) => ({
        kind: 'launched',
        feedName: spec.name,
        specHash: spec.hash,
        outcome: {
          ok: false,
          runtimeId: null,
          error: new LaunchError(errorMessage(error), spec.name, '', error),
        },
      }),
    );
  }

  private dispatchStop(handle: WorkerHandle): void {
    const { feedName, runtimeId } = handle;
    if (runtimeId === null) return;

    this.store.inFlight.add(feedName);
    this.store.setHandle({ ...handle, status: 'stopping' });
    this.logger.info(`Stopping worker for feed "${feedName}"`, { runtimeId });

    this.track(
      this.launcher.stop(feedName, runtimeId),
      (outcome) => ({ kind: 'stopped', feedName, runtimeId, outcome }),
      (error) => ({ kind: 'stopped', feedName, runtimeId, outcome: { ok: false, error: errorMessage(error) } }),
    );
  }

  /** Run an operation off the queue and post its completion back onto it. */
  private track<T>(
    operation: Promise<T>,
    onDone: (result: T) => ControllerEvent,
    onFailed: (error: unknown) => ControllerEvent,
  ): void {
    const tracked = operation
      .then(onDone, onFailed)
      .then((event) => {
        if (!this.queue.push(event)) {
          this.logger.warn(`Dropped ${event.kind} completion after the queue closed`);
        }
      })
      .catch((error: unknown) => {
        this.logger.error('Failed to post operation completion', { error });
      })
      .finally(() => {
        this.operations.delete(tracked);
      });
    this.operations.add(tracked);
  }

  // ─── Waiting ────────────────────────────────────────────────────

  private isIdle(): boolean {
    return !this.processing && this.queue.size === 0 && this.store.inFlight.size === 0;
  }

  private waitFor(condition: () => boolean | undefined, timeoutMs: number): Promise<boolean> {
    const initial = condition();
    if (initial !== undefined) return Promise.resolve(initial);

    return new Promise<boolean>((resolve) => {
      const waiter: Waiter = {
        condition,
        resolve,
        timer: setTimeout(() => {
          this.waiters.delete(waiter);
          resolve(false);
        }, timeoutMs),
      };
      this.waiters.add(waiter);
    });
  }

  private checkWaiters(): void {
    for (const waiter of [...this.waiters]) {
      const met = waiter.condition();
      if (met === undefined) continue;
      clearTimeout(waiter.timer);
      this.waiters.delete(waiter);
      waiter.resolve(met);
    }
  }
}
