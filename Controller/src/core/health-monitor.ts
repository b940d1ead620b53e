/**
 * HealthMonitor - detects worker deaths and turns them into HealthEvents.
 *
 * Two paths feed the same queue:
 * - the runtime's event stream (fast, but may drop out)
 * - a fallback poll every FALLBACK_POLL_INTERVAL_MS that lists the group's
 *   workers, compares them with the recorded handles and re-establishes a
 *   broken subscription
 *
 * A death is reported once per runtime id, whichever path sees it first.
 */

import { logger as rootLogger } from '@feedyard/shared/Utils/logger.js';
import type { RuntimeClient, RuntimeEvent, RuntimeSubscription, WorkerInfo } from '../runtime/types.js';
import type { StateSnapshot } from './state-store.js';
import { WORKER_LABELS, type ControllerEvent, type HealthEvent, type WorkerHandle } from './types.js';

export interface HealthMonitorOptions {
  groupLabel: string;
  fallbackPollIntervalMs: number;
}

const DEATH_EVENTS = new Set(['die', 'oom', 'kill']);

export class HealthMonitor {
  private subscription: RuntimeSubscription | null = null;
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private reported = new Set<string>();
  private running = false;
  private logger = rootLogger.child('health-monitor');

  constructor(
    private runtime: RuntimeClient,
    private getSnapshot: () => StateSnapshot,
    private emit: (event: ControllerEvent) => void,
    private options: HealthMonitorOptions,
  ) {}

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;

    await this.subscribe();

    this.logger.info(`Starting fallback health polling (every ${this.options.fallbackPollIntervalMs / 1000}s)`);
    this.pollTimer = setInterval(() => {
      this.poll().catch((error: unknown) => {
        this.logger.error('Fallback health check failed', { error });
      });
    }, this.options.fallbackPollIntervalMs);

    if (this.pollTimer.unref) {
      this.pollTimer.unref();
    }
  }

  stop(): void {
    this.running = false;
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    this.subscription?.close();
    this.subscription = null;
  }

  get isSubscribed(): boolean {
    return this.subscription !== null;
  }

  /**
   * One fallback pass: resubscribe if needed, compare listed workers with
   * recorded handles, report deaths and orphans, then enqueue a tick.
   */
  async poll(): Promise<void> {
    if (!this.running) return;
    if (!this.subscription) {
      await this.subscribe();
    }

    // Snapshot before listing: every handle seen here existed when the list was taken
    const snapshot = this.getSnapshot();
    let workers: WorkerInfo[];
    try {
      workers = await this.runtime.list({ [WORKER_LABELS.group]: this.options.groupLabel });
    } catch (error) {
      this.logger.warn('Could not list workers during fallback check', { error });
      this.emit({ kind: 'tick' });
      return;
    }
    if (!this.running) return;

    const byId = new Map(workers.map((w) => [w.runtimeId, w]));
    const tracked = new Set<string>();

    for (const handle of snapshot.actual.values()) {
      if (handle.runtimeId === null) continue;
      tracked.add(handle.runtimeId);
      if (handle.status !== 'running' || snapshot.inFlight.has(handle.feedName)) continue;

      const worker = byId.get(handle.runtimeId);
      if (!worker) {
        this.report(handle, { reason: 'missing', source: 'poll', detail: 'worker no longer listed by the runtime' });
      } else if (worker.state !== 'running') {
        this.report(handle, {
          reason: 'exited',
          source: 'poll',
          exitCode: worker.exitCode ?? undefined,
          detail: `worker is ${worker.state}`,
        });
      }
    }

    for (const worker of workers) {
      if (worker.state !== 'running' || tracked.has(worker.runtimeId)) continue;
      const feedName = worker.labels[WORKER_LABELS.feed] ?? worker.name;
      if (snapshot.inFlight.has(feedName)) continue;
      this.emit({ kind: 'orphan', worker, feedName });
    }

    // Forget ids whose handle is gone so a reused feed name starts clean
    for (const id of this.reported) {
      if (!tracked.has(id)) this.reported.delete(id);
    }

    this.emit({ kind: 'tick' });
  }

  // ─── Event path ─────────────────────────────────────────────────

  private async subscribe(): Promise<void> {
    try {
      this.subscription = await this.runtime.subscribe(
        { [WORKER_LABELS.group]: this.options.groupLabel },
        {
          onEvent: (event) => this.handleRuntimeEvent(event),
          onError: (error) => {
            this.logger.warn('Runtime event stream failed; relying on polling until resubscribed', { error });
            this.subscription = null;
          },
          onEnd: () => {
            this.logger.warn('Runtime event stream ended; relying on polling until resubscribed');
            this.subscription = null;
          },
        },
      );
      this.logger.debug('Subscribed to runtime events');
    } catch (error) {
      this.logger.warn('Could not subscribe to runtime events; relying on polling', { error });
      this.subscription = null;
    }
  }

  private handleRuntimeEvent(event: RuntimeEvent): void {
    if (!this.running) return;
    const isDeath = DEATH_EVENTS.has(event.type);
    if (!isDeath && event.type !== 'unhealthy') return;

    const feedName = event.labels[WORKER_LABELS.feed];
    if (!feedName) return;
    const handle = this.getSnapshot().actual.get(feedName);
    if (!handle || handle.runtimeId !== event.runtimeId || handle.status !== 'running') return;

    this.report(handle, {
      reason: isDeath ? 'exited' : 'unhealthy',
      source: 'events',
      exitCode: event.exitCode,
      detail: event.action,
    });
  }

  private report(
    handle: Readonly<WorkerHandle>,
    health: Omit<HealthEvent, 'feedName' | 'runtimeId'>,
  ): void {
    if (handle.runtimeId === null || this.reported.has(handle.runtimeId)) return;
    this.reported.add(handle.runtimeId);
    this.emit({
      kind: 'health',
      health: { ...health, feedName: handle.feedName, runtimeId: handle.runtimeId },
    });
  }
}
