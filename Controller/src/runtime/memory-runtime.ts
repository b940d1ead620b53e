/**
 * InMemoryRuntimeClient - a RuntimeClient that keeps workers in a Map.
 *
 * Used by the unit tests and by `RUNTIME=memory` dry runs. Besides the RuntimeClient surface
 * it can script launch outcomes, inject transient call failures, kill
 * workers out-of-band and silence its event stream.
 */

import {
  matchesLabels,
  type LabelFilter,
  type LaunchRequest,
  type RuntimeClient,
  type RuntimeEvent,
  type RuntimeEventHandlers,
  type RuntimeEventType,
  type RuntimeOperation,
  type RuntimeSubscription,
  type WorkerInfo,
} from './types.js';

/** What happens when a worker with a given name is launched */
export type LaunchBehavior = 'run' | 'exit' | 'reject';

export interface RuntimeCall {
  operation: RuntimeOperation;
  target: string;
}

interface MemoryWorker {
  info: WorkerInfo;
  logs: string[];
}

export class RuntimeConflictError extends Error {
  statusCode = 409;

  constructor(name: string) {
    super(`Conflict. The container name "${name}" is already in use`);
    this.name = 'RuntimeConflictError';
  }
}

export class InMemoryRuntimeClient implements RuntimeClient {
  readonly calls: RuntimeCall[] = [];
  readonly launches: LaunchRequest[] = [];

  private workers = new Map<string, MemoryWorker>();
  private subscribers = new Set<{ filter: LabelFilter; handlers: RuntimeEventHandlers }>();
  private behaviors = new Map<string, LaunchBehavior>();
  private failures = new Map<RuntimeOperation, Error[]>();
  private eventsEnabled = true;
  private nextId = 1;

  // ─── Scripting ──────────────────────────────────────────────────

  setLaunchBehavior(name: string, behavior: LaunchBehavior): void {
    this.behaviors.set(name, behavior);
  }

  /** Make the next `count` calls of `operation` reject with `error`. */
  failNext(operation: RuntimeOperation, count: number, error = new Error(`${operation} failed`)): void {
    const queue = this.failures.get(operation) ?? [];
    for (let i = 0; i < count; i++) queue.push(error);
    this.failures.set(operation, queue);
  }

  /** A silent stream: subscriptions stay open but receive nothing. */
  setEventsEnabled(enabled: boolean): void {
    this.eventsEnabled = enabled;
  }

  /** Register a pre-existing worker, e.g. one left behind by a previous controller. */
  seed(worker: Omit<WorkerInfo, 'runtimeId'> & { runtimeId?: string }): WorkerInfo {
    const info: WorkerInfo = { ...worker, runtimeId: worker.runtimeId ?? this.allocateId() };
    this.workers.set(info.runtimeId, { info, logs: [] });
    return { ...info };
  }

  /** Terminate a worker behind the controller's back. */
  kill(nameOrId: string, exitCode = 137): void {
    const worker = this.find(nameOrId);
    if (!worker) throw new Error(`No such worker: ${nameOrId}`);
    worker.info.state = 'exited';
    worker.info.exitCode = exitCode;
    this.emit(worker.info, 'die', 'die', exitCode);
  }

  /** Report a running worker as unhealthy without stopping it. */
  markUnhealthy(nameOrId: string): void {
    const worker = this.find(nameOrId);
    if (!worker) throw new Error(`No such worker: ${nameOrId}`);
    this.emit(worker.info, 'unhealthy', 'health_status: unhealthy');
  }

  setLogs(nameOrId: string, text: string): void {
    const worker = this.find(nameOrId);
    if (!worker) throw new Error(`No such worker: ${nameOrId}`);
    worker.logs = text.split('\n');
  }

  /** Fail every open subscription, as when the daemon drops the connection. */
  breakSubscriptions(error = new Error('event stream closed')): void {
    for (const sub of [...this.subscribers]) {
      this.subscribers.delete(sub);
      sub.handlers.onError(error);
    }
  }

  callsOf(operation: RuntimeOperation): string[] {
    return this.calls.filter((c) => c.operation === operation).map((c) => c.target);
  }

  workerByName(name: string): WorkerInfo | undefined {
    const worker = [...this.workers.values()].find((w) => w.info.name === name);
    return worker ? { ...worker.info } : undefined;
  }

  runningNames(): string[] {
    return [...this.workers.values()]
      .filter((w) => w.info.state === 'running')
      .map((w) => w.info.name)
      .sort();
  }

  // ─── RuntimeClient ──────────────────────────────────────────────

  async launch(request: LaunchRequest): Promise<string> {
    this.record('launch', request.name);
    this.launches.push({ ...request, env: { ...request.env }, labels: { ...request.labels } });

    const behavior = this.behaviors.get(request.name) ?? 'run';
    if (behavior === 'reject') {
      throw new Error(`image ${request.image} could not be started`);
    }
    if ([...this.workers.values()].some((w) => w.info.name === request.name)) {
      throw new RuntimeConflictError(request.name);
    }

    const info: WorkerInfo = {
      runtimeId: this.allocateId(),
      name: request.name,
      state: 'running',
      labels: { ...request.labels },
      startedAt: new Date().toISOString(),
      exitCode: null,
    };
    const worker: MemoryWorker = { info, logs: [`${request.name} starting`] };
    this.workers.set(info.runtimeId, worker);
    this.emit(info, 'start', 'start');

    if (behavior === 'exit') {
      info.state = 'exited';
      info.exitCode = 1;
      worker.logs.push('fatal: could not reach source');
      this.emit(info, 'die', 'die', 1);
    }
    return info.runtimeId;
  }

  async stop(runtimeId: string, _timeoutSeconds: number): Promise<void> {
    this.record('stop', runtimeId);
    const worker = this.workers.get(runtimeId);
    if (!worker || worker.info.state !== 'running') return;
    worker.info.state = 'exited';
    worker.info.exitCode = 0;
    this.emit(worker.info, 'stop', 'stop');
  }

  async remove(runtimeId: string): Promise<void> {
    this.record('remove', runtimeId);
    const worker = this.workers.get(runtimeId);
    if (!worker) return;
    this.workers.delete(runtimeId);
    this.emit(worker.info, 'destroy', 'destroy');
  }

  async inspect(runtimeId: string): Promise<WorkerInfo | null> {
    this.record('inspect', runtimeId);
    const worker = this.find(runtimeId);
    return worker ? { ...worker.info, labels: { ...worker.info.labels } } : null;
  }

  async list(filter: LabelFilter): Promise<WorkerInfo[]> {
    this.record('list', JSON.stringify(filter));
    return [...this.workers.values()]
      .filter((w) => matchesLabels(w.info.labels, filter))
      .map((w) => ({ ...w.info, labels: { ...w.info.labels } }));
  }

  async logs(runtimeId: string, tailLines: number): Promise<string> {
    this.record('logs', runtimeId);
    const worker = this.find(runtimeId);
    return worker ? worker.logs.slice(-tailLines).join('\n') : '';
  }

  async subscribe(filter: LabelFilter, handlers: RuntimeEventHandlers): Promise<RuntimeSubscription> {
    this.record('subscribe', JSON.stringify(filter));
    const sub = { filter, handlers };
    this.subscribers.add(sub);
    return { close: () => { this.subscribers.delete(sub); } };
  }

  // ─── Internals ──────────────────────────────────────────────────

  private record(operation: RuntimeOperation, target: string): void {
    this.calls.push({ operation, target });
    const queue = this.failures.get(operation);
    const failure = queue?.shift();
    if (failure) throw failure;
  }

  private find(nameOrId: string): MemoryWorker | undefined {
    return this.workers.get(nameOrId)
      ?? [...this.workers.values()].find((w) => w.info.name === nameOrId);
  }

  private allocateId(): string {
    return `mem-${this.nextId++}`;
  }

  private emit(info: WorkerInfo, type: RuntimeEventType, action: string, exitCode?: number): void {
    if (!this.eventsEnabled) return;
    const event: RuntimeEvent = {
      runtimeId: info.runtimeId,
      name: info.name,
      type,
      labels: { ...info.labels },
      exitCode,
      action,
      time: Date.now(),
    };
    for (const sub of this.subscribers) {
      if (matchesLabels(event.labels, sub.filter)) {
        queueMicrotask(() => sub.handlers.onEvent(event));
      }
    }
  }
}
