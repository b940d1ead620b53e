/**
 * Runtime Client contract.
 *
 * A thin, stateless capability over the container runtime. Implementations
 * carry no policy: retries, timeouts and state live in the controller.
 */

export interface VolumeMount {
  /** Path on the runtime host */
  source: string;
  /** Path inside the worker */
  target: string;
  readOnly: boolean;
}

export interface LaunchRequest {
  /** Worker (container) name, unique per feed */
  name: string;
  image: string;
  env: Record<string, string>;
  network: string;
  labels: Record<string, string>;
  mounts: VolumeMount[];
}

export type RuntimeState =
  | 'created'
  | 'running'
  | 'restarting'
  | 'paused'
  | 'exited'
  | 'dead'
  | 'removing';

export interface WorkerInfo {
  runtimeId: string;
  name: string;
  state: RuntimeState;
  labels: Record<string, string>;
  /** ISO timestamp, null when the runtime does not report one */
  startedAt: string | null;
  exitCode: number | null;
}

export type RuntimeEventType =
  | 'start'
  | 'die'
  | 'stop'
  | 'kill'
  | 'oom'
  | 'unhealthy'
  | 'destroy'
  | 'other';

export interface RuntimeEvent {
  runtimeId: string;
  name: string;
  type: RuntimeEventType;
  labels: Record<string, string>;
  exitCode?: number;
  /** Raw action string as reported by the runtime */
  action: string;
  /** Epoch milliseconds */
  time: number;
}

export interface RuntimeEventHandlers {
  onEvent: (event: RuntimeEvent) => void;
  onError: (error: Error) => void;
  /** The stream ended without an explicit close() */
  onEnd: () => void;
}

export interface RuntimeSubscription {
  close(): void;
}

export type RuntimeOperation = 'launch' | 'stop' | 'remove' | 'inspect' | 'list' | 'logs' | 'subscribe';

/** Label key/value pairs a worker must carry to match */
export type LabelFilter = Record<string, string>;

export interface RuntimeClient {
  /** Create and start a worker. Resolves with its runtime id. */
  launch(request: LaunchRequest): Promise<string>;
  /** Stop a worker. Already stopped or missing workers resolve normally. */
  stop(runtimeId: string, timeoutSeconds: number): Promise<void>;
  /** Remove a worker. Missing workers resolve normally. */
  remove(runtimeId: string): Promise<void>;
  /** Resolves null when the worker does not exist. */
  inspect(runtimeId: string): Promise<WorkerInfo | null>;
  /** All workers (running or not) carrying every label in the filter. */
  list(filter: LabelFilter): Promise<WorkerInfo[]>;
  /** The last `tailLines` lines of combined stdout/stderr. */
  logs(runtimeId: string, tailLines: number): Promise<string>;
  subscribe(filter: LabelFilter, handlers: RuntimeEventHandlers): Promise<RuntimeSubscription>;
}

const ACTION_TYPES: Record<string, RuntimeEventType> = {
  start: 'start',
  die: 'die',
  stop: 'stop',
  kill: 'kill',
  oom: 'oom',
  destroy: 'destroy',
  'health_status: unhealthy': 'unhealthy',
};

/**
 * Map a raw runtime action (e.g. "health_status: unhealthy") onto an event type.
 */
export function classifyAction(action: string): RuntimeEventType {
  return ACTION_TYPES[action.trim()] ?? 'other';
}

export function matchesLabels(labels: Record<string, string>, filter: LabelFilter): boolean {
  return Object.entries(filter).every(([key, value]) => labels[key] === value);
}

/** Where the controller itself runs, as far as the runtime can tell */
export interface HostPlacement {
  network: string | null;
  composeProject: string | null;
}
