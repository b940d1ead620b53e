import type { WorkerInfo } from '../runtime/types.js';
import type { LaunchOutcome, StopOutcome } from './worker-launcher.js';

export type FeedOrder = 'none' | 'asc' | 'desc';

/**
 * A validated feed definition. Immutable: a modified file yields a new
 * FeedSpec with the same name and (usually) a different hash.
 */
export interface FeedSpec {
  name: string;
  sourceUrl: string;
  targetEndpoint: string;
  pollingIntervalSeconds: number;
  shape: string;
  /** Unset means the launcher derives one from the group label */
  targetGraph?: string;
  follow: boolean;
  materialize: boolean;
  order: FeedOrder;
  lastVersionOnly: boolean;
  failureIsFatal: boolean;
  concurrentFetches: number;
  queryTimeoutSeconds: number;
  forVirtuoso: boolean;
  /** ISO-8601 */
  before?: string;
  /** ISO-8601 */
  after?: string;
  accessToken?: string;
  perfName?: string;
  environment: Record<string, string>;
  /** File the spec was read from (basename). Not part of the hash. */
  sourceFile: string;
  /** Content hash over every behavior-affecting field */
  hash: string;
}

export type WorkerStatus = 'launching' | 'running' | 'degraded' | 'stopping' | 'absent';

export interface WorkerHandle {
  feedName: string;
  /** Null while launching and after a failed launch */
  runtimeId: string | null;
  specHash: string;
  status: WorkerStatus;
  /** ISO timestamp of the confirmed start */
  startedAt: string | null;
  /** Relaunches after unexpected deaths */
  restarts: number;
  lastError: string | null;
}

// ─── Events ─────────────────────────────────────────────────────

export type ChangeEvent =
  | { type: 'added'; name: string; spec: FeedSpec }
  | { type: 'modified'; name: string; spec: FeedSpec }
  | { type: 'removed'; name: string; reason: string };

export type HealthReason = 'exited' | 'unhealthy' | 'missing';

export interface HealthEvent {
  feedName: string;
  runtimeId: string;
  reason: HealthReason;
  exitCode?: number;
  /** Where the signal came from: the runtime event stream or the fallback poll */
  source: 'events' | 'poll';
  detail: string;
}

export type ControllerEvent =
  | { kind: 'config'; change: ChangeEvent }
  | { kind: 'health'; health: HealthEvent }
  | { kind: 'tick' }
  | { kind: 'orphan'; worker: WorkerInfo; feedName: string }
  | { kind: 'launched'; feedName: string; specHash: string; outcome: LaunchOutcome }
  | { kind: 'stopped'; feedName: string; runtimeId: string; outcome: StopOutcome }
  | { kind: 'shutdown' };

/** Label keys stamped on every worker the controller launches */
export const WORKER_LABELS = {
  group: 'feedyard.group',
  feed: 'feedyard.feed',
  specHash: 'feedyard.spec-hash',
  configFile: 'feedyard.config-file',
} as const;
