/**
 * WorkerLauncher - turns a FeedSpec into a running worker and back.
 *
 * launch(): state dir, stale-container cleanup, create+start, then confirm
 * the worker stays running for the settle period. Failures come back as a
 * LaunchOutcome carrying the worker's last output; nothing here retries a
 * launch (the reconciler does that on its next tick).
 *
 * stop(): stop then (optionally) remove, each with a bounded retry.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { logger as rootLogger } from '@feedyard/shared/Utils/logger.js';
import { retry, sleep, withTimeout } from '@feedyard/shared/Utils/async.js';
import { errorMessage } from '@feedyard/shared/Types/errors.js';
import type { Config } from '../config/index.js';
import {
  OVERRIDABLE_WORKER_DEFAULTS,
  defaultTargetGraph,
  secondsToMs,
} from '../config/feed-defaults.js';
import type { LaunchRequest, RuntimeClient, RuntimeOperation, WorkerInfo } from '../runtime/types.js';
import { LaunchError, RuntimeCallError } from '../utils/errors.js';
import { WORKER_LABELS, type FeedSpec } from './types.js';

// Captured worker output is bounded so a noisy worker can't flood the log
export const MAX_DIAGNOSTIC_CHARS = 4000;

export type LaunchOutcome =
  | { ok: true; runtimeId: string; startedAt: string }
  | { ok: false; runtimeId: string | null; error: LaunchError };

export type StopOutcome =
  | { ok: true }
  | { ok: false; error: string };

export type LauncherConfig = Pick<Config, 'groupLabel' | 'composeProject' | 'worker' | 'timing' | 'retry'>;

export class WorkerLauncher {
  private logger = rootLogger.child('worker-launcher');

  constructor(
    private runtime: RuntimeClient,
    private config: LauncherConfig,
  ) {}

  workerName(feedName: string): string {
    return `${this.config.worker.namePrefix}-${feedName}`;
  }

  /**
   * Pure mapping from a spec to the runtime request. Equal specs give equal requests.
   */
  buildLaunchRequest(spec: FeedSpec): LaunchRequest {
    const { worker, groupLabel, composeProject } = this.config;

    const env: Record<string, string> = {
      ...OVERRIDABLE_WORKER_DEFAULTS,
      LOG_LEVEL: worker.logLevel,
      ...spec.environment,
      LDES: spec.sourceUrl,
      SPARQL_ENDPOINT: spec.targetEndpoint,
      TARGET_GRAPH: spec.targetGraph ?? defaultTargetGraph(groupLabel, spec.name),
      SHAPE: spec.shape,
      FOLLOW: String(spec.follow),
      MATERIALIZE: String(spec.materialize),
      ORDER: spec.order,
      LAST_VERSION_ONLY: String(spec.lastVersionOnly),
      FAILURE_IS_FATAL: String(spec.failureIsFatal),
      POLLING_FREQUENCY: String(secondsToMs(spec.pollingIntervalSeconds)),
      CONCURRENT_FETCHES: String(spec.concurrentFetches),
      QUERY_TIMEOUT: String(spec.queryTimeoutSeconds),
      FOR_VIRTUOSO: String(spec.forVirtuoso),
    };
    if (spec.before !== undefined) env.BEFORE = spec.before;
    if (spec.after !== undefined) env.AFTER = spec.after;
    if (spec.accessToken !== undefined) env.ACCESS_TOKEN = spec.accessToken;
    if (spec.perfName !== undefined) env.PERF_NAME = spec.perfName;

    const labels: Record<string, string> = {
      [WORKER_LABELS.group]: groupLabel,
      [WORKER_LABELS.feed]: spec.name,
      [WORKER_LABELS.specHash]: spec.hash,
      [WORKER_LABELS.configFile]: spec.sourceFile,
    };
    if (composeProject) {
      labels['com.docker.compose.project'] = composeProject;
      labels['com.docker.compose.service'] = this.workerName(spec.name);
    }

    return {
      name: this.workerName(spec.name),
      image: worker.image,
      env,
      network: worker.network,
      labels,
      mounts: [{ source: join(worker.hostStateRoot, spec.name), target: '/state', readOnly: false }],
    };
  }

  async launch(spec: FeedSpec): Promise<LaunchOutcome> {
    const request = this.buildLaunchRequest(spec);

    let runtimeId: string;
    try {
      mkdirSync(join(this.config.worker.stateRoot, spec.name), { recursive: true });
      await this.removeStale(request.name);
      runtimeId = await this.call('launch', request.name, () => this.runtime.launch(request));
    } catch (error) {
      return {
        ok: false,
        runtimeId: null,
        error: new LaunchError(`Launch of "${spec.name}" failed: ${errorMessage(error)}`, spec.name, '', error),
      };
    }
    this.logger.info(`Worker started for feed "${spec.name}"`, {
      worker: request.name,
      runtimeId,
      specHash: spec.hash,
    });

    const confirmation = await this.confirmRunning(runtimeId);
    if (confirmation.ok) {
      return { ok: true, runtimeId, startedAt: confirmation.startedAt };
    }

    const diagnostics = await this.captureDiagnostics(spec.name, runtimeId);
    this.logger.error(`Worker for feed "${spec.name}" did not stay running: ${confirmation.reason}`, {
      runtimeId,
      diagnostics,
    });
    await this.discard(spec.name, runtimeId);
    return {
      ok: false,
      runtimeId,
      error: new LaunchError(
        `Worker for feed "${spec.name}" ${confirmation.reason}`,
        spec.name,
        diagnostics,
      ),
    };
  }

  async stop(feedName: string, runtimeId: string): Promise<StopOutcome> {
    const { stopTimeoutSeconds } = this.config.timing;
    try {
      await this.withRetry('stop', feedName, () =>
        this.call('stop', runtimeId, () => this.runtime.stop(runtimeId, stopTimeoutSeconds)),
      );
      if (this.config.worker.remove) {
        await this.withRetry('remove', feedName, () =>
          this.call('remove', runtimeId, () => this.runtime.remove(runtimeId)),
        );
      }
    } catch (error) {
      this.logger.warn(`Giving up on stopping worker for feed "${feedName}"`, { runtimeId, error });
      return { ok: false, error: errorMessage(error) };
    }
    this.logger.info(`Worker for feed "${feedName}" stopped`, { runtimeId });
    return { ok: true };
  }

  /** Every worker carrying this controller's group label, running or not. */
  async listWorkers(): Promise<WorkerInfo[]> {
    return this.call('list', this.config.groupLabel, () =>
      this.runtime.list({ [WORKER_LABELS.group]: this.config.groupLabel }),
    );
  }

  /** Remove a worker that is not running; failures are logged, not thrown. */
  async discard(feedName: string, runtimeId: string): Promise<void> {
    try {
      await this.withRetry('remove', feedName, () =>
        this.call('remove', runtimeId, () => this.runtime.remove(runtimeId)),
      );
    } catch (error) {
      this.logger.warn(`Failed to remove worker for feed "${feedName}"`, { runtimeId, error });
    }
  }

  // ─── Internals ──────────────────────────────────────────────────

  private async confirmRunning(
    runtimeId: string,
  ): Promise<{ ok: true; startedAt: string } | { ok: false; reason: string }> {
    const { launchTimeoutMs, launchSettleMs, launchPollMs } = this.config.timing;
    const deadline = Date.now() + launchTimeoutMs;
    let runningSince: number | null = null;

    for (;;) {
      let info: WorkerInfo | null;
      try {
        info = await this.call('inspect', runtimeId, () => this.runtime.inspect(runtimeId));
      } catch (error) {
        if (Date.now() >= deadline) {
          return { ok: false, reason: `could not be inspected (${errorMessage(error)})` };
        }
        await sleep(launchPollMs);
        continue;
      }
      const now = Date.now();

      if (!info) {
        return { ok: false, reason: 'disappeared during startup' };
      }
      if (info.state === 'exited' || info.state === 'dead') {
        return { ok: false, reason: `exited during startup (exit code ${info.exitCode ?? 'unknown'})` };
      }
      if (info.state === 'running') {
        runningSince ??= now;
        if (now - runningSince >= launchSettleMs) {
          return { ok: true, startedAt: info.startedAt ?? new Date(runningSince).toISOString() };
        }
      } else {
        runningSince = null;
      }

      if (now >= deadline) {
        return { ok: false, reason: `was not confirmed running within ${launchTimeoutMs}ms` };
      }
      await sleep(launchPollMs);
    }
  }

  private async removeStale(workerName: string): Promise<void> {
    const existing = await this.call('inspect', workerName, () => this.runtime.inspect(workerName));
    if (!existing) return;
    this.logger.warn(`Removing stale worker "${workerName}"`, {
      runtimeId: existing.runtimeId,
      state: existing.state,
    });
    await this.call('remove', existing.runtimeId, () => this.runtime.remove(existing.runtimeId));
  }

  private async captureDiagnostics(feedName: string, runtimeId: string): Promise<string> {
    const { diagnosticTailLines, diagnosticsDir } = this.config.worker;
    let output: string;
    try {
      output = await this.call('logs', runtimeId, () => this.runtime.logs(runtimeId, diagnosticTailLines));
    } catch (error) {
      this.logger.warn(`Could not capture output of worker for feed "${feedName}"`, { runtimeId, error });
      return '';
    }

    const diagnostics = output.slice(-MAX_DIAGNOSTIC_CHARS);
    if (diagnosticsDir) {
      const stamp = new Date().toISOString().replace(/[:.]/g, '-');
      const file = join(diagnosticsDir, `${feedName}_${stamp}.log`);
      try {
        mkdirSync(diagnosticsDir, { recursive: true });
        writeFileSync(file, output, 'utf-8');
        this.logger.info(`Worker output for feed "${feedName}" saved`, { file });
      } catch (error) {
        this.logger.warn('Failed to save worker output', { file, error });
      }
    }
    return diagnostics;
  }

  private withRetry<T>(operation: RuntimeOperation, feedName: string, fn: () => Promise<T>): Promise<T> {
    return retry(fn, {
      attempts: this.config.retry.attempts,
      delayMs: this.config.retry.delayMs,
      onRetry: (error, attempt) => {
        this.logger.warn(`${operation} for feed "${feedName}" failed (attempt ${attempt}), retrying`, {
          error: errorMessage(error),
        });
      },
    });
  }

  /** Bound a runtime call and normalize its failure. */
  private async call<T>(operation: RuntimeOperation, target: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(fn(), this.config.timing.runtimeCallTimeoutMs, `${operation} ${target}`);
    } catch (error) {
      throw new RuntimeCallError(`${operation} ${target} failed: ${errorMessage(error)}`, operation, target, error);
    }
  }
}
