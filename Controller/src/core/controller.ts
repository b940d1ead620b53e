/**
 * FeedController - wires the config source, reconciler, launcher and health
 * monitor around one event queue.
 */

import { logger as rootLogger } from '@feedyard/shared/Utils/logger.js';
import type { Config } from '../config/index.js';
import type { RuntimeClient } from '../runtime/types.js';
import { FeedConfigSource, type WatchFunction } from './config-source.js';
import { HealthMonitor } from './health-monitor.js';
import { Reconciler, type ReconcilerStatus } from './reconciler.js';
import { WorkerLauncher } from './worker-launcher.js';
import type { Drainable } from './shutdown-coordinator.js';

export interface FeedControllerOptions {
  /** Filesystem notification source for the feed directory (tests) */
  watch?: WatchFunction;
}

export class FeedController implements Drainable {
  readonly configSource: FeedConfigSource;
  readonly reconciler: Reconciler;
  readonly healthMonitor: HealthMonitor;
  private started = false;
  private logger = rootLogger.child('controller');

  constructor(
    runtime: RuntimeClient,
    private config: Config,
    options: FeedControllerOptions = {},
  ) {
    const launcher = new WorkerLauncher(runtime, config);
    this.reconciler = new Reconciler(launcher);
    this.configSource = new FeedConfigSource(config.feedConfigDir, {
      debounceMs: config.timing.configDebounceMs,
      watch: options.watch,
    });
    this.healthMonitor = new HealthMonitor(
      runtime,
      () => this.reconciler.snapshot(),
      (event) => {
        this.reconciler.enqueue(event);
      },
      {
        groupLabel: config.groupLabel,
        fallbackPollIntervalMs: config.timing.fallbackPollIntervalMs,
      },
    );
  }

  /**
   * Scan, adopt existing workers, start the reconciler loop and run the
   * initial reconciliation, then start watching for changes.
   */
  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;

    const { specs } = this.configSource.scan();
    this.reconciler.setDesired(specs);
    await this.reconciler.adopt();

    this.reconciler.start();
    this.reconciler.enqueue({ kind: 'tick' });

    this.configSource.watch((change) => {
      this.reconciler.enqueue({ kind: 'config', change });
    });
    await this.healthMonitor.start();

    this.logger.info('Feed controller started', {
      feeds: [...specs.keys()],
      group: this.config.groupLabel,
    });
  }

  async shutdown(graceMs: number): Promise<boolean> {
    this.configSource.stop();
    this.healthMonitor.stop();

    if (!this.started) return true;

    this.reconciler.enqueue({ kind: 'shutdown' });
    const clean = await this.reconciler.whenStopped(graceMs);
    if (clean) {
      await this.reconciler.close();
    } else {
      this.logger.warn('Shutdown left workers running', {
        workers: this.reconciler.getStatus().workers.map((w) => `${w.feedName}:${w.status}`),
      });
    }
    return clean;
  }

  getStatus(): ReconcilerStatus {
    return this.reconciler.getStatus();
  }
}
