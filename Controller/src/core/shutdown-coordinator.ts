import { constants } from 'node:os';
import { logger as rootLogger } from '@feedyard/shared/Utils/logger.js';

export interface Drainable {
  /** Stop every worker; resolves false if the grace period ran out first. */
  shutdown(graceMs: number): Promise<boolean>;
}

export interface ShutdownOptions {
  graceMs: number;
  /** Runs once, right before exit (lock release) */
  onExit?: () => void;
  exit?: (code: number) => void;
}

export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

export function signalExitCode(signal: NodeJS.Signals): number {
  return 128 + (constants.signals[signal] ?? 0);
}

/**
 * First SIGTERM/SIGINT drains the controller and exits 0 when every worker
 * stopped in time. Grace expiry, or a second signal, exits 128 + signal.
 */
export class ShutdownCoordinator {
  private draining: Promise<void> | null = null;
  private exited = false;
  private logger = rootLogger.child('shutdown');
  private listeners = new Map<NodeJS.Signals, () => void>();

  constructor(
    private target: Drainable,
    private options: ShutdownOptions,
  ) {}

  install(): void {
    for (const signal of SHUTDOWN_SIGNALS) {
      const listener = (): void => {
        this.handle(signal).catch((error: unknown) => {
          this.logger.error('Shutdown failed', { error });
        });
      };
      this.listeners.set(signal, listener);
      process.on(signal, listener);
    }
  }

  uninstall(): void {
    for (const [signal, listener] of this.listeners) {
      process.off(signal, listener);
    }
    this.listeners.clear();
  }

  handle(signal: NodeJS.Signals): Promise<void> {
    if (this.draining) {
      this.logger.warn(`Received ${signal} again; forcing exit`);
      this.finish(signalExitCode(signal));
      return this.draining;
    }

    this.logger.info(`Received ${signal}; draining (grace ${this.options.graceMs}ms)`);
    this.draining = this.drain(signal);
    return this.draining;
  }

  private async drain(signal: NodeJS.Signals): Promise<void> {
    let clean = false;
    try {
      clean = await this.target.shutdown(this.options.graceMs);
    } catch (error) {
      this.logger.error('Error while draining workers', { error });
    }

    if (clean) {
      this.logger.info('All workers stopped; exiting');
      this.finish(0);
    } else {
      this.logger.warn('Grace period expired with workers still running; exiting');
      this.finish(signalExitCode(signal));
    }
  }

  private finish(code: number): void {
    if (this.exited) return;
    this.exited = true;
    try {
      this.options.onExit?.();
    } catch (error) {
      this.logger.error('Cleanup before exit failed', { error });
    }
    const exit = this.options.exit ?? ((exitCode: number) => process.exit(exitCode));
    exit(code);
  }
}
