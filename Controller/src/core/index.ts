export { FeedController, type FeedControllerOptions } from './controller.js';
export { Reconciler, type ReconcilerStatus } from './reconciler.js';
export { WorkerLauncher, type LaunchOutcome, type StopOutcome } from './worker-launcher.js';
export { FeedConfigSource, type WatchFunction, type DirectoryWatcher } from './config-source.js';
export { HealthMonitor } from './health-monitor.js';
export { LockManager, isProcessAlive, type LockToken } from './lock-manager.js';
export { ShutdownCoordinator, signalExitCode, type Drainable } from './shutdown-coordinator.js';
export { EventQueue } from './event-queue.js';
export { StateStore, computeDiff, type ReconcileDiff, type StateSnapshot } from './state-store.js';
export type { FeedSpec, WorkerHandle, WorkerStatus, ChangeEvent, HealthEvent, ControllerEvent } from './types.js';
