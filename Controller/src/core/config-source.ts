import { watch as fsWatch, mkdirSync } from 'node:fs';
import { logger } from '@feedyard/shared/Utils/logger.js';
import { scanFeedDirectory, isFeedFile, type FeedScanResult } from '../config/feed-loader.js';
import type { ChangeEvent, FeedSpec } from './types.js';

export interface DirectoryWatcher {
  close(): void;
}

export type WatchFunction = (
  dir: string,
  onChange: (filename: string | null) => void,
  onError: (error: Error) => void,
) => DirectoryWatcher;

const watchDirectory: WatchFunction = (dir, onChange, onError) => {
  const watcher = fsWatch(dir, (_eventType, filename) => onChange(filename));
  watcher.on('error', onError);
  return watcher;
};

export interface ConfigSourceOptions {
  debounceMs: number;
  /** Filesystem notification source; defaults to fs.watch on the directory */
  watch?: WatchFunction;
}

// Debounce key for notifications that carry no filename
const FULL_RESCAN = '*';

/**
 * Turns a directory of feed files into ChangeEvents.
 *
 * Notifications are debounced per file. When a timer fires the whole
 * directory is re-read and compared with the last known state, so an event
 * always carries the final content and duplicate names resolve the same way
 * they do at startup. Changes to files whose own window is still open are
 * held back until it closes.
 */
export class FeedConfigSource {
  private watcher: DirectoryWatcher | null = null;
  private timers = new Map<string, ReturnType<typeof setTimeout>>();
  private known = new Map<string, FeedSpec>();
  /** Last error reported per file, so a broken file is logged once per distinct failure */
  private reportedErrors = new Map<string, string>();
  private onEvent: ((change: ChangeEvent) => void) | null = null;
  private log = logger.child('config-source');
  private watchFn: WatchFunction;

  constructor(
    private dir: string,
    private options: ConfigSourceOptions,
  ) {
    this.watchFn = options.watch ?? watchDirectory;
  }

  /**
   * Initial load. Replaces the known state without emitting events.
   */
  scan(): FeedScanResult {
    const result = scanFeedDirectory(this.dir);
    this.reportErrors(result);
    this.known = new Map(result.specs);
    this.log.info(`Loaded ${result.specs.size} feed(s)`, {
      dir: this.dir,
      feeds: [...result.specs.keys()],
      ...(result.errors.length > 0 ? { rejected: result.errors.map((e) => e.file) } : {}),
    });
    return result;
  }

  /**
   * Start delivering changes. Differences since the last known state (for
   * example edits made while the source was stopped) are emitted first.
   */
  watch(onEvent: (change: ChangeEvent) => void): void {
    if (this.watcher) return;
    this.onEvent = onEvent;

    mkdirSync(this.dir, { recursive: true });
    try {
      this.watcher = this.watchFn(
        this.dir,
        (filename) => this.notify(filename),
        (error) => this.log.error('Feed directory watcher failed', { dir: this.dir, error }),
      );
      this.log.info('Watching feed directory for changes', { dir: this.dir });
    } catch (error) {
      this.log.error('Failed to watch feed directory', { dir: this.dir, error });
    }

    this.rescan();
  }

  stop(): void {
    this.watcher?.close();
    this.watcher = null;
    this.onEvent = null;
    for (const timer of this.timers.values()) clearTimeout(timer);
    this.timers.clear();
  }

  /** Currently valid specs by name */
  snapshot(): ReadonlyMap<string, FeedSpec> {
    return new Map(this.known);
  }

  private notify(filename: string | null): void {
    if (filename !== null && !isFeedFile(filename)) return;

    const key = filename ?? FULL_RESCAN;
    const pending = this.timers.get(key);
    if (pending) clearTimeout(pending);

    this.timers.set(key, setTimeout(() => {
      this.timers.delete(key);
      this.rescan();
    }, this.options.debounceMs));
  }

  private rescan(): void {
    const onEvent = this.onEvent;
    if (!onEvent) return;
    // a pending directory-wide rescan will cover this one
    if (this.timers.has(FULL_RESCAN)) return;

    const result = scanFeedDirectory(this.dir);
    this.reportErrors(result);
    const errorsByName = new Map(result.errors.map((e) => [e.feedName, e.message]));

    // Files still inside their own debounce window are reported when that window closes
    const settling = (...files: string[]): boolean => files.some((file) => this.timers.has(file));
    const next = new Map(result.specs);
    const changes: ChangeEvent[] = [];

    for (const [name, previous] of this.known) {
      if (result.specs.has(name)) continue;
      if (settling(previous.sourceFile)) {
        next.set(name, previous);
        continue;
      }
      const reason = errorsByName.get(name) ?? `${previous.sourceFile} removed`;
      changes.push({ type: 'removed', name, reason });
    }
    for (const [name, spec] of result.specs) {
      const previous = this.known.get(name);
      if (!previous) {
        if (settling(spec.sourceFile)) {
          next.delete(name);
          continue;
        }
        changes.push({ type: 'added', name, spec });
      } else if (previous.hash !== spec.hash) {
        if (settling(previous.sourceFile, spec.sourceFile)) {
          next.set(name, previous);
          continue;
        }
        changes.push({ type: 'modified', name, spec });
      }
    }

    this.known = next;

    if (changes.length === 0) return;
    this.log.info('Feed configuration changed', {
      changes: changes.map((c) => `${c.type}:${c.name}`),
    });
    for (const change of changes) onEvent(change);
  }

  private reportErrors(result: FeedScanResult): void {
    const current = new Map(result.errors.map((e) => [e.file, e.message]));

    for (const error of result.errors) {
      if (this.reportedErrors.get(error.file) === error.message) continue;
      this.log.error(`Feed "${error.feedName}" rejected: ${error.message}`, {
        file: error.file,
        code: error.code,
      });
    }
    this.reportedErrors = current;
  }
}
