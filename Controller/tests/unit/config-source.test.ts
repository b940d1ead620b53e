import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { writeFileSync, unlinkSync } from 'node:fs';
import { join } from 'node:path';

const childLogger = vi.hoisted(() => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
}));

vi.mock('@feedyard/shared/Utils/logger.js', () => ({
  logger: { child: () => childLogger },
}));

import { FeedConfigSource, type WatchFunction } from '../../src/core/config-source.js';
import type { ChangeEvent } from '../../src/core/types.js';
import { makeTempDir, removeTempDir } from '../helpers/fixtures.js';

const DEBOUNCE_MS = 50;

function feed(name: string, pollingInterval = 60): string {
  return `url: https://feeds.example.org/${name}\nsparql_endpoint: http://store.example.org/sparql\npolling_interval: ${pollingInterval}\n`;
}

describe('FeedConfigSource', () => {
  let dir: string;
  let notify: (filename: string | null) => void;
  let close: ReturnType<typeof vi.fn>;
  let watchFn: WatchFunction;
  let events: ChangeEvent[];

  function write(file: string, content: string): void {
    writeFileSync(join(dir, file), content);
  }

  function createSource(): FeedConfigSource {
    return new FeedConfigSource(dir, { debounceMs: DEBOUNCE_MS, watch: watchFn });
  }

  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers();
    dir = makeTempDir();
    events = [];
    notify = () => {};
    close = vi.fn();
    watchFn = (_dir, onChange) => {
      notify = onChange;
      return { close };
    };
  });

  afterEach(() => {
    vi.useRealTimers();
    removeTempDir(dir);
  });

  it('should emit nothing when the directory matches the initial scan', () => {
    write('a.yaml', feed('a'));
    const source = createSource();

    expect([...source.scan().specs.keys()]).toEqual(['a']);
    source.watch((e) => events.push(e));

    expect(events).toEqual([]);
    source.stop();
  });

  it('should collapse rapid notifications into one event with the final content', () => {
    write('a.yaml', feed('a', 60));
    const source = createSource();
    source.scan();
    source.watch((e) => events.push(e));

    write('a.yaml', feed('a', 90));
    notify('a.yaml');
    vi.advanceTimersByTime(20);
    write('a.yaml', feed('a', 120));
    notify('a.yaml');
    vi.advanceTimersByTime(20);
    write('a.yaml', feed('a', 180));
    notify('a.yaml');

    vi.advanceTimersByTime(DEBOUNCE_MS - 1);
    expect(events).toEqual([]);

    vi.advanceTimersByTime(1);
    expect(events).toHaveLength(1);
    const [event] = events;
    expect(event.type).toBe('modified');
    expect(event.type === 'modified' && event.spec.pollingIntervalSeconds).toBe(180);
    source.stop();
  });

  it('should hold back a file whose window is still open when another file settles', () => {
    write('a.yaml', feed('a', 60));
    write('b.yaml', feed('b', 60));
    const source = createSource();
    source.scan();
    source.watch((e) => events.push(e));

    write('a.yaml', feed('a', 90));
    notify('a.yaml');
    vi.advanceTimersByTime(25);
    write('b.yaml', feed('b', 90));
    notify('b.yaml');

    // a settles at t=50 while b is still settling
    vi.advanceTimersByTime(25);
    expect(events.map((e) => `${e.type}:${e.name}`)).toEqual(['modified:a']);

    vi.advanceTimersByTime(5);
    write('b.yaml', feed('b', 120));
    notify('b.yaml');
    vi.advanceTimersByTime(DEBOUNCE_MS);

    expect(events.map((e) => `${e.type}:${e.name}`)).toEqual(['modified:a', 'modified:b']);
    const last = events[1];
    expect(last.type === 'modified' && last.spec.pollingIntervalSeconds).toBe(120);
    expect(source.snapshot().get('b')?.pollingIntervalSeconds).toBe(120);
    source.stop();
  });

  it('should hold back a new file until its own window closes', () => {
    const source = createSource();
    source.scan();
    source.watch((e) => events.push(e));

    write('a.yaml', feed('a'));
    notify('a.yaml');
    vi.advanceTimersByTime(25);
    write('b.yaml', feed('b'));
    notify('b.yaml');
    vi.advanceTimersByTime(25);

    expect(events.map((e) => `${e.type}:${e.name}`)).toEqual(['added:a']);
    expect(source.snapshot().has('b')).toBe(false);

    vi.advanceTimersByTime(25);
    expect(events.map((e) => `${e.type}:${e.name}`)).toEqual(['added:a', 'added:b']);
    source.stop();
  });

  it('should emit added for a new file', () => {
    const source = createSource();
    source.scan();
    source.watch((e) => events.push(e));

    write('b.yaml', feed('b'));
    notify('b.yaml');
    vi.advanceTimersByTime(DEBOUNCE_MS);

    expect(events.map((e) => `${e.type}:${e.name}`)).toEqual(['added:b']);
    source.stop();
  });

  it('should emit removed keyed by the last known name', () => {
    write('Marine_Species.yaml', feed('m'));
    const source = createSource();
    source.scan();
    source.watch((e) => events.push(e));

    unlinkSync(join(dir, 'Marine_Species.yaml'));
    notify('Marine_Species.yaml');
    vi.advanceTimersByTime(DEBOUNCE_MS);

    expect(events).toEqual([{ type: 'removed', name: 'marine-species', reason: 'Marine_Species.yaml removed' }]);
    source.stop();
  });

  it('should remove a feed whose file becomes invalid', () => {
    write('a.yaml', feed('a'));
    const source = createSource();
    source.scan();
    source.watch((e) => events.push(e));

    write('a.yaml', 'url: https://feeds.example.org/a\n');
    notify('a.yaml');
    vi.advanceTimersByTime(DEBOUNCE_MS);

    expect(events).toEqual([{
      type: 'removed',
      name: 'a',
      reason: 'a.yaml: sparql_endpoint: Required (sparql_endpoint or target)',
    }]);
    expect(childLogger.error).toHaveBeenCalledTimes(1);
    source.stop();
  });

  it('should log an invalid new file once and emit nothing for it', () => {
    write('a.yaml', feed('a'));
    const source = createSource();
    source.scan();
    source.watch((e) => events.push(e));

    write('feedb.yaml', 'url: https://feeds.example.org/b\n');
    notify('feedb.yaml');
    vi.advanceTimersByTime(DEBOUNCE_MS);

    // an unrelated change triggers another rescan
    write('c.yaml', feed('c'));
    notify('c.yaml');
    vi.advanceTimersByTime(DEBOUNCE_MS);

    expect(events.map((e) => `${e.type}:${e.name}`)).toEqual(['added:c']);
    expect(childLogger.error).toHaveBeenCalledTimes(1);
    expect(String(childLogger.error.mock.calls[0][0])).toBe(
      'Feed "feedb" rejected: feedb.yaml: sparql_endpoint: Required (sparql_endpoint or target)',
    );
    expect(source.snapshot().has('feedb')).toBe(false);
    source.stop();
  });

  it('should ignore notifications for files that are not feeds', () => {
    const source = createSource();
    source.scan();
    source.watch((e) => events.push(e));

    notify('.controller.lock');
    notify('README.md');

    expect(vi.getTimerCount()).toBe(0);
    source.stop();
  });

  it('should rescan on a notification without a filename', () => {
    const source = createSource();
    source.scan();
    source.watch((e) => events.push(e));

    write('b.yaml', feed('b'));
    notify(null);
    vi.advanceTimersByTime(DEBOUNCE_MS);

    expect(events.map((e) => `${e.type}:${e.name}`)).toEqual(['added:b']);
    source.stop();
  });

  it('should drop pending notifications on stop', () => {
    const source = createSource();
    source.scan();
    source.watch((e) => events.push(e));

    write('b.yaml', feed('b'));
    notify('b.yaml');
    source.stop();
    vi.advanceTimersByTime(DEBOUNCE_MS);

    expect(events).toEqual([]);
    expect(close).toHaveBeenCalledTimes(1);
  });

  it('should emit changes made while stopped when watching again', () => {
    write('a.yaml', feed('a', 60));
    const source = createSource();
    source.scan();
    source.watch(() => {});
    source.stop();

    write('a.yaml', feed('a', 120));
    write('b.yaml', feed('b'));
    source.watch((e) => events.push(e));

    expect(events.map((e) => `${e.type}:${e.name}`)).toEqual(['modified:a', 'added:b']);
    source.stop();
  });
});
