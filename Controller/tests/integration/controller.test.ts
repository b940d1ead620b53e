import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, unlinkSync } from 'node:fs';
import { join } from 'node:path';

vi.mock('@feedyard/shared/Utils/logger.js', () => ({
  logger: {
    child: () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }),
  },
}));

import { FeedController } from '../../src/core/controller.js';
import type { WatchFunction } from '../../src/core/config-source.js';
import { InMemoryRuntimeClient } from '../../src/runtime/memory-runtime.js';
import {
  feedYaml,
  makeConfig,
  makeTempDir,
  removeTempDir,
  SOURCE_BASE,
  TARGET_ENDPOINT,
} from '../helpers/fixtures.js';

const IDLE_TIMEOUT_MS = 2000;

describe('FeedController', () => {
  let stateRoot: string;
  let feedsDir: string;
  let runtime: InMemoryRuntimeClient;
  let controller: FeedController;
  let notify: (filename: string | null) => void;

  const watch: WatchFunction = (_dir, onChange) => {
    notify = onChange;
    return { close: () => {} };
  };

  function writeFeed(name: string, pollingInterval = 60): void {
    writeFileSync(join(feedsDir, `${name}.yaml`), feedYaml({
      url: `${SOURCE_BASE}/${name}`,
      sparql_endpoint: TARGET_ENDPOINT,
      polling_interval: pollingInterval,
    }));
  }

  function launchesOf(name: string): number {
    return runtime.callsOf('launch').filter((target) => target === `feed-worker-${name}`).length;
  }

  async function settle(): Promise<void> {
    expect(await controller.reconciler.whenIdle(IDLE_TIMEOUT_MS)).toBe(true);
  }

  beforeEach(async () => {
    stateRoot = makeTempDir();
    feedsDir = join(stateRoot, 'feeds');
    mkdirSync(feedsDir);
    writeFeed('a');
    writeFeed('b');
    notify = () => {};
    runtime = new InMemoryRuntimeClient();
    controller = new FeedController(runtime, makeConfig(stateRoot, { feedConfigDir: feedsDir }), { watch });

    await controller.start();
    await settle();
  });

  afterEach(async () => {
    await controller.shutdown(IDLE_TIMEOUT_MS);
    removeTempDir(stateRoot);
  });

  it('should start a worker for every feed file', () => {
    expect(runtime.runningNames()).toEqual(['feed-worker-a', 'feed-worker-b']);
    expect(controller.getStatus().desired).toEqual(['a', 'b']);
    expect(controller.healthMonitor.isSubscribed).toBe(true);
  });

  it('should follow edits, additions and removals in the feed directory', async () => {
    writeFeed('a', 120);
    notify('a.yaml');
    writeFeed('c');
    notify('c.yaml');
    unlinkSync(join(feedsDir, 'b.yaml'));
    notify('b.yaml');

    await vi.waitFor(() => expect(controller.getStatus().desired).toEqual(['a', 'c']));
    await settle();

    expect(runtime.runningNames()).toEqual(['feed-worker-a', 'feed-worker-c']);
    expect(launchesOf('a')).toBe(2);
    const lastLaunchOfA = runtime.launches.filter((l) => l.name === 'feed-worker-a').pop();
    expect(lastLaunchOfA?.env.POLLING_FREQUENCY).toBe('120000');
  });

  it('should relaunch a worker that dies', async () => {
    runtime.kill('feed-worker-a');

    await vi.waitFor(() => expect(launchesOf('a')).toBe(2));
    await settle();

    const worker = controller.getStatus().workers.find((w) => w.feedName === 'a');
    expect(worker).toMatchObject({ status: 'running', restarts: 1 });
    expect(runtime.runningNames()).toEqual(['feed-worker-a', 'feed-worker-b']);
  });

  it('should relaunch a dead worker exactly once when only polling notices', async () => {
    runtime.setEventsEnabled(false);
    runtime.kill('feed-worker-b');

    await controller.healthMonitor.poll();
    await controller.healthMonitor.poll();
    await vi.waitFor(() => expect(launchesOf('b')).toBe(2));
    await settle();
    await controller.healthMonitor.poll();
    await settle();

    expect(launchesOf('b')).toBe(2);
    expect(runtime.runningNames()).toEqual(['feed-worker-a', 'feed-worker-b']);
  });

  it('should stop every worker on shutdown', async () => {
    expect(await controller.shutdown(IDLE_TIMEOUT_MS)).toBe(true);

    expect(runtime.runningNames()).toEqual([]);
    expect(controller.healthMonitor.isSubscribed).toBe(false);
  });

  it('should report an unclean shutdown when workers could not be stopped', async () => {
    runtime.failNext('stop', 6);

    expect(await controller.shutdown(IDLE_TIMEOUT_MS)).toBe(false);

    expect(runtime.runningNames()).toEqual(['feed-worker-a', 'feed-worker-b']);
    expect(controller.getStatus().workers.map((w) => `${w.feedName}:${w.status}`)).toEqual(['a:degraded', 'b:degraded']);
  });
});
