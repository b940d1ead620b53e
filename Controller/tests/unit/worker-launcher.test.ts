import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

vi.mock('@feedyard/shared/Utils/logger.js', () => ({
  logger: {
    child: () => ({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }),
  },
}));

import { WorkerLauncher } from '../../src/core/worker-launcher.js';
import { LaunchError } from '../../src/utils/errors.js';
import { InMemoryRuntimeClient } from '../../src/runtime/memory-runtime.js';
import {
  makeConfig,
  makeSpec,
  makeTempDir,
  removeTempDir,
  TARGET_ENDPOINT,
  type ConfigOverrides,
} from '../helpers/fixtures.js';

describe('WorkerLauncher', () => {
  let stateRoot: string;
  let runtime: InMemoryRuntimeClient;

  function createLauncher(overrides: ConfigOverrides = {}): WorkerLauncher {
    return new WorkerLauncher(runtime, makeConfig(stateRoot, overrides));
  }

  beforeEach(() => {
    stateRoot = makeTempDir();
    runtime = new InMemoryRuntimeClient();
  });

  afterEach(() => {
    removeTempDir(stateRoot);
  });

  describe('buildLaunchRequest', () => {
    it('should map every feed field onto the worker environment', () => {
      const spec = makeSpec('museum', {
        pollingIntervalSeconds: 120,
        environment: { MEMBER_BATCH_SIZE: '100' },
      });

      const request = createLauncher().buildLaunchRequest(spec);

      expect(request.name).toBe('feed-worker-museum');
      expect(request.image).toBe('example/feed-worker:test');
      expect(request.network).toBe('test-net');
      expect(request.env).toEqual({
        OPERATION_MODE: 'Sync',
        MEMBER_BATCH_SIZE: '100',
        LOG_LEVEL: 'info',
        LDES: 'https://feeds.example.org/museum',
        SPARQL_ENDPOINT: TARGET_ENDPOINT,
        TARGET_GRAPH: 'urn:feedyard:museum',
        SHAPE: '',
        FOLLOW: 'true',
        MATERIALIZE: 'false',
        ORDER: 'none',
        LAST_VERSION_ONLY: 'false',
        FAILURE_IS_FATAL: 'false',
        POLLING_FREQUENCY: '120000',
        CONCURRENT_FETCHES: '10',
        QUERY_TIMEOUT: '1800',
        FOR_VIRTUOSO: 'false',
      });
    });

    it('should pass optional fields only when set', () => {
      const spec = makeSpec('museum', {
        targetGraph: 'http://example.org/graphs/museum',
        after: '2024-01-01T00:00:00.000Z',
        accessToken: 'test-secret',
        perfName: 'run-1',
      });

      const { env } = createLauncher().buildLaunchRequest(spec);

      expect(env.TARGET_GRAPH).toBe('http://example.org/graphs/museum');
      expect(env.AFTER).toBe('2024-01-01T00:00:00.000Z');
      expect(env.ACCESS_TOKEN).toBe('test-secret');
      expect(env.PERF_NAME).toBe('run-1');
      expect('BEFORE' in env).toBe(false);
    });

    it('should label the worker with group, feed, hash and file', () => {
      const spec = makeSpec('museum');

      const request = createLauncher().buildLaunchRequest(spec);

      expect(request.labels).toEqual({
        'feedyard.group': 'feedyard',
        'feedyard.feed': 'museum',
        'feedyard.spec-hash': spec.hash,
        'feedyard.config-file': 'museum.yaml',
      });
      expect(request.mounts).toEqual([{ source: '/host/state/museum', target: '/state', readOnly: false }]);
    });

    it('should add compose labels when a compose project is configured', () => {
      const request = createLauncher({ composeProject: 'stack' }).buildLaunchRequest(makeSpec('museum'));

      expect(request.labels['com.docker.compose.project']).toBe('stack');
      expect(request.labels['com.docker.compose.service']).toBe('feed-worker-museum');
    });

    it('should give equal requests for equal specs', () => {
      const launcher = createLauncher();
      expect(launcher.buildLaunchRequest(makeSpec('a'))).toEqual(launcher.buildLaunchRequest(makeSpec('a')));
    });
  });

  describe('launch', () => {
    it('should start the worker and confirm it is running', async () => {
      const outcome = await createLauncher().launch(makeSpec('a'));

      expect(outcome.ok).toBe(true);
      expect(outcome.runtimeId).toBe('mem-1');
      expect(runtime.runningNames()).toEqual(['feed-worker-a']);
      expect(existsSync(join(stateRoot, 'a'))).toBe(true);
      expect(runtime.calls.map((c) => `${c.operation} ${c.target}`)).toEqual([
        'inspect feed-worker-a',
        'launch feed-worker-a',
        'inspect mem-1',
      ]);
    });

    it('should remove a stale worker with the same name first', async () => {
      runtime.seed({ name: 'feed-worker-a', state: 'exited', labels: {}, startedAt: null, exitCode: 0 });

      const outcome = await createLauncher().launch(makeSpec('a'));

      expect(outcome).toMatchObject({ ok: true, runtimeId: 'mem-2' });
      expect(runtime.callsOf('remove')).toEqual(['mem-1']);
    });

    it('should report a worker that exits during startup with its output', async () => {
      runtime.setLaunchBehavior('feed-worker-a', 'exit');

      const outcome = await createLauncher().launch(makeSpec('a'));

      if (outcome.ok) throw new Error('expected launch to fail');
      expect(outcome.runtimeId).toBe('mem-1');
      expect(outcome.error).toBeInstanceOf(LaunchError);
      expect(outcome.error.message).toBe('Worker for feed "a" exited during startup (exit code 1)');
      expect(outcome.error.diagnostics).toBe('feed-worker-a starting\nfatal: could not reach source');
      expect(runtime.workerByName('feed-worker-a')).toBeUndefined();
    });

    it('should save worker output to the diagnostics directory', async () => {
      const diagnosticsDir = join(stateRoot, 'diagnostics');
      runtime.setLaunchBehavior('feed-worker-a', 'exit');

      await createLauncher({ worker: { diagnosticsDir } }).launch(makeSpec('a'));

      const files = readdirSync(diagnosticsDir);
      expect(files).toHaveLength(1);
      expect(files[0]).toMatch(/^a_.+\.log$/);
      expect(readFileSync(join(diagnosticsDir, files[0]), 'utf-8'))
        .toBe('feed-worker-a starting\nfatal: could not reach source');
    });

    it('should report a launch the runtime rejects', async () => {
      runtime.setLaunchBehavior('feed-worker-a', 'reject');

      const outcome = await createLauncher().launch(makeSpec('a'));

      if (outcome.ok) throw new Error('expected launch to fail');
      expect(outcome.runtimeId).toBeNull();
      expect(outcome.error.message).toBe(
        'Launch of "a" failed: launch feed-worker-a failed: image example/feed-worker:test could not be started',
      );
      expect(outcome.error.diagnostics).toBe('');
    });
  });

  describe('stop', () => {
    it('should retry a failing stop and then remove the worker', async () => {
      const launcher = createLauncher();
      await launcher.launch(makeSpec('a'));
      runtime.failNext('stop', 2);

      const outcome = await launcher.stop('a', 'mem-1');

      expect(outcome).toEqual({ ok: true });
      expect(runtime.callsOf('stop')).toEqual(['mem-1', 'mem-1', 'mem-1']);
      expect(runtime.callsOf('remove')).toEqual(['mem-1']);
      expect(runtime.workerByName('feed-worker-a')).toBeUndefined();
    });

    it('should give up once retries are exhausted', async () => {
      const launcher = createLauncher();
      await launcher.launch(makeSpec('a'));
      runtime.failNext('stop', 3);

      const outcome = await launcher.stop('a', 'mem-1');

      expect(outcome).toEqual({ ok: false, error: 'stop mem-1 failed: stop failed' });
      expect(runtime.callsOf('remove')).toEqual([]);
    });

    it('should keep the stopped worker when removal is disabled', async () => {
      const launcher = createLauncher({ worker: { remove: false } });
      await launcher.launch(makeSpec('a'));

      await launcher.stop('a', 'mem-1');

      expect(runtime.workerByName('feed-worker-a')?.state).toBe('exited');
      expect(runtime.callsOf('remove')).toEqual([]);
    });
  });

  it('should list only workers in its group', async () => {
    const launcher = createLauncher();
    await launcher.launch(makeSpec('a'));
    runtime.seed({ name: 'unrelated', state: 'running', labels: { 'feedyard.group': 'other' }, startedAt: null, exitCode: null });

    const workers = await launcher.listWorkers();

    expect(workers.map((w) => w.name)).toEqual(['feed-worker-a']);
  });
});
