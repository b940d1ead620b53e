import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { computeSpecHash } from '../../src/config/feed-loader.js';
import type { Config, TimingConfig, WorkerConfig } from '../../src/config/index.js';
import type { FeedSpec } from '../../src/core/types.js';

export const SOURCE_BASE = 'https://feeds.example.org';
export const TARGET_ENDPOINT = 'http://store.example.org/sparql';

type SpecFields = Omit<FeedSpec, 'name' | 'hash' | 'sourceFile'>;

export function makeSpec(name: string, overrides: Partial<SpecFields> = {}): FeedSpec {
  const fields: Omit<FeedSpec, 'hash' | 'sourceFile'> = {
    name,
    sourceUrl: `${SOURCE_BASE}/${name}`,
    targetEndpoint: TARGET_ENDPOINT,
    pollingIntervalSeconds: 60,
    shape: '',
    follow: true,
    materialize: false,
    order: 'none',
    lastVersionOnly: false,
    failureIsFatal: false,
    concurrentFetches: 10,
    queryTimeoutSeconds: 1800,
    forVirtuoso: false,
    environment: {},
    ...overrides,
  };
  return { ...fields, sourceFile: `${name}.yaml`, hash: computeSpecHash(fields) };
}

export interface ConfigOverrides {
  feedConfigDir?: string;
  composeProject?: string;
  worker?: Partial<WorkerConfig>;
  timing?: Partial<TimingConfig>;
}

/** Fast timings so launches confirm on the first inspect. */
export function makeConfig(stateRoot: string, overrides: ConfigOverrides = {}): Config {
  return {
    feedConfigDir: overrides.feedConfigDir ?? join(stateRoot, 'feeds'),
    groupLabel: 'feedyard',
    composeProject: overrides.composeProject,
    inheritPlacement: { network: false, composeProject: false },
    logLevel: 'info',
    runtime: 'memory',
    dockerSocket: '/var/run/docker.sock',
    worker: {
      image: 'example/feed-worker:test',
      network: 'test-net',
      namePrefix: 'feed-worker',
      logLevel: 'info',
      stateRoot,
      hostStateRoot: '/host/state',
      remove: true,
      diagnosticsDir: undefined,
      diagnosticTailLines: 50,
      ...overrides.worker,
    },
    lock: {
      path: join(stateRoot, '.controller.lock'),
      retries: 0,
      backoffMs: 1,
    },
    timing: {
      fallbackPollIntervalMs: 60000,
      launchTimeoutMs: 500,
      launchSettleMs: 0,
      launchPollMs: 5,
      stopTimeoutSeconds: 1,
      shutdownGraceMs: 1000,
      configDebounceMs: 50,
      runtimeCallTimeoutMs: 1000,
      ...overrides.timing,
    },
    retry: {
      attempts: 3,
      delayMs: 0,
    },
  };
}

export function makeTempDir(prefix = 'feedyard-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export function feedYaml(fields: Record<string, string | number | boolean>): string {
  return Object.entries(fields).map(([key, value]) => `${key}: ${String(value)}`).join('\n') + '\n';
}
