import { loadEnvSafely } from '@feedyard/shared/Utils/env.js';
loadEnvSafely(import.meta.url, 2);

import { resolve } from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import type { HostPlacement } from '../runtime/types.js';
import { ConfigurationError } from '@feedyard/shared/Types/errors.js';
import { logger, parseLogLevel } from '@feedyard/shared/Utils/logger.js';
import {
  expandPath,
  getEnvString,
  getEnvNumber,
  getEnvBoolean,
} from '@feedyard/shared/Utils/config.js';

function resolvePath(value: string): string {
  return resolve(expandPath(value));
}

export function loadConfig(): Config {
  const feedConfigDir = resolvePath(getEnvString('FEED_CONFIG_DIR', './feeds'));
  const stateRoot = resolvePath(getEnvString('STATE_ROOT', './state'));
  const rawLogLevel = getEnvString('LOG_LEVEL', 'info');
  const logLevel = parseLogLevel(rawLogLevel) ?? rawLogLevel;
  const diagnosticsDir = getEnvString('DIAGNOSTICS_DIR');
  const network = getEnvString('WORKER_NETWORK');
  const composeProject = getEnvString('COMPOSE_PROJECT_NAME');

  const rawConfig = {
    feedConfigDir,
    groupLabel: getEnvString('GROUP_LABEL', 'feedyard'),
    composeProject: composeProject || undefined,
    inheritPlacement: {
      network: !network,
      composeProject: !composeProject,
    },
    logLevel,
    runtime: getEnvString('RUNTIME', 'docker').toLowerCase(),
    dockerSocket: getEnvString('DOCKER_SOCKET', '/var/run/docker.sock'),

    worker: {
      image: getEnvString('WORKER_IMAGE', 'ghcr.io/rdf-connect/ldes2sparql:latest'),
      network: network || 'feedyard_default',
      namePrefix: getEnvString('WORKER_NAME_PREFIX', 'feed-worker'),
      // Workers expect lowercase level names
      logLevel: getEnvString('WORKER_LOG_LEVEL', rawLogLevel).toLowerCase(),
      stateRoot,
      // When the controller itself runs in a container, the host sees the state root elsewhere
      hostStateRoot: getEnvString('HOST_STATE_ROOT') || stateRoot,
      remove: getEnvBoolean('REMOVE_WORKERS', true),
      diagnosticsDir: diagnosticsDir ? resolvePath(diagnosticsDir) : undefined,
      diagnosticTailLines: getEnvNumber('DIAGNOSTIC_TAIL_LINES', 50),
    },

    lock: {
      path: resolvePath(getEnvString('LOCK_FILE', resolve(feedConfigDir, '.controller.lock'))),
      retries: getEnvNumber('LOCK_RETRIES', 10),
      backoffMs: getEnvNumber('LOCK_BACKOFF_MS', 1000),
    },

    timing: {
      fallbackPollIntervalMs: getEnvNumber('FALLBACK_POLL_INTERVAL_MS', 30000),
      launchTimeoutMs: getEnvNumber('LAUNCH_TIMEOUT_MS', 10000),
      launchSettleMs: getEnvNumber('LAUNCH_SETTLE_MS', 2000),
      launchPollMs: getEnvNumber('LAUNCH_POLL_MS', 250),
      stopTimeoutSeconds: getEnvNumber('STOP_TIMEOUT_SECONDS', 10),
      shutdownGraceMs: getEnvNumber('SHUTDOWN_GRACE_MS', 30000),
      configDebounceMs: getEnvNumber('CONFIG_DEBOUNCE_MS', 1500),
      runtimeCallTimeoutMs: getEnvNumber('RUNTIME_CALL_TIMEOUT_MS', 30000),
    },

    retry: {
      attempts: getEnvNumber('RUNTIME_RETRY_ATTEMPTS', 3),
      delayMs: getEnvNumber('RUNTIME_RETRY_DELAY_MS', 1000),
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.flatten();
    logger.error('Configuration validation failed', errors);
    throw new ConfigurationError('Invalid configuration', errors);
  }

  logger.info('Configuration loaded successfully', {
    feedConfigDir: result.data.feedConfigDir,
    runtime: result.data.runtime,
    image: result.data.worker.image,
    network: result.data.worker.network,
  });
  return result.data;
}

/**
 * Fill the settings left unset from the container the controller runs in,
 * so workers join the same network and compose project.
 */
export function withHostPlacement(config: Config, placement: HostPlacement | null): Config {
  if (!placement) return config;
  const { inheritPlacement } = config;

  const network = inheritPlacement.network && placement.network ? placement.network : config.worker.network;
  const composeProject = inheritPlacement.composeProject && placement.composeProject
    ? placement.composeProject
    : config.composeProject;

  if (network !== config.worker.network || composeProject !== config.composeProject) {
    logger.info('Using placement of the controller container', { network, composeProject });
  }
  return { ...config, composeProject, worker: { ...config.worker, network } };
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

export {
  type Config,
  type WorkerConfig,
  type TimingConfig,
  type LockConfig,
  type InheritPlacement,
  type RetryConfig,
} from './schema.js';
