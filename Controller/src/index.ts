#!/usr/bin/env node

import { getConfig, withHostPlacement } from './config/index.js';
import { getEnvString } from '@feedyard/shared/Utils/config.js';
import { logger } from '@feedyard/shared/Utils/logger.js';
import { FeedController, LockManager, ShutdownCoordinator, type LockToken } from './core/index.js';
import { DockerRuntimeClient } from './runtime/docker-runtime.js';
import { InMemoryRuntimeClient } from './runtime/memory-runtime.js';
import type { RuntimeClient } from './runtime/types.js';
import { LockError } from './utils/errors.js';

async function main(): Promise<void> {
  let config = getConfig();
  logger.setLevel(config.logLevel);

  logger.info('Starting feed controller', {
    feedConfigDir: config.feedConfigDir,
    group: config.groupLabel,
    runtime: config.runtime,
  });

  const lockManager = new LockManager();
  let token: LockToken;
  try {
    token = await lockManager.acquire({
      path: config.lock.path,
      retries: config.lock.retries,
      backoffMs: config.lock.backoffMs,
    });
  } catch (error) {
    if (error instanceof LockError) {
      logger.error(`Another controller owns ${config.feedConfigDir}: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  let runtime: RuntimeClient;
  if (config.runtime === 'memory') {
    runtime = new InMemoryRuntimeClient();
  } else {
    const docker = DockerRuntimeClient.fromSocket(config.dockerSocket);
    const { network, composeProject } = config.inheritPlacement;
    if (network || composeProject) {
      // Inside a container HOSTNAME is the container id
      config = withHostPlacement(config, await docker.describeHost(getEnvString('HOSTNAME')));
    }
    runtime = docker;
  }

  const controller = new FeedController(runtime, config);
  const coordinator = new ShutdownCoordinator(controller, {
    graceMs: config.timing.shutdownGraceMs,
    onExit: () => {
      lockManager.release(token);
    },
  });
  coordinator.install();

  try {
    await controller.start();
  } catch (error) {
    logger.error('Failed to start feed controller', { error });
    lockManager.release(token);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error('Unhandled error', { error });
  process.exit(1);
});
