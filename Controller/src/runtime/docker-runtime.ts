/**
 * DockerRuntimeClient - RuntimeClient backed by the Docker Engine API (dockerode).
 *
 * Every call maps onto a single Engine request. "Already stopped" and
 * "no such container" answers are treated as success for stop/remove so the
 * controller can call them idempotently.
 */

import Docker from 'dockerode';
import { Readable } from 'node:stream';
import { StringDecoder } from 'node:string_decoder';
import { z } from 'zod';
import { logger } from '@feedyard/shared/Utils/logger.js';
import {
  classifyAction,
  type HostPlacement,
  type LabelFilter,
  type LaunchRequest,
  type RuntimeClient,
  type RuntimeEvent,
  type RuntimeEventHandlers,
  type RuntimeState,
  type RuntimeSubscription,
  type WorkerInfo,
} from './types.js';

const KNOWN_STATES: readonly RuntimeState[] = [
  'created', 'running', 'restarting', 'paused', 'exited', 'dead', 'removing',
];

function toRuntimeState(value: string): RuntimeState {
  const normalized = value.toLowerCase();
  return KNOWN_STATES.find((s) => s === normalized) ?? 'dead';
}

function statusCodeOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'statusCode' in error) {
    return typeof error.statusCode === 'number' ? error.statusCode : undefined;
  }
  return undefined;
}

function labelFilterQuery(filter: LabelFilter): string[] {
  return Object.entries(filter).map(([key, value]) => `${key}=${value}`);
}

// Shape of one line of the Engine's /events stream (only the fields we read)
const DockerEventSchema = z.object({
  Type: z.string().optional(),
  Action: z.string().optional(),
  status: z.string().optional(),
  time: z.number().optional(),
  timeNano: z.number().optional(),
  Actor: z.object({
    ID: z.string(),
    Attributes: z.record(z.string()).default({}),
  }),
});

/**
 * Split a non-TTY log payload into text. Docker prefixes each frame with an
 * 8-byte header: stream type, three zero bytes, big-endian payload length.
 */
export function demuxLogs(buffer: Buffer): string {
  const chunks: string[] = [];
  let offset = 0;

  while (offset + 8 <= buffer.length) {
    const streamType = buffer[offset];
    const frameLength = buffer.readUInt32BE(offset + 4);
    const isHeader = streamType <= 2
      && buffer[offset + 1] === 0
      && buffer[offset + 2] === 0
      && buffer[offset + 3] === 0
      && offset + 8 + frameLength <= buffer.length;
    if (!isHeader) {
      // TTY workers have no framing
      break;
    }
    chunks.push(buffer.subarray(offset + 8, offset + 8 + frameLength).toString('utf-8'));
    offset += 8 + frameLength;
  }

  if (offset < buffer.length) {
    chunks.push(buffer.subarray(offset).toString('utf-8'));
  }
  return chunks.join('');
}

export class DockerRuntimeClient implements RuntimeClient {
  private log = logger.child('docker-runtime');

  constructor(private docker: Docker) {}

  static fromSocket(socketPath: string): DockerRuntimeClient {
    return new DockerRuntimeClient(new Docker({ socketPath }));
  }

  async launch(request: LaunchRequest): Promise<string> {
    const binds = request.mounts.map(
      (m) => `${m.source}:${m.target}${m.readOnly ? ':ro' : ''}`,
    );
    const env = Object.entries(request.env).map(([key, value]) => `${key}=${value}`);

    this.log.debug(`Creating container "${request.name}"`, {
      image: request.image,
      network: request.network,
      binds,
    });

    const container = await this.docker.createContainer({
      name: request.name,
      Image: request.image,
      Env: env,
      Labels: request.labels,
      HostConfig: {
        NetworkMode: request.network,
        Binds: binds,
      },
    });
    await container.start();
    return container.id;
  }

  async stop(runtimeId: string, timeoutSeconds: number): Promise<void> {
    try {
      await this.docker.getContainer(runtimeId).stop({ t: timeoutSeconds });
    } catch (error) {
      const code = statusCodeOf(error);
      // 304: already stopped, 404: gone
      if (code === 304 || code === 404) return;
      throw error;
    }
  }

  async remove(runtimeId: string): Promise<void> {
    try {
      await this.docker.getContainer(runtimeId).remove({ force: true });
    } catch (error) {
      const code = statusCodeOf(error);
      // 404: gone, 409: removal already in progress
      if (code === 404 || code === 409) return;
      throw error;
    }
  }

  async inspect(runtimeId: string): Promise<WorkerInfo | null> {
    try {
      const info = await this.docker.getContainer(runtimeId).inspect();
      return {
        runtimeId: info.Id,
        name: info.Name.replace(/^\//, ''),
        state: toRuntimeState(info.State.Status),
        labels: info.Config.Labels ?? {},
        startedAt: info.State.StartedAt || null,
        exitCode: info.State.Running ? null : info.State.ExitCode,
      };
    } catch (error) {
      if (statusCodeOf(error) === 404) return null;
      throw error;
    }
  }

  /**
   * Network and compose project of the container with this id (the
   * controller's own when given its HOSTNAME). Null outside a container.
   */
  async describeHost(containerId: string | undefined): Promise<HostPlacement | null> {
    if (!containerId) return null;
    try {
      const info = await this.docker.getContainer(containerId).inspect();
      const network = Object.keys(info.NetworkSettings.Networks ?? {})[0] ?? null;
      const composeProject = info.Config.Labels?.['com.docker.compose.project'] ?? null;
      this.log.debug('Detected controller container placement', { containerId, network, composeProject });
      return { network, composeProject };
    } catch (error) {
      if (statusCodeOf(error) !== 404) {
        this.log.warn('Could not inspect the controller container', { containerId, error });
      }
      return null;
    }
  }

  async list(filter: LabelFilter): Promise<WorkerInfo[]> {
    const containers = await this.docker.listContainers({
      all: true,
      filters: JSON.stringify({ label: labelFilterQuery(filter) }),
    });

    return containers.map((c) => ({
      runtimeId: c.Id,
      name: (c.Names[0] ?? c.Id).replace(/^\//, ''),
      state: toRuntimeState(c.State),
      labels: c.Labels ?? {},
      startedAt: null,
      exitCode: null,
    }));
  }

  async logs(runtimeId: string, tailLines: number): Promise<string> {
    const buffer = await this.docker.getContainer(runtimeId).logs({
      stdout: true,
      stderr: true,
      tail: tailLines,
      follow: false,
    });
    return demuxLogs(buffer);
  }

  async subscribe(filter: LabelFilter, handlers: RuntimeEventHandlers): Promise<RuntimeSubscription> {
    const stream = await this.docker.getEvents({
      filters: JSON.stringify({ type: ['container'], label: labelFilterQuery(filter) }),
    });

    // chunks can split a multi-byte character
    const decoder = new StringDecoder('utf8');
    let pending = '';
    let closed = false;

    stream.on('data', (chunk: Buffer | string) => {
      pending += typeof chunk === 'string' ? chunk : decoder.write(chunk);
      const lines = pending.split('\n');
      pending = lines.pop() ?? '';
      for (const line of lines) {
        const event = this.parseEvent(line);
        if (event) handlers.onEvent(event);
      }
    });
    stream.on('error', (error: Error) => {
      if (!closed) handlers.onError(error);
    });
    stream.on('end', () => {
      if (!closed) handlers.onEnd();
    });

    return {
      close: () => {
        closed = true;
        if (stream instanceof Readable) {
          stream.destroy();
        } else {
          stream.removeAllListeners();
        }
      },
    };
  }

  private parseEvent(line: string): RuntimeEvent | null {
    const trimmed = line.trim();
    if (!trimmed) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(trimmed);
    } catch (error) {
      this.log.warn('Ignoring unparseable runtime event', { line: trimmed.slice(0, 200), error });
      return null;
    }

    const parsed = DockerEventSchema.safeParse(raw);
    if (!parsed.success || (parsed.data.Type && parsed.data.Type !== 'container')) {
      return null;
    }

    const { Actor } = parsed.data;
    const action = parsed.data.Action ?? parsed.data.status ?? '';
    const exitCode = Actor.Attributes.exitCode !== undefined
      ? parseInt(Actor.Attributes.exitCode, 10)
      : undefined;
    const time = parsed.data.timeNano !== undefined
      ? Math.floor(parsed.data.timeNano / 1_000_000)
      : (parsed.data.time ?? 0) * 1000;

    return {
      runtimeId: Actor.ID,
      name: Actor.Attributes.name ?? Actor.ID,
      type: classifyAction(action),
      labels: Actor.Attributes,
      exitCode: exitCode !== undefined && !Number.isNaN(exitCode) ? exitCode : undefined,
      action,
      time,
    };
  }
}
