/**
 * LockManager - single-writer ownership of a feed configuration root.
 *
 * The lock is a JSON record created with O_EXCL ('wx'). A record whose
 * holder process is gone (or that cannot be read) is stale. A stale record is
 * reclaimed by renaming it aside and checking that the moved file is the one
 * judged stale; a live record moved by mistake is linked back.
 *
 * A record naming this process's pid but a holder this process never issued
 * is left over from an earlier run whose pid has been reused, and is stale too.
 */

import { readFileSync, writeFileSync, unlinkSync, mkdirSync, renameSync, linkSync } from 'node:fs';
import { dirname } from 'node:path';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { logger as rootLogger } from '@feedyard/shared/Utils/logger.js';
import { sleep } from '@feedyard/shared/Utils/async.js';
import { errorMessage } from '@feedyard/shared/Types/errors.js';
import { LockError } from '../utils/errors.js';

const LockRecordSchema = z.object({
  holderId: z.string().min(1),
  pid: z.number().int().positive(),
  acquiredAt: z.string(),
});

type LockRecord = z.infer<typeof LockRecordSchema>;

export interface LockToken extends LockRecord {
  path: string;
}

export interface AcquireOptions {
  path: string;
  holderId?: string;
  retries: number;
  backoffMs: number;
}

// Holders issued by this process and not yet released
const liveHolders = new Set<string>();

function errnoOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Signal 0 probes for existence without delivering anything. EPERM means
 * the process exists but belongs to someone else.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    return errnoOf(error) === 'EPERM';
  }
}

function parseRecord(raw: string): LockRecord | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = LockRecordSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export class LockManager {
  private logger = rootLogger.child('lock-manager');

  constructor(private isAlive: (pid: number) => boolean = isProcessAlive) {}

  async acquire(options: AcquireOptions): Promise<LockToken> {
    const record: LockRecord = {
      holderId: options.holderId ?? randomUUID(),
      pid: process.pid,
      acquiredAt: new Date().toISOString(),
    };
    mkdirSync(dirname(options.path), { recursive: true });

    let waits = 0;
    for (;;) {
      if (this.tryCreate(options.path, record)) {
        liveHolders.add(record.holderId);
        this.logger.info('Lock acquired', { path: options.path, holderId: record.holderId });
        return { ...record, path: options.path };
      }

      const raw = this.readRaw(options.path);
      if (raw === null) continue;
      const holder = parseRecord(raw);
      if (holder === null || this.isStale(holder)) {
        this.logger.warn('Removing stale lock', {
          path: options.path,
          holder: holder ?? 'unreadable',
        });
        this.reclaim(options.path, raw);
        continue;
      }

      if (waits >= options.retries) {
        throw new LockError(
          `Lock ${options.path} is held by pid ${holder.pid} (holder ${holder.holderId})`,
          options.path,
          holder,
        );
      }
      waits++;
      this.logger.info(`Lock held by pid ${holder.pid}, retrying (${waits}/${options.retries})`, {
        path: options.path,
      });
      await sleep(options.backoffMs);
    }
  }

  /**
   * Remove the lock only if it still names this holder. Returns whether it was removed.
   */
  release(token: LockToken): boolean {
    const holder = this.readHolder(token.path);
    if (!holder || holder.holderId !== token.holderId) {
      this.logger.warn('Lock no longer held by this controller; leaving it in place', {
        path: token.path,
      });
      return false;
    }
    this.removeFile(token.path);
    liveHolders.delete(token.holderId);
    this.logger.info('Lock released', { path: token.path });
    return true;
  }

  private tryCreate(path: string, record: LockRecord): boolean {
    try {
      writeFileSync(path, JSON.stringify(record), { flag: 'wx' });
      return true;
    } catch (error) {
      if (errnoOf(error) === 'EEXIST') return false;
      throw new LockError(`Cannot create lock ${path}: ${errorMessage(error)}`, path, error);
    }
  }

  private isStale(holder: LockRecord): boolean {
    if (holder.pid === process.pid && !liveHolders.has(holder.holderId)) return true;
    return !this.isAlive(holder.pid);
  }

  /**
   * Move the record judged stale out of the way. If the file moved is no
   * longer that record, another contender got there first and it goes back.
   */
  private reclaim(path: string, staleRaw: string): void {
    const aside = `${path}.${randomUUID()}.stale`;
    try {
      renameSync(path, aside);
    } catch (error) {
      if (errnoOf(error) === 'ENOENT') return;
      throw new LockError(`Cannot reclaim lock ${path}: ${errorMessage(error)}`, path, error);
    }

    const moved = this.readRaw(aside);
    if (moved !== null && moved !== staleRaw) {
      try {
        linkSync(aside, path);
      } catch (error) {
        if (errnoOf(error) !== 'EEXIST') {
          throw new LockError(`Cannot restore lock ${path}: ${errorMessage(error)}`, path, error);
        }
        this.logger.error('Lock replaced while restoring a live record', { path });
      }
    }
    this.removeFile(aside);
  }

  private readHolder(path: string): LockRecord | null {
    const raw = this.readRaw(path);
    return raw === null ? null : parseRecord(raw);
  }

  /** File contents, or null when there is no file */
  private readRaw(path: string): string | null {
    try {
      return readFileSync(path, 'utf-8');
    } catch (error) {
      if (errnoOf(error) === 'ENOENT') return null;
      throw new LockError(`Cannot read lock ${path}: ${errorMessage(error)}`, path, error);
    }
  }

  private removeFile(path: string): void {
    try {
      unlinkSync(path);
    } catch (error) {
      if (errnoOf(error) !== 'ENOENT') throw error;
    }
  }
}
