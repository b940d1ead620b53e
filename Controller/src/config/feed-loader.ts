/**
 * Loads feed definitions from a directory of YAML files.
 *
 * - One file maps to one FeedSpec, keyed by its declared or filename-derived name
 * - Each file is validated individually; one bad file doesn't affect the rest
 * - Reports per-file FeedConfigErrors alongside valid specs
 * - Duplicate names: the file that sorts later is rejected
 */
import { readFileSync, readdirSync, existsSync } from 'node:fs';
import { basename, extname, join } from 'node:path';
import { createHash } from 'node:crypto';
import { parse as parseYaml, YAMLParseError } from 'yaml';
import type { ZodError } from 'zod';
import { logger } from '@feedyard/shared/Utils/logger.js';
import { errorMessage } from '@feedyard/shared/Types/errors.js';
import { FeedFileSchema, type FeedFile } from './schema.js';
import {
  FEED_DEFAULTS,
  FEED_FILE_EXTENSIONS,
  FEED_NAME_PATTERN,
  RESERVED_WORKER_ENV,
} from './feed-defaults.js';
import { FeedConfigError } from '../utils/errors.js';
import type { FeedSpec } from '../core/types.js';

const log = logger.child('feed-loader');

export type FeedParseResult =
  | { ok: true; spec: FeedSpec }
  | { ok: false; error: FeedConfigError };

export interface FeedScanResult {
  specs: Map<string, FeedSpec>;
  errors: FeedConfigError[];
}

export function isFeedFile(file: string): boolean {
  const name = basename(file);
  if (name.startsWith('.')) return false;
  const ext = extname(name).toLowerCase();
  return FEED_FILE_EXTENSIONS.some((e) => e === ext);
}

/**
 * "Museum_Objects v2.yaml" -> "museum-objects-v2"
 */
export function feedNameFromFile(file: string): string {
  const name = basename(file);
  return name
    .slice(0, name.length - extname(name).length)
    .toLowerCase()
    .replace(/[_\s]+/g, '-');
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalize);
  if (typeof value === 'object' && value !== null) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const entry: unknown = Reflect.get(value, key);
      if (entry !== undefined) sorted[key] = canonicalize(entry);
    }
    return sorted;
  }
  return value;
}

/**
 * Content hash over every field that affects worker behavior:
 * SHA-256 of the key-sorted JSON, first 16 hex chars.
 */
export function computeSpecHash(spec: Omit<FeedSpec, 'hash' | 'sourceFile'>): string {
  return createHash('sha256')
    .update(JSON.stringify(canonicalize(spec)))
    .digest('hex')
    .slice(0, 16);
}

function formatIssues(error: ZodError): string {
  const flat = error.flatten();
  return Object.entries(flat.fieldErrors)
    .map(([field, msgs]) => `${field}: ${(msgs ?? []).join(', ')}`)
    .join('; ') || flat.formErrors.join('; ') || 'Invalid feed definition';
}

function declaredName(raw: unknown): string | undefined {
  if (typeof raw !== 'object' || raw === null || !('name' in raw)) return undefined;
  return typeof raw.name === 'string' ? raw.name : undefined;
}

function filterEnvironment(name: string, environment: Record<string, string>): Record<string, string> {
  const allowed: Record<string, string> = {};
  for (const [key, value] of Object.entries(environment)) {
    if (RESERVED_WORKER_ENV.has(key)) {
      log.warn(`Feed "${name}": environment key ${key} is derived from feed fields and cannot be overridden`);
      continue;
    }
    allowed[key] = value;
  }
  return allowed;
}

function toSpec(name: string, file: string, data: FeedFile): FeedSpec {
  // superRefine guarantees one of each pair is present
  const sourceUrl = data.url ?? data.source ?? '';
  const targetEndpoint = data.sparql_endpoint ?? data.target ?? '';

  const fields: Omit<FeedSpec, 'hash' | 'sourceFile'> = {
    name,
    sourceUrl,
    targetEndpoint,
    pollingIntervalSeconds: data.polling_interval ?? FEED_DEFAULTS.pollingIntervalSeconds,
    shape: data.shape ?? FEED_DEFAULTS.shape,
    targetGraph: data.target_graph,
    follow: data.follow ?? FEED_DEFAULTS.follow,
    materialize: data.materialize ?? FEED_DEFAULTS.materialize,
    order: data.order ?? FEED_DEFAULTS.order,
    lastVersionOnly: data.last_version_only ?? FEED_DEFAULTS.lastVersionOnly,
    failureIsFatal: data.failure_is_fatal ?? FEED_DEFAULTS.failureIsFatal,
    concurrentFetches: data.concurrent_fetches ?? FEED_DEFAULTS.concurrentFetches,
    queryTimeoutSeconds: data.query_timeout ?? FEED_DEFAULTS.queryTimeoutSeconds,
    forVirtuoso: data.for_virtuoso ?? FEED_DEFAULTS.forVirtuoso,
    before: data.before,
    after: data.after,
    accessToken: data.access_token,
    perfName: data.perf_name,
    environment: filterEnvironment(name, data.environment ?? {}),
  };

  return { ...fields, sourceFile: file, hash: computeSpecHash(fields) };
}

/**
 * Parse the text of one feed file. `file` is the basename, used for the
 * default name and in error messages.
 */
export function parseFeedContent(content: string, file: string): FeedParseResult {
  const fallbackName = feedNameFromFile(file);
  const fail = (message: string, feedName = fallbackName, details?: unknown): FeedParseResult => ({
    ok: false,
    error: new FeedConfigError(`${file}: ${message}`, feedName, file, details),
  });

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    const message = error instanceof YAMLParseError ? error.message : errorMessage(error);
    return fail(`invalid YAML (${message})`);
  }

  if (raw === null || raw === undefined) {
    return fail('file is empty');
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    return fail('top level must be a mapping');
  }

  const feedName = declaredName(raw) ?? fallbackName;
  const result = FeedFileSchema.safeParse(raw);
  if (!result.success) {
    return fail(formatIssues(result.error), feedName, result.error.flatten());
  }

  if (!FEED_NAME_PATTERN.test(feedName)) {
    return fail(`"${feedName}" is not a valid feed name; set "name" explicitly`, feedName);
  }

  return { ok: true, spec: toSpec(feedName, file, result.data) };
}

export function parseFeedFile(path: string): FeedParseResult {
  const file = basename(path);
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    return {
      ok: false,
      error: new FeedConfigError(`${file}: unreadable (${errorMessage(error)})`, feedNameFromFile(file), file, error),
    };
  }
  return parseFeedContent(content, file);
}

/**
 * Load every feed file in `dir`. A missing directory yields an empty result.
 */
export function scanFeedDirectory(dir: string): FeedScanResult {
  const result: FeedScanResult = { specs: new Map(), errors: [] };

  if (!existsSync(dir)) {
    log.warn('Feed directory does not exist', { dir });
    return result;
  }

  const files = readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && isFeedFile(entry.name))
    .map((entry) => entry.name)
    .sort();

  for (const file of files) {
    const parsed = parseFeedFile(join(dir, file));
    if (!parsed.ok) {
      result.errors.push(parsed.error);
      continue;
    }

    const existing = result.specs.get(parsed.spec.name);
    if (existing) {
      result.errors.push(new FeedConfigError(
        `${file}: feed name "${parsed.spec.name}" is already defined in ${existing.sourceFile}`,
        parsed.spec.name,
        file,
      ));
      continue;
    }

    result.specs.set(parsed.spec.name, parsed.spec);
  }

  return result;
}
