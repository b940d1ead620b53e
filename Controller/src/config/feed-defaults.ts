/**
 * Defaults table for feed files.
 *
 * Every optional feed field lands in the worker environment, either with the
 * value from the file or with the default below. Durations are written in
 * seconds in feed files. POLLING_FREQUENCY is handed to the worker in
 * milliseconds (seconds x 1000); QUERY_TIMEOUT stays in seconds because
 * that is the unit the worker reads.
 *
 * | feed key            | default                  | worker variable    |
 * |---------------------|--------------------------|--------------------|
 * | url / source        | required                 | LDES               |
 * | sparql_endpoint     | required                 | SPARQL_ENDPOINT    |
 * | polling_interval    | 60 s                     | POLLING_FREQUENCY  |
 * | shape               | ""                       | SHAPE              |
 * | target_graph        | urn:<group>:<feed name>  | TARGET_GRAPH       |
 * | follow              | true                     | FOLLOW             |
 * | materialize         | false                    | MATERIALIZE        |
 * | order               | none                     | ORDER              |
 * | last_version_only   | false                    | LAST_VERSION_ONLY  |
 * | failure_is_fatal    | false                    | FAILURE_IS_FATAL   |
 * | concurrent_fetches  | 10                       | CONCURRENT_FETCHES |
 * | query_timeout       | 1800 s                   | QUERY_TIMEOUT      |
 * | for_virtuoso        | false                    | FOR_VIRTUOSO       |
 * | before / after      | unset                    | BEFORE / AFTER     |
 * | access_token        | unset                    | ACCESS_TOKEN       |
 * | perf_name           | unset                    | PERF_NAME          |
 */

import type { FeedOrder } from '../core/types.js';

export const FEED_DEFAULTS = {
  pollingIntervalSeconds: 60,
  shape: '',
  follow: true,
  materialize: false,
  order: 'none' satisfies FeedOrder,
  lastVersionOnly: false,
  failureIsFatal: false,
  concurrentFetches: 10,
  queryTimeoutSeconds: 1800,
  forVirtuoso: false,
} as const;

/**
 * Worker variables that are always set but that a feed's `environment`
 * map may override. LOG_LEVEL is filled in from the controller config.
 */
export const OVERRIDABLE_WORKER_DEFAULTS: Readonly<Record<string, string>> = {
  OPERATION_MODE: 'Sync',
  MEMBER_BATCH_SIZE: '500',
};

/** Variables derived from feed fields; `environment` cannot replace them. */
export const RESERVED_WORKER_ENV: ReadonlySet<string> = new Set([
  'LDES',
  'SPARQL_ENDPOINT',
  'TARGET_GRAPH',
  'SHAPE',
  'FOLLOW',
  'MATERIALIZE',
  'ORDER',
  'LAST_VERSION_ONLY',
  'FAILURE_IS_FATAL',
  'POLLING_FREQUENCY',
  'CONCURRENT_FETCHES',
  'QUERY_TIMEOUT',
  'FOR_VIRTUOSO',
  'BEFORE',
  'AFTER',
  'ACCESS_TOKEN',
  'PERF_NAME',
]);

export const MS_PER_SECOND = 1000;

export function secondsToMs(seconds: number): number {
  return Math.round(seconds * MS_PER_SECOND);
}

export function defaultTargetGraph(groupLabel: string, feedName: string): string {
  return `urn:${groupLabel}:${feedName}`;
}

/** Feed names double as worker-name suffixes, so they follow container naming rules. */
export const FEED_NAME_PATTERN = /^[a-z0-9][a-z0-9.-]*$/;

export const FEED_FILE_EXTENSIONS = ['.yaml', '.yml'] as const;
