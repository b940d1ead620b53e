import { z } from 'zod';
import { FEED_NAME_PATTERN } from './feed-defaults.js';

// ─── Controller configuration ───────────────────────────────────

const labelValue = z.string().regex(/^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/, 'Must be a valid label value');

export const TimingConfigSchema = z.object({
  fallbackPollIntervalMs: z.number().int().min(100).default(30000),
  launchTimeoutMs: z.number().int().positive().default(10000),
  launchSettleMs: z.number().int().min(0).default(2000),
  launchPollMs: z.number().int().positive().default(250),
  stopTimeoutSeconds: z.number().int().min(0).default(10),
  shutdownGraceMs: z.number().int().positive().default(30000),
  configDebounceMs: z.number().int().min(0).default(1500),
  runtimeCallTimeoutMs: z.number().int().positive().default(30000),
});

export type TimingConfig = z.infer<typeof TimingConfigSchema>;

export const LockConfigSchema = z.object({
  path: z.string().min(1),
  retries: z.number().int().min(0).default(10),
  backoffMs: z.number().int().min(0).default(1000),
});

export type LockConfig = z.infer<typeof LockConfigSchema>;

export const RetryConfigSchema = z.object({
  attempts: z.number().int().min(1).default(3),
  delayMs: z.number().int().min(0).default(1000),
});

export type RetryConfig = z.infer<typeof RetryConfigSchema>;

export const WorkerConfigSchema = z.object({
  image: z.string().min(1).default('ghcr.io/rdf-connect/ldes2sparql:latest'),
  network: z.string().min(1).default('feedyard_default'),
  namePrefix: labelValue.default('feed-worker'),
  logLevel: z.string().min(1).default('info'),
  stateRoot: z.string().min(1).default('./state'),
  /** State root as the runtime host sees it (bind mount source) */
  hostStateRoot: z.string().min(1),
  remove: z.boolean().default(true),
  diagnosticsDir: z.string().min(1).optional(),
  diagnosticTailLines: z.number().int().positive().default(50),
});

export type WorkerConfig = z.infer<typeof WorkerConfigSchema>;

/** Settings left unset, to be taken from the controller's own container when it runs in one */
export const InheritPlacementSchema = z.object({
  network: z.boolean().default(false),
  composeProject: z.boolean().default(false),
});

export type InheritPlacement = z.infer<typeof InheritPlacementSchema>;

export const ConfigSchema = z.object({
  feedConfigDir: z.string().min(1).default('./feeds'),
  groupLabel: labelValue.default('feedyard'),
  composeProject: labelValue.optional(),
  inheritPlacement: InheritPlacementSchema.default({}),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  runtime: z.enum(['docker', 'memory']).default('docker'),
  dockerSocket: z.string().min(1).default('/var/run/docker.sock'),
  worker: WorkerConfigSchema,
  lock: LockConfigSchema,
  timing: TimingConfigSchema,
  retry: RetryConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

// ─── Feed files ─────────────────────────────────────────────────

// YAML gives real booleans, but quoted "true"/"false" show up in hand-written files
const booleanish = z
  .union([z.boolean(), z.enum(['true', 'false', 'True', 'False'])])
  .transform((value) => (typeof value === 'boolean' ? value : value.toLowerCase() === 'true'));

const seconds = z.coerce.number().positive();

// YAML parses unquoted timestamps into Date objects
const timestamp = z.union([z.string(), z.date()]).transform((value, ctx) => {
  const date = value instanceof Date ? value : new Date(value);
  if (Number.isNaN(date.getTime())) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid timestamp' });
    return z.NEVER;
  }
  return date.toISOString();
});

const envValue = z.union([z.string(), z.number(), z.boolean()]).transform(String);

export const FeedFileSchema = z
  .object({
    name: z.string().regex(FEED_NAME_PATTERN, 'Must be lowercase letters, digits, "." or "-"').optional(),
    url: z.string().url().optional(),
    source: z.string().url().optional(),
    sparql_endpoint: z.string().url().optional(),
    target: z.string().url().optional(),
    polling_interval: seconds.optional(),
    shape: z.string().optional(),
    target_graph: z.string().min(1).optional(),
    follow: booleanish.optional(),
    materialize: booleanish.optional(),
    order: z.enum(['none', 'asc', 'desc']).optional(),
    last_version_only: booleanish.optional(),
    failure_is_fatal: booleanish.optional(),
    concurrent_fetches: z.coerce.number().int().positive().optional(),
    query_timeout: seconds.optional(),
    for_virtuoso: booleanish.optional(),
    before: timestamp.optional(),
    after: timestamp.optional(),
    access_token: z.string().min(1).optional(),
    perf_name: z.string().min(1).optional(),
    environment: z.record(envValue).optional(),
  })
  .superRefine((data, ctx) => {
    if (data.url === undefined && data.source === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['url'], message: 'Required (url or source)' });
    }
    if (data.sparql_endpoint === undefined && data.target === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['sparql_endpoint'],
        message: 'Required (sparql_endpoint or target)',
      });
    }
  });

export type FeedFile = z.infer<typeof FeedFileSchema>;
