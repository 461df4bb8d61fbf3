import { z } from 'zod';
import { readFile } from 'fs/promises';
import { dirname, isAbsolute, resolve } from 'path';
import type { SourcedEntity } from '@conservation-warehouse/types';
import { FatalConfigurationError } from './errors';
import { FileDetectionService } from './utils/fileDetection';
import { getErrorMessage } from './utils/errorUtils';
import type { FilingSection, SourceLocator } from './types';

const sourceSchema = z.object({
  path: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]),
  type: z.enum(['tabular', 'document', 'filing']).optional(),
  requiredColumns: z.array(z.string().min(1)).default([]),
  minPopulated: z.number().int().nonnegative().default(1),
  flatten: z
    .object({
      field: z.string().min(1),
      as: z.string().min(1).optional(),
      whenEmpty: z.enum(['parent', 'skip']).default('skip'),
    })
    .optional(),
  section: z.enum(['summary', 'programs']).optional(),
});

export const DEFAULT_PROGRAM_NAMES: Record<string, string> = {
  '4a': 'Land Protection & Access',
  '4b': 'Hunting Heritage',
  '4c': 'Habitat Stewardship',
  '4d': 'Other Program Services',
};

export const configSchema = z.object({
  store: z.object({
    target: z.string().min(1, 'store.target is required'),
    serviceKey: z.string().min(1).optional(),
  }),
  sources: z
    .object({
      donor: sourceSchema.optional(),
      campaign: sourceSchema.optional(),
      habitat: sourceSchema.optional(),
      project: sourceSchema.optional(),
      donation: sourceSchema.optional(),
      elk_population: sourceSchema.optional(),
      conservation_metric: sourceSchema.optional(),
      financial_filing: sourceSchema.optional(),
      program_service: sourceSchema.optional(),
    })
    .strict()
    .default({}),
  anomalies: z
    .object({
      largeDonationAmount: z.number().positive().default(10000),
      atRiskStatuses: z.array(z.string().min(1)).default(['At Risk']),
      populationDeclinePct: z.number().min(0).max(100).default(10),
    })
    .default({}),
  filing: z
    .object({
      programNames: z.record(z.string()).default(DEFAULT_PROGRAM_NAMES),
      // Extra label synonyms per filing field, tried after the built-in ones
      labels: z.record(z.array(z.string().min(1))).default({}),
    })
    .default({}),
  run: z
    .object({
      timeoutMs: z.number().int().positive().default(300_000),
      lockPath: z.string().min(1).default('.etl-run.lock'),
      staleLockMs: z.number().int().positive().default(6 * 60 * 60 * 1000),
      reportPath: z.string().min(1).optional(),
      fiscalYearStartMonth: z.number().int().min(1).max(12).default(10),
    })
    .default({}),
});

export type EtlConfig = z.infer<typeof configSchema>;
export type EtlConfigInput = z.input<typeof configSchema>;
export type SourceConfig = z.infer<typeof sourceSchema>;

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  return isRecord(value) ? { ...value } : {};
}

// Environment variables win over the file
function applyEnvOverrides(raw: unknown, env: Env): unknown {
  if (!isRecord(raw)) {
    return raw;
  }

  const merged: Record<string, unknown> = { ...raw };
  const store = section(raw, 'store');
  const run = section(raw, 'run');

  if (env.WAREHOUSE_STORE_TARGET) {
    store.target = env.WAREHOUSE_STORE_TARGET;
  }
  if (env.SUPABASE_SERVICE_ROLE_KEY) {
    store.serviceKey = env.SUPABASE_SERVICE_ROLE_KEY;
  }
  if (env.ETL_RUN_TIMEOUT_MS) {
    run.timeoutMs = Number(env.ETL_RUN_TIMEOUT_MS);
  }

  merged.store = store;
  if (Object.keys(run).length > 0) {
    merged.run = run;
  }
  return merged;
}

/**
 * Validate an in-memory configuration. Relative source paths are resolved against baseDir.
 */
export function parseConfig(raw: unknown, env: Env = process.env, baseDir = process.cwd()): EtlConfig {
  const result = configSchema.safeParse(applyEnvOverrides(raw, env));
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
    );
    throw new FatalConfigurationError('Invalid ETL configuration', issues);
  }

  const config = result.data;
  const resolvePath = (path: string): string => (isAbsolute(path) ? path : resolve(baseDir, path));

  for (const source of Object.values(config.sources)) {
    if (source) {
      source.path = Array.isArray(source.path) ? source.path.map(resolvePath) : resolvePath(source.path);
    }
  }
  if (config.run.reportPath) {
    config.run.reportPath = resolvePath(config.run.reportPath);
  }
  config.run.lockPath = resolvePath(config.run.lockPath);
  const sqliteFile = config.store.target.startsWith('sqlite:') ? config.store.target.slice('sqlite:'.length) : '';
  if (sqliteFile && sqliteFile !== ':memory:') {
    config.store.target = `sqlite:${resolvePath(sqliteFile)}`;
  }

  return config;
}

export async function loadConfig(path: string, env: Env = process.env): Promise<EtlConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    throw new FatalConfigurationError(`Cannot read configuration ${path}: ${getErrorMessage(error)}`, [], error);
  }
  return parseConfig(raw, env, dirname(resolve(path)));
}

const DEFAULT_SECTIONS: Partial<Record<SourcedEntity, FilingSection>> = {
  program_service: 'programs',
};

/**
 * Resolve one entity's configured source into a reader locator, or null when it is not configured.
 * The source type is taken from the configuration, otherwise from the first file's MIME type.
 */
export function resolveSource(entity: SourcedEntity, config: EtlConfig): SourceLocator | null {
  const source = config.sources[entity];
  if (!source) {
    return null;
  }

  const paths = Array.isArray(source.path) ? source.path : [source.path];
  const type = source.type ?? FileDetectionService.detectSourceType(paths[0]);
  if (!type) {
    throw new FatalConfigurationError(`Cannot detect the source type of ${paths[0]} for ${entity}`);
  }

  return {
    entity,
    paths,
    type,
    requiredColumns: source.requiredColumns,
    minPopulated: source.minPopulated,
    flatten: source.flatten,
    section: source.section ?? DEFAULT_SECTIONS[entity] ?? 'summary',
  };
}
