/**
 * Reposnap Configuration
 *
 * Each value resolves in order: explicit option (CLI flag), environment
 * variable (optionally loaded from an env file), built-in default.
 */

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { basename, join, resolve } from 'node:path';
import { parse as parseDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import type { CommitPolicy } from '../types/index.js';
import { DEFAULT_KEEP } from '../prune/prune-snapshots.js';

export type Env = Record<string, string | undefined>;

// ========== Environment ==========

export const ENV_KEYS = {
  destDir: 'REPOSNAP_DEST_DIR',
  keep: 'REPOSNAP_KEEP',
  projectName: 'REPOSNAP_PROJECT',
  counterFile: 'REPOSNAP_COUNTER_FILE',
  snapshotsDir: 'REPOSNAP_SNAPSHOTS_DIR',
  logFile: 'REPOSNAP_LOG_FILE',
  commitPolicy: 'REPOSNAP_COMMIT_POLICY',
} as const;

export const DEFAULT_ENV_FILE = '.reposnap.env';

/**
 * Loads `envFile` into `env` when it exists. Variables already set win.
 * Returns whether a file was loaded.
 */
export function loadEnvFile(envFile: string, env: Env = process.env): boolean {
  if (!existsSync(envFile)) return false;
  const parsed = parseDotenv(readFileSync(envFile, 'utf-8'));
  for (const [key, value] of Object.entries(parsed)) {
    if (env[key] === undefined) env[key] = value;
  }
  return true;
}

/**
 * Loads the env file for a run in `workDir`. Without `envFile` the default
 * `.reposnap.env` is loaded when present; a named file must exist.
 */
export function loadProjectEnv(workDir: string, envFile?: string, env: Env = process.env): boolean {
  if (envFile === undefined) return loadEnvFile(join(workDir, DEFAULT_ENV_FILE), env);
  if (!loadEnvFile(resolve(workDir, expandHome(envFile)), env)) {
    throw new ConfigError([`env file not found: ${envFile}`], 'Check the --env-file path');
  }
  return true;
}

// ========== Defaults ==========

export const DEFAULT_COUNTER_SNAPSHOT = {
  keep: DEFAULT_KEEP,
  counterFile: '.snapshot_count',
  commitPolicy: 'if-staged' as CommitPolicy,
} as const;

export const DEFAULT_TIMESTAMP_SNAPSHOT = {
  snapshotsDir: 'snapshots',
  logFile: 'last_agent_log.txt',
  excludeDirs: ['.git', '__pycache__', 'DerivedData', '.build', 'build', 'snapshots', 'node_modules'],
  commitPolicy: 'always' as CommitPolicy,
} as const;

/**
 * Default destination for counter snapshots: the user's desktop.
 */
export function defaultDestDir(): string {
  return join(homedir(), 'Desktop');
}

// ========== Config ==========

interface SharedSnapshotConfig {
  workDir?: string;
  projectName?: string;
  commitPolicy?: CommitPolicy;
}

export interface CounterSnapshotConfig extends SharedSnapshotConfig {
  destDir?: string;
  keep?: number;
  counterFile?: string;
}

export interface TimestampSnapshotConfig extends SharedSnapshotConfig {
  snapshotsDir?: string;
  logFile?: string;
  excludeDirs?: string[];
  excludeFiles?: string[];
}

// ========== Resolved ==========

export interface ResolvedCounterSnapshotConfig {
  workDir: string;
  projectName: string;
  destDir: string;
  keep: number;
  counterPath: string;
  commitPolicy: CommitPolicy;
}

export interface ResolvedTimestampSnapshotConfig {
  workDir: string;
  projectName: string;
  snapshotsDir: string;
  logPath: string;
  excludeDirs: string[];
  excludeFiles: string[];
  commitPolicy: CommitPolicy;
}

const nonEmpty = z.string().min(1, 'must not be empty');
const commitPolicySchema = z.enum(['if-staged', 'always']);

const counterSchema = z.object({
  projectName: nonEmpty,
  destDir: nonEmpty,
  keep: z.number().int().positive(),
  counterFile: nonEmpty,
  commitPolicy: commitPolicySchema,
});

const timestampSchema = z.object({
  projectName: nonEmpty,
  snapshotsDir: nonEmpty,
  logFile: nonEmpty,
  commitPolicy: commitPolicySchema,
});

function expandHome(value: string): string {
  if (value === '~') return homedir();
  if (value.startsWith('~/')) return join(homedir(), value.slice(2));
  return value;
}

function fromEnv(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function parseKeep(raw: string | undefined): number | undefined {
  return raw === undefined ? undefined : Number(raw);
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return parsed.data;
}

export function resolveCounterSnapshotConfig(
  config: CounterSnapshotConfig = {},
  env: Env = process.env,
): ResolvedCounterSnapshotConfig {
  const workDir = resolve(config.workDir ?? process.cwd());

  const values = validate(counterSchema, {
    projectName: config.projectName ?? fromEnv(env, ENV_KEYS.projectName) ?? basename(workDir),
    destDir: config.destDir ?? fromEnv(env, ENV_KEYS.destDir) ?? defaultDestDir(),
    keep: config.keep ?? parseKeep(fromEnv(env, ENV_KEYS.keep)) ?? DEFAULT_COUNTER_SNAPSHOT.keep,
    counterFile: config.counterFile ?? fromEnv(env, ENV_KEYS.counterFile) ?? DEFAULT_COUNTER_SNAPSHOT.counterFile,
    commitPolicy: config.commitPolicy ?? fromEnv(env, ENV_KEYS.commitPolicy) ?? DEFAULT_COUNTER_SNAPSHOT.commitPolicy,
  });

  return {
    workDir,
    projectName: values.projectName,
    destDir: resolve(workDir, expandHome(values.destDir)),
    keep: values.keep,
    counterPath: resolve(workDir, expandHome(values.counterFile)),
    commitPolicy: values.commitPolicy,
  };
}

export function resolveTimestampSnapshotConfig(
  config: TimestampSnapshotConfig = {},
  env: Env = process.env,
): ResolvedTimestampSnapshotConfig {
  const workDir = resolve(config.workDir ?? process.cwd());

  const values = validate(timestampSchema, {
    projectName: config.projectName ?? fromEnv(env, ENV_KEYS.projectName) ?? basename(workDir),
    snapshotsDir: config.snapshotsDir ?? fromEnv(env, ENV_KEYS.snapshotsDir) ?? DEFAULT_TIMESTAMP_SNAPSHOT.snapshotsDir,
    logFile: config.logFile ?? fromEnv(env, ENV_KEYS.logFile) ?? DEFAULT_TIMESTAMP_SNAPSHOT.logFile,
    commitPolicy: config.commitPolicy ?? fromEnv(env, ENV_KEYS.commitPolicy) ?? DEFAULT_TIMESTAMP_SNAPSHOT.commitPolicy,
  });

  const snapshotsDir = resolve(workDir, expandHome(values.snapshotsDir));
  const excludeDirs = new Set<string>(config.excludeDirs ?? DEFAULT_TIMESTAMP_SNAPSHOT.excludeDirs);
  excludeDirs.add(basename(snapshotsDir));

  return {
    workDir,
    projectName: values.projectName,
    snapshotsDir,
    logPath: resolve(workDir, expandHome(values.logFile)),
    excludeDirs: [...excludeDirs],
    excludeFiles: [...(config.excludeFiles ?? [])],
    commitPolicy: values.commitPolicy,
  };
}
