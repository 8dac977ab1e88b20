/**
 * Configuration loading and validation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import type { LineageConfig } from './types.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { ConfigError, ConfigNotFoundError, toError } from '../shared/errors.js';
import { QUERY_DIRECTIONS } from '../shared/types.js';

const CONFIG_DIR = '.lineage';
const CONFIG_FILE = 'config.json';
const DB_FILE = 'lineage.db';

const partialConfigSchema = z.object({
  traversal: z
    .object({
      default_depth: z.number().int().min(1).optional(),
      max_depth: z.number().int().min(1).optional(),
      default_direction: z.enum(QUERY_DIRECTIONS).optional(),
      timeout_ms: z.number().int().min(0).optional(),
      slow_query_ms: z.number().int().min(0).optional(),
    })
    .optional(),
  runs: z
    .object({
      default_status: z.enum(['created', 'running']).optional(),
    })
    .optional(),
  log: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      file: z.string().nullable().optional(),
    })
    .optional(),
});

export type PartialLineageConfig = z.infer<typeof partialConfigSchema>;

/**
 * Resolve the .lineage directory path from a given working directory.
 */
export function resolveLineageDir(cwd: string): string {
  return path.join(cwd, CONFIG_DIR);
}

/**
 * Resolve the config.json path.
 */
export function resolveConfigPath(cwd: string): string {
  return path.join(resolveLineageDir(cwd), CONFIG_FILE);
}

/**
 * Resolve the database path.
 */
export function resolveDbPath(cwd: string): string {
  return path.join(resolveLineageDir(cwd), DB_FILE);
}

export function configExists(cwd: string): boolean {
  return fs.existsSync(resolveConfigPath(cwd));
}

/**
 * Load config from disk, merging with defaults.
 */
export function loadConfig(cwd: string): LineageConfig {
  const configPath = resolveConfigPath(cwd);

  if (!fs.existsSync(configPath)) {
    throw new ConfigNotFoundError(configPath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(
      `Failed to load config from ${configPath}: ${toError(err).message}`,
      toError(err),
    );
  }

  const parsed = partialConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join('.') : '';
    throw new ConfigError(
      `Invalid config in ${configPath}${where ? ` at ${where}` : ''}: ${issue?.message ?? 'unknown issue'}`,
    );
  }

  const config = mergeWithDefaults(parsed.data);
  if (config.traversal.default_depth > config.traversal.max_depth) {
    throw new ConfigError(
      `traversal.default_depth (${config.traversal.default_depth}) exceeds traversal.max_depth (${config.traversal.max_depth})`,
    );
  }
  return config;
}

/**
 * Save config to disk.
 */
export function saveConfig(cwd: string, config: LineageConfig): void {
  fs.mkdirSync(resolveLineageDir(cwd), { recursive: true });
  fs.writeFileSync(
    resolveConfigPath(cwd),
    JSON.stringify(config, null, 2) + '\n',
    'utf-8',
  );
}

/**
 * Delete the .lineage directory.
 */
export function cleanConfig(cwd: string): void {
  const dir = resolveLineageDir(cwd);
  if (fs.existsSync(dir)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

export function mergeWithDefaults(partial: PartialLineageConfig): LineageConfig {
  return {
    traversal: {
      default_depth: partial.traversal?.default_depth ?? DEFAULT_CONFIG.traversal.default_depth,
      max_depth: partial.traversal?.max_depth ?? DEFAULT_CONFIG.traversal.max_depth,
      default_direction:
        partial.traversal?.default_direction ?? DEFAULT_CONFIG.traversal.default_direction,
      timeout_ms: partial.traversal?.timeout_ms ?? DEFAULT_CONFIG.traversal.timeout_ms,
      slow_query_ms: partial.traversal?.slow_query_ms ?? DEFAULT_CONFIG.traversal.slow_query_ms,
    },
    runs: {
      default_status: partial.runs?.default_status ?? DEFAULT_CONFIG.runs.default_status,
    },
    log: {
      level: partial.log?.level ?? DEFAULT_CONFIG.log.level,
      file: partial.log?.file ?? DEFAULT_CONFIG.log.file,
    },
  };
}
