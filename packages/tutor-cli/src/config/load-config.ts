/**
 * Configuration loading
 *
 * Finds the nearest tutor.config.json (walking up from cwd), applies
 * environment overrides and validates the result.
 */

import * as path from 'node:path';
import fs from 'fs-extra';
import { createTutorError } from '@studyhall/tutor-core';
import { parseTutorConfig, type TutorConfig } from '@studyhall/tutor-contracts';

export const CONFIG_FILE_NAMES = ['tutor.config.json', '.studyhall/tutor.config.json'] as const;

export interface LoadConfigOptions {
  cwd: string;
  /** Explicit config path; skips the search */
  configPath?: string;
  env?: Record<string, string | undefined>;
}

export interface LoadedConfig {
  config: TutorConfig;
  /** null when running on defaults */
  path: string | null;
}

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function findConfigPath(cwd: string): Promise<string | null> {
  let dir = path.resolve(cwd);
  for (;;) {
    for (const name of CONFIG_FILE_NAMES) {
      const candidate = path.join(dir, name);
      if (await fs.pathExists(candidate)) {
        return candidate;
      }
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

async function readConfigFile(file: string): Promise<RawConfig> {
  let raw: unknown;
  try {
    raw = await fs.readJson(file);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw createTutorError('TUTOR_CONFIG_INVALID', `Cannot read ${file}: ${message}`, { path: file });
  }
  if (!isRecord(raw)) {
    throw createTutorError('TUTOR_CONFIG_INVALID', `${file} must contain a JSON object`, { path: file });
  }
  // Section format: { "tutor": { ... } }
  if (isRecord(raw.tutor)) {
    return raw.tutor;
  }
  return raw;
}

function numberFromEnv(env: Record<string, string | undefined>, name: string): number | undefined {
  const value = env[name];
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw createTutorError('TUTOR_CONFIG_INVALID', `${name} must be a number, got "${value}"`, { variable: name });
  }
  return parsed;
}

function section(raw: RawConfig, key: string): RawConfig {
  const value = raw[key];
  return isRecord(value) ? value : {};
}

/**
 * Overlay TUTOR_* and LOG_LEVEL environment variables on the raw config
 */
export function applyEnvOverrides(raw: RawConfig, env: Record<string, string | undefined>): RawConfig {
  const result: RawConfig = { ...raw };

  const threshold = numberFromEnv(env, 'TUTOR_SIMILARITY_THRESHOLD');
  const ttlMs = numberFromEnv(env, 'TUTOR_CACHE_TTL_MS');
  if (threshold !== undefined || ttlMs !== undefined) {
    result.cache = {
      ...section(raw, 'cache'),
      ...(threshold !== undefined ? { similarityThreshold: threshold } : {}),
      ...(ttlMs !== undefined ? { ttlMs } : {}),
    };
  }

  const topK = numberFromEnv(env, 'TUTOR_RETRIEVAL_TOP_K');
  if (topK !== undefined) {
    result.retrieval = { ...section(raw, 'retrieval'), topK };
  }

  const logLevel = env.LOG_LEVEL?.trim();
  if (logLevel) {
    result.logLevel = logLevel.toLowerCase();
  }

  return result;
}

export async function loadTutorConfig(options: LoadConfigOptions): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const configPath = options.configPath
    ? path.resolve(options.cwd, options.configPath)
    : await findConfigPath(options.cwd);

  if (options.configPath && configPath && !(await fs.pathExists(configPath))) {
    throw createTutorError('TUTOR_CONFIG_INVALID', `Config file not found: ${configPath}`, { path: configPath });
  }

  const raw = configPath ? await readConfigFile(configPath) : {};
  return {
    config: parseTutorConfig(applyEnvOverrides(raw, env)),
    path: configPath,
  };
}
