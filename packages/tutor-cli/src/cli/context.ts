import * as path from 'node:path';
import { createLogger, setLogger, type Logger } from '@studyhall/tutor-core';
import { loadTutorConfig, type LoadedConfig } from '../config/load-config.js';
import { createTutorRuntime, type TutorRuntime, type TutorRuntimeOptions } from '../runtime/tutor-runtime.js';
import type { CliIO } from './output.js';

/**
 * Everything a command needs from its surroundings
 */
export interface CliContext {
  io: CliIO;
  cwd: string;
  env: Record<string, string | undefined>;
  fetch?: TutorRuntimeOptions['fetch'];
  createCompletion?: TutorRuntimeOptions['createCompletion'];
  logger?: Logger;
}

export interface CommandSetup {
  loaded: LoadedConfig;
  runtime: TutorRuntime;
}

export async function loadConfigFor(ctx: CliContext, configPath?: string): Promise<LoadedConfig> {
  return loadTutorConfig({ cwd: ctx.cwd, configPath, env: ctx.env });
}

/**
 * Directory that relative config paths resolve against
 */
export function configRoot(configPath: string | null, cwd: string): string {
  if (!configPath) {
    return cwd;
  }
  const dir = path.dirname(configPath);
  return path.basename(dir) === '.studyhall' ? path.dirname(dir) : dir;
}

/**
 * Load config, install the logger and build the runtime. Relative paths
 * in the config resolve against `configRoot`.
 */
export async function setupRuntime(ctx: CliContext, configPath?: string): Promise<CommandSetup> {
  const loaded = await loadConfigFor(ctx, configPath);
  const logger = ctx.logger ?? createLogger({ level: loaded.config.logLevel, stderr: true });
  setLogger(logger);

  const runtime = createTutorRuntime(loaded.config, {
    cwd: configRoot(loaded.path, ctx.cwd),
    env: ctx.env,
    fetch: ctx.fetch,
    logger,
    createCompletion: ctx.createCompletion,
  });
  return { loaded, runtime };
}
