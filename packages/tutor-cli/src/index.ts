/**
 * @studyhall/tutor-cli
 * Config loading, runtime wiring and the `tutor` command line
 */

export {
  loadTutorConfig,
  findConfigPath,
  applyEnvOverrides,
  CONFIG_FILE_NAMES,
  type LoadConfigOptions,
  type LoadedConfig,
} from './config/load-config.js';
export {
  createTutorRuntime,
  createProviderEntries,
  createVectorStore,
  type TutorRuntime,
  type TutorRuntimeOptions,
} from './runtime/tutor-runtime.js';
export { runCli, createProgram } from './cli/program.js';
export { readCorpus, CorpusFileSchema } from './cli/commands/ingest.js';
export type { CliContext } from './cli/context.js';
export type { CliIO } from './cli/output.js';
