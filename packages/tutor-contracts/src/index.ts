export * from './schema/config.schema.js';
export * from './schema/wire.schema.js';
export { parseTutorConfig, formatIssues, DEFAULT_TUTOR_CONFIG } from './parse.js';
