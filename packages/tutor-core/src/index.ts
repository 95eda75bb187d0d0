/**
 * @studyhall/tutor-core
 * Domain types, errors, logging and utilities for the tutoring orchestrator
 */

// Types
export * from './types/index.js';

// Errors
export * from './error/tutor-error.js';

// Logging
export * from './logging/logger.js';

// Utils
export * from './utils/hash.js';
export * from './utils/math.js';
export * from './utils/text.js';
export * from './utils/timeout.js';
