import { createTutorError } from '@studyhall/tutor-core';
import type { ZodError } from 'zod';
import { TutorConfigSchema, type TutorConfig } from './schema/config.schema.js';

/**
 * Render zod issues as `path: message` lines
 */
export function formatIssues(error: ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate raw configuration and apply defaults.
 *
 * @throws TutorError TUTOR_CONFIG_INVALID listing every issue
 */
export function parseTutorConfig(input: unknown): TutorConfig {
  const result = TutorConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw createTutorError('TUTOR_CONFIG_INVALID', `Invalid tutor config: ${issues.join('; ')}`, {
      issues,
    });
  }
  return result.data;
}

export const DEFAULT_TUTOR_CONFIG: TutorConfig = TutorConfigSchema.parse({});
