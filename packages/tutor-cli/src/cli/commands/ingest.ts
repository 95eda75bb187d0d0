/**
 * tutor ingest
 *
 * Embeds a JSON corpus into the configured vector backend for one tenant.
 */

import * as path from 'node:path';
import fs from 'fs-extra';
import { z } from 'zod';
import { createTutorError } from '@studyhall/tutor-core';
import { formatIssues } from '@studyhall/tutor-contracts';
import type { PassageInput } from '@studyhall/tutor-retrieval';
import { setupRuntime, type CliContext } from '../context.js';
import { formatTiming, keyValue, paint } from '../output.js';

const CorpusPassageSchema = z.object({
  id: z.string().min(1).optional(),
  text: z.string().trim().min(1),
  subject: z.string().trim().min(1),
  grade: z.number().int().positive().optional(),
  source_id: z.string().min(1),
  metadata: z.record(z.unknown()).optional(),
});

export const CorpusFileSchema = z.union([
  z.array(CorpusPassageSchema),
  z.object({ passages: z.array(CorpusPassageSchema) }),
]);

export const IngestOptionsSchema = z.object({
  tenant: z.string().min(1),
  replace: z.boolean().default(false),
  config: z.string().optional(),
});

/**
 * Read and validate a corpus file
 */
export async function readCorpus(file: string): Promise<PassageInput[]> {
  let raw: unknown;
  try {
    raw = await fs.readJson(file);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw createTutorError('TUTOR_INGEST_ERROR', `Cannot read corpus ${file}: ${message}`, { path: file });
  }

  const parsed = CorpusFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw createTutorError('TUTOR_INGEST_ERROR', `Invalid corpus ${file}: ${issues.join('; ')}`, { issues });
  }

  const passages = Array.isArray(parsed.data) ? parsed.data : parsed.data.passages;
  return passages.map(passage => ({
    id: passage.id,
    text: passage.text,
    subject: passage.subject,
    grade: passage.grade,
    sourceId: passage.source_id,
    metadata: passage.metadata,
  }));
}

export async function runIngest(ctx: CliContext, file: string, rawOptions: unknown): Promise<number> {
  const options = IngestOptionsSchema.parse(rawOptions);
  const started = Date.now();
  const passages = await readCorpus(path.resolve(ctx.cwd, file));
  const { runtime } = await setupRuntime(ctx, options.config);

  const count = await runtime.retrieval.ingest(options.tenant, passages, { replace: options.replace });

  ctx.io.out(paint(ctx.io, 'green', `✓ Ingested ${count} passages for ${options.tenant}`));
  ctx.io.out(keyValue(ctx.io, 'Backend', runtime.store.id));
  ctx.io.out(keyValue(ctx.io, 'Indexed', await runtime.store.count(options.tenant)));
  ctx.io.out(keyValue(ctx.io, 'Time', formatTiming(Date.now() - started)));
  return 0;
}
