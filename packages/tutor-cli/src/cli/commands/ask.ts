/**
 * tutor ask
 */

import * as path from 'node:path';
import fs from 'fs-extra';
import { z } from 'zod';
import { createTutorError, getExitCode } from '@studyhall/tutor-core';
import type { TutorErrorEnvelope, TutorRequestInput, TutorResponse } from '@studyhall/tutor-contracts';
import { isErrorEnvelope } from '@studyhall/tutor-orchestrator';
import { setupRuntime, type CliContext } from '../context.js';
import { formatTiming, keyValue, paint, type CliIO } from '../output.js';

export const AskOptionsSchema = z.object({
  tenant: z.string().optional(),
  grade: z.coerce.number().int().positive().optional(),
  subject: z.string().optional(),
  answer: z.string().optional(),
  expected: z.string().optional(),
  /** JSON file holding a complete wire request */
  request: z.string().optional(),
  json: z.boolean().default(false),
  config: z.string().optional(),
});

export type AskOptions = z.infer<typeof AskOptionsSchema>;

async function buildRequest(ctx: CliContext, words: string[], options: AskOptions): Promise<unknown> {
  if (options.request) {
    const file = path.resolve(ctx.cwd, options.request);
    try {
      return await fs.readJson(file);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw createTutorError('TUTOR_INVALID_REQUEST', `Cannot read request file ${file}: ${message}`);
    }
  }

  const request: Partial<TutorRequestInput> = {
    tenant_id: options.tenant,
    user_query: words.join(' '),
    student_profile:
      options.grade !== undefined && options.subject !== undefined
        ? { grade: options.grade, subject: options.subject }
        : undefined,
    submitted_answer: options.answer,
    expected_answer: options.expected,
  };
  return request;
}

function printResponse(io: CliIO, response: TutorResponse): void {
  const { payload } = response;
  io.out(payload.text);

  if (payload.score !== undefined) {
    io.out('');
    io.out(keyValue(io, 'Score', `${payload.score}/${payload.max_score ?? '?'}${payload.correct ? ' (correct)' : ''}`));
  }
  for (const [label, items] of [
    ['Mistakes', payload.mistakes],
    ['Strengths', payload.strengths],
    ['Weaknesses', payload.weaknesses],
    ['Recommendations', payload.recommendations],
    ['Sources', payload.sources],
  ] as const) {
    if (items && items.length > 0) {
      io.out(keyValue(io, label, items.join('; ')));
    }
  }

  io.out('');
  io.out(
    paint(
      io,
      'gray',
      `${response.specialist} · ${response.provenance} · ${formatTiming(response.latency_ms)} · ${response.request_id}`,
    ),
  );
  for (const warning of response.warnings) {
    io.err(paint(io, 'yellow', `⚠ ${warning.code}: ${warning.message}`));
  }
}

function printEnvelope(io: CliIO, envelope: TutorErrorEnvelope): void {
  const { error } = envelope;
  io.err(paint(io, 'red', `✗ ${error.code}: ${error.message}`));
  if (error.hint) {
    io.err(paint(io, 'gray', `  ${error.hint}`));
  }
}

export async function runAsk(ctx: CliContext, words: string[], rawOptions: unknown): Promise<number> {
  const options = AskOptionsSchema.parse(rawOptions);
  const { runtime } = await setupRuntime(ctx, options.config);

  const result = await runtime.supervisor.handleRequest(await buildRequest(ctx, words, options));
  await runtime.supervisor.drain();

  if (options.json) {
    ctx.io.out(JSON.stringify(result, null, 2));
  } else if (isErrorEnvelope(result)) {
    printEnvelope(ctx.io, result);
  } else {
    printResponse(ctx.io, result);
  }

  return isErrorEnvelope(result) ? getExitCode(result.error) : 0;
}
