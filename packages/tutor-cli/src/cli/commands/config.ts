/**
 * tutor config
 *
 * Prints the resolved configuration (defaults, file, environment).
 */

import { z } from 'zod';
import { loadConfigFor, type CliContext } from '../context.js';
import { keyValue } from '../output.js';

export const ConfigOptionsSchema = z.object({
  json: z.boolean().default(false),
  config: z.string().optional(),
});

export async function runConfig(ctx: CliContext, rawOptions: unknown): Promise<number> {
  const options = ConfigOptionsSchema.parse(rawOptions);
  const { config, path } = await loadConfigFor(ctx, options.config);

  if (options.json) {
    ctx.io.out(JSON.stringify({ path, config }, null, 2));
    return 0;
  }

  const { io } = ctx;
  io.out(keyValue(io, 'Config file', path ?? '(defaults)'));
  io.out(keyValue(io, 'Providers', config.llm.providers.map(p => `${p.id} (${p.model})`).join(', ')));
  io.out(keyValue(io, 'Embeddings', config.embeddings.type));
  io.out(keyValue(io, 'Vector backend', config.retrieval.backend.type));
  io.out(keyValue(io, 'Retrieval', `top-k ${config.retrieval.topK}, floor ${config.retrieval.scoreFloor}`));
  io.out(
    keyValue(
      io,
      'Cache',
      config.cache.enabled
        ? `threshold ${config.cache.similarityThreshold}, ttl ${config.cache.ttlMs}ms, max ${config.cache.maxEntries}`
        : 'disabled',
    ),
  );
  return 0;
}
