/**
 * Streaming chunk shape of the Ollama `/api/generate` endpoint
 *
 * Only the fields the timing protocol reads are typed; everything else the
 * server sends (durations, context, model name) passes through untouched and
 * ends up in the run's raw metadata.
 */

import { z } from 'zod';

export const GenerateChunkSchema = z
  .object({
    model: z.string().optional(),
    response: z.string().optional(),
    done: z.boolean().default(false),
    eval_count: z.number().int().nonnegative().optional(),
    error: z.string().optional(),
  })
  .passthrough();

export type GenerateChunk = z.infer<typeof GenerateChunkSchema>;
