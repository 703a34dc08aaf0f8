import { z } from 'zod';

export const TextChunkSchema = z.object({
  index: z.number().int().min(0).describe('Position in source order'),
  text: z.string().min(1).describe('Contiguous slice of the source text'),
  tokenCount: z.number().int().min(0),
});

export type TextChunk = z.infer<typeof TextChunkSchema>;
