import { z } from 'zod';

export const ReadDocumentInputSchema = z.object({
  documentId: z
    .string()
    .min(1)
    .describe('Path of the document inside the storage bucket'),
  query: z
    .string()
    .min(1)
    .optional()
    .describe('Topic to focus filtering and summarization on'),
});

export type ReadDocumentInput = z.infer<typeof ReadDocumentInputSchema>;
