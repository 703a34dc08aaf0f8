import { tool } from 'ai';
import { z } from 'zod';
import type {
  QueryTabularFileUseCase,
  ReadDocumentUseCase,
} from '@deep-research/domain/usecases';

export type ResearchToolsDeps = {
  tabular: QueryTabularFileUseCase;
  document: ReadDocumentUseCase;
};

/** Tool definitions handed to the agent that dispatches research requests. */
export function createResearchTools({ tabular, document }: ResearchToolsDeps) {
  return {
    queryCsv: tool({
      description:
        'Query a tabular file (CSV, TSV, JSON or Parquet) from the research bucket. The data is exposed as the table current_csv_table. Pass either a read-only SQL `query` or a natural-language `objective`; with an objective the schema is analyzed and a multi-step query plan is executed and validated. Returns a markdown report.',
      inputSchema: z.object({
        fileId: z.string().min(1).describe('Path of the file in the bucket'),
        query: z
          .string()
          .optional()
          .describe('SELECT statement against current_csv_table'),
        objective: z
          .string()
          .optional()
          .describe('Question to answer, e.g. "How many companies have registered X?"'),
      }),
      execute: async ({ fileId, query, objective }) =>
        tabular.execute({
          fileId,
          query: query || undefined,
          objective: objective || undefined,
        }),
    }),

    readPdf: tool({
      description:
        'Read a document (PDF, text or markdown) from the research bucket. Small documents are returned in full; large ones are filtered by the optional focus `query` and summarized section by section.',
      inputSchema: z.object({
        documentId: z.string().min(1).describe('Path of the document in the bucket'),
        query: z
          .string()
          .optional()
          .describe('Topic to focus on when the document is large'),
      }),
      execute: async ({ documentId, query }) =>
        document.execute({ documentId, query: query || undefined }),
    }),
  };
}
