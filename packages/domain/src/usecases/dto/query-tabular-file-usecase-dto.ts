import { z } from 'zod';

export const QueryTabularFileInputSchema = z
  .object({
    fileId: z
      .string()
      .min(1)
      .describe('Path of the tabular file inside the storage bucket'),
    query: z
      .string()
      .min(1)
      .optional()
      .describe('SQL statement to run against table current_csv_table'),
    objective: z
      .string()
      .min(1)
      .optional()
      .describe('Natural-language question used to plan the queries'),
  })
  .refine((input) => input.query !== undefined || input.objective !== undefined, {
    message: "Either 'query' or 'objective' must be provided.",
    path: ['query'],
  });

export type QueryTabularFileInput = z.infer<typeof QueryTabularFileInputSchema>;
