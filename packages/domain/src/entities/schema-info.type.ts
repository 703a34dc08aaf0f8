import { z } from 'zod';
import { ColumnDataTypeSchema } from './column-category.type';

export const KeyColumnsSchema = z.object({
  company: z.array(z.string()),
  product: z.array(z.string()),
  country: z.array(z.string()),
  approval: z.array(z.string()),
  date: z.array(z.string()),
  status: z.array(z.string()),
  other: z.array(z.string()),
});

export type KeyColumns = z.infer<typeof KeyColumnsSchema>;

/**
 * Profile of a tabular dataset, produced once per analysis request.
 * Every column appears in exactly one bucket of `keyColumns`.
 */
export const SchemaInfoSchema = z.object({
  columns: z
    .array(z.string())
    .describe('Column names in the order they appear in the source'),
  dataTypes: z
    .record(z.string(), ColumnDataTypeSchema)
    .describe('Coarse data type per column'),
  sampleValues: z
    .record(z.string(), z.array(z.string()).max(5))
    .describe('Up to 5 distinct, non-null, string-rendered values per column'),
  rowCount: z.number().int().min(0).describe('Number of data rows'),
  keyColumns: KeyColumnsSchema.describe('Columns bucketed by category'),
});

export type SchemaInfo = z.infer<typeof SchemaInfoSchema>;
