import { z } from 'zod';

/**
 * Semantic role of a tabular column, assigned by keyword heuristics.
 * The order of the options is the priority order used when categorizing.
 */
export const ColumnCategorySchema = z.enum([
  'company',
  'product',
  'country',
  'approval',
  'date',
  'status',
  'other',
]);

export type ColumnCategory = z.infer<typeof ColumnCategorySchema>;

export type KeywordCategory = Exclude<ColumnCategory, 'other'>;

export const ColumnDataTypeSchema = z.enum([
  'integer',
  'numeric',
  'datetime',
  'text',
]);

export type ColumnDataType = z.infer<typeof ColumnDataTypeSchema>;
