import { z } from 'zod';

export const PlanStepSchema = z.object({
  description: z.string().min(1).describe('Human-readable step description'),
  query: z.string().min(1).describe('Executable SQL statement'),
  validationHint: z
    .string()
    .describe('Free-text expectation checked against the result shape'),
});

export type PlanStep = z.infer<typeof PlanStepSchema>;

export const ExpectedResultTypeSchema = z.enum([
  'numeric_count_with_details',
  'list_of_items',
  'general_information',
]);

export type ExpectedResultType = z.infer<typeof ExpectedResultTypeSchema>;

/**
 * Ordered, independent query steps synthesized from an objective.
 * Consumed exactly once by the plan executor.
 */
export const QueryPlanSchema = z.object({
  objective: z.string().describe('The request, verbatim'),
  steps: z.array(PlanStepSchema),
  expectedResultType: ExpectedResultTypeSchema,
});

export type QueryPlan = z.infer<typeof QueryPlanSchema>;
