import type {
  ExpectedResultType,
  QueryPlan,
  SchemaInfo,
} from '@deep-research/domain/entities';
import {
  type EntityExtractor,
  uppercaseTokenExtractor,
} from './entity-extractor';
import { PLAN_RULES, type PlanContext, type PlanRule } from './plan-rules';

export type CreateQueryPlanOptions = {
  entityExtractor?: EntityExtractor;
  rules?: readonly PlanRule[];
};

const isBrandNameColumn = (lower: string) =>
  lower.includes('brand') && lower.includes('name');

const isGenericNameColumn = (lower: string) =>
  lower.includes('generic') && lower.includes('name');

export function expectedResultTypeFor(objective: string): ExpectedResultType {
  const lower = objective.toLowerCase();
  if (lower.includes('how many') || lower.includes('count')) {
    return 'numeric_count_with_details';
  }
  if (lower.includes('list') || lower.includes('what are')) {
    return 'list_of_items';
  }
  return 'general_information';
}

export function buildPlanContext(
  objective: string,
  schema: SchemaInfo,
  entityExtractor: EntityExtractor = uppercaseTokenExtractor,
): PlanContext {
  const brandNameColumns: string[] = [];
  const genericNameColumns: string[] = [];
  for (const col of schema.columns) {
    const lower = col.toLowerCase();
    if (isBrandNameColumn(lower)) {
      brandNameColumns.push(col);
    } else if (isGenericNameColumn(lower)) {
      genericNameColumns.push(col);
    }
  }

  return {
    objective,
    objectiveLower: objective.toLowerCase(),
    schema,
    entity: entityExtractor.extract(objective)[0] ?? null,
    brandNameColumns,
    genericNameColumns,
  };
}

/**
 * Synthesizes an ordered plan from a fixed vocabulary. Objectives outside
 * that vocabulary produce an empty plan, not an error.
 */
export function createQueryPlan(
  objective: string,
  schema: SchemaInfo,
  options: CreateQueryPlanOptions = {},
): QueryPlan {
  const { entityExtractor = uppercaseTokenExtractor, rules = PLAN_RULES } =
    options;
  const ctx = buildPlanContext(objective, schema, entityExtractor);

  const steps = rules
    .filter((rule) => rule.applies(ctx))
    .flatMap((rule) => rule.build(ctx));

  return {
    objective,
    steps,
    expectedResultType: expectedResultTypeFor(objective),
  };
}
