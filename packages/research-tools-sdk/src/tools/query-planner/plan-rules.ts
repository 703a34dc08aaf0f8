import type { PlanStep, SchemaInfo } from '@deep-research/domain/entities';
import { TABLE_NAME } from '../tabular-session';
import { quoteIdentifier, quoteLiteral } from '../utils/sql-literals';

export type PlanContext = {
  objective: string;
  objectiveLower: string;
  schema: SchemaInfo;
  /** First entity token found in the objective, if any. */
  entity: string | null;
  brandNameColumns: string[];
  genericNameColumns: string[];
};

export type PlanRule = {
  name: string;
  applies: (ctx: PlanContext) => boolean;
  build: (ctx: PlanContext) => PlanStep[];
};

const TABLE = quoteIdentifier(TABLE_NAME);

export const ENUMERATION_VOCABULARY = [
  'how many',
  'count',
  'companies',
  'products',
] as const;

const mentionsAny = (text: string, words: readonly string[]) =>
  words.some((word) => text.includes(word));

const mentionsCompanies = (ctx: PlanContext) =>
  mentionsAny(ctx.objectiveLower, ['company', 'companies']);

const primaryCompanyColumn = (ctx: PlanContext): string | undefined =>
  ctx.schema.keyColumns.company[0];

const containsEntity = (column: string, entity: string) =>
  `UPPER(${quoteIdentifier(column)}) LIKE ${quoteLiteral(`%${entity.toUpperCase()}%`)}`;

const searchStep = (
  column: string,
  entity: string,
  label: string,
): PlanStep => ({
  description: `Search for product '${entity}' in ${label} column '${column}'`,
  query: `SELECT * FROM ${TABLE} WHERE ${containsEntity(column, entity)} LIMIT 5`,
  validationHint: `Should return rows whose ${label.toLowerCase()} contains '${entity}'`,
});

const structureDiscovery: PlanRule = {
  name: 'structure-discovery',
  applies: (ctx) => mentionsAny(ctx.objectiveLower, ENUMERATION_VOCABULARY),
  build: () => [
    {
      description: 'Explore dataset structure and columns',
      query: `SELECT column_name FROM information_schema.columns WHERE table_name = ${quoteLiteral(TABLE_NAME)} ORDER BY ordinal_position`,
      validationHint: 'Should return list of column names',
    },
  ],
};

const companyExploration: PlanRule = {
  name: 'company-exploration',
  applies: (ctx) =>
    mentionsCompanies(ctx) && primaryCompanyColumn(ctx) !== undefined,
  build: (ctx) => {
    const column = primaryCompanyColumn(ctx);
    if (column === undefined) {
      return [];
    }
    return [
      {
        description: `Explore company data in column '${column}'`,
        query: `SELECT DISTINCT ${quoteIdentifier(column)} FROM ${TABLE} LIMIT 10`,
        validationHint: 'Should return list of company names',
      },
    ];
  },
};

const entitySearch: PlanRule = {
  name: 'entity-search',
  applies: (ctx) =>
    ctx.entity !== null &&
    (ctx.brandNameColumns.length > 0 ||
      ctx.genericNameColumns.length > 0 ||
      ctx.schema.keyColumns.product.length > 0),
  build: (ctx) => {
    const { entity } = ctx;
    if (entity === null) {
      return [];
    }
    // Brand and generic names live in separate columns; a product may be
    // registered under either, so both are searched.
    const steps = [
      ...ctx.brandNameColumns.map((col) => searchStep(col, entity, 'Brand Name')),
      ...ctx.genericNameColumns.map((col) =>
        searchStep(col, entity, 'Generic Name'),
      ),
    ];
    const fallback = ctx.schema.keyColumns.product[0];
    if (steps.length === 0 && fallback !== undefined) {
      steps.push(searchStep(fallback, entity, 'Product'));
    }
    return steps;
  },
};

const companyCount: PlanRule = {
  name: 'company-count',
  applies: (ctx) =>
    ctx.objectiveLower.includes('how many companies') &&
    ctx.entity !== null &&
    primaryCompanyColumn(ctx) !== undefined &&
    ctx.brandNameColumns.length + ctx.genericNameColumns.length > 0,
  build: (ctx) => {
    const { entity } = ctx;
    const column = primaryCompanyColumn(ctx);
    if (entity === null || column === undefined) {
      return [];
    }
    const where = [...ctx.brandNameColumns, ...ctx.genericNameColumns]
      .map((col) => containsEntity(col, entity))
      .join(' OR ');
    const company = quoteIdentifier(column);
    return [
      {
        description: `Count distinct companies that have registered ${entity} (checking multiple columns)`,
        query: `SELECT COUNT(DISTINCT ${company}) AS company_count FROM ${TABLE} WHERE ${where}`,
        validationHint: `Should return count of companies with ${entity}`,
      },
      {
        description: `List companies that have registered ${entity} (from all relevant columns)`,
        query: `SELECT DISTINCT ${company} AS company_name FROM ${TABLE} WHERE ${where}`,
        validationHint: `Should return list of companies with ${entity}`,
      },
    ];
  },
};

/** Evaluated in this order; every applicable rule contributes its steps. */
export const PLAN_RULES: readonly PlanRule[] = [
  structureDiscovery,
  companyExploration,
  entitySearch,
  companyCount,
];
