import { describe, expect, it } from 'vitest';
import type { QueryPlan, StepResult } from '@deep-research/domain/entities';
import { analyzeDatasetSchema } from '../../src/tools/analyze-schema';
import {
  composeFinalAnswer,
  executeQueryPlan,
  extractMissingColumn,
} from '../../src/tools/execute-query-plan';
import { createQueryPlan } from '../../src/tools/query-planner';
import { PRODUCTS_CSV, csvDataset } from '../helpers/fixtures';

const dataset = csvDataset(PRODUCTS_CSV);

describe('executeQueryPlan', () => {
  it('should continue past a failing step and suggest the intended column', async () => {
    const plan: QueryPlan = {
      objective: 'How many rows are there?',
      expectedResultType: 'numeric_count_with_details',
      steps: [
        {
          description: 'Read misspelled column',
          query: 'SELECT "Compnay" FROM current_csv_table',
          validationHint: '',
        },
        {
          description: 'Count rows',
          query: 'SELECT COUNT(*) AS row_count FROM current_csv_table',
          validationHint: 'Should return count of rows',
        },
      ],
    };

    const report = await executeQueryPlan({ dataset, plan });

    expect(report.success).toBe(true);
    expect(report.stepsExecuted.map((s) => s.executionSucceeded)).toEqual([
      false,
      true,
    ]);
    expect(report.stepsExecuted[1]?.resultPayload).toEqual([{ row_count: 3 }]);
    expect(report.errors).toHaveLength(1);
    expect(report.errors[0]).toMatch(/^Step 1 failed: /);
    expect(report.warnings).toEqual([
      "Column 'Compnay' not found. Did you mean 'Company'?",
    ]);
    expect(report.finalAnswer).toContain('**Count rows:**\n- Count: **3**');
    expect(report.finalAnswer).toContain('### Final Answer: **3** companies');
    expect(report.finalAnswer).toContain('### Issues Encountered:\n- ❌ Step 1 failed: ');
    expect(report.finalAnswer).toContain(
      "### Warnings:\n- ⚠️ Column 'Compnay' not found. Did you mean 'Company'?",
    );
  });

  it('should record a validation failure as a warning and leave the step out of the answer', async () => {
    const plan: QueryPlan = {
      objective: 'Show companies',
      expectedResultType: 'general_information',
      steps: [
        {
          description: 'Companies as a count',
          query: 'SELECT "Company" FROM current_csv_table',
          validationHint: 'Should return count of companies',
        },
        {
          description: 'Chilean companies',
          query: `SELECT "Company" FROM current_csv_table WHERE "Country" = 'Chile'`,
          validationHint: 'Should return rows',
        },
      ],
    };

    const report = await executeQueryPlan({ dataset, plan });

    expect(report.stepsExecuted.map((s) => s.validationPassed)).toEqual([
      false,
      true,
    ]);
    expect(report.stepsExecuted[1]?.resultPayload).toEqual([]);
    expect(report.warnings).toEqual([
      'Step 1 validation failed: Expected a single row with a count column, got 3 rows',
    ]);
    expect(report.finalAnswer).not.toContain('Companies as a count');
    expect(report.finalAnswer).toContain('**Chilean companies:**\n- No records found');
  });

  it('should report a failed setup without running any step', async () => {
    const plan = createQueryPlan('How many companies are listed?', {
      columns: ['Company'],
      dataTypes: { Company: 'text' },
      sampleValues: { Company: [] },
      rowCount: 1,
      keyColumns: {
        company: ['Company'],
        product: [],
        country: [],
        approval: [],
        date: [],
        status: [],
        other: [],
      },
    });

    const report = await executeQueryPlan({
      dataset: csvDataset('definitely not parquet', 'broken.parquet'),
      plan,
    });

    expect(report.success).toBe(false);
    expect(report.stepsExecuted).toEqual([]);
    expect(report.errors[0]).toMatch(
      /^Critical error in query plan execution: Could not read dataset 'broken.parquet'/,
    );
    expect(report.finalAnswer).toMatch(
      /^Error: Could not execute analysis - Could not read dataset 'broken.parquet'/,
    );
  });

  it('should answer how many companies registered an entity across brand and generic names', async () => {
    const objective = 'How many companies have registered TIAROTEC?';
    const schema = await analyzeDatasetSchema(dataset);
    const plan = createQueryPlan(objective, schema);

    const report = await executeQueryPlan({ dataset, plan });

    expect(report.success).toBe(true);
    expect(report.errors).toEqual([]);
    expect(report.stepsExecuted).toHaveLength(6);
    expect(
      report.stepsExecuted.every((s) => s.executionSucceeded && s.validationPassed),
    ).toBe(true);
    expect(report.stepsExecuted[4]?.resultPayload).toEqual([
      { company_count: 2 },
    ]);
    const listed = report.stepsExecuted[5]?.resultPayload;
    expect(Array.isArray(listed) ? listed.map((row) => row.company_name).sort() : listed).toEqual([
      'Alpha Pharma',
      'Beta Labs',
    ]);
    expect(report.finalAnswer).toContain('### Final Answer: **2** companies');
  });
});

describe('extractMissingColumn', () => {
  it('should extract the quoted name from an unknown column error', () => {
    expect(
      extractMissingColumn(
        'Binder Error: Referenced column "Compnay" not found in FROM clause!',
      ),
    ).toBe('Compnay');
    expect(extractMissingColumn('Parser Error: syntax error at "FORM"')).toBeNull();
  });
});

describe('composeFinalAnswer', () => {
  const step = (
    stepNumber: number,
    description: string,
    resultPayload: StepResult['resultPayload'],
  ): StepResult => ({
    stepNumber,
    description,
    query: 'SELECT 1',
    resultPayload,
    executionSucceeded: true,
    validationPassed: true,
    feedback: '',
  });

  it('should cap listed values at ten with an overflow line', () => {
    const rows = Array.from({ length: 12 }, (_, i) => ({ name: `Item ${i + 1}` }));
    const plan: QueryPlan = {
      objective: 'List items',
      expectedResultType: 'list_of_items',
      steps: [{ description: 'All items', query: 'SELECT 1', validationHint: 'list' }],
    };

    const answer = composeFinalAnswer(plan, [step(1, 'All items', rows)], [], []);

    expect(answer).toBe(
      [
        '## Analysis Results for: List items',
        '',
        '### Key Findings:',
        '',
        '**All items:**',
        '- Found 12 records:',
        ...Array.from({ length: 10 }, (_, i) => `  - Item ${i + 1}`),
        '  - +2 more',
      ].join('\n'),
    );
  });

  it('should render a single value as a bold scalar', () => {
    const plan: QueryPlan = {
      objective: 'Top brand',
      expectedResultType: 'general_information',
      steps: [{ description: 'Top brand', query: 'SELECT 1', validationHint: '' }],
    };

    const answer = composeFinalAnswer(
      plan,
      [step(1, 'Top brand', [{ BrandName: 'Spiriva' }])],
      [],
      [],
    );

    expect(answer).toContain('**Top brand:**\n- **Spiriva**');
  });
});
