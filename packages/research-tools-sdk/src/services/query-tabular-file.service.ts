import { nanoid } from 'nanoid';
import type {
  ExecutionReport,
  SchemaInfo,
  TabularDataset,
} from '@deep-research/domain/entities';
import type { IBlobStorage } from '@deep-research/domain/ports';
import {
  type QueryTabularFileInput,
  QueryTabularFileInputSchema,
  type QueryTabularFileUseCase,
} from '@deep-research/domain/usecases';
import { analyzeDatasetSchema, describeSchema } from '../tools/analyze-schema';
import { executeQueryPlan } from '../tools/execute-query-plan';
import { createQueryPlan } from '../tools/query-planner';
import { runDirectQuery } from '../tools/run-direct-query';

export type QueryTabularFileServiceOptions = {
  bucket: string;
};

const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

export function renderTabularReport(
  fileId: string,
  objective: string,
  schema: SchemaInfo,
  report: ExecutionReport,
): string {
  const lines = [
    '## Tabular Analysis Results',
    `**File:** ${fileId}`,
    `**Objective:** ${objective}`,
    `**Schema:** ${schema.columns.length} columns, ${schema.rowCount} rows`,
    '',
    '### 📊 Dataset Schema Information:',
    describeSchema(schema),
    '',
  ];

  if (report.stepsExecuted.length > 0) {
    lines.push('### 🔍 Query Execution Steps:');
    for (const step of report.stepsExecuted) {
      const icon =
        step.executionSucceeded && step.validationPassed ? '✅' : '❌';
      lines.push(`${icon} **Step ${step.stepNumber}:** ${step.description}`);
      if (!step.executionSucceeded) {
        lines.push(`   Error: ${step.feedback}`);
      }
    }
    lines.push('');
  }

  lines.push(report.finalAnswer);

  if (report.errors.length > 0 || report.warnings.length > 0) {
    lines.push('', '### 🔧 Technical Details:');
    if (report.errors.length > 0) {
      lines.push('**Errors:**', ...report.errors.map((error) => `- ${error}`));
    }
    if (report.warnings.length > 0) {
      lines.push(
        '**Warnings:**',
        ...report.warnings.map((warning) => `- ${warning}`),
      );
    }
  }

  return lines.join('\n');
}

/**
 * Entry point for tabular questions. A direct `query` wins over an
 * `objective`; either way the result is a markdown string and failures are
 * reported as `Error: …` text.
 */
export class QueryTabularFileService implements QueryTabularFileUseCase {
  constructor(
    private readonly blobStorage: IBlobStorage,
    private readonly options: QueryTabularFileServiceOptions,
  ) {}

  public async execute(input: QueryTabularFileInput): Promise<string> {
    const parsed = QueryTabularFileInputSchema.safeParse(input);
    if (!parsed.success) {
      return `Error: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`;
    }
    const { fileId, query, objective } = parsed.data;
    const requestId = nanoid(8);
    const { bucket } = this.options;
    console.log(
      `[QueryTabularFile] [${requestId}] file '${fileId}' in bucket '${bucket}'`,
    );

    let dataset: TabularDataset;
    try {
      const content = await this.blobStorage.fetch(bucket, fileId);
      if (!content || content.byteLength === 0) {
        return `Error: Could not download file '${fileId}' from bucket '${bucket}'. File not found or empty.`;
      }
      dataset = { name: fileId, content };
    } catch (error) {
      console.error(`[QueryTabularFile] [${requestId}] Download failed:`, error);
      return `Error: Could not download file '${fileId}' from bucket '${bucket}': ${errorMessage(error)}`;
    }

    if (query !== undefined) {
      console.log(`[QueryTabularFile] [${requestId}] Running direct query`);
      try {
        return await runDirectQuery({ dataset, sql: query });
      } catch (error) {
        return `Error: ${errorMessage(error)}`;
      }
    }

    if (objective === undefined) {
      return "Error: Either 'query' or 'objective' must be provided.";
    }

    const startTime = performance.now();
    let schema: SchemaInfo;
    try {
      schema = await analyzeDatasetSchema(dataset);
    } catch (error) {
      return `Error: Could not analyze dataset schema: ${errorMessage(error)}`;
    }
    console.log(
      `[QueryTabularFile] [${requestId}] Schema: ${schema.columns.length} columns, ${schema.rowCount} rows`,
    );

    const plan = createQueryPlan(objective, schema);
    console.log(
      `[QueryTabularFile] [${requestId}] Plan with ${plan.steps.length} steps`,
    );

    const report = await executeQueryPlan({ dataset, plan });
    console.log(
      `[QueryTabularFile] [${requestId}] [PERF] Analysis took ${(performance.now() - startTime).toFixed(2)}ms`,
    );
    if (!report.success) {
      return report.finalAnswer;
    }
    return renderTabularReport(fileId, objective, schema, report);
  }
}
