import type {
  ExecutionReport,
  JsonValue,
  QueryPlan,
  QueryRow,
  StepResult,
  TabularDataset,
} from '@deep-research/domain/entities';
import { findBestColumnMatch } from './column-matcher';
import { TabularSession } from './tabular-session';
import { hasCountLikeKey, validateStepResult } from './validate-step-result';

export type ExecuteQueryPlanInput = {
  dataset: TabularDataset;
  plan: QueryPlan;
};

const MAX_LISTED_VALUES = 10;

const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

const formatValue = (value: JsonValue | undefined): string => {
  if (value === undefined) {
    return '';
  }
  return typeof value === 'string' ? value : JSON.stringify(value);
};

const firstValue = (row: QueryRow): JsonValue | undefined =>
  Object.values(row)[0];

/**
 * Name of the column a failed query referenced, when the engine reports an
 * unresolvable column such as `Referenced column "Compnay" not found`.
 */
export function extractMissingColumn(message: string): string | null {
  const lower = message.toLowerCase();
  if (!lower.includes('column') || !lower.includes('not found')) {
    return null;
  }
  return /"([^"]+)"/.exec(message)?.[1] ?? null;
}

const renderRows = (rows: QueryRow[]): string[] => {
  const [first] = rows;
  if (first === undefined) {
    return ['- No records found'];
  }
  if (rows.length === 1 && hasCountLikeKey(first)) {
    return [`- Count: **${formatValue(firstValue(first))}**`];
  }
  if (rows.length === 1 && Object.keys(first).length === 1) {
    return [`- **${formatValue(firstValue(first))}**`];
  }
  const lines = [`- Found ${rows.length} records:`];
  for (const row of rows.slice(0, MAX_LISTED_VALUES)) {
    lines.push(`  - ${formatValue(firstValue(row))}`);
  }
  if (rows.length > MAX_LISTED_VALUES) {
    lines.push(`  - +${rows.length - MAX_LISTED_VALUES} more`);
  }
  return lines;
};

const countValueOf = (step: StepResult): JsonValue | undefined => {
  if (!Array.isArray(step.resultPayload)) {
    return undefined;
  }
  const [row] = step.resultPayload;
  return row === undefined ? undefined : firstValue(row);
};

/** Markdown answer built from the steps that executed and validated. */
export function composeFinalAnswer(
  plan: QueryPlan,
  steps: StepResult[],
  errors: string[],
  warnings: string[],
): string {
  const lines = [`## Analysis Results for: ${plan.objective}`, ''];
  const successful = steps.filter(
    (step) => step.executionSucceeded && step.validationPassed,
  );

  if (successful.length > 0) {
    lines.push('### Key Findings:', '');
    for (const step of successful) {
      lines.push(`**${step.description}:**`);
      if (Array.isArray(step.resultPayload)) {
        lines.push(...renderRows(step.resultPayload));
      }
      lines.push('');
    }
  }

  if (plan.expectedResultType === 'numeric_count_with_details') {
    const countStep = successful.find((step) =>
      plan.steps[step.stepNumber - 1]?.validationHint
        .toLowerCase()
        .includes('count'),
    );
    const value = countStep ? countValueOf(countStep) : undefined;
    if (value !== undefined) {
      lines.push(`### Final Answer: **${formatValue(value)}** companies`, '');
    }
  }

  if (errors.length > 0) {
    lines.push('### Issues Encountered:');
    lines.push(...errors.map((error) => `- ❌ ${error}`));
    lines.push('');
  }

  if (warnings.length > 0) {
    lines.push('### Warnings:');
    lines.push(...warnings.map((warning) => `- ⚠️ ${warning}`));
  }

  return lines.join('\n').trimEnd();
}

/**
 * Runs every step of `plan` in order against a fresh session. A failing step
 * is recorded and skipped; only a failed setup makes `success` false.
 */
export async function executeQueryPlan({
  dataset,
  plan,
}: ExecuteQueryPlanInput): Promise<ExecutionReport> {
  const report: ExecutionReport = {
    objective: plan.objective,
    stepsExecuted: [],
    errors: [],
    warnings: [],
    finalAnswer: '',
    success: true,
  };

  let session: TabularSession;
  try {
    session = await TabularSession.open(dataset);
  } catch (error) {
    const message = errorMessage(error);
    report.success = false;
    report.errors.push(`Critical error in query plan execution: ${message}`);
    report.finalAnswer = `Error: Could not execute analysis - ${message}`;
    return report;
  }

  try {
    const availableColumns = (await session.describe()).map((col) => col.name);

    for (const [index, step] of plan.steps.entries()) {
      const stepNumber = index + 1;
      console.log(
        `[QueryPlanExecutor] Step ${stepNumber}/${plan.steps.length}: ${step.description}`,
      );
      const startTime = performance.now();

      try {
        const { rows } = await session.query(step.query);
        const validation = validateStepResult(step.validationHint, rows);
        report.stepsExecuted.push({
          stepNumber,
          description: step.description,
          query: step.query,
          resultPayload: rows,
          executionSucceeded: true,
          validationPassed: validation.passed,
          feedback: validation.feedback,
        });
        if (!validation.passed) {
          report.warnings.push(
            `Step ${stepNumber} validation failed: ${validation.feedback}`,
          );
        }
      } catch (error) {
        const message = errorMessage(error);
        report.stepsExecuted.push({
          stepNumber,
          description: step.description,
          query: step.query,
          resultPayload: `Error: ${message}`,
          executionSucceeded: false,
          validationPassed: false,
          feedback: `SQL execution failed: ${message}`,
        });
        report.errors.push(`Step ${stepNumber} failed: ${message}`);

        const missing = extractMissingColumn(message);
        const suggestion =
          missing === null
            ? null
            : findBestColumnMatch(missing, availableColumns);
        if (missing !== null && suggestion !== null) {
          report.warnings.push(
            `Column '${missing}' not found. Did you mean '${suggestion}'?`,
          );
        }
      }

      console.log(
        `[QueryPlanExecutor] [PERF] Step ${stepNumber} took ${(performance.now() - startTime).toFixed(2)}ms`,
      );
    }
  } catch (error) {
    const message = errorMessage(error);
    report.success = false;
    report.errors.push(`Critical error in query plan execution: ${message}`);
    report.finalAnswer = `Error: Could not execute analysis - ${message}`;
    return report;
  } finally {
    await session.close();
  }

  report.finalAnswer = composeFinalAnswer(
    plan,
    report.stepsExecuted,
    report.errors,
    report.warnings,
  );
  return report;
}
