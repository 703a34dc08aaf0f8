import type { TabularDataset } from '@deep-research/domain/entities';
import { findBestColumnMatch } from './column-matcher';
import { extractMissingColumn } from './execute-query-plan';
import { withTabularSession } from './tabular-session';
import { assertReadOnlySql } from './utils/sql-guard';

export type RunDirectQueryInput = {
  dataset: TabularDataset;
  sql: string;
};

const errorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

/**
 * Runs a caller-supplied read-only statement and renders the rows as a
 * markdown report. Query failures are rendered too, with a column
 * suggestion when the engine names an unknown column.
 */
export async function runDirectQuery({
  dataset,
  sql: rawSql,
}: RunDirectQueryInput): Promise<string> {
  const sql = assertReadOnlySql(rawSql);

  return withTabularSession(dataset, async (session) => {
    const columns = (await session.describe()).map((col) => col.name);
    const rowCount = await session.rowCount();
    const availableColumns = `**Available Columns:** ${columns.join(', ')}`;

    try {
      const startTime = performance.now();
      const { rows } = await session.query(sql);
      console.log(
        `[DirectQuery] [PERF] ${rows.length} rows in ${(performance.now() - startTime).toFixed(2)}ms`,
      );

      return [
        '## Tabular Query Results',
        `**File:** ${dataset.name} (${rowCount} rows, ${columns.length} columns)`,
        `**Query:** \`${sql}\``,
        `**Results:** ${rows.length} records found`,
        '',
        '### Data:',
        '```json',
        JSON.stringify(rows, null, 2),
        '```',
        '',
        availableColumns,
      ].join('\n');
    } catch (error) {
      const message = errorMessage(error);
      const missing = extractMissingColumn(message);
      const suggestion =
        missing === null ? null : findBestColumnMatch(missing, columns);

      if (missing !== null && suggestion !== null) {
        return [
          `Error: ${message}`,
          '',
          `💡 **Suggestion:** Column '${missing}' not found. Did you mean '${suggestion}'?`,
          '',
          availableColumns,
        ].join('\n');
      }
      return [
        `Error: Could not execute query on file '${dataset.name}': ${message}`,
        '',
        availableColumns,
      ].join('\n');
    }
  });
}
