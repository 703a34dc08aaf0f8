import type {
  ColumnDataType,
  KeyColumns,
  SchemaInfo,
  TabularDataset,
} from '@deep-research/domain/entities';
import { Code, DomainException } from '@deep-research/domain/exceptions';
import { categorizeColumn } from './utils/column-categories';
import { quoteIdentifier } from './utils/sql-literals';
import {
  TABLE_NAME,
  TabularSession,
  withTabularSession,
} from './tabular-session';

const SAMPLE_SIZE = 5;

const INTEGER_TYPES = /^(TINYINT|SMALLINT|INTEGER|BIGINT|HUGEINT|UTINYINT|USMALLINT|UINTEGER|UBIGINT|UHUGEINT|INT\d*)$/;
const NUMERIC_TYPES = /^(DOUBLE|FLOAT|REAL|DECIMAL(\(.*\))?)$/;
const DATETIME_TYPES = /^(DATE|TIME|TIMESTAMP)/;

/** Maps a DuckDB storage type onto the coarse schema types. */
export function toColumnDataType(storageType: string): ColumnDataType {
  const normalized = storageType.trim().toUpperCase();
  if (INTEGER_TYPES.test(normalized)) {
    return 'integer';
  }
  if (NUMERIC_TYPES.test(normalized)) {
    return 'numeric';
  }
  if (DATETIME_TYPES.test(normalized)) {
    return 'datetime';
  }
  return 'text';
}

const emptyKeyColumns = (): KeyColumns => ({
  company: [],
  product: [],
  country: [],
  approval: [],
  date: [],
  status: [],
  other: [],
});

const sampleValuesOf = async (
  session: TabularSession,
  column: string,
): Promise<string[]> => {
  const col = quoteIdentifier(column);
  const { rows } = await session.query(
    `SELECT CAST(${col} AS VARCHAR) AS sample FROM ${quoteIdentifier(TABLE_NAME)} WHERE ${col} IS NOT NULL GROUP BY ${col} ORDER BY MIN(rowid) LIMIT ${SAMPLE_SIZE}`,
  );
  return rows.map((row) => String(row.sample));
};

/**
 * Profiles the dataset loaded in `session`. An empty dataset is fatal:
 * there is no partial schema.
 */
export async function analyzeSchema(
  session: TabularSession,
): Promise<SchemaInfo> {
  const described = await session.describe();
  const rowCount = await session.rowCount();

  if (described.length === 0 || rowCount === 0) {
    throw DomainException.new({
      code: Code.DATASET_EMPTY_ERROR,
      overrideMessage: `Dataset '${session.datasetName}' is empty or contains no data.`,
      data: { dataset: session.datasetName },
    });
  }

  const columns: string[] = [];
  const dataTypes: Record<string, ColumnDataType> = {};
  const sampleValues: Record<string, string[]> = {};
  const keyColumns = emptyKeyColumns();

  for (const { name, type } of described) {
    const dataType = toColumnDataType(type);
    columns.push(name);
    dataTypes[name] = dataType;
    sampleValues[name] = await sampleValuesOf(session, name);
    keyColumns[categorizeColumn(name, dataType)].push(name);
  }

  return { columns, dataTypes, sampleValues, rowCount, keyColumns };
}

export async function analyzeDatasetSchema(
  dataset: TabularDataset,
): Promise<SchemaInfo> {
  return withTabularSession(dataset, (session) => analyzeSchema(session));
}

const titleCase = (value: string) =>
  value.charAt(0).toUpperCase() + value.slice(1);

/** Markdown list of the non-empty category buckets. */
export function describeSchema(schema: SchemaInfo): string {
  const lines = ['**Columns by Category:**'];
  for (const [category, cols] of Object.entries(schema.keyColumns)) {
    if (cols.length > 0) {
      lines.push(`- **${titleCase(category)}:** ${cols.join(', ')}`);
    }
  }
  return lines.join('\n');
}
