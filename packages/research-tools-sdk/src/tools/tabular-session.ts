import type { DuckDBConnection, DuckDBInstance } from '@duckdb/node-api';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { extname, join } from 'node:path';
import type {
  JsonValue,
  QueryRow,
  TabularDataset,
} from '@deep-research/domain/entities';
import { Code, DomainException } from '@deep-research/domain/exceptions';
import { quoteIdentifier, quoteLiteral } from './utils/sql-literals';

/** Name under which every dataset is exposed to queries. */
export const TABLE_NAME = 'current_csv_table';

export type ColumnDescription = {
  name: string;
  type: string;
};

export type QueryResult = {
  columns: string[];
  rows: QueryRow[];
};

const readerFor = (fileName: string, path: string): string => {
  const source = quoteLiteral(path);
  switch (extname(fileName).toLowerCase()) {
    case '.tsv':
      return `read_csv(${source}, header = true, delim = '\t', auto_detect = true)`;
    case '.json':
    case '.jsonl':
    case '.ndjson':
      return `read_json_auto(${source})`;
    case '.parquet':
      return `read_parquet(${source})`;
    default:
      return `read_csv(${source}, header = true, auto_detect = true)`;
  }
};

/**
 * Converts a DuckDB JS value into plain JSON. BIGINTs become numbers when
 * they fit, strings otherwise; timestamps and dates become ISO strings.
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'bigint') {
    return value >= BigInt(Number.MIN_SAFE_INTEGER) &&
      value <= BigInt(Number.MAX_SAFE_INTEGER)
      ? Number(value)
      : value.toString();
  }
  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  ) {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString('base64');
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toJsonValue(item));
  }
  if (typeof value === 'object') {
    const entries = Object.entries(value).map(
      ([key, item]): [string, JsonValue] => [key, toJsonValue(item)],
    );
    return Object.fromEntries(entries);
  }
  return String(value);
}

const toQueryRow = (row: Record<string, unknown>): QueryRow => {
  const normalized: QueryRow = {};
  for (const [key, value] of Object.entries(row)) {
    normalized[key] = toJsonValue(value);
  }
  return normalized;
};

/**
 * One in-memory DuckDB database holding a single dataset as
 * `current_csv_table`. Opened per request and closed when the request ends.
 */
export class TabularSession {
  private closed = false;

  private constructor(
    private readonly instance: DuckDBInstance,
    private readonly conn: DuckDBConnection,
    private readonly workDir: string,
    public readonly datasetName: string,
  ) {}

  /**
   * Loads the dataset. Throws DATASET_UNREADABLE_ERROR when it cannot be
   * staged or parsed; nothing is left open in that case.
   */
  static async open(dataset: TabularDataset): Promise<TabularSession> {
    const startTime = performance.now();
    const workDir = await mkdtemp(join(tmpdir(), 'tabular-session-'));
    let instance: DuckDBInstance | null = null;
    let conn: DuckDBConnection | null = null;

    try {
      const fileName = `dataset${extname(dataset.name).toLowerCase() || '.csv'}`;
      const filePath = join(workDir, fileName);
      await writeFile(filePath, dataset.content);

      const duckdb = await import('@duckdb/node-api');
      instance = await duckdb.DuckDBInstance.create(':memory:');
      conn = await instance.connect();
      await conn.run(
        `CREATE TABLE ${quoteIdentifier(TABLE_NAME)} AS SELECT * FROM ${readerFor(fileName, filePath)}`,
      );

      const loadTime = performance.now() - startTime;
      console.log(
        `[DuckDBSession] [PERF] Loaded '${dataset.name}' in ${loadTime.toFixed(2)}ms`,
      );
      return new TabularSession(instance, conn, workDir, dataset.name);
    } catch (error) {
      conn?.closeSync();
      instance?.closeSync();
      await rm(workDir, { recursive: true, force: true });
      throw DomainException.new({
        code: Code.DATASET_UNREADABLE_ERROR,
        overrideMessage: `Could not read dataset '${dataset.name}': ${
          error instanceof Error ? error.message : String(error)
        }`,
        data: { dataset: dataset.name },
      });
    }
  }

  async query(sql: string): Promise<QueryResult> {
    const reader = await this.conn.runAndReadAll(sql);
    const rows = reader.getRowObjectsJS().map((row) => toQueryRow(row));
    return { columns: reader.columnNames(), rows };
  }

  async describe(): Promise<ColumnDescription[]> {
    const { rows } = await this.query(`DESCRIBE ${quoteIdentifier(TABLE_NAME)}`);
    return rows.map((row) => ({
      name: String(row.column_name),
      type: String(row.column_type),
    }));
  }

  async rowCount(): Promise<number> {
    const { rows } = await this.query(
      `SELECT COUNT(*) AS row_count FROM ${quoteIdentifier(TABLE_NAME)}`,
    );
    const value = rows[0]?.row_count;
    return typeof value === 'number' ? value : Number(value ?? 0);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.conn.closeSync();
    this.instance.closeSync();
    await rm(this.workDir, { recursive: true, force: true });
  }
}

/** Opens a session, hands it to `work` and always closes it afterwards. */
export async function withTabularSession<T>(
  dataset: TabularDataset,
  work: (session: TabularSession) => Promise<T>,
): Promise<T> {
  const session = await TabularSession.open(dataset);
  try {
    return await work(session);
  } finally {
    await session.close();
  }
}
