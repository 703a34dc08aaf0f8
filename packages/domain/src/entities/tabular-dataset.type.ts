/**
 * Raw tabular file as retrieved from storage. The name's extension selects
 * the reader (csv, tsv, json, jsonl, parquet).
 */
export type TabularDataset = {
  name: string;
  content: Uint8Array;
};
