import {
  IndexBackend,
  Match,
  RecordMetadata,
  VectorMetric,
  VectorRecord,
} from "./types.js";

export interface QueryOptions {
  includeMetadata?: boolean;
  /** Metadata equality constraints; a match must satisfy every entry. */
  filter?: RecordMetadata;
}

export interface IndexStats {
  name: string;
  backend: IndexBackend;
  dimension: number;
  metric: VectorMetric;
  recordCount: number;
}

export interface VectorIndex {
  readonly name: string;
  readonly backend: IndexBackend;
  readonly dimension: number;
  readonly metric: VectorMetric;
  upsert(records: VectorRecord[]): Promise<void>;
  query(embedding: number[], topK: number, options?: QueryOptions): Promise<Match[]>;
  persist(): Promise<void>;
  describe(): Promise<IndexStats>;
  close(): Promise<void>;
}
