export type MetadataValue = string | number | boolean;

export type RecordMetadata = Record<string, MetadataValue>;

export type VectorMetric = "cosine" | "dotproduct";

export type IndexBackend = "managed" | "local";

export interface Chunk {
  text: string;
  ordinal: number;
}

export interface VectorRecord {
  id: string;
  embedding: number[];
  metadata?: RecordMetadata;
}

export interface Match {
  id: string;
  score: number;
  metadata?: RecordMetadata;
}

export interface ClauseEvidence {
  text: string;
  explanation?: string;
}

export interface AnswerBundle {
  answer: string;
  clauses: ClauseEvidence[];
  decision_rationale: string;
}

export interface DocumentQueryRequest {
  documents: string;
  questions: string[];
}

export interface DocumentQueryResponse {
  answers: AnswerBundle[];
}
