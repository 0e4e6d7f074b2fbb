import { z } from "zod";
import {
  ConfigurationError,
  DimensionMismatchError,
  UpsertBatchError,
} from "../../domain/errors.js";
import { Match, VectorMetric, VectorRecord } from "../../domain/types.js";
import { IndexStats, QueryOptions, VectorIndex } from "../../domain/vectorIndex.js";
import { SqlExecutor } from "../db/postgres.js";
import { assertEmbeddingDimensions, assertTopK } from "./indexGuards.js";

export const MAX_UPSERT_BATCH_SIZE = 100;

const REGISTRY_TABLE = "vector_index_registry";

const registryRowSchema = z.object({
  name: z.string(),
  dimension: z.coerce.number().int(),
  metric: z.enum(["cosine", "dotproduct"]),
});

const matchRowSchema = z.object({
  id: z.string(),
  score: z.coerce.number(),
  metadata: z.record(z.union([z.string(), z.number(), z.boolean()])).nullable().optional(),
});

const countRowSchema = z.object({
  count: z.coerce.number().int(),
});

export interface PgVectorIndexOptions {
  name: string;
  dimension: number;
  metric?: VectorMetric;
  batchSize?: number;
  close?: () => Promise<void>;
}

/**
 * Managed index backed by PostgreSQL + pgvector. Each named index owns one
 * table; a registry table records the dimension and metric it was created
 * with, which then stay fixed for its lifetime.
 */
export class PgVectorIndex implements VectorIndex {
  readonly backend = "managed" as const;

  readonly name: string;

  readonly dimension: number;

  readonly metric: VectorMetric;

  private readonly tableName: string;

  private readonly batchSize: number;

  private initialization: Promise<void> | null = null;

  constructor(
    private readonly db: SqlExecutor,
    private readonly options: PgVectorIndexOptions,
  ) {
    if (!/^[a-z0-9][a-z0-9-]{0,44}$/.test(options.name)) {
      throw new ConfigurationError(
        `Invalid index name "${options.name}": use lowercase letters, digits and hyphens (max 45).`,
      );
    }
    this.name = options.name;
    this.dimension = options.dimension;
    this.metric = options.metric ?? "cosine";
    this.tableName = `vec_${options.name.replace(/-/g, "_")}`;
    this.batchSize = Math.min(options.batchSize ?? MAX_UPSERT_BATCH_SIZE, MAX_UPSERT_BATCH_SIZE);
  }

  /** Lists registered indexes and creates this one when it is absent. */
  initialize(): Promise<void> {
    if (!this.initialization) {
      this.initialization = this.ensureIndex().catch((error: unknown) => {
        this.initialization = null;
        throw error;
      });
    }
    return this.initialization;
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    assertEmbeddingDimensions(records, this.dimension);
    if (records.length === 0) {
      return;
    }
    await this.initialize();

    const unique = keepLastById(records);
    const failedIds: string[] = [];
    const causes: unknown[] = [];
    let upsertedCount = 0;

    for (let start = 0; start < unique.length; start += this.batchSize) {
      const batch = unique.slice(start, start + this.batchSize);
      try {
        await this.upsertBatch(batch);
        upsertedCount += batch.length;
      } catch (error) {
        failedIds.push(...batch.map((record) => record.id));
        causes.push(error);
      }
    }

    if (failedIds.length > 0) {
      throw new UpsertBatchError(failedIds, upsertedCount, {
        cause: causes.length === 1 ? causes[0] : new AggregateError(causes),
      });
    }
  }

  async query(
    embedding: number[],
    topK: number,
    options?: QueryOptions,
  ): Promise<Match[]> {
    assertTopK(topK);
    if (embedding.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, embedding.length);
    }
    await this.initialize();

    const includeMetadata = options?.includeMetadata ?? true;
    const filter = options?.filter && Object.keys(options.filter).length > 0 ? options.filter : null;
    const { distance, score } = metricExpressions(this.metric);

    const result = await this.db.query(
      `
        SELECT
          id,
          ${score} AS score,
          ${includeMetadata ? "metadata" : "NULL::jsonb AS metadata"}
        FROM ${quoteIdent(this.tableName)}
        WHERE ($2::jsonb IS NULL OR metadata @> $2::jsonb)
        ORDER BY ${distance} ASC, seq ASC
        LIMIT $3
      `,
      [toVectorLiteral(embedding), filter ? JSON.stringify(filter) : null, topK],
    );

    return result.rows.map((row) => {
      const parsed = matchRowSchema.parse(row);
      return parsed.metadata
        ? { id: parsed.id, score: parsed.score, metadata: parsed.metadata }
        : { id: parsed.id, score: parsed.score };
    });
  }

  async persist(): Promise<void> {
    // Writes are durable once each statement commits.
  }

  async describe(): Promise<IndexStats> {
    await this.initialize();
    const result = await this.db.query(
      `SELECT COUNT(*)::int AS count FROM ${quoteIdent(this.tableName)}`,
    );
    const [row] = result.rows;
    return {
      name: this.name,
      backend: this.backend,
      dimension: this.dimension,
      metric: this.metric,
      recordCount: row ? countRowSchema.parse(row).count : 0,
    };
  }

  async close(): Promise<void> {
    await this.options.close?.();
  }

  private async ensureIndex(): Promise<void> {
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS ${REGISTRY_TABLE} (
        name TEXT PRIMARY KEY,
        dimension INTEGER NOT NULL,
        metric TEXT NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    const listed = await this.db.query(
      `SELECT name, dimension, metric FROM ${REGISTRY_TABLE} ORDER BY name ASC`,
    );
    const existing = listed.rows
      .map((row) => registryRowSchema.parse(row))
      .find((row) => row.name === this.name);

    if (existing) {
      if (existing.dimension !== this.dimension || existing.metric !== this.metric) {
        throw new ConfigurationError(
          `Managed index "${this.name}" exists with dimension ${existing.dimension} and metric ${existing.metric}; configured ${this.dimension}/${this.metric}.`,
        );
      }
      return;
    }

    await this.db.query(`CREATE EXTENSION IF NOT EXISTS vector`);
    await this.db.query(`
      CREATE TABLE IF NOT EXISTS ${quoteIdent(this.tableName)} (
        id TEXT PRIMARY KEY,
        seq BIGSERIAL,
        embedding VECTOR(${this.dimension}) NOT NULL,
        metadata JSONB,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    await this.db.query(
      `
        INSERT INTO ${REGISTRY_TABLE} (name, dimension, metric)
        VALUES ($1, $2, $3)
        ON CONFLICT (name) DO NOTHING
      `,
      [this.name, this.dimension, this.metric],
    );
  }

  private async upsertBatch(batch: VectorRecord[]): Promise<void> {
    const values: unknown[] = [];
    const tuples = batch.map((record, row) => {
      const offset = row * 3;
      values.push(
        record.id,
        toVectorLiteral(record.embedding),
        record.metadata ? JSON.stringify(record.metadata) : null,
      );
      return `($${offset + 1}, $${offset + 2}::vector, $${offset + 3}::jsonb)`;
    });

    await this.db.query(
      `
        INSERT INTO ${quoteIdent(this.tableName)} (id, embedding, metadata)
        VALUES ${tuples.join(", ")}
        ON CONFLICT (id)
        DO UPDATE SET embedding = EXCLUDED.embedding, metadata = EXCLUDED.metadata, updated_at = NOW()
      `,
      values,
    );
  }
}

function metricExpressions(metric: VectorMetric): { distance: string; score: string } {
  if (metric === "dotproduct") {
    // `<#>` yields the negated inner product.
    return {
      distance: "(embedding <#> $1::vector)",
      score: "(-(embedding <#> $1::vector))",
    };
  }
  return {
    distance: "(embedding <=> $1::vector)",
    score: "(1 - (embedding <=> $1::vector))",
  };
}

// One INSERT .. ON CONFLICT statement cannot touch the same row twice.
function keepLastById(records: VectorRecord[]): VectorRecord[] {
  const byId = new Map<string, VectorRecord>();
  for (const record of records) {
    byId.delete(record.id);
    byId.set(record.id, record);
  }
  return [...byId.values()];
}

function quoteIdent(identifier: string): string {
  return `"${identifier.replace(/"/g, '""')}"`;
}

function toVectorLiteral(values: number[]): string {
  return `[${values.join(",")}]`;
}
