import { QueryResultRow } from "pg";
import { describe, expect, it } from "vitest";
import {
  ConfigurationError,
  DimensionMismatchError,
  UpsertBatchError,
} from "../src/domain/errors.js";
import { VectorRecord } from "../src/domain/types.js";
import { SqlExecutor } from "../src/infra/db/postgres.js";
import { PgVectorIndex } from "../src/infra/store/pgVectorIndex.js";

interface RecordedQuery {
  text: string;
  values: unknown[];
}

class FakeSqlExecutor implements SqlExecutor {
  readonly queries: RecordedQuery[] = [];

  registry: QueryResultRow[] = [];

  matchRows: QueryResultRow[] = [];

  failInsert: (call: number) => boolean = () => false;

  private insertCalls = 0;

  async query(text: string, values: unknown[] = []): Promise<{ rows: QueryResultRow[] }> {
    this.queries.push({ text, values });
    if (text.includes("SELECT name, dimension, metric")) {
      return { rows: this.registry };
    }
    if (text.includes('INSERT INTO "vec_')) {
      const call = this.insertCalls;
      this.insertCalls += 1;
      if (this.failInsert(call)) {
        throw new Error("connection reset");
      }
      return { rows: [] };
    }
    if (text.includes("COUNT(*)")) {
      return { rows: [{ count: "7" }] };
    }
    if (text.includes("AS score")) {
      return { rows: this.matchRows };
    }
    return { rows: [] };
  }

  get inserts(): RecordedQuery[] {
    return this.queries.filter((query) => query.text.includes('INSERT INTO "vec_'));
  }
}

function records(count: number): VectorRecord[] {
  return Array.from({ length: count }, (_, i) => ({
    id: `doc-${i}`,
    embedding: [i, 1],
    metadata: { text: `chunk ${i}` },
  }));
}

describe("PgVectorIndex", () => {
  it("creates the index table and registry entry on first use", async () => {
    const db = new FakeSqlExecutor();
    const index = new PgVectorIndex(db, { name: "policy-docs", dimension: 2 });

    await index.initialize();

    const texts = db.queries.map((query) => query.text);
    expect(texts.some((text) => text.includes("CREATE EXTENSION IF NOT EXISTS vector"))).toBe(true);
    expect(texts.some((text) => text.includes('CREATE TABLE IF NOT EXISTS "vec_policy_docs"'))).toBe(
      true,
    );
    expect(db.queries.at(-1)?.values).toEqual(["policy-docs", 2, "cosine"]);
  });

  it("reuses an existing index with the same dimension and metric", async () => {
    const db = new FakeSqlExecutor();
    db.registry = [{ name: "policy-docs", dimension: 2, metric: "cosine" }];
    const index = new PgVectorIndex(db, { name: "policy-docs", dimension: 2 });

    await index.initialize();

    expect(db.queries.some((query) => query.text.includes("CREATE EXTENSION"))).toBe(false);
  });

  it("refuses an existing index with a different dimension", async () => {
    const db = new FakeSqlExecutor();
    db.registry = [{ name: "policy-docs", dimension: 768, metric: "cosine" }];
    const index = new PgVectorIndex(db, { name: "policy-docs", dimension: 2 });

    await expect(index.initialize()).rejects.toThrow(ConfigurationError);
  });

  it("splits large upserts into batches of at most 100 records", async () => {
    const db = new FakeSqlExecutor();
    const index = new PgVectorIndex(db, { name: "policy-docs", dimension: 2 });

    await index.upsert(records(250));

    expect(db.inserts.map((query) => query.values.length / 3)).toEqual([100, 100, 50]);
    expect(db.inserts[0].values.slice(0, 3)).toEqual([
      "doc-0",
      "[0,1]",
      JSON.stringify({ text: "chunk 0" }),
    ]);
  });

  it("reports the ids of a failed batch after attempting the rest", async () => {
    const db = new FakeSqlExecutor();
    db.failInsert = (call) => call === 1;
    const index = new PgVectorIndex(db, { name: "policy-docs", dimension: 2 });

    const error = await index.upsert(records(250)).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UpsertBatchError);
    if (!(error instanceof UpsertBatchError)) {
      return;
    }
    expect(error.upsertedCount).toBe(150);
    expect(error.failedIds).toHaveLength(100);
    expect(error.failedIds[0]).toBe("doc-100");
    expect(error.failedIds[99]).toBe("doc-199");
    expect(db.inserts).toHaveLength(3);
  });

  it("sends a repeated id only once per upsert", async () => {
    const db = new FakeSqlExecutor();
    const index = new PgVectorIndex(db, { name: "policy-docs", dimension: 2 });

    await index.upsert([
      { id: "same", embedding: [1, 0] },
      { id: "same", embedding: [0, 1] },
    ]);

    expect(db.inserts).toHaveLength(1);
    expect(db.inserts[0].values).toEqual(["same", "[0,1]", null]);
  });

  it("rejects a wrong-sized embedding before touching the database", async () => {
    const db = new FakeSqlExecutor();
    const index = new PgVectorIndex(db, { name: "policy-docs", dimension: 2 });

    await expect(index.upsert([{ id: "bad", embedding: [1, 2, 3] }])).rejects.toThrow(
      DimensionMismatchError,
    );
    expect(db.queries).toHaveLength(0);
  });

  it("maps query rows to matches and passes the metadata filter", async () => {
    const db = new FakeSqlExecutor();
    db.matchRows = [
      { id: "doc-1", score: "0.91", metadata: { text: "chunk 1" } },
      { id: "doc-2", score: 0.5, metadata: null },
    ];
    const index = new PgVectorIndex(db, { name: "policy-docs", dimension: 2 });

    const matches = await index.query([0.5, 0.5], 2, { filter: { source: "src_1" } });

    expect(matches).toEqual([
      { id: "doc-1", score: 0.91, metadata: { text: "chunk 1" } },
      { id: "doc-2", score: 0.5 },
    ]);
    const search = db.queries.at(-1);
    expect(search?.values).toEqual(["[0.5,0.5]", JSON.stringify({ source: "src_1" }), 2]);
    expect(search?.text).toContain("1 - (embedding <=> $1::vector)");
  });

  it("scores by inner product under the dotproduct metric", async () => {
    const db = new FakeSqlExecutor();
    const index = new PgVectorIndex(db, {
      name: "policy-docs",
      dimension: 2,
      metric: "dotproduct",
    });

    await index.query([1, 0], 1);

    expect(db.queries.at(-1)?.text).toContain("-(embedding <#> $1::vector)");
    expect(db.queries.at(-1)?.values[1]).toBeNull();
  });

  it("reports the stored record count", async () => {
    const db = new FakeSqlExecutor();
    const index = new PgVectorIndex(db, { name: "policy-docs", dimension: 2 });

    expect(await index.describe()).toEqual({
      name: "policy-docs",
      backend: "managed",
      dimension: 2,
      metric: "cosine",
      recordCount: 7,
    });
  });

  it("rejects index names that cannot form a table name", () => {
    const db = new FakeSqlExecutor();
    expect(() => new PgVectorIndex(db, { name: "Policy Docs", dimension: 2 })).toThrow(
      ConfigurationError,
    );
  });
});
