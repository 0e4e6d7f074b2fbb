import { DimensionMismatchError } from "../../domain/errors.js";
import {
  Match,
  RecordMetadata,
  VectorMetric,
  VectorRecord,
} from "../../domain/types.js";
import { IndexStats, QueryOptions, VectorIndex } from "../../domain/vectorIndex.js";
import { dotProduct, l2Normalize } from "../../utils/vector.js";
import { FlatIndexSnapshot, FlatIndexStorage } from "./flatIndexStorage.js";
import { assertEmbeddingDimensions, assertTopK, matchesFilter } from "./indexGuards.js";

export interface LocalFlatIndexOptions {
  directory: string;
  name: string;
  dimension: number;
  metric?: VectorMetric;
}

/**
 * Exact nearest-neighbour index held in memory and persisted beside the
 * process. Under the cosine metric vectors are L2-normalized on the way in,
 * so the inner product equals cosine similarity.
 */
export class LocalFlatIndex implements VectorIndex {
  readonly backend = "local" as const;

  readonly name: string;

  readonly dimension: number;

  readonly metric: VectorMetric;

  private state: FlatIndexSnapshot;

  private writeChain: Promise<void> = Promise.resolve();

  private constructor(
    private readonly storage: FlatIndexStorage,
    options: LocalFlatIndexOptions,
    state: FlatIndexSnapshot,
  ) {
    this.name = options.name;
    this.dimension = options.dimension;
    this.metric = options.metric ?? "cosine";
    this.state = state;
  }

  static async open(options: LocalFlatIndexOptions): Promise<LocalFlatIndex> {
    const storage = new FlatIndexStorage(options.directory, options.name);
    const loaded = await storage.load(options.dimension);
    return new LocalFlatIndex(
      storage,
      options,
      loaded ?? {
        dimension: options.dimension,
        generation: 0,
        vectors: [],
        ids: [],
        metadata: new Map(),
      },
    );
  }

  get size(): number {
    return this.state.ids.length;
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    assertEmbeddingDimensions(records, this.dimension);
    if (records.length === 0) {
      return;
    }

    const prepared = records.map((record) => ({
      id: record.id,
      vector: this.prepareVector(record.embedding),
      metadata: record.metadata,
    }));

    await this.enqueueWrite(async () => {
      const next = applyUpserts(this.state, prepared);
      await this.storage.save(next);
      this.state = next;
    });
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

    const state = this.state;
    if (state.ids.length === 0) {
      return [];
    }

    const queryVector = this.prepareVector(embedding);
    const scored: Array<{ position: number; score: number }> = [];
    for (let position = 0; position < state.vectors.length; position += 1) {
      const id = state.ids[position];
      if (options?.filter && !matchesFilter(state.metadata.get(id), options.filter)) {
        continue;
      }
      scored.push({ position, score: dotProduct(queryVector, state.vectors[position]) });
    }

    scored.sort((a, b) => b.score - a.score || a.position - b.position);

    const includeMetadata = options?.includeMetadata ?? true;
    return scored.slice(0, topK).map(({ position, score }) => {
      const id = state.ids[position];
      const metadata = includeMetadata ? state.metadata.get(id) : undefined;
      return metadata ? { id, score, metadata: { ...metadata } } : { id, score };
    });
  }

  async persist(): Promise<void> {
    await this.enqueueWrite(async () => {
      await this.storage.save(this.state);
    });
  }

  async describe(): Promise<IndexStats> {
    return {
      name: this.name,
      backend: this.backend,
      dimension: this.dimension,
      metric: this.metric,
      recordCount: this.state.ids.length,
    };
  }

  async close(): Promise<void> {
    await this.writeChain;
  }

  private prepareVector(embedding: number[]): Float32Array {
    return this.metric === "cosine" ? l2Normalize(embedding) : Float32Array.from(embedding);
  }

  private enqueueWrite(task: () => Promise<void>): Promise<void> {
    const run = this.writeChain.then(task);
    // A failed write must not block the writes queued behind it.
    this.writeChain = run.catch(() => undefined);
    return run;
  }
}

function applyUpserts(
  current: FlatIndexSnapshot,
  records: Array<{ id: string; vector: Float32Array; metadata?: RecordMetadata }>,
): FlatIndexSnapshot {
  const vectors = [...current.vectors];
  const ids = [...current.ids];
  const metadata = new Map(current.metadata);
  const positions = new Map<string, number>(ids.map((id, position) => [id, position]));

  for (const record of records) {
    const existing = positions.get(record.id);
    if (existing === undefined) {
      positions.set(record.id, ids.length);
      ids.push(record.id);
      vectors.push(record.vector);
    } else {
      vectors[existing] = record.vector;
    }

    if (record.metadata) {
      metadata.set(record.id, { ...record.metadata });
    } else {
      metadata.delete(record.id);
    }
  }

  return {
    dimension: current.dimension,
    generation: current.generation + 1,
    vectors,
    ids,
    metadata,
  };
}
