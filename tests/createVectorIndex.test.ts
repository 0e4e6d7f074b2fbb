import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { IndexUnavailableError } from "../src/domain/errors.js";
import { createSilentLogger } from "../src/infra/logger.js";
import {
  createVectorIndex,
  IndexConfig,
  ManagedIndexConnection,
} from "../src/infra/store/createVectorIndex.js";

const TEMP_DIR = path.resolve(".tmp-tests-index-factory");

function config(overrides: Partial<IndexConfig> = {}): IndexConfig {
  return {
    databaseUrl: null,
    indexName: "factory-test",
    vectorDimension: 3,
    vectorMetric: "cosine",
    localIndexDir: TEMP_DIR,
    requestTimeoutMs: 1_000,
    ...overrides,
  };
}

function connection(query: ManagedIndexConnection["db"]["query"]) {
  const close = vi.fn(async () => {});
  const connect = vi.fn((): ManagedIndexConnection => ({ db: { query }, close }));
  return { connect, close };
}

describe("createVectorIndex", () => {
  afterEach(async () => {
    await fs.rm(TEMP_DIR, { recursive: true, force: true });
  });

  it("uses the local index when no database is configured", async () => {
    const { connect } = connection(async () => ({ rows: [] }));

    const result = await createVectorIndex(config(), createSilentLogger(), connect);

    expect(result.backend).toBe("local");
    expect(result.fallbackReason).toBeNull();
    expect(result.index.backend).toBe("local");
    expect(connect).not.toHaveBeenCalled();
  });

  it("uses the managed index when it initializes", async () => {
    const { connect } = connection(async () => ({ rows: [] }));

    const result = await createVectorIndex(
      config({ databaseUrl: "postgres://localhost/test" }),
      createSilentLogger(),
      connect,
    );

    expect(result.backend).toBe("managed");
    expect(result.index.name).toBe("factory-test");
  });

  it("falls back to the local index when the managed index cannot initialize", async () => {
    const { connect, close } = connection(async () => {
      throw new Error("connect ECONNREFUSED");
    });

    const result = await createVectorIndex(
      config({ databaseUrl: "postgres://localhost/test" }),
      createSilentLogger(),
      connect,
    );

    expect(result.backend).toBe("local");
    expect(result.fallbackReason).toBe("connect ECONNREFUSED");
    expect(close).toHaveBeenCalledTimes(1);
  });

  it("fails when neither backend can be opened", async () => {
    const { connect } = connection(async () => {
      throw new Error("connect ECONNREFUSED");
    });
    await fs.mkdir(TEMP_DIR, { recursive: true });
    await fs.writeFile(path.join(TEMP_DIR, "factory-test.ids.json"), "{}", "utf-8");

    await expect(
      createVectorIndex(
        config({ databaseUrl: "postgres://localhost/test" }),
        createSilentLogger(),
        connect,
      ),
    ).rejects.toThrow(IndexUnavailableError);
  });
});
