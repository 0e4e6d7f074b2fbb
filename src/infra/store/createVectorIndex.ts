import { AppConfig } from "../../config/env.js";
import { describeError, IndexUnavailableError } from "../../domain/errors.js";
import { VectorIndex } from "../../domain/vectorIndex.js";
import { createPostgresPool, SqlExecutor } from "../db/postgres.js";
import { Logger } from "../logger.js";
import { LocalFlatIndex } from "./localFlatIndex.js";
import { PgVectorIndex } from "./pgVectorIndex.js";

export type VectorIndexBootstrapResult =
  | { backend: "managed"; index: VectorIndex; fallbackReason: null }
  | { backend: "local"; index: VectorIndex; fallbackReason: string | null };

export interface ManagedIndexConnection {
  db: SqlExecutor;
  close: () => Promise<void>;
}

export type IndexConfig = Pick<
  AppConfig,
  "databaseUrl" | "indexName" | "vectorDimension" | "vectorMetric" | "localIndexDir" | "requestTimeoutMs"
>;

/**
 * Resolves the index backend once per process: the managed index when its
 * connection is configured and initializes, otherwise the local flat index.
 */
export async function createVectorIndex(
  config: IndexConfig,
  logger: Logger,
  connect: (config: IndexConfig, logger: Logger) => ManagedIndexConnection = connectPostgres,
): Promise<VectorIndexBootstrapResult> {
  let fallbackReason: string | null = null;

  if (config.databaseUrl) {
    const connection = connect(config, logger);
    try {
      const managed = new PgVectorIndex(connection.db, {
        name: config.indexName,
        dimension: config.vectorDimension,
        metric: config.vectorMetric,
        close: connection.close,
      });
      await managed.initialize();
      logger.info(
        { backend: "managed", index: config.indexName, dimension: config.vectorDimension },
        "Vector index ready",
      );
      return { backend: "managed", index: managed, fallbackReason: null };
    } catch (error) {
      fallbackReason = describeError(error);
      logger.warn(
        { err: error, index: config.indexName },
        "Managed index unavailable, falling back to local flat index",
      );
      await connection.close().catch((closeError: unknown) => {
        logger.warn({ err: closeError }, "Failed to close managed index connection");
      });
    }
  }

  try {
    const local = await LocalFlatIndex.open({
      directory: config.localIndexDir,
      name: config.indexName,
      dimension: config.vectorDimension,
      metric: config.vectorMetric,
    });
    logger.info(
      {
        backend: "local",
        index: config.indexName,
        dimension: config.vectorDimension,
        records: local.size,
      },
      "Vector index ready",
    );
    return { backend: "local", index: local, fallbackReason };
  } catch (error) {
    throw new IndexUnavailableError(
      fallbackReason
        ? `No vector index available: managed (${fallbackReason}); local (${describeError(error)}).`
        : `Local vector index could not be opened: ${describeError(error)}`,
      { cause: error },
    );
  }
}

function connectPostgres(config: IndexConfig, logger: Logger): ManagedIndexConnection {
  if (!config.databaseUrl) {
    throw new IndexUnavailableError("DATABASE_URL is required for the managed index.");
  }
  const pool = createPostgresPool(config.databaseUrl, config.requestTimeoutMs);
  pool.on("error", (error) => {
    logger.error({ err: error }, "Idle PostgreSQL client error");
  });
  return {
    db: { query: (text, values) => pool.query(text, values) },
    close: () => pool.end(),
  };
}
