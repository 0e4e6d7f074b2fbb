import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import {
  ConfigurationError,
  CorruptIndexError,
  IndexUnavailableError,
} from "../../domain/errors.js";
import { RecordMetadata } from "../../domain/types.js";

const CURRENT_FORMAT_VERSION = 1;
const VECTOR_FILE_MAGIC = "FVEC";
const VECTOR_HEADER_BYTES = 20;

export interface FlatIndexSnapshot {
  dimension: number;
  generation: number;
  /** Row-major, one entry per stored position. */
  vectors: Float32Array[];
  /** Position -> external id. */
  ids: string[];
  /** External id -> metadata. */
  metadata: Map<string, RecordMetadata>;
}

export interface FlatIndexFiles {
  vectors: string;
  ids: string;
  metadata: string;
}

const metadataValueSchema = z.union([z.string(), z.number(), z.boolean()]);

const idsFileSchema = z.object({
  format_version: z.literal(CURRENT_FORMAT_VERSION),
  generation: z.number().int().nonnegative(),
  ids: z.array(z.string()),
});

const metadataFileSchema = z.object({
  format_version: z.literal(CURRENT_FORMAT_VERSION),
  generation: z.number().int().nonnegative(),
  metadata: z.record(z.record(metadataValueSchema)),
});

/**
 * Persists a flat index as three artifacts: a binary vector store and two
 * JSON mappings. Every artifact carries the same generation stamp, and each
 * is written to a temp file then renamed into place.
 */
export class FlatIndexStorage {
  readonly files: FlatIndexFiles;

  constructor(directory: string, indexName: string) {
    const base = path.join(path.resolve(directory), indexName);
    this.files = {
      vectors: `${base}.vectors.bin`,
      ids: `${base}.ids.json`,
      metadata: `${base}.metadata.json`,
    };
  }

  async load(expectedDimension: number): Promise<FlatIndexSnapshot | null> {
    const present = await Promise.all(
      Object.values(this.files).map((filePath) => fileExists(filePath)),
    );
    if (present.every((exists) => !exists)) {
      return null;
    }
    if (!present.every(Boolean)) {
      throw new CorruptIndexError(
        `Incomplete local index state: expected ${Object.values(this.files).join(", ")} to exist together.`,
      );
    }

    const vectorFile = decodeVectorFile(await fs.readFile(this.files.vectors), this.files.vectors);
    const idsFile = parseJsonFile(
      await fs.readFile(this.files.ids, "utf-8"),
      idsFileSchema,
      this.files.ids,
    );
    const metadataFile = parseJsonFile(
      await fs.readFile(this.files.metadata, "utf-8"),
      metadataFileSchema,
      this.files.metadata,
    );

    if (
      vectorFile.generation !== idsFile.generation ||
      vectorFile.generation !== metadataFile.generation
    ) {
      throw new CorruptIndexError(
        `Local index artifacts disagree on generation (vectors=${vectorFile.generation}, ids=${idsFile.generation}, metadata=${metadataFile.generation}).`,
      );
    }
    if (vectorFile.vectors.length !== idsFile.ids.length) {
      throw new CorruptIndexError(
        `Local index holds ${vectorFile.vectors.length} vectors but ${idsFile.ids.length} id mappings.`,
      );
    }
    if (new Set(idsFile.ids).size !== idsFile.ids.length) {
      throw new CorruptIndexError("Local index id mapping contains duplicate ids.");
    }
    if (vectorFile.dimension !== expectedDimension) {
      throw new ConfigurationError(
        `Local index "${path.basename(this.files.vectors)}" has dimension ${vectorFile.dimension}, configured dimension is ${expectedDimension}.`,
      );
    }

    return {
      dimension: vectorFile.dimension,
      generation: vectorFile.generation,
      vectors: vectorFile.vectors,
      ids: idsFile.ids,
      metadata: new Map(Object.entries(metadataFile.metadata)),
    };
  }

  async save(snapshot: FlatIndexSnapshot): Promise<void> {
    await fs.mkdir(path.dirname(this.files.vectors), { recursive: true });

    const metadataPayload = JSON.stringify({
      format_version: CURRENT_FORMAT_VERSION,
      generation: snapshot.generation,
      metadata: Object.fromEntries(snapshot.metadata),
    });
    const idsPayload = JSON.stringify({
      format_version: CURRENT_FORMAT_VERSION,
      generation: snapshot.generation,
      ids: snapshot.ids,
    });

    await writeFileAtomically(this.files.metadata, metadataPayload);
    await writeFileAtomically(this.files.ids, idsPayload);
    await writeFileAtomically(this.files.vectors, encodeVectorFile(snapshot));
  }
}

function encodeVectorFile(snapshot: FlatIndexSnapshot): Buffer {
  const { dimension, vectors } = snapshot;
  const buffer = Buffer.alloc(VECTOR_HEADER_BYTES + vectors.length * dimension * 4);
  buffer.write(VECTOR_FILE_MAGIC, 0, "ascii");
  buffer.writeUInt32LE(CURRENT_FORMAT_VERSION, 4);
  buffer.writeUInt32LE(dimension, 8);
  buffer.writeUInt32LE(vectors.length, 12);
  buffer.writeUInt32LE(snapshot.generation, 16);

  let offset = VECTOR_HEADER_BYTES;
  for (const vector of vectors) {
    for (let i = 0; i < dimension; i += 1) {
      buffer.writeFloatLE(vector[i], offset);
      offset += 4;
    }
  }
  return buffer;
}

function decodeVectorFile(
  buffer: Buffer,
  filePath: string,
): { dimension: number; generation: number; vectors: Float32Array[] } {
  if (
    buffer.length < VECTOR_HEADER_BYTES ||
    buffer.toString("ascii", 0, 4) !== VECTOR_FILE_MAGIC
  ) {
    throw new CorruptIndexError(`${filePath} is not a vector store file.`);
  }

  const version = buffer.readUInt32LE(4);
  if (version !== CURRENT_FORMAT_VERSION) {
    throw new CorruptIndexError(
      `Unsupported vector store format version: ${version}. Expected ${CURRENT_FORMAT_VERSION}.`,
    );
  }

  const dimension = buffer.readUInt32LE(8);
  const count = buffer.readUInt32LE(12);
  const generation = buffer.readUInt32LE(16);
  const expectedBytes = VECTOR_HEADER_BYTES + count * dimension * 4;
  if (buffer.length !== expectedBytes) {
    throw new CorruptIndexError(
      `${filePath} is ${buffer.length} bytes, expected ${expectedBytes} for ${count} vectors of dimension ${dimension}.`,
    );
  }

  const vectors: Float32Array[] = [];
  let offset = VECTOR_HEADER_BYTES;
  for (let row = 0; row < count; row += 1) {
    const vector = new Float32Array(dimension);
    for (let i = 0; i < dimension; i += 1) {
      vector[i] = buffer.readFloatLE(offset);
      offset += 4;
    }
    vectors.push(vector);
  }
  return { dimension, generation, vectors };
}

function parseJsonFile<T>(
  raw: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  filePath: string,
): T {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new CorruptIndexError(`${filePath} is not valid JSON.`, { cause: error });
  }
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new CorruptIndexError(
      `${filePath} has an invalid format: ${parsed.error.issues[0]?.message ?? "invalid"}`,
    );
  }
  return parsed.data;
}

async function writeFileAtomically(targetPath: string, content: string | Buffer): Promise<void> {
  const tempPath = `${targetPath}.tmp`;
  await fs.writeFile(tempPath, content);
  await replaceFileSafely(tempPath, targetPath);
}

async function replaceFileSafely(
  tempPath: string,
  targetPath: string,
): Promise<void> {
  try {
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  try {
    await fs.rm(targetPath, { force: true });
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  await fs.rm(tempPath, { force: true });
  throw new IndexUnavailableError(`Could not replace ${targetPath}: the file is locked.`);
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (error) {
    if (isFileMissing(error)) {
      return false;
    }
    throw error;
  }
}

function errorCode(error: unknown): string | undefined {
  if (!(error instanceof Error) || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
}

function isFileMissing(error: unknown): boolean {
  return errorCode(error) === "ENOENT";
}

function isReplaceableRenameError(error: unknown): boolean {
  const code = errorCode(error);
  return code === "EPERM" || code === "EEXIST" || code === "EBUSY";
}
