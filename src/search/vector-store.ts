import { createClient, type Client, type InValue } from "@libsql/client";
import path from "node:path";
import { ensureDir } from "../utils/fs.js";

export const VECTORS_FILE = "vectors.db";

export interface VectorMetadata {
  segment_id: string | null;
  text: string;
}

export interface VectorMatch extends VectorMetadata {
  id: string;
  distance: number;
}

function toNumber(value: InValue | undefined): number {
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  if (typeof value === "string" && value.trim()) {
    return Number(value);
  }
  return Number.NaN;
}

function toText(value: InValue | undefined): string | null {
  return typeof value === "string" ? value : null;
}

/** Opens the project's vector database; pass ":memory:" for an in-process one. */
export async function openVectorDb(projectDirOrMemory: string): Promise<Client> {
  if (projectDirOrMemory === ":memory:") {
    return createClient({ url: ":memory:" });
  }
  await ensureDir(projectDirOrMemory);
  return createClient({ url: `file:${path.join(projectDirOrMemory, VECTORS_FILE)}` });
}

export async function initVectorStore(db: Client, dimensions: number): Promise<void> {
  if (!Number.isInteger(dimensions) || dimensions <= 0) {
    throw new Error(`Embedding dimensions must be a positive integer, got ${dimensions}.`);
  }
  await db.execute(`
    CREATE TABLE IF NOT EXISTS atom_vectors (
      id TEXT PRIMARY KEY,
      segment_id TEXT,
      text TEXT NOT NULL,
      embedding F32_BLOB(${dimensions}) NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);
}

export async function upsertVector(
  db: Client,
  id: string,
  vector: readonly number[],
  metadata: VectorMetadata,
): Promise<void> {
  await db.execute({
    sql: `
      INSERT INTO atom_vectors (id, segment_id, text, embedding, updated_at)
      VALUES (?, ?, ?, vector32(?), ?)
      ON CONFLICT(id) DO UPDATE SET
        segment_id = excluded.segment_id,
        text = excluded.text,
        embedding = excluded.embedding,
        updated_at = excluded.updated_at
    `,
    args: [id, metadata.segment_id, metadata.text, JSON.stringify(vector), new Date().toISOString()],
  });
}

/** Deletes every vector whose id is not in `keepIds`; returns how many went. */
export async function pruneVectors(db: Client, keepIds: readonly string[]): Promise<number> {
  const result = await db.execute({
    sql: "DELETE FROM atom_vectors WHERE id NOT IN (SELECT value FROM json_each(?))",
    args: [JSON.stringify(keepIds)],
  });
  return result.rowsAffected;
}

export async function countVectors(db: Client): Promise<number> {
  const result = await db.execute("SELECT COUNT(*) AS count FROM atom_vectors");
  const count = toNumber(result.rows[0]?.count);
  return Number.isFinite(count) ? count : 0;
}

/** Nearest atoms by cosine distance, closest first. */
export async function searchVectors(db: Client, vector: readonly number[], limit: number): Promise<VectorMatch[]> {
  const result = await db.execute({
    sql: `
      SELECT id, segment_id, text, vector_distance_cos(embedding, vector32(?)) AS distance
      FROM atom_vectors
      ORDER BY distance ASC, id ASC
      LIMIT ?
    `,
    args: [JSON.stringify(vector), Math.max(1, Math.floor(limit))],
  });

  return result.rows.map((row) => ({
    id: toText(row.id) ?? "",
    segment_id: toText(row.segment_id),
    text: toText(row.text) ?? "",
    distance: toNumber(row.distance),
  }));
}
