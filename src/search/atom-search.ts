import type { Client } from "@libsql/client";
import type { Embedder } from "../embeddings/client.js";
import type { Atom, SegmentRecord } from "../types.js";
import { logger } from "../utils/logger.js";
import { initVectorStore, pruneVectors, searchVectors, upsertVector, type VectorMatch } from "./vector-store.js";

export interface AtomIndexResult {
  indexed: number;
  removed: number;
}

/** Maps each atom id to the segment whose refs cover it. */
export function segmentIdsByAtom(atoms: readonly Atom[], segments: readonly SegmentRecord[]): Map<string, string> {
  const owners = new Map<string, string>();
  for (const segment of segments) {
    for (const ref of segment.atom_refs) {
      const atom = atoms[ref];
      if (atom) {
        owners.set(atom.atom_id, segment.segment_id);
      }
    }
  }
  return owners;
}

/**
 * Embeds every atom and stores it under its atom id. Vectors of atoms that
 * are no longer in the store are removed first.
 */
export async function indexAtoms(params: {
  db: Client;
  embedder: Embedder;
  atoms: readonly Atom[];
  segments: readonly SegmentRecord[];
  dimensions: number;
}): Promise<AtomIndexResult> {
  await initVectorStore(params.db, params.dimensions);
  const removed = await pruneVectors(params.db, params.atoms.map((atom) => atom.atom_id));
  if (params.atoms.length === 0) {
    return { indexed: 0, removed };
  }

  const vectors = await params.embedder(params.atoms.map((atom) => atom.merged_text));
  if (vectors.length !== params.atoms.length) {
    throw new Error(`Embedder returned ${vectors.length} vectors for ${params.atoms.length} atoms.`);
  }

  const owners = segmentIdsByAtom(params.atoms, params.segments);
  for (const [position, atom] of params.atoms.entries()) {
    const vector = vectors[position];
    if (!vector) {
      continue;
    }
    await upsertVector(params.db, atom.atom_id, vector, {
      segment_id: owners.get(atom.atom_id) ?? null,
      text: atom.merged_text,
    });
  }

  logger.info("atoms_indexed", { indexed: params.atoms.length, removed });
  return { indexed: params.atoms.length, removed };
}

export async function searchAtoms(params: {
  db: Client;
  embedder: Embedder;
  query: string;
  limit: number;
}): Promise<VectorMatch[]> {
  const query = params.query.trim();
  if (!query) {
    throw new Error("Search query cannot be empty.");
  }
  const [vector] = await params.embedder([query]);
  if (!vector) {
    throw new Error("Embedder returned no vector for the query.");
  }
  return searchVectors(params.db, vector, params.limit);
}
