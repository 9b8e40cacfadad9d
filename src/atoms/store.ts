import fs from "node:fs/promises";
import { z } from "zod";
import { CorruptStoreError, IdentityViolation, StorageError, hasErrorCode } from "../errors.js";
import type { Atom } from "../types.js";
import { writeFileAtomic } from "../utils/fs.js";
import { logger } from "../utils/logger.js";

export const ATOMS_FILE = "atoms.jsonl";

const DEFAULT_ATOM_TYPE = "fragment";
const DEFAULT_COMPLETENESS = "complete";

const atomRecordSchema = z.object({
  atom_id: z.string().trim().min(1, "atom_id is empty"),
  start_ms: z.number().int("start_ms must be an integer").nonnegative("start_ms is negative"),
  end_ms: z.number().int("end_ms must be an integer"),
  duration_ms: z.number().int("duration_ms must be an integer").optional(),
  merged_text: z.string().refine((value) => value.trim().length > 0, "merged_text is empty"),
  type: z.string().optional(),
  completeness: z.string().optional(),
  source_utterance_ids: z.array(z.number().int()).optional(),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const field = issue.path.join(".");
      if (issue.code === "invalid_type" && issue.received === "undefined") {
        return `missing ${field}`;
      }
      return field ? `${field}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

/** Validates one raw record at the ingestion boundary. */
export function parseAtomRecord(raw: unknown, filePath: string, line: number): Atom {
  const parsed = atomRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CorruptStoreError(filePath, line, describeIssues(parsed.error));
  }

  const record = parsed.data;
  if (record.end_ms <= record.start_ms) {
    throw new CorruptStoreError(filePath, line, `end_ms (${record.end_ms}) must exceed start_ms (${record.start_ms})`);
  }

  const duration = record.end_ms - record.start_ms;
  if (record.duration_ms !== undefined && record.duration_ms !== duration) {
    throw new CorruptStoreError(
      filePath,
      line,
      `duration_ms (${record.duration_ms}) does not match end_ms - start_ms (${duration})`,
    );
  }

  const atom: Atom = {
    atom_id: record.atom_id,
    start_ms: record.start_ms,
    end_ms: record.end_ms,
    duration_ms: duration,
    merged_text: record.merged_text,
    type: record.type ?? DEFAULT_ATOM_TYPE,
    completeness: record.completeness ?? DEFAULT_COMPLETENESS,
  };
  if (record.source_utterance_ids) {
    atom.source_utterance_ids = record.source_utterance_ids;
  }
  return atom;
}

export function parseAtomsJsonl(content: string, filePath: string): Atom[] {
  const atoms: Atom[] = [];
  const lines = content.split(/\r?\n/);

  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index]?.trim();
    if (!line) {
      continue;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (error) {
      throw new CorruptStoreError(
        filePath,
        index + 1,
        `invalid JSON (${error instanceof Error ? error.message : String(error)})`,
      );
    }
    atoms.push(parseAtomRecord(raw, filePath, index + 1));
  }

  return atoms;
}

export async function loadAtoms(filePath: string): Promise<Atom[]> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return [];
    }
    throw new StorageError(filePath, error);
  }
  return parseAtomsJsonl(content, filePath);
}

export async function saveAtoms(filePath: string, atoms: readonly Atom[]): Promise<void> {
  const body = atoms.map((atom) => JSON.stringify(atom)).join("\n");
  try {
    await writeFileAtomic(filePath, atoms.length > 0 ? `${body}\n` : "");
  } catch (error) {
    throw new StorageError(filePath, error);
  }
}

/** Ids that occur more than once, in first-seen order. */
export function findDuplicateAtomIds(atoms: readonly Atom[]): string[] {
  const counts = new Map<string, number>();
  for (const atom of atoms) {
    counts.set(atom.atom_id, (counts.get(atom.atom_id) ?? 0) + 1);
  }
  return Array.from(counts.entries())
    .filter(([, count]) => count > 1)
    .map(([atomId]) => atomId);
}

export function assertUniqueAtomIds(atoms: readonly Atom[]): void {
  const duplicates = findDuplicateAtomIds(atoms);
  if (duplicates.length > 0) {
    throw new IdentityViolation(duplicates);
  }
}

export function positionalAtomId(position: number): string {
  return `A${String(position + 1).padStart(3, "0")}`;
}

/** Renumbers atoms by position. Pure and idempotent. */
export function assignUniqueIds(atoms: readonly Atom[]): Atom[] {
  return atoms.map((atom, position) => ({ ...atom, atom_id: positionalAtomId(position) }));
}

export interface AtomRepairResult {
  total: number;
  renamed: number;
}

export interface AtomCheckReport {
  total: number;
  duplicates: string[];
  totalDurationMs: number;
  lastEndMs: number;
}

export class AtomStore {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  /** Loads the ordered atom list and refuses duplicate ids. */
  async load(): Promise<Atom[]> {
    const atoms = await loadAtoms(this.filePath);
    assertUniqueAtomIds(atoms);
    return atoms;
  }

  async check(): Promise<AtomCheckReport> {
    const atoms = await loadAtoms(this.filePath);
    return {
      total: atoms.length,
      duplicates: findDuplicateAtomIds(atoms),
      totalDurationMs: atoms.reduce((sum, atom) => sum + atom.duration_ms, 0),
      lastEndMs: atoms.reduce((max, atom) => Math.max(max, atom.end_ms), 0),
    };
  }

  async repair(): Promise<AtomRepairResult> {
    const atoms = await loadAtoms(this.filePath);
    const renumbered = assignUniqueIds(atoms);
    const renamed = renumbered.filter((atom, index) => atom.atom_id !== atoms[index]?.atom_id).length;

    if (renamed > 0) {
      await saveAtoms(this.filePath, renumbered);
    }
    logger.info("atom_ids_repaired", { file: this.filePath, total: atoms.length, renamed });

    return { total: atoms.length, renamed };
  }
}
