import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { emptyIndex } from "../../src/aggregate/aggregator.js";
import { INDEX_FILES, IndexStore } from "../../src/aggregate/index-store.js";
import { StorageError } from "../../src/errors.js";

const tempDirs: string[] = [];

async function makeTempDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "vidatlas-index-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(async () => {
  vi.restoreAllMocks();
  await Promise.all(tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
});

describe("IndexStore", () => {
  it("initialises an empty index when nothing has been written", async () => {
    const store = new IndexStore(await makeTempDir());

    expect(await store.loadOrInit()).toEqual(emptyIndex());
  });

  it("round-trips the index through four documents", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const dir = await makeTempDir();
    const store = new IndexStore(dir);
    const index = emptyIndex();
    index.entities.persons.push({
      name: "Khun Sa",
      type: "persons",
      mentions: 2,
      atom_ids: ["A001", "A002"],
      segment_ids: ["SEG_001"],
      context: [],
    });
    index.entities.statistics = { ...index.entities.statistics, total_entities: 1 };
    index.entities.statistics.by_type.persons = 1;

    await store.save(index);

    expect((await fs.readdir(dir)).sort()).toEqual(
      [INDEX_FILES.annotations, INDEX_FILES.entities, INDEX_FILES.graph, INDEX_FILES.topics].sort(),
    );
    expect(await store.loadOrInit()).toEqual(index);
  });

  it("recomputes statistics that are missing from a stored document", async () => {
    const dir = await makeTempDir();
    await fs.writeFile(
      path.join(dir, INDEX_FILES.entities),
      JSON.stringify({
        persons: [
          { name: "Khun Sa", type: "persons", mentions: 1, atom_ids: ["A001"], segment_ids: [], context: [] },
        ],
      }),
    );

    const index = await new IndexStore(dir).loadOrInit();

    expect(index.entities.countries).toEqual([]);
    expect(index.entities.statistics.total_entities).toBe(1);
  });

  it("treats an unreadable document as a storage error", async () => {
    const dir = await makeTempDir();
    await fs.writeFile(path.join(dir, INDEX_FILES.graph), "{not json");

    await expect(new IndexStore(dir).loadOrInit()).rejects.toBeInstanceOf(StorageError);
  });

  it("clears every document", async () => {
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const dir = await makeTempDir();
    const store = new IndexStore(dir);
    await store.save(emptyIndex());

    expect(await store.clear()).toBe(4);
    expect(await fs.readdir(dir)).toEqual([]);
    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('"event":"index_cleared"'));
  });
});
