import fs from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { saveAtoms } from "../../src/atoms/store.js";
import { runIndexCommand, runSearchCommand, type SearchCommandDeps } from "../../src/commands/search.js";
import type { Embedder } from "../../src/embeddings/client.js";
import { acquireRunLock } from "../../src/service/run-lock.js";
import { makeAtom } from "../helpers/fixtures.js";
import { captureIo, createTempProject, type CapturedIo, type TempProject } from "../helpers/project.js";

const tempDirs: string[] = [];

const VECTORS: Record<string, number[]> = {
  "Caravans crossed the river.": [1, 0, 0],
  "The general signed a treaty.": [0, 1, 0],
  "Mules carried the loads.": [0.9, 0.1, 0],
  caravans: [1, 0, 0],
};

const ATOMS = [
  makeAtom("A001", 0, 5000, "Caravans crossed the river."),
  makeAtom("A002", 5000, 5000, "The general signed a treaty."),
  makeAtom("A003", 1250000, 5000, "Mules carried the loads."),
];

function commandDeps(project: TempProject, io: CapturedIo, embedded: string[][]): Partial<SearchCommandDeps> {
  const embedder: Embedder = async (texts) => {
    embedded.push(texts);
    return texts.map((text) => VECTORS[text] ?? [0, 0, 1]);
  };
  return {
    loadContextFn: () => project.context,
    createEmbedderFn: () => embedder,
    ...io,
  };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await Promise.all(tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
});

describe("index and search commands", () => {
  it("indexes a project and finds the closest atoms", async () => {
    const project = await createTempProject(tempDirs, ATOMS);
    const embedded: string[][] = [];

    const indexIo = captureIo();
    const indexed = await runIndexCommand("demo", commandDeps(project, indexIo, embedded));
    expect(indexed.exitCode).toBe(0);
    expect(indexIo.stdout).toEqual(["ok Indexed 3 atom(s)"]);

    const searchIo = captureIo();
    const searched = await runSearchCommand(
      "demo",
      "caravans",
      { limit: 2, json: true },
      commandDeps(project, searchIo, embedded),
    );

    expect(searched.exitCode).toBe(0);
    const matches: unknown = JSON.parse(searchIo.stdout.join("\n"));
    expect(matches).toMatchObject([
      { id: "A001", segment_id: "SEG_001", text: "Caravans crossed the river." },
      { id: "A003", segment_id: "SEG_002", text: "Mules carried the loads." },
    ]);
    expect(embedded).toEqual([
      ["Caravans crossed the river.", "The general signed a treaty.", "Mules carried the loads."],
      ["caravans"],
    ]);
  });

  it("prints one line per match", async () => {
    const project = await createTempProject(tempDirs, ATOMS);
    await runIndexCommand("demo", commandDeps(project, captureIo(), []));
    const io = captureIo();

    await runSearchCommand("demo", "caravans", { limit: 1 }, commandDeps(project, io, []));

    expect(io.stdout).toHaveLength(1);
    expect(io.stdout[0]?.startsWith("A001 SEG_001 ")).toBe(true);
    expect(io.stdout[0]?.endsWith("  Caravans crossed the river.")).toBe(true);
  });

  it("asks for an index before embedding the query", async () => {
    const project = await createTempProject(tempDirs, ATOMS);
    const embedded: string[][] = [];
    const io = captureIo();

    const result = await runSearchCommand("demo", "caravans", {}, commandDeps(project, io, embedded));

    expect(result.exitCode).toBe(0);
    expect(io.stdout).toEqual(["warning No indexed atoms. Run `vidatlas index demo` first."]);
    expect(embedded).toEqual([]);
  });

  it("rejects a non-positive limit", async () => {
    const project = await createTempProject(tempDirs, ATOMS);
    const io = captureIo();

    const result = await runSearchCommand("demo", "caravans", { limit: 0 }, commandDeps(project, io, []));

    expect(result.exitCode).toBe(1);
    expect(io.stderr).toEqual(["error --limit must be a positive integer, got 0."]);
  });

  it("removes vectors of atoms that are gone when re-indexing", async () => {
    const project = await createTempProject(tempDirs, ATOMS);
    await runIndexCommand("demo", commandDeps(project, captureIo(), []));
    await saveAtoms(project.stores.atoms.filePath, ATOMS.slice(0, 2));
    const io = captureIo();

    const result = await runIndexCommand("demo", commandDeps(project, io, []));

    expect(result.exitCode).toBe(0);
    expect(io.stdout).toEqual(["ok Indexed 2 atom(s)", "warning Removed 1 vector(s) of atoms no longer in the store"]);
  });

  it("refuses to index while an analysis run holds the project", async () => {
    const project = await createTempProject(tempDirs, ATOMS);
    acquireRunLock(project.stores.projectDir);
    const embedded: string[][] = [];
    const io = captureIo();

    const result = await runIndexCommand("demo", commandDeps(project, io, embedded));

    expect(result.exitCode).toBe(1);
    expect(io.stderr).toEqual([`error An analysis run is already in progress for demo (PID ${process.pid}).`]);
    expect(embedded).toEqual([]);
  });
});
