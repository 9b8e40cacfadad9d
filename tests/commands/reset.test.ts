import fs from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { emptyIndex } from "../../src/aggregate/aggregator.js";
import { runResetCommand } from "../../src/commands/reset.js";
import { acquireRunLock } from "../../src/service/run-lock.js";
import { makeAtom } from "../helpers/fixtures.js";
import { captureIo, createTempProject, type TempProject } from "../helpers/project.js";

const tempDirs: string[] = [];

const ATOMS = [makeAtom("A001", 0, 5000), makeAtom("A002", 1250000, 5000)];

async function analyzedProject(): Promise<TempProject> {
  const project = await createTempProject(tempDirs, ATOMS);
  await project.stores.segments.loadOrRebuild(ATOMS);
  for (const segmentId of ["SEG_001", "SEG_002"]) {
    await project.stores.segments.updateStatus(segmentId, "analyzing");
    await project.stores.segments.updateStatus(segmentId, "analyzed", { entity_count: 2, analysis_outcome: "llm" });
  }
  await project.stores.index.save(emptyIndex());
  return project;
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await Promise.all(tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
});

describe("runResetCommand", () => {
  it("only describes a full reset without confirmation", async () => {
    const project = await analyzedProject();
    const io = captureIo();

    const result = await runResetCommand("demo", undefined, {}, { loadContextFn: () => project.context, ...io });

    expect(result.exitCode).toBe(0);
    expect(io.stdout).toEqual([
      "[dry run] vidatlas reset demo would perform the following actions:",
      "  - Return every atomized segment to the analyzable state",
      "  - Delete: entities.json",
      "  - Delete: topics.json",
      "  - Delete: knowledge_graph.json",
      "  - Delete: atom_annotations.json",
      "Run with --confirm-reset to execute.",
    ]);
    expect((await project.stores.segments.get("SEG_001")).status).toBe("analyzed");
  });

  it("resets every segment and deletes the index when confirmed", async () => {
    const project = await analyzedProject();
    const io = captureIo();

    await runResetCommand("demo", undefined, { confirmReset: true }, { loadContextFn: () => project.context, ...io });

    expect(io.stdout).toEqual(["ok Reset 2 segment(s)"]);
    expect((await project.stores.segments.list()).map((segment) => segment.status)).toEqual(["atomized", "atomized"]);
    await expect(fs.access(project.stores.index.pathFor("entities"))).rejects.toThrow();
  });

  it("resets a single segment without a confirmation flag", async () => {
    const project = await analyzedProject();
    const io = captureIo();

    await runResetCommand("demo", "SEG_002", {}, { loadContextFn: () => project.context, ...io });

    expect(io.stdout).toEqual(["ok Reset 1 segment(s)"]);
    expect((await project.stores.segments.list()).map((segment) => segment.status)).toEqual(["analyzed", "atomized"]);
    await expect(fs.access(project.stores.index.pathFor("entities"))).resolves.toBeUndefined();
  });

  it("fails on an unknown segment", async () => {
    const project = await analyzedProject();
    const io = captureIo();

    const result = await runResetCommand("demo", "SEG_009", {}, { loadContextFn: () => project.context, ...io });

    expect(result.exitCode).toBe(1);
    expect(io.stderr).toEqual(["error Segment not found: SEG_009"]);
  });

  it("refuses to reset while an analysis run holds the project", async () => {
    const project = await analyzedProject();
    acquireRunLock(project.stores.projectDir);
    const io = captureIo();

    const result = await runResetCommand("demo", undefined, { confirmReset: true }, {
      loadContextFn: () => project.context,
      ...io,
    });

    expect(result.exitCode).toBe(1);
    expect(io.stderr).toEqual([`error An analysis run is already in progress for demo (PID ${process.pid}).`]);
    expect((await project.stores.segments.list()).map((segment) => segment.status)).toEqual(["analyzed", "analyzed"]);
    await expect(fs.access(project.stores.index.pathFor("entities"))).resolves.toBeUndefined();
  });
});
