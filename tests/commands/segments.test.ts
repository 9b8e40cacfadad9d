import fs from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runSegmentsCommand } from "../../src/commands/segments.js";
import { acquireRunLock } from "../../src/service/run-lock.js";
import { makeAtom } from "../helpers/fixtures.js";
import { captureIo, createTempProject } from "../helpers/project.js";

const tempDirs: string[] = [];

const ATOMS = [makeAtom("A001", 0, 5000), makeAtom("A002", 700000, 5000), makeAtom("A003", 1250000, 5000)];

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await Promise.all(tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
});

describe("runSegmentsCommand", () => {
  it("builds the table with the configured window and lists it", async () => {
    const project = await createTempProject(tempDirs, ATOMS);
    const io = captureIo();

    const result = await runSegmentsCommand("demo", {}, { loadContextFn: () => project.context, ...io });

    expect(result.exitCode).toBe(0);
    expect(io.stdout).toEqual([
      "Atoms: 3",
      "Segments: 2",
      "SEG_001  00:00:00-00:20:00  atoms=2  atomized",
      "SEG_002  00:20:00-00:20:55  atoms=1  atomized",
    ]);
  });

  it("keeps an existing table and warns when a different window is asked for", async () => {
    const project = await createTempProject(tempDirs, ATOMS);
    await project.stores.segments.loadOrRebuild(ATOMS);
    const io = captureIo();

    await runSegmentsCommand("demo", { minutes: 10 }, { loadContextFn: () => project.context, ...io });

    expect(io.stdout[1]).toBe("Segments: 2");
    expect(io.stderr).toEqual([
      "warning Existing table uses 20-minute windows; pass --recreate to repartition (analysis state is lost).",
    ]);
  });

  it("repartitions with --recreate", async () => {
    const project = await createTempProject(tempDirs, ATOMS);
    await project.stores.segments.loadOrRebuild(ATOMS);
    const io = captureIo();

    await runSegmentsCommand("demo", { minutes: 10, recreate: true }, { loadContextFn: () => project.context, ...io });

    expect(io.stdout).toEqual([
      "Atoms: 3",
      "Segments: 3",
      "SEG_001  00:00:00-00:10:00  atoms=1  atomized",
      "SEG_002  00:10:00-00:20:00  atoms=1  atomized",
      "SEG_003  00:20:00-00:20:55  atoms=1  atomized",
    ]);
    expect(io.stderr).toEqual([]);
    expect((await project.stores.segments.read())?.window_minutes).toBe(10);
  });

  it("rejects a non-positive window", async () => {
    const project = await createTempProject(tempDirs, ATOMS);
    const io = captureIo();

    const result = await runSegmentsCommand("demo", { minutes: 0 }, { loadContextFn: () => project.context, ...io });

    expect(result.exitCode).toBe(1);
    expect(io.stderr).toEqual(["error --minutes must be a positive number, got 0."]);
  });

  it("refuses to recreate the table while an analysis run holds the project", async () => {
    const project = await createTempProject(tempDirs, ATOMS);
    await project.stores.segments.loadOrRebuild(ATOMS);
    acquireRunLock(project.stores.projectDir);
    const io = captureIo();

    const result = await runSegmentsCommand(
      "demo",
      { minutes: 10, recreate: true },
      { loadContextFn: () => project.context, ...io },
    );

    expect(result.exitCode).toBe(1);
    expect(io.stderr).toEqual([`error An analysis run is already in progress for demo (PID ${process.pid}).`]);
    expect((await project.stores.segments.read())?.window_minutes).toBe(20);
  });
});
