import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { AnalysisConflictError } from "../../src/errors.js";
import { acquireRunLock, releaseRunLock, runLockPath, withRunLock } from "../../src/service/run-lock.js";

const tempDirs: string[] = [];

async function makeProjectDir(): Promise<string> {
  const dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "vidatlas-lock-"));
  tempDirs.push(dataDir);
  return path.join(dataDir, "demo");
}

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
});

describe("run lock", () => {
  it("writes the holder's pid and refuses a second holder", async () => {
    const projectDir = await makeProjectDir();

    acquireRunLock(projectDir);

    expect(await fs.readFile(runLockPath(projectDir), "utf8")).toBe(String(process.pid));
    expect(() => acquireRunLock(projectDir)).toThrow(AnalysisConflictError);
    expect(() => acquireRunLock(projectDir)).toThrow(
      `An analysis run is already in progress for demo (PID ${process.pid}).`,
    );

    releaseRunLock(projectDir);
    expect(() => acquireRunLock(projectDir)).not.toThrow();
  });

  it("replaces a lock left by a process that is gone", async () => {
    const projectDir = await makeProjectDir();
    await fs.mkdir(projectDir, { recursive: true });
    await fs.writeFile(runLockPath(projectDir), "999999999", "utf8");

    acquireRunLock(projectDir);

    expect(await fs.readFile(runLockPath(projectDir), "utf8")).toBe(String(process.pid));
  });

  it("replaces a lock file without a pid", async () => {
    const projectDir = await makeProjectDir();
    await fs.mkdir(projectDir, { recursive: true });
    await fs.writeFile(runLockPath(projectDir), "garbage", "utf8");

    acquireRunLock(projectDir);

    expect(await fs.readFile(runLockPath(projectDir), "utf8")).toBe(String(process.pid));
  });

  it("releases the lock when the guarded work throws", async () => {
    const projectDir = await makeProjectDir();

    await expect(
      withRunLock(projectDir, async () => {
        throw new Error("disk full");
      }),
    ).rejects.toThrow("disk full");

    await expect(fs.access(runLockPath(projectDir))).rejects.toThrow();
  });
});
