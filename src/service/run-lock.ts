import fs from "node:fs";
import path from "node:path";
import { AnalysisConflictError, hasErrorCode } from "../errors.js";

export const RUN_LOCK_FILE = "analysis.lock";

export function runLockPath(projectDir: string): string {
  return path.join(projectDir, RUN_LOCK_FILE);
}

function readLockPid(lockPath: string): number | null {
  try {
    const raw = fs.readFileSync(lockPath, "utf8").trim();
    const pid = Number.parseInt(raw, 10);
    return Number.isInteger(pid) && pid > 0 ? pid : null;
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return null;
    }
    throw error;
  }
}

function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM means the process exists but belongs to someone else.
    return !hasErrorCode(error, "ESRCH");
  }
}

function conflict(projectDir: string, pid: number): AnalysisConflictError {
  return new AnalysisConflictError(
    `An analysis run is already in progress for ${path.basename(projectDir)} (PID ${pid}).`,
  );
}

/**
 * Takes the project's run lock or throws AnalysisConflictError. A lock left
 * behind by a dead process is replaced.
 */
export function acquireRunLock(projectDir: string): void {
  fs.mkdirSync(projectDir, { recursive: true });
  const lockPath = runLockPath(projectDir);

  for (let attempt = 0; attempt < 2; attempt += 1) {
    try {
      fs.writeFileSync(lockPath, String(process.pid), { encoding: "utf8", flag: "wx" });
      return;
    } catch (error) {
      if (!hasErrorCode(error, "EEXIST")) {
        throw error;
      }
    }

    const pid = readLockPid(lockPath);
    if (pid !== null && isPidAlive(pid)) {
      throw conflict(projectDir, pid);
    }
    fs.rmSync(lockPath, { force: true });
  }

  throw new AnalysisConflictError(`Could not take the analysis lock at ${lockPath}.`);
}

export function releaseRunLock(projectDir: string): void {
  fs.rmSync(runLockPath(projectDir), { force: true });
}

/** Runs `fn` while holding the project's run lock. */
export async function withRunLock<T>(projectDir: string, fn: () => Promise<T>): Promise<T> {
  acquireRunLock(projectDir);
  try {
    return await fn();
  } finally {
    releaseRunLock(projectDir);
  }
}
