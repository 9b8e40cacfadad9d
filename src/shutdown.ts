let signalCount = 0;
let installed = false;
let wakeCallback: (() => void) | null = null;

let sigintHandler: (() => void) | null = null;
let sigtermHandler: (() => void) | null = null;

function logLine(message: string): void {
  process.stderr.write(`${message}\n`);
}

/** Called once on the first signal; the analyze command uses it to request a stop. */
export function onWake(fn: (() => void) | null): void {
  wakeCallback = fn;
}

export function installSignalHandlers(): void {
  if (installed) return;
  installed = true;

  const handleSignal = (): void => {
    signalCount += 1;

    if (signalCount === 1) {
      wakeCallback?.();
      logLine("Stopping after the current segment reaches a safe point... (press Ctrl-C again to force)");
      return;
    }

    logLine("Forced shutdown");
    process.exit(1);
  };

  sigintHandler = handleSignal;
  sigtermHandler = handleSignal;

  process.on("SIGINT", sigintHandler);
  process.on("SIGTERM", sigtermHandler);
}

// @internal - used by tests to avoid cross-test contamination.
export function resetShutdownForTests(): void {
  signalCount = 0;
  wakeCallback = null;

  if (installed) {
    if (sigintHandler) process.off("SIGINT", sigintHandler);
    if (sigtermHandler) process.off("SIGTERM", sigtermHandler);
  }

  sigintHandler = null;
  sigtermHandler = null;
  installed = false;
}
