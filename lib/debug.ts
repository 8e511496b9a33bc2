// Console logging helpers. debug/info output is on outside production, or when JOBFIT_DEBUG=1.

function debugEnabled(): boolean {
  return process.env.JOBFIT_DEBUG === "1" || process.env.NODE_ENV !== "production";
}

export const debug = (...args: unknown[]) => {
  if (debugEnabled()) {
    console.log(...args);
  }
};

export const logInfo = (...args: unknown[]) => {
  if (debugEnabled()) {
    console.info(...args);
  }
};

/** Always printed. */
export const logWarning = (...args: unknown[]) => {
  console.warn(...args);
};

/** Always printed. */
export const logError = (...args: unknown[]) => {
  console.error(...args);
};

/**
 * A named trace that keeps its messages (for the caller's debug output)
 * and echoes them to the console with a `[scope]` prefix.
 */
export function createTrace(scope: string) {
  const messages: string[] = [];
  const log = (msg: string) => {
    messages.push(msg);
    debug(`[${scope}] ${msg}`);
  };
  return { messages, log };
}
