import { Stderr } from "./logger";

let instance: Stderr | null = null;

/**
 * Process-wide logger, created from the environment on first use.
 *
 * There is no locking: code that shares it across workers or interleaved
 * async tasks must serialize its own trace and context calls.
 */
export function getLogger(): Stderr {
  if (!instance) {
    instance = new Stderr();
  }
  return instance;
}

/**
 * Drop the shared logger so the next `getLogger()` builds a new one.
 */
export function resetLogger(): void {
  instance = null;
}
