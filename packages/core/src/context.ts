import { err, ok, type Result } from "neverthrow";

import type { IoError } from "./errors";

export interface ContextState {
  /** Context the caller last declared */
  current?: string;
  /** Context named by the most recent banner actually written */
  lastShown?: string;
}

/** Writes a context banner; resolves `false` when output is suppressed. */
export interface BannerWriter {
  writeContextBanner(context: string): Result<boolean, IoError>;
}

/**
 * Tracks the declared context and announces changes with a banner.
 * Setting the same context again prints nothing until it changes.
 */
export class ContextController {
  private state: ContextState = {};

  constructor(private readonly writer: BannerWriter) {}

  get current(): string | undefined {
    return this.state.current;
  }

  get lastShown(): string | undefined {
    return this.state.lastShown;
  }

  snapshot(): ContextState {
    return { ...this.state };
  }

  restore(state: ContextState): void {
    this.state = { ...state };
  }

  setContext(context: string): Result<void, IoError> {
    this.state.current = context;
    if (context === this.state.lastShown) {
      return ok(undefined);
    }

    const written = this.writer.writeContextBanner(context);
    if (written.isErr()) {
      return err(written.error);
    }
    if (written.value) {
      this.state.lastShown = context;
    }
    return ok(undefined);
  }

  /** Forget the current context. No banner; `lastShown` is kept. */
  clearContext(): void {
    this.state.current = undefined;
  }

  /**
   * Run `body` under `context`, then restore the previous state exactly,
   * including when `body` throws.
   */
  withContext<T>(context: string, body: () => T): Result<T, IoError> {
    const saved = this.snapshot();
    try {
      const set = this.setContext(context);
      if (set.isErr()) {
        return err(set.error);
      }
      return ok(body());
    } finally {
      this.restore(saved);
    }
  }
}
