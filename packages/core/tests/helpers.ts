import { err, ok } from "neverthrow";

import { IoError } from "../src/errors";
import { Stderr, type LoggerOptions } from "../src/logger";
import { createMemorySink, type MemorySink, type Sink } from "../src/sink";
import type { VerbosityConfig } from "../src/schema/config";

export interface TestLogger {
  log: Stderr;
  sink: MemorySink;
}

/**
 * Logger writing uncolored output to memory.
 */
export function createTestLogger(
  config: Partial<VerbosityConfig> = {},
  options: Omit<LoggerOptions, "config" | "sink"> = {}
): TestLogger {
  const sink = createMemorySink();
  const log = new Stderr({
    color: false,
    width: 80,
    ...options,
    config,
    sink,
  });
  return { log, sink };
}

/**
 * Sink that records writes until `failing` is switched on.
 */
export function createSwitchableSink(): Sink & {
  failing: boolean;
  written: string[];
} {
  return {
    failing: false,
    written: [],
    write(text) {
      if (this.failing) {
        return err(new IoError({ message: "sink closed" }));
      }
      this.written.push(text);
      return ok(undefined);
    },
  };
}
