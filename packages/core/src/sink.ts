import { writeSync } from "node:fs";
import { err, ok, type Result } from "neverthrow";

import { describeCause, IoError } from "./errors";

/**
 * Destination for rendered text. Writes are synchronous and never throw.
 */
export interface Sink {
  write(text: string): Result<void, IoError>;
}

/** Writer accepted by `createStreamSink`; `process.stderr` satisfies it. */
export interface WritableLike {
  write(chunk: string, callback?: (error?: Error | null) => void): unknown;
  /** When present, text is written straight to this descriptor */
  readonly fd?: number;
  on?(event: "error", listener: (error: Error) => void): unknown;
}

function toIoError(error: unknown): IoError {
  return new IoError({
    message: `Failed to write output: ${describeCause(error)}`,
    cause: error,
  });
}

function writeToFd(fd: number, text: string): void {
  const bytes = Buffer.from(text);
  let offset = 0;
  while (offset < bytes.length) {
    offset += writeSync(fd, bytes, offset);
  }
}

/**
 * Sink over a stream.
 *
 * Streams with a file descriptor are written synchronously, so EPIPE and
 * friends come back from the same call. Other streams report failures
 * through their `error` event; the sink listens for it and returns the
 * failure from every write after it arrived.
 */
export function createStreamSink(
  stream: WritableLike = process.stderr
): Sink {
  const { fd } = stream;
  if (typeof fd === "number") {
    return {
      write(text) {
        try {
          writeToFd(fd, text);
          return ok(undefined);
        } catch (error) {
          return err(toIoError(error));
        }
      },
    };
  }

  let failure: IoError | undefined;
  const record = (error: Error): void => {
    if (!failure) {
      failure = toIoError(error);
    }
  };
  stream.on?.("error", record);

  return {
    write(text) {
      if (failure) {
        return err(failure);
      }
      try {
        stream.write(text, (error) => {
          if (error) {
            record(error);
          }
        });
        return ok(undefined);
      } catch (error) {
        return err(toIoError(error));
      }
    },
  };
}

export interface MemorySink extends Sink {
  /** Everything written so far */
  readonly output: string;
  /** Written output split into lines, without the trailing empty line */
  lines(): string[];
  clear(): void;
}

/**
 * Sink that collects output in memory. Used by tests and by callers that
 * render to a string.
 */
export function createMemorySink(): MemorySink {
  let buffer = "";
  return {
    get output() {
      return buffer;
    },
    write(text) {
      buffer += text;
      return ok(undefined);
    },
    lines() {
      if (buffer === "") {
        return [];
      }
      const parts = buffer.split("\n");
      if (parts.at(-1) === "") {
        parts.pop();
      }
      return parts;
    },
    clear() {
      buffer = "";
    },
  };
}
