import { readFileSync, readSync } from "node:fs";

import { describeCause, InputError, type InputReader } from "@glyphlog/core";
import { err, ok, type Result } from "neverthrow";

const STDIN_FD = 0;
const NEWLINE = 0x0a;

/**
 * Read all of standard input synchronously.
 */
export function readAllStdin(fd: number = STDIN_FD): Result<string, InputError> {
  try {
    return ok(readFileSync(fd, "utf8"));
  } catch (error) {
    return err(
      new InputError({
        message: `Failed to read standard input: ${describeCause(error)}`,
        cause: error,
      })
    );
  }
}

/**
 * Line reader over a file descriptor. Reads one byte at a time so nothing
 * past the current line is consumed.
 */
export function createStdinReader(fd: number = STDIN_FD): InputReader {
  const byte = Buffer.alloc(1);

  return {
    readLine() {
      const bytes: number[] = [];
      try {
        for (;;) {
          const read = readSync(fd, byte, 0, 1, null);
          if (read === 0) {
            return ok(
              bytes.length === 0 ? null : Buffer.from(bytes).toString("utf8")
            );
          }
          const value = byte[0] ?? NEWLINE;
          if (value === NEWLINE) {
            return ok(Buffer.from(bytes).toString("utf8").replace(/\r$/, ""));
          }
          bytes.push(value);
        }
      } catch (error) {
        return err(
          new InputError({
            message: `Failed to read answer: ${describeCause(error)}`,
            cause: error,
          })
        );
      }
    },
  };
}
