import { err, ok, type Result } from "neverthrow";

import { InputError, type IoError } from "./errors";
import { box } from "./render/grid";
import type { BorderStyle } from "./render/types";

export type ConfirmAnswer = "yes" | "no" | "quit";

export const MAX_CONFIRM_ATTEMPTS = 5;

const CHOICES = "[y/n/q]";

/**
 * Source of answer lines. `null` means end of input.
 */
export interface InputReader {
  readLine(): Result<string | null, InputError>;
}

/** What a confirmation needs from the logger that owns it. */
export interface ConfirmHost {
  readonly isQuiet: boolean;
  writeRaw(text: string): Result<void, IoError>;
  warn(text: string): Result<void, IoError>;
  colorize(code: number, text: string): string;
}

interface ConfirmSettings {
  prompt: string;
  boxed: boolean;
  style: BorderStyle;
  promptColor?: number;
  defaultAnswer?: "yes" | "no";
}

/**
 * Parse one answer line. Empty input takes the default when there is one.
 */
export function parseAnswer(
  input: string,
  defaultAnswer?: "yes" | "no"
): ConfirmAnswer | null {
  switch (input.trim().toLowerCase()) {
    case "y":
    case "yes":
      return "yes";
    case "n":
    case "no":
      return "no";
    case "q":
    case "quit":
      return "quit";
    case "":
      return defaultAnswer ?? null;
    default:
      return null;
  }
}

/**
 * Immutable description of a yes/no/quit prompt. Each setter returns a new
 * builder; `ask` draws the prompt and reads until a valid answer.
 */
export class ConfirmBuilder {
  private readonly settings: ConfirmSettings;

  constructor(
    private readonly host: ConfirmHost,
    prompt: string | ConfirmSettings
  ) {
    this.settings =
      typeof prompt === "string"
        ? { prompt, boxed: false, style: "light" }
        : prompt;
  }

  private with(changes: Partial<ConfirmSettings>): ConfirmBuilder {
    return new ConfirmBuilder(this.host, { ...this.settings, ...changes });
  }

  boxed(boxed = true): ConfirmBuilder {
    return this.with({ boxed });
  }

  style(style: BorderStyle): ConfirmBuilder {
    return this.with({ style });
  }

  promptColor(code: number): ConfirmBuilder {
    return this.with({ promptColor: code });
  }

  defaultAnswer(answer: "yes" | "no"): ConfirmBuilder {
    return this.with({ defaultAnswer: answer });
  }

  private paint(text: string): string {
    const { promptColor } = this.settings;
    return promptColor === undefined
      ? text
      : this.host.colorize(promptColor, text);
  }

  /**
   * The prompt exactly as `ask` writes it.
   *
   * @example
   * logger.confirm("Deploy?").render(); // "Deploy? [y/n/q] > "
   */
  render(): string {
    const { prompt, boxed, style } = this.settings;
    if (!boxed) {
      return this.paint(`${prompt} ${CHOICES} > `);
    }
    const frame = box(prompt, style).map((line) => this.paint(line));
    return `${frame.join("\n")}\nYour choice ${CHOICES} -> `;
  }

  /**
   * Ask until a valid answer arrives. Quiet mode answers "yes" without
   * reading.
   */
  ask(reader: InputReader): Result<ConfirmAnswer, InputError | IoError> {
    if (this.host.isQuiet) {
      return ok("yes");
    }

    for (let attempt = 1; attempt <= MAX_CONFIRM_ATTEMPTS; attempt++) {
      const written = this.host.writeRaw(this.render());
      if (written.isErr()) {
        return err(written.error);
      }

      const line = reader.readLine();
      if (line.isErr()) {
        return err(line.error);
      }
      if (line.value === null) {
        return err(
          new InputError({ message: "Input ended before an answer was given" })
        );
      }

      const answer = parseAnswer(line.value, this.settings.defaultAnswer);
      if (answer) {
        return ok(answer);
      }

      const warned = this.host.warn(
        `Invalid answer "${line.value.trim()}"; expected y, n or q`
      );
      if (warned.isErr()) {
        return err(warned.error);
      }
    }

    return err(
      new InputError({
        message: `No valid answer after ${MAX_CONFIRM_ATTEMPTS} attempts`,
      })
    );
  }
}

/**
 * Reader over a fixed list of lines, then end of input.
 */
export function createLineReader(lines: readonly string[]): InputReader {
  let index = 0;
  return {
    readLine() {
      const line = lines[index];
      index += 1;
      return ok(line ?? null);
    },
  };
}
