/**
 * The renderer: one dispatch point for messages, trace frames, context
 * banners and layout output.
 *
 * Every call applies the verbosity gate, then the trace prefix, formats its
 * lines and writes them to the sink in one synchronous write. Failures come
 * back as `Result` values; nothing here throws or exits.
 *
 * @example
 * const log = new Stderr({ config: { trace: true } });
 * log.info("starting");
 * log.scope("load", (h) => {
 *   h.step("reading file");
 * });
 */

import type { Ansis } from "ansis";
import { err, ok, type Result } from "neverthrow";

import { loadGlyphCatalogue } from "./catalogue";
import { resolveVerbosity } from "./config";
import { ConfirmBuilder, type ConfirmHost } from "./confirm";
import { ContextController } from "./context";
import { describeValue } from "./describe";
import { HandleMisuseError, type IoError, LayoutError } from "./errors";
import { DEFAULT_LEVEL_STYLES, withGlyphOverrides } from "./levels";
import { SEPARATOR } from "./render/glyphs";
import {
  box,
  columns,
  flagTable,
  list,
  numberedList,
  simpleTable,
  table,
  type TableStyles,
} from "./render/grid";
import { displayWidth, splitLines } from "./render/text";
import { renderBanner, renderContextBanner, traceIndent } from "./render/tree";
import type {
  BorderStyle,
  FlagSpec,
  FlagTableOptions,
  Grid,
  TableRow,
} from "./render/types";
import { detectViewport } from "./render/viewport";
import {
  DEFAULT_VERBOSITY,
  type GlyphOverrides,
  type LogLevel,
  type VerbosityConfig,
} from "./schema/config";
import { createStreamSink, type Sink } from "./sink";
import {
  createAnsis,
  getAnsis,
  paint,
  PALETTE_SIZE,
  swatch,
} from "./style";
import {
  DEFAULT_ENTER_TEXT,
  enterFrame,
  type ScopeHandle,
  TraceStack,
} from "./trace";

export interface LoggerOptions {
  /**
   * Verbosity flags. When omitted they are resolved from QUIET_MODE,
   * DEBUG_MODE, TRACE_MODE, SILLY_MODE and DEV_MODE.
   */
  config?: Partial<VerbosityConfig>;
  /** Environment used when `config` is omitted. Default: process.env */
  env?: NodeJS.ProcessEnv;
  /** Output destination. Default: process.stderr */
  sink?: Sink;
  /** Force color on or off; detected lazily when unset */
  color?: boolean;
  /** Layout width. Default: the terminal width, or 80 */
  width?: number;
  /** Shown in front of every message glyph */
  label?: string;
  glyphs?: GlyphOverrides;
}

export type LayoutResult = Result<void, LayoutError | IoError>;
export type ScopeResult<T> = Result<T, IoError | HandleMisuseError>;

const MESSAGE_GATES: Readonly<
  Record<LogLevel, (flags: VerbosityConfig) => boolean>
> = {
  okay: () => true,
  error: () => true,
  info: (f) => !f.quiet,
  note: (f) => !f.quiet,
  warn: (f) => !f.quiet,
  debug: (f) => !f.quiet && f.debug,
  trace: (f) => !f.quiet && f.trace,
  magic: (f) => !f.quiet && f.silly,
  silly: (f) => !f.quiet && f.silly,
  devlog: (f) => !f.quiet && f.dev,
};

const CATALOGUE_COLUMNS = 4;
const PALETTE_COLUMNS = 16;

export class Stderr implements ConfirmHost {
  private readonly options: LoggerOptions;
  private readonly flags: VerbosityConfig;
  private readonly sink: Sink;
  private readonly width: number;
  private readonly styles: Record<LogLevel, { glyph: string; color: number }>;
  private readonly stack = new TraceStack();
  private readonly context: ContextController;
  private label: string | undefined;

  constructor(options: LoggerOptions = {}) {
    this.options = options;
    this.flags = options.config
      ? { ...DEFAULT_VERBOSITY, ...options.config }
      : resolveVerbosity(options.env);
    this.sink = options.sink ?? createStreamSink();
    this.width = options.width ?? detectViewport().width;
    this.styles = {
      ...withGlyphOverrides(DEFAULT_LEVEL_STYLES, options.glyphs ?? {}),
    };
    this.label = options.label;
    this.context = new ContextController({
      writeContextBanner: (name) => this.writeContextBanner(name),
    });
  }

  // --------------------------------------------------------------------------
  // Configuration
  // --------------------------------------------------------------------------

  get config(): Readonly<VerbosityConfig> {
    return { ...this.flags };
  }

  get isQuiet(): boolean {
    return this.flags.quiet;
  }

  get layoutWidth(): number {
    return this.width;
  }

  setQuiet(enabled: boolean): void {
    this.flags.quiet = enabled;
  }

  setDebug(enabled: boolean): void {
    this.flags.debug = enabled;
  }

  setTrace(enabled: boolean): void {
    this.flags.trace = enabled;
  }

  setSilly(enabled: boolean): void {
    this.flags.silly = enabled;
  }

  setDev(enabled: boolean): void {
    this.flags.dev = enabled;
  }

  setLabel(label: string): void {
    this.label = label;
  }

  clearLabel(): void {
    this.label = undefined;
  }

  setGlyph(level: LogLevel, glyph: string): void {
    this.styles[level] = { ...this.styles[level], glyph };
  }

  glyphFor(level: LogLevel): string {
    return this.styles[level].glyph;
  }

  /**
   * A new logger over the same sink with extra glyph overrides. Trace and
   * context state start fresh.
   */
  withGlyphs(overrides: GlyphOverrides): Stderr {
    return new Stderr({
      ...this.options,
      config: { ...this.flags },
      sink: this.sink,
      width: this.width,
      label: this.label,
      glyphs: { ...this.options.glyphs, ...overrides },
    });
  }

  /** Whether a message at `level` would be written. */
  isEnabled(level: LogLevel): boolean {
    return MESSAGE_GATES[level](this.flags);
  }

  // --------------------------------------------------------------------------
  // Output plumbing
  // --------------------------------------------------------------------------

  private get ansis(): Ansis {
    return this.options.color === undefined
      ? getAnsis()
      : createAnsis(this.options.color);
  }

  private get tracing(): boolean {
    return this.flags.trace && !this.flags.quiet;
  }

  private prefix(): string {
    return this.tracing ? traceIndent(this.stack.depth) : "";
  }

  colorize(code: number, text: string): string {
    return paint(this.ansis, code, text);
  }

  writeRaw(text: string): Result<void, IoError> {
    return this.sink.write(text);
  }

  private writeLines(lines: readonly string[]): Result<void, IoError> {
    if (lines.length === 0) {
      return ok(undefined);
    }
    const prefix = this.prefix();
    return this.sink.write(lines.map((line) => `${prefix}${line}\n`).join(""));
  }

  private writeLayout(lines: readonly string[]): Result<void, IoError> {
    if (this.flags.quiet) {
      return ok(undefined);
    }
    return this.writeLines(lines);
  }

  private writeTraceLine(line: string): Result<void, IoError> {
    if (!this.tracing) {
      return ok(undefined);
    }
    return this.sink.write(
      `${this.colorize(DEFAULT_LEVEL_STYLES.trace.color, line)}\n`
    );
  }

  private writeContextBanner(name: string): Result<boolean, IoError> {
    if (this.flags.quiet) {
      return ok(false);
    }
    const banner = this.ansis.bold(renderContextBanner(name, this.width));
    return this.writeLines([banner]).map(() => true);
  }

  private tableStyles(): TableStyles {
    const a = this.ansis;
    return { header: (text) => a.bold(text), rule: (text) => a.dim(text) };
  }

  // --------------------------------------------------------------------------
  // Messages
  // --------------------------------------------------------------------------

  /**
   * Format a message without writing it. Continuation lines of multi-line
   * text are indented under the first.
   */
  format(level: LogLevel, text: string): string[] {
    const { glyph, color } = this.styles[level];
    const head = this.label ? `[${this.label}][${glyph}] ` : `[${glyph}] `;
    const indent = " ".repeat(displayWidth(head));
    return splitLines(text).map((line, i) =>
      this.colorize(color, `${i === 0 ? head : indent}${line}`)
    );
  }

  log(level: LogLevel, text: string): Result<void, IoError> {
    if (!this.isEnabled(level)) {
      return ok(undefined);
    }
    return this.writeLines(this.format(level, text));
  }

  okay(text: string): Result<void, IoError> {
    return this.log("okay", text);
  }

  info(text: string): Result<void, IoError> {
    return this.log("info", text);
  }

  note(text: string): Result<void, IoError> {
    return this.log("note", text);
  }

  warn(text: string): Result<void, IoError> {
    return this.log("warn", text);
  }

  error(text: string): Result<void, IoError> {
    return this.log("error", text);
  }

  debug(text: string): Result<void, IoError> {
    return this.log("debug", text);
  }

  trace(text: string): Result<void, IoError> {
    return this.log("trace", text);
  }

  magic(text: string): Result<void, IoError> {
    return this.log("magic", text);
  }

  silly(text: string): Result<void, IoError> {
    return this.log("silly", text);
  }

  devlog(text: string): Result<void, IoError> {
    return this.log("devlog", text);
  }

  /**
   * Pretty-print a value at `level`, through `describe()` when it has one.
   */
  inspect(level: LogLevel, value: unknown): Result<void, IoError> {
    if (!this.isEnabled(level)) {
      return ok(undefined);
    }
    return this.log(level, describeValue(value));
  }

  // --------------------------------------------------------------------------
  // Trace frames
  // --------------------------------------------------------------------------

  /** Number of open trace frames */
  get traceDepth(): number {
    return this.stack.depth;
  }

  enter(
    name: string,
    text: string = DEFAULT_ENTER_TEXT
  ): Result<ScopeHandle, IoError> {
    return enterFrame(
      this.stack,
      { writeTraceLine: (line) => this.writeTraceLine(line) },
      name,
      text
    );
  }

  exit(
    handle: ScopeHandle,
    text?: string
  ): Result<void, IoError | HandleMisuseError> {
    return handle.release(text);
  }

  /**
   * Run `body` inside a frame that is always released afterwards, along
   * with any frames the body opened and left open. When `body` throws, the
   * exit lines are written and the exception propagates. A frame left open
   * by a body that returned is reported as a `HandleMisuseError`.
   */
  scope<T>(name: string, body: (handle: ScopeHandle) => T): ScopeResult<T> {
    const entered = this.enter(name);
    if (entered.isErr()) {
      return err(entered.error);
    }
    const handle = entered.value;

    let value: T;
    try {
      value = body(handle);
    } catch (error) {
      // The body's exception takes precedence over an exit-line failure.
      handle.unwind();
      throw error;
    }

    if (handle.isReleased) {
      return ok(value);
    }
    const unwound = handle.unwind();
    if (unwound.isErr()) {
      return err(unwound.error);
    }
    const leaked = unwound.value.at(-1);
    if (leaked !== undefined) {
      return err(
        new HandleMisuseError(leaked, {
          message: `Trace frame "${leaked}" was still open when "${name}" closed`,
        })
      );
    }
    return ok(value);
  }

  // --------------------------------------------------------------------------
  // Context
  // --------------------------------------------------------------------------

  get currentContext(): string | undefined {
    return this.context.current;
  }

  setContext(name: string): Result<void, IoError> {
    return this.context.setContext(name);
  }

  clearContext(): void {
    this.context.clearContext();
  }

  withContext<T>(name: string, body: () => T): Result<T, IoError> {
    return this.context.withContext(name, body);
  }

  // --------------------------------------------------------------------------
  // Layout
  // --------------------------------------------------------------------------

  simpleTable(rows: Grid): Result<void, IoError> {
    return this.writeLayout(simpleTable(rows, this.tableStyles()));
  }

  table(
    headers: readonly string[],
    rows: readonly TableRow[]
  ): Result<void, IoError> {
    return this.writeLayout(table(headers, rows, this.tableStyles()));
  }

  columns(items: readonly string[], count: number): LayoutResult {
    const lines = columns(items, count);
    if (lines.isErr()) {
      return err(lines.error);
    }
    return this.writeLayout(lines.value);
  }

  box(text: string, style: BorderStyle = "light"): Result<void, IoError> {
    return this.writeLayout(box(text, style));
  }

  boxLight(text: string): Result<void, IoError> {
    return this.box(text, "light");
  }

  boxHeavy(text: string): Result<void, IoError> {
    return this.box(text, "heavy");
  }

  boxDouble(text: string): Result<void, IoError> {
    return this.box(text, "double");
  }

  flagTable(spec: FlagSpec, options: FlagTableOptions = {}): LayoutResult {
    const lines = flagTable(spec, options);
    if (lines.isErr()) {
      return err(lines.error);
    }
    return this.writeLayout(lines.value);
  }

  banner(
    text: string,
    fill: string = SEPARATOR.primary
  ): Result<void, IoError> {
    return this.writeLayout([renderBanner(text, this.width, fill)]);
  }

  list(items: readonly string[], bullet?: string): Result<void, IoError> {
    return this.writeLayout(list(items, bullet));
  }

  numberedList(items: readonly string[]): Result<void, IoError> {
    return this.writeLayout(numberedList(items));
  }

  /** Usage text in a light box. */
  help(text: string): Result<void, IoError> {
    return this.box(text, "light");
  }

  /** Every named glyph, laid out in columns. */
  glyphCatalogue(count: number = CATALOGUE_COLUMNS): LayoutResult {
    const items = loadGlyphCatalogue().map(
      (entry) => `${entry.glyph} ${entry.name}`
    );
    return this.columns(items, count);
  }

  /** The 256-color palette, `perRow` swatches to a line. */
  colorGrid(perRow: number = PALETTE_COLUMNS): LayoutResult {
    if (!Number.isInteger(perRow) || perRow < 1) {
      return err(
        new LayoutError({
          message: `Column count must be a positive integer, got ${perRow}`,
        })
      );
    }
    const cells = Array.from({ length: PALETTE_SIZE }, (_, code) =>
      swatch(this.ansis, code)
    );
    const rows: string[] = [];
    for (let i = 0; i < cells.length; i += perRow) {
      rows.push(cells.slice(i, i + perRow).join(""));
    }
    return this.writeLayout(rows);
  }

  // --------------------------------------------------------------------------
  // Prompts
  // --------------------------------------------------------------------------

  confirm(prompt: string): ConfirmBuilder {
    return new ConfirmBuilder(this, prompt);
  }
}
