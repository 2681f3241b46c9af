/**
 * Hierarchical trace frames with scoped handles.
 *
 * The stack only does bookkeeping; lines are handed to a `TraceWriter`,
 * which decides whether they are shown. Frames are tracked either way, so
 * depth stays correct when trace output is switched on mid-run.
 */

import { err, ok, type Result } from "neverthrow";

import { describeValue } from "./describe";
import { HandleMisuseError, type IoError } from "./errors";
import { TRACE_LABEL } from "./render/glyphs";
import {
  renderTraceExit,
  renderTraceHeader,
  renderTraceLabel,
  renderTraceStep,
} from "./render/tree";

export const DEFAULT_ENTER_TEXT = "entering";
export const DEFAULT_EXIT_TEXT = "exiting";

export interface TraceFrame {
  readonly id: number;
  readonly name: string;
  /** 1 for the outermost frame */
  readonly depth: number;
}

/** Receives rendered trace lines. */
export interface TraceWriter {
  writeTraceLine(line: string): Result<void, IoError>;
}

export type HandleResult = Result<void, HandleMisuseError | IoError>;

export class TraceStack {
  private readonly frames: TraceFrame[] = [];
  private nextId = 1;

  /** Number of open frames */
  get depth(): number {
    return this.frames.length;
  }

  top(): TraceFrame | undefined {
    return this.frames.at(-1);
  }

  /** Open frame names, outermost first */
  names(): string[] {
    return this.frames.map((frame) => frame.name);
  }

  isOpen(frame: TraceFrame): boolean {
    return this.frames.some((open) => open.id === frame.id);
  }

  isTop(frame: TraceFrame): boolean {
    return this.top()?.id === frame.id;
  }

  /**
   * The frame the next `push(name)` would create, without creating it.
   */
  peekNext(name: string): TraceFrame {
    return { id: this.nextId, name, depth: this.frames.length + 1 };
  }

  push(name: string): TraceFrame {
    const frame = this.peekNext(name);
    this.nextId += 1;
    this.frames.push(frame);
    return frame;
  }

  /**
   * Pop `frame`, which must be on top.
   */
  pop(frame: TraceFrame): Result<TraceFrame, HandleMisuseError> {
    if (!this.isTop(frame)) {
      return err(misuse(frame, this.isOpen(frame)));
    }
    this.frames.pop();
    return ok(frame);
  }

  /**
   * Pop `frame` and every frame opened after it, innermost first. Empty
   * when `frame` is no longer open.
   */
  popThrough(frame: TraceFrame): TraceFrame[] {
    const index = this.frames.findIndex((open) => open.id === frame.id);
    if (index === -1) {
      return [];
    }
    return this.frames.splice(index).reverse();
  }
}

function misuse(frame: TraceFrame, open: boolean): HandleMisuseError {
  const message = open
    ? `Trace frame "${frame.name}" is not the innermost open frame`
    : `Trace frame "${frame.name}" was already released`;
  return new HandleMisuseError(frame.name, { message });
}

/**
 * Caller-held right to one trace frame. Only the handle of the innermost
 * frame may step or release; a handle releases exactly once.
 */
export class ScopeHandle {
  private released = false;

  constructor(
    private readonly stack: TraceStack,
    private readonly writer: TraceWriter,
    readonly frame: TraceFrame
  ) {}

  get name(): string {
    return this.frame.name;
  }

  get depth(): number {
    return this.frame.depth;
  }

  /** True once released, or once an enclosing scope unwound this frame */
  get isReleased(): boolean {
    return this.released || !this.stack.isOpen(this.frame);
  }

  private check(): Result<void, HandleMisuseError> {
    if (this.released || !this.stack.isTop(this.frame)) {
      return err(misuse(this.frame, this.stack.isOpen(this.frame)));
    }
    return ok(undefined);
  }

  private emit(line: string): HandleResult {
    const checked = this.check();
    if (checked.isErr()) {
      return err(checked.error);
    }
    return this.writer.writeTraceLine(line);
  }

  step(text: string): HandleResult {
    return this.emit(renderTraceStep(this.frame.depth, text));
  }

  /** Step line followed by a one-line rendering of `value`. */
  stepValue(text: string, value: unknown): HandleResult {
    return this.step(`${text}: ${describeValue(value, { compact: true })}`);
  }

  traceAdd(text: string): HandleResult {
    return this.emit(renderTraceLabel(this.frame.depth, TRACE_LABEL.add, text));
  }

  traceSub(text: string): HandleResult {
    return this.emit(renderTraceLabel(this.frame.depth, TRACE_LABEL.sub, text));
  }

  traceFound(text: string): HandleResult {
    return this.emit(
      renderTraceLabel(this.frame.depth, TRACE_LABEL.found, text)
    );
  }

  traceDone(text: string): HandleResult {
    return this.emit(renderTraceLabel(this.frame.depth, TRACE_LABEL.done, text));
  }

  traceItem(text: string): HandleResult {
    return this.emit(renderTraceLabel(this.frame.depth, TRACE_LABEL.item, text));
  }

  /**
   * Pop the frame and write its exit line. The frame is popped even when
   * the write fails.
   */
  release(text: string = DEFAULT_EXIT_TEXT): HandleResult {
    const checked = this.check();
    if (checked.isErr()) {
      return err(checked.error);
    }
    const popped = this.stack.pop(this.frame);
    if (popped.isErr()) {
      return err(popped.error);
    }
    this.released = true;
    return this.writer.writeTraceLine(renderTraceExit(this.frame.depth, text));
  }

  /**
   * Close this frame and any frames still open above it, writing an exit
   * line for each. All of them are popped even when a write fails; the
   * first failure is returned. Resolves to the names of the inner frames
   * that had been left open, innermost first.
   */
  unwind(text: string = DEFAULT_EXIT_TEXT): Result<string[], IoError> {
    const closed = this.stack.popThrough(this.frame);
    this.released = true;

    let failure: IoError | undefined;
    for (const frame of closed) {
      const written = this.writer.writeTraceLine(
        renderTraceExit(frame.depth, text)
      );
      if (written.isErr() && !failure) {
        failure = written.error;
      }
    }
    if (failure) {
      return err(failure);
    }
    return ok(
      closed.filter((frame) => frame.id !== this.frame.id).map((f) => f.name)
    );
  }
}

/**
 * Open a frame: write its header, then push it. A failed header write
 * leaves the stack unchanged.
 */
export function enterFrame(
  stack: TraceStack,
  writer: TraceWriter,
  name: string,
  text: string = DEFAULT_ENTER_TEXT
): Result<ScopeHandle, IoError> {
  const next = stack.peekNext(name);
  const written = writer.writeTraceLine(
    renderTraceHeader(next.depth, name, text)
  );
  if (written.isErr()) {
    return err(written.error);
  }
  return ok(new ScopeHandle(stack, writer, stack.push(name)));
}
