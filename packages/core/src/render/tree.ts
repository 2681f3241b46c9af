/**
 * Tree connectors for trace output, and banners.
 *
 * A frame at depth `d` draws one continuation column per open ancestor
 * (`d - 1` columns) before its own connector. The rule is the same at every
 * depth:
 *
 * ```
 * λ load: entering
 * ├┄ reading file
 * ┆ λ parse: entering
 * ┆ ├┄ token stream
 * ┆ └┄ exiting
 * └┄ exiting
 * ```
 */

import { SEPARATOR, TRACE } from "./glyphs";
import { displayWidth } from "./text";

/** Widest a context banner gets, whatever the viewport */
export const CONTEXT_BANNER_MAX_WIDTH = 60;

/**
 * Continuation columns for `columns` open frames.
 */
export function traceIndent(columns: number): string {
  return TRACE.continuation.repeat(Math.max(0, columns));
}

export function renderTraceHeader(
  depth: number,
  name: string,
  text: string
): string {
  return `${traceIndent(depth - 1)}${TRACE.header}${name}: ${text}`;
}

export function renderTraceStep(depth: number, text: string): string {
  return `${traceIndent(depth - 1)}${TRACE.branch}${text}`;
}

export function renderTraceExit(depth: number, text: string): string {
  return `${traceIndent(depth - 1)}${TRACE.last}${text}`;
}

/**
 * Labelled trace line, e.g. `└┄┄[ + ] added user`.
 */
export function renderTraceLabel(
  depth: number,
  label: string,
  text: string
): string {
  return `${traceIndent(depth - 1)}${TRACE.labelled}[ ${label} ] ${text}`;
}

/**
 * Center text in a run of fill characters across `width` cells.
 * Text that does not fit is returned with a single space on each side.
 */
export function renderBanner(
  text: string,
  width: number,
  fill: string = SEPARATOR.primary
): string {
  const textWidth = displayWidth(text) + 2;
  if (textWidth >= width) {
    return ` ${text} `;
  }

  const totalFill = width - textWidth;
  const left = Math.floor(totalFill / 2);
  const right = totalFill - left;
  return `${fill.repeat(left)} ${text} ${fill.repeat(right)}`;
}

/**
 * Banner announcing a context change, capped at 60 cells.
 *
 * @example
 * renderContextBanner("@build", 30);
 * // "------ Context: @build -------"
 */
export function renderContextBanner(context: string, width: number): string {
  const cap = Math.min(width, CONTEXT_BANNER_MAX_WIDTH);
  const message = ` Context: ${context} `;
  const messageWidth = displayWidth(message);

  if (messageWidth >= cap) {
    return `--- ${context} ---`;
  }

  const totalFill = cap - messageWidth;
  const left = Math.floor(totalFill / 2);
  const right = totalFill - left;
  return `${SEPARATOR.context.repeat(left)}${message}${SEPARATOR.context.repeat(right)}`;
}
