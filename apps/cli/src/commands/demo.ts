import type { GlyphlogError, Stderr } from "@glyphlog/core";
import { Command } from "commander";
import { err, ok, type Result } from "neverthrow";

import type { CliIo } from "../io";
import { createRenderer, fail } from "../runtime";

type DemoStep = (renderer: Stderr) => Result<unknown, GlyphlogError>;

function compileStep(r: Stderr): Result<void, GlyphlogError> {
  return r
    .scope("compile", (compile) =>
      compile
        .traceAdd("src/index.ts")
        .andThen(() => compile.traceDone("1 file"))
    )
    .andThen((written) => written);
}

function buildStep(r: Stderr): Result<void, GlyphlogError> {
  return r
    .scope("build", (build) =>
      build
        .step("reading manifest")
        .andThen(() => compileStep(r))
        .andThen(() => build.stepValue("artifacts", ["dist/index.js"]))
    )
    .andThen((written) => written);
}

const DEMO_STEPS: readonly DemoStep[] = [
  (r) => r.setContext("@demo"),
  (r) => r.info("rendering a short walkthrough"),
  buildStep,
  (r) =>
    r.simpleTable([
      ["step", "status"],
      ["build", "ok"],
      ["test", "ok"],
    ]),
  (r) =>
    r.flagTable({
      bitWidth: 8,
      labels: ["r", "w", "x", "s", "g", "u", "d", "a"],
      value: 0b1011_0010,
    }),
  (r) => r.boxHeavy("walkthrough finished"),
  (r) => r.okay("demo complete"),
];

/**
 * Show trace frames, a context banner and the layouts in one run.
 */
export function runDemo(renderer: Stderr): Result<void, GlyphlogError> {
  renderer.setTrace(true);
  for (const step of DEMO_STEPS) {
    const result = step(renderer);
    if (result.isErr()) {
      return err(result.error);
    }
  }
  return ok(undefined);
}

export function demoCommand(io: CliIo): Command {
  return new Command("demo")
    .description("Show trace frames, context banners and layouts")
    .action((_options: unknown, command: Command) => {
      const renderer = createRenderer(io, command);
      const result = runDemo(renderer);
      if (result.isErr()) {
        fail(io, renderer, result.error);
      }
    });
}
