#!/usr/bin/env tsx

import { run } from "../src";

process.on("uncaughtException", (err) => {
  console.error(
    "Uncaught exception:",
    err instanceof Error ? err.message : err
  );
  process.exit(1);
});

process.exitCode = run();
