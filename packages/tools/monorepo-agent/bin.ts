#!/usr/bin/env node
import { defaultDeps, main } from "./cli.js";

const controller = new AbortController();
process.once("SIGINT", () => {
  console.error("Interrupted, waiting for running mirrors to stop...");
  controller.abort();
});

try {
  process.exitCode = await main(
    process.argv.slice(2),
    defaultDeps(controller.signal),
  );
} catch (e) {
  console.error(e instanceof Error ? e.stack ?? e.message : String(e));
  process.exitCode = 1;
}
