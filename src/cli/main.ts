#!/usr/bin/env node
import { InterruptedError } from "../fixtures/errors.js";
import { buildProgram } from "./program.js";

// A first Ctrl-C stops the run before it writes; a second one kills it.
const interrupt = new AbortController();
process.once("SIGINT", () => interrupt.abort());

buildProgram({ signal: interrupt.signal })
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    if (err instanceof InterruptedError) {
      console.error("Interrupted");
      process.exitCode = 130;
      return;
    }
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  });
