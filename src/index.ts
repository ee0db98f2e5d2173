#!/usr/bin/env node
import { runCli } from "./cli";
import { ScrapeError } from "./core/errors";

function describeFailure(error: unknown): string {
  if (error instanceof ScrapeError) {
    return `${error.name}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error(`fatal: ${describeFailure(error)}`);
    process.exitCode = 1;
  });
