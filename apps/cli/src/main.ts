#!/usr/bin/env -S node --import tsx
/**
 * cavern-run entry point.
 */

import { createConsoleLogger } from "@cavern/game";
import { parseCliArgs, USAGE } from "./args";
import { runGames } from "./runner";

async function main(argv: readonly string[]): Promise<number> {
  const config = parseCliArgs(argv);
  if (config.isErr()) {
    console.error(`Error, ${config.error.message}`);
    console.error(USAGE);
    return 1;
  }

  await runGames(config.value, { logger: createConsoleLogger("Game") });
  return 0;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("[cavern-run]", error);
    process.exitCode = 1;
  },
);
