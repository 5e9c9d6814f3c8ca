import { buildRunConfig, type CavernError, type Result, type RunConfig } from "@cavern/contracts";

export const USAGE = "Usage: cavern-run [-s <seed>] [-n <count>] [-d] [--solver <module>]";

/**
 * Parse `cavern-run` arguments. Unknown arguments are ignored.
 *
 * A flag given without a value is validated as an empty value, so `-s` at
 * the end of the line is reported like a malformed seed.
 */
export function parseCliArgs(argv: readonly string[]): Result<RunConfig, CavernError> {
  const getFlagValue = (flag: string): string | undefined => {
    const index = argv.indexOf(flag);
    if (index < 0) return undefined;
    return argv[index + 1] ?? "";
  };

  return buildRunConfig({
    seed: getFlagValue("-s"),
    count: getFlagValue("-n"),
    display: argv.includes("-d"),
    solver: getFlagValue("--solver"),
  });
}
