import { type RunConfig, RunConfigSchema, RunCountSchema, SeedSchema } from "../schemas/run-config";
import { CavernError } from "../types/error";
import { Err, Ok, type Result } from "../types/result";

export interface BuildRunConfigInput {
  readonly seed?: string | number;
  readonly count?: string | number;
  readonly display?: boolean;
  readonly solver?: string;
}

function firstIssue(error: { issues: readonly { message: string }[] }): string {
  return error.issues[0]?.message ?? "invalid value";
}

/**
 * Validate raw run options, applying defaults.
 *
 * A count below one is raised to one rather than rejected; anything that is
 * not a whole number is a configuration error.
 */
export function buildRunConfig(
  input: BuildRunConfigInput,
): Result<RunConfig, CavernError> {
  const seed = SeedSchema.safeParse(input.seed ?? 0);
  if (!seed.success) {
    return Err(
      CavernError.configInvalid(`-s must be followed by a numerical seed (${firstIssue(seed.error)})`, {
        seed: input.seed,
      }),
    );
  }

  const count = RunCountSchema.safeParse(input.count ?? 1);
  if (!count.success) {
    return Err(
      CavernError.configInvalid(`-n must be followed by a run count (${firstIssue(count.error)})`, {
        count: input.count,
      }),
    );
  }

  const parsed = RunConfigSchema.safeParse({
    seed: seed.data,
    count: Math.max(count.data, 1),
    display: input.display ?? false,
    solver: input.solver,
  });
  if (!parsed.success) {
    return Err(CavernError.configInvalid(firstIssue(parsed.error)));
  }
  return Ok(parsed.data);
}
