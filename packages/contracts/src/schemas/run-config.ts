import { z } from "zod";

/**
 * Decimal integer text as typed on a command line ("-12", "0", "4096").
 */
const IntegerText = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/, { error: "Expected a whole number" })
  .transform((text) => Number(text))
  .pipe(z.number().int({ error: "Number is out of range" }));

/**
 * A whole number given either as a number or as command-line text. Numbers
 * go through the same text check, so `2.5` and `"2.5"` fail alike.
 */
const WholeNumber = z
  .union([z.string(), z.number()])
  .transform((value) => String(value))
  .pipe(IntegerText);

/**
 * Seed 0 means "choose a random seed".
 */
export const SeedSchema = WholeNumber;

export const RunCountSchema = WholeNumber;

export const RunConfigSchema = z.object({
  seed: z.number().int(),
  count: z.number().int().min(1, { error: "Run count must be at least 1" }),
  display: z.boolean(),
  solver: z.string().min(1, { error: "Solver module cannot be empty" }).optional(),
});

export type RunConfig = z.infer<typeof RunConfigSchema>;
