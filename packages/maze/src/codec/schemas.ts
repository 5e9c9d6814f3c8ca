import { z } from "zod";
import { MAX_EDGE_WEIGHT, MAX_FILE_DIMENSION } from "../constants";

/**
 * Unsigned decimal integer token, e.g. "0", "17".
 */
const UnsignedText = z
  .string()
  .regex(/^\d+$/, { error: "expected an unsigned integer" })
  .transform((text) => Number(text));

export const DimensionSchema = UnsignedText.pipe(
  z
    .number()
    .int()
    .min(1, { error: "dimension must be at least 1" })
    .max(MAX_FILE_DIMENSION, { error: `dimension cannot exceed ${MAX_FILE_DIMENSION}` }),
);

export const CoordinateSchema = UnsignedText.pipe(
  z.number().int({ error: "coordinate is out of range" }),
);

export const EdgeLengthSchema = UnsignedText.pipe(
  z
    .number()
    .int()
    .min(1, { error: "edge length must be at least 1" })
    .max(MAX_EDGE_WEIGHT, { error: `edge length cannot exceed ${MAX_EDGE_WEIGHT}` }),
);

/**
 * Open cell token `<id>:<gold>`.
 */
export const OpenCellSchema = z
  .string()
  .regex(/^\d+:\d+$/, { error: "expected '#' or '<id>:<gold>'" })
  .transform((text) => {
    const [id = "", gold = ""] = text.split(":");
    return { id: Number(id), gold: Number(gold) };
  })
  .pipe(
    z.object({
      id: z.number().int({ error: "node id is out of range" }),
      gold: z.number().int({ error: "gold is out of range" }),
    }),
  );

export const WALL_TOKEN = "#";
