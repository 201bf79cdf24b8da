import { z } from "zod";
import { parseModeName } from "../modes.js";
import { normalizeNote } from "../music-theory.js";
import type { ChordSize, ModeName, NoteWithAccidental, ToolResult } from "../types.js";

export const modeInputSchema = z.object({
  key: z.string().min(1, "key is required"),
  mode: z.string().min(1, "mode is required"),
});

export const chordsInputSchema = modeInputSchema.extend({
  sizes: z.array(z.number()).nonempty().optional(),
});

export const DEFAULT_SIZES: readonly ChordSize[] = [3, 4];

/**
 * Validate tool arguments against a schema, joining zod's issues into one message
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new Error(message);
  }
  return parsed.data;
}

export function resolveModeInput(args: z.infer<typeof modeInputSchema>): {
  key: NoteWithAccidental;
  mode: ModeName;
} {
  return { key: normalizeNote(args.key), mode: parseModeName(args.mode) };
}

export function errorResult(prefix: string, error: unknown): ToolResult {
  const message = error instanceof Error ? error.message : String(error);
  return {
    content: [{ type: "text", text: `${prefix}: ${message}` }],
    isError: true,
  };
}

export const modeProperties = {
  key: {
    type: "string",
    description: 'Key of the mode (e.g., "C", "Eb", "F#"). Lydian keys are spelled with sharps, all other modes with flats.',
  },
  mode: {
    type: "string",
    enum: ["ionian", "dorian", "phrygian", "lydian", "mixolydian", "aeolian", "locrian"],
    description: "Church mode",
  },
};

export const sizesProperty = {
  type: "array",
  items: { type: "number", enum: [3, 4, 5, 6, 7] },
  description:
    "Chord sizes to build: 3 (triads), 4 (6th, 7th, add9), 5 (6/9, 9th), 6 (11th), 7 (13th). Default: [3, 4]",
};
