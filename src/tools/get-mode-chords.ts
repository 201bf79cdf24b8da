import { z } from "zod";
import { catalogFromRecords, enumerateChordRecords, normalizeChordSizes } from "../chord-catalog.js";
import type { ChordCatalog, ChordRecord, ToolResult } from "../types.js";
import {
  chordsInputSchema,
  DEFAULT_SIZES,
  errorResult,
  modeProperties,
  parseInput,
  resolveModeInput,
  sizesProperty,
} from "./inputs.js";

const getModeChordsInput = chordsInputSchema.extend({
  includeRecords: z.boolean().optional(),
});

interface ModeChordsResult {
  key: string;
  mode: string;
  sizes: readonly number[];
  chords: ChordCatalog;
  records?: ChordRecord[];
}

export async function getModeChords(input: unknown): Promise<ToolResult> {
  try {
    const args = parseInput(getModeChordsInput, input);
    const { key, mode } = resolveModeInput(args);
    const { sizes = DEFAULT_SIZES, includeRecords = false } = args;

    const walked = normalizeChordSizes(sizes);
    const records = enumerateChordRecords(mode, key, walked);
    const chords = catalogFromRecords(records);

    const result: ModeChordsResult = { key, mode, sizes: walked, chords };
    if (includeRecords) {
      result.records = records;
    }

    return {
      content: [
        {
          type: "text",
          text: JSON.stringify(result, null, 2),
        },
      ],
    };
  } catch (error) {
    return errorResult("Error", error);
  }
}

export const getModeChordsSchema = {
  name: "get_mode_chords",
  description:
    'Get every named chord of a church mode, keyed "{root}_{quality}". Each value lists 7 slots; empty strings pad chords with fewer tones.',
  inputSchema: {
    type: "object" as const,
    properties: {
      ...modeProperties,
      sizes: sizesProperty,
      includeRecords: {
        type: "boolean",
        description:
          "Also return one record per degree and chord pattern, including chords whose name was overwritten (default: false)",
      },
    },
    required: ["key", "mode"],
  },
};
