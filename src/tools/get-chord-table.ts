import { enumerateChords } from "../chord-catalog.js";
import { formatChordTable } from "../chord-report.js";
import type { ToolResult } from "../types.js";
import {
  chordsInputSchema,
  DEFAULT_SIZES,
  errorResult,
  modeProperties,
  parseInput,
  resolveModeInput,
  sizesProperty,
} from "./inputs.js";

export async function getChordTable(input: unknown): Promise<ToolResult> {
  try {
    const args = parseInput(chordsInputSchema, input);
    const { key, mode } = resolveModeInput(args);
    const { sizes = DEFAULT_SIZES } = args;

    const table = formatChordTable(enumerateChords(mode, key, sizes));

    return {
      content: [
        {
          type: "text",
          text: `## ${key} ${mode}\n\n${table}`,
        },
      ],
    };
  } catch (error) {
    return errorResult("Error", error);
  }
}

export const getChordTableSchema = {
  name: "get_chord_table",
  description:
    "Tabulate the chords of a church mode as a Markdown table: one row per chord, sorted by name, one column per chord tone.",
  inputSchema: {
    type: "object" as const,
    properties: {
      ...modeProperties,
      sizes: sizesProperty,
    },
    required: ["key", "mode"],
  },
};
