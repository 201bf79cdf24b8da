import { basename } from "path";
import { z } from "zod";
import { enumerateChords } from "../chord-catalog.js";
import { loadConfig, type Config } from "../config.js";
import { writeCatalogMidi } from "../midi-writer.js";
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

const generateChordMidiInput = chordsInputSchema.extend({
  tempo: z.number().positive().max(400).optional(),
  octave: z.number().int().min(0).max(8).optional(),
  beats: z.number().positive().optional(),
});

/**
 * Write one MIDI sample per chord of a mode
 */
export async function generateChordMidi(
  input: unknown,
  config: Config = loadConfig()
): Promise<ToolResult> {
  try {
    const args = parseInput(generateChordMidiInput, input);
    const { key, mode } = resolveModeInput(args);
    const {
      sizes = DEFAULT_SIZES,
      tempo = config.tempo,
      octave = config.octave,
      beats = config.chordBeats,
    } = args;

    const catalog = enumerateChords(mode, key, sizes);
    const paths = writeCatalogMidi(catalog, {
      outputDir: config.outputDir,
      prefix: `${key}-${mode}`,
      tempo,
      octave,
      beats,
    });

    return {
      content: [
        {
          type: "text",
          text:
            `Generated ${paths.length} MIDI files for ${key} ${mode}\n` +
            `Directory: ${config.outputDir}\n` +
            `Tempo: ${tempo} BPM\n` +
            `Files:\n` +
            paths.map((path) => `- ${basename(path)}`).join("\n"),
        },
      ],
    };
  } catch (error) {
    return errorResult("Error generating MIDI", error);
  }
}

export const generateChordMidiSchema = {
  name: "generate_chord_midi",
  description:
    "Generate one MIDI file per chord of a church mode. Each file holds the chord as a block chord stacked upwards from its root.",
  inputSchema: {
    type: "object" as const,
    properties: {
      ...modeProperties,
      sizes: sizesProperty,
      tempo: {
        type: "number",
        description: "Tempo in BPM (default: 120)",
      },
      octave: {
        type: "number",
        description: "Octave of each chord root (default: 4)",
      },
      beats: {
        type: "number",
        description: "Length of each chord in beats (default: 4)",
      },
    },
    required: ["key", "mode"],
  },
};
