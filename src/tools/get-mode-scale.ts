import { z } from "zod";
import { loadConfig, type Config } from "../config.js";
import { NoteOutOfRangeError } from "../errors.js";
import { MIDI_NOTE_MAX } from "../midi-writer.js";
import { modeOffsets, resolveMode } from "../modes.js";
import { noteToSemitone } from "../music-theory.js";
import type { ModeResolution, ToolResult } from "../types.js";
import { errorResult, modeInputSchema, modeProperties, parseInput, resolveModeInput } from "./inputs.js";

const getModeScaleInput = modeInputSchema.extend({
  octave: z.number().int().min(0).max(8).optional(),
});

interface ModeScaleResult extends ModeResolution {
  midiNumbers: number[];
  octave: number;
}

export async function getModeScale(
  input: unknown,
  config: Config = loadConfig()
): Promise<ToolResult> {
  try {
    const args = parseInput(getModeScaleInput, input);
    const { key, mode } = resolveModeInput(args);
    const { octave = config.octave } = args;

    const resolution = resolveMode(key, mode);
    const rootMidi = noteToSemitone(key) + (octave + 1) * 12;
    const midiNumbers = modeOffsets(mode).map((offset) => rootMidi + offset);
    midiNumbers.forEach((midi, index) => {
      if (midi > MIDI_NOTE_MAX) {
        throw new NoteOutOfRangeError(resolution.scale[index], midi);
      }
    });

    const result: ModeScaleResult = { ...resolution, midiNumbers, octave };

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

export const getModeScaleSchema = {
  name: "get_mode_scale",
  description:
    "Get the notes of a church mode on a key, the chromatic sequence rooted at the key, and MIDI numbers.",
  inputSchema: {
    type: "object" as const,
    properties: {
      ...modeProperties,
      octave: {
        type: "number",
        description: "Octave of the key for MIDI numbers (default: MODAL_CHORDS_OCTAVE, else 4, the middle C octave)",
      },
    },
    required: ["key", "mode"],
  },
};
