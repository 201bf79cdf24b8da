import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";

const __dirname = dirname(fileURLToPath(import.meta.url));
const DEFAULT_OUTPUT_DIR = join(__dirname, "..", "output");

const configSchema = z.object({
  MODAL_CHORDS_OUTPUT_DIR: z.string().min(1).default(DEFAULT_OUTPUT_DIR),
  MODAL_CHORDS_TEMPO: z.coerce.number().positive().max(400).default(120),
  MODAL_CHORDS_OCTAVE: z.coerce.number().int().min(0).max(8).default(4),
  MODAL_CHORDS_CHORD_BEATS: z.coerce.number().positive().default(4),
});

export interface Config {
  outputDir: string;
  tempo: number;
  octave: number;
  chordBeats: number;
}

/**
 * Read settings from the environment. Unset values fall back to defaults;
 * malformed ones throw.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    outputDir: values.MODAL_CHORDS_OUTPUT_DIR,
    tempo: values.MODAL_CHORDS_TEMPO,
    octave: values.MODAL_CHORDS_OCTAVE,
    chordBeats: values.MODAL_CHORDS_CHORD_BEATS,
  };
}
