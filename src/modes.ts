import { UnknownModeError, InvalidKeyError, UnknownRootError } from "./errors.js";
import {
  CHROMATIC_FLAT,
  CHROMATIC_SHARP,
  isSupportedRoot,
  rotate,
} from "./music-theory.js";
import type { ModeName, ModeResolution, NoteWithAccidental, Spelling } from "./types.js";

// W-W-H-W-W-W-H, the major scale (ionian). Whole = 2 semitones, half = 1
export const IONIAN_STEPS: readonly number[] = [2, 2, 1, 2, 2, 2, 1];

// How far the step pattern is shifted earlier for each mode
export const MODE_OFFSETS: Readonly<Record<ModeName, number>> = {
  ionian: 0,
  dorian: 1,
  phrygian: 2,
  lydian: 3,
  mixolydian: 4,
  aeolian: 5,
  locrian: 6,
};

export const MODE_NAMES: readonly ModeName[] = [
  "ionian",
  "dorian",
  "phrygian",
  "lydian",
  "mixolydian",
  "aeolian",
  "locrian",
];

export function isModeName(value: string): value is ModeName {
  return Object.hasOwn(MODE_OFFSETS, value);
}

export function parseModeName(value: string): ModeName {
  const normalized = value.trim().toLowerCase();
  if (!isModeName(normalized)) {
    throw new UnknownModeError(value);
  }
  return normalized;
}

/**
 * Lydian is spelled with sharps, every other mode with flats
 */
export function modeSpelling(mode: ModeName): Spelling {
  return mode === "lydian" ? "sharps" : "flats";
}

/**
 * Step pattern of a mode, in semitones
 */
export function modeSteps(mode: ModeName): number[] {
  return rotate(IONIAN_STEPS, MODE_OFFSETS[mode]);
}

/**
 * Chromatic offsets of the 7 mode notes from the key, starting at 0
 */
export function modeOffsets(mode: ModeName): number[] {
  const offsets = [0];
  for (const step of modeSteps(mode).slice(0, -1)) {
    offsets.push(offsets[offsets.length - 1] + step);
  }
  return offsets;
}

/**
 * Resolve the notes of a mode and the chromatic sequence rooted at its key.
 *
 * The key must be spelled the way the mode's chromatic sequence spells it:
 * `D#` is rejected for dorian (flats) and `Bb` for lydian (sharps).
 */
export function resolveMode(key: string, mode: ModeName): ModeResolution {
  if (!isSupportedRoot(key)) {
    throw new UnknownRootError(key);
  }

  const spelling = modeSpelling(mode);
  const sequence = spelling === "sharps" ? CHROMATIC_SHARP : CHROMATIC_FLAT;
  const keyIndex = sequence.indexOf(key);
  if (keyIndex === -1) {
    throw new InvalidKeyError(key, mode, spelling);
  }

  const chromatic = rotate(sequence, keyIndex);
  const scale: NoteWithAccidental[] = modeOffsets(mode).map((offset) => chromatic[offset]);

  return { key, mode, spelling, scale, chromatic };
}
