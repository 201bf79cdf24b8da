import { readFileSync } from "fs";
import { z } from "zod";
import { UnknownRootError } from "./errors.js";
import type {
  NoteName,
  Accidental,
  NoteWithAccidental,
  ChordQualityEntry,
} from "./types.js";

// Note to semitone mapping (C = 0)
export const NOTE_TO_SEMITONE: Record<NoteName, number> = {
  C: 0,
  D: 2,
  E: 4,
  F: 5,
  G: 7,
  A: 9,
  B: 11,
};

// Chromatic scale spelled with sharps
export const CHROMATIC_SHARP: readonly NoteWithAccidental[] = [
  "C",
  "C#",
  "D",
  "D#",
  "E",
  "F",
  "F#",
  "G",
  "G#",
  "A",
  "A#",
  "B",
];

// Chromatic scale spelled with flats
export const CHROMATIC_FLAT: readonly NoteWithAccidental[] = [
  "C",
  "Db",
  "D",
  "Eb",
  "E",
  "F",
  "Gb",
  "G",
  "Ab",
  "A",
  "Bb",
  "B",
];

// Major scale for every supported root, including the theoretical C# and Cb
export const MAJOR_SCALES: Readonly<Record<string, readonly NoteWithAccidental[]>> = {
  C: ["C", "D", "E", "F", "G", "A", "B"],
  Db: ["Db", "Eb", "F", "Gb", "Ab", "Bb", "C"],
  "C#": ["C#", "D#", "E#", "F#", "G#", "A#", "B#"],
  D: ["D", "E", "F#", "G", "A", "B", "C#"],
  Eb: ["Eb", "F", "G", "Ab", "Bb", "C", "D"],
  E: ["E", "F#", "G#", "A", "B", "C#", "D#"],
  F: ["F", "G", "A", "Bb", "C", "D", "E"],
  Gb: ["Gb", "Ab", "Bb", "Cb", "Db", "Eb", "F"],
  "F#": ["F#", "G#", "A#", "B", "C#", "D#", "E#"],
  G: ["G", "A", "B", "C", "D", "E", "F#"],
  Ab: ["Ab", "Bb", "C", "Db", "Eb", "F", "G"],
  A: ["A", "B", "C#", "D", "E", "F#", "G#"],
  Bb: ["Bb", "C", "D", "Eb", "F", "G", "A"],
  B: ["B", "C#", "D#", "E", "F#", "G#", "A#"],
  Cb: ["Cb", "Db", "Eb", "Fb", "Gb", "Ab", "Bb"],
};

// Spellings replaced by the way the root appears on the circle of fifths
export const CIRCLE_OF_FIFTHS_SPELLINGS: Readonly<Record<string, NoteWithAccidental>> = {
  "A#": "Bb",
  "D#": "Eb",
  "G#": "Ab",
  "E#": "F",
  Fb: "E",
  "B#": "C",
  Cb: "B",
};

// Major-scale notes that have no place in either chromatic table
const OFF_TABLE_SPELLINGS: Readonly<Record<string, NoteWithAccidental>> = {
  "E#": "F",
  Fb: "E",
  "B#": "C",
  Cb: "B",
};

// Roots whose reference chromatic sequence is spelled with flats
const FLAT_REFERENCE_ROOTS = ["F", "A#", "Bb", "D#", "Eb", "G#", "Ab", "Db", "Gb", "Cb"];

export const UNKNOWN_QUALITY = "Unknown";
export const SIX_ADD_NINE = "6th added 9";

const chordQualitiesSchema = z.array(
  z.object({
    name: z.string().min(1),
    signature: z.array(z.number().int()).min(3).max(7),
  })
);

// Chord names keyed by their deviation from the major chord at the same root.
// Signatures of four tones or more are shared; the name carries the final degree.
export const CHORD_QUALITIES: readonly ChordQualityEntry[] = chordQualitiesSchema.parse(
  JSON.parse(
    readFileSync(new URL("../data/chord-qualities.json", import.meta.url), "utf-8")
  )
);

export function chromaticSharp(): NoteWithAccidental[] {
  return [...CHROMATIC_SHARP];
}

export function chromaticFlat(): NoteWithAccidental[] {
  return [...CHROMATIC_FLAT];
}

/**
 * Rotate a sequence left so that the element at `start` comes first
 */
export function rotate<T>(items: readonly T[], start: number): T[] {
  const n = items.length;
  if (n === 0) return [];
  const offset = ((start % n) + n) % n;
  return [...items.slice(offset), ...items.slice(0, offset)];
}

/**
 * Rotate a note sequence so that `note` comes first
 */
export function rotateTo(
  items: readonly NoteWithAccidental[],
  note: NoteWithAccidental
): NoteWithAccidental[] {
  const index = items.indexOf(note);
  if (index === -1) {
    throw new UnknownRootError(note);
  }
  return rotate(items, index);
}

/**
 * True for the symbols the major-scale table answers, directly or after
 * circle-of-fifths normalization
 */
export function isSupportedRoot(value: string): value is NoteWithAccidental {
  return Object.hasOwn(MAJOR_SCALES, value) || Object.hasOwn(CIRCLE_OF_FIFTHS_SPELLINGS, value);
}

export function normalizeRoot(root: NoteWithAccidental): NoteWithAccidental {
  return CIRCLE_OF_FIFTHS_SPELLINGS[root] ?? root;
}

/**
 * Major scale used as the reference for a root
 */
export function majorScaleOf(root: string): NoteWithAccidental[] {
  if (!isSupportedRoot(root)) {
    throw new UnknownRootError(root);
  }
  const scale = MAJOR_SCALES[normalizeRoot(root)];
  if (scale === undefined) {
    throw new UnknownRootError(root);
  }
  return [...scale];
}

/**
 * Chromatic sequence a root is measured against, rotated to the root.
 * Off-table spellings are folded first.
 */
export function referenceChromaticOf(root: NoteWithAccidental): NoteWithAccidental[] {
  const normalized = normalizeRoot(root);
  const chromatic = FLAT_REFERENCE_ROOTS.includes(normalized) ? CHROMATIC_FLAT : CHROMATIC_SHARP;
  return rotateTo(chromatic, normalized);
}

/**
 * Major scale of a root with E#, Fb, B# and Cb folded onto table spellings
 */
export function referenceMajorScaleOf(root: NoteWithAccidental): NoteWithAccidental[] {
  return majorScaleOf(root).map((note) => OFF_TABLE_SPELLINGS[note] ?? note);
}

function sameSignature(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}

/**
 * Name a chord from its signature and the 1-indexed degrees of its last tones.
 *
 * Rules, in order:
 * 1. a chord ending on the 6th then the 9th is "6th added 9"
 * 2. candidates are the table entries with an equal signature
 * 3. four tones or more: keep the entries whose name holds the final degree
 * 4. nothing left is "Unknown"
 */
export function chordQualityOf(
  signature: readonly number[],
  finalDegree: number,
  penultimateDegree?: number
): string {
  if (penultimateDegree === 6 && finalDegree === 9) {
    return SIX_ADD_NINE;
  }

  let candidates = CHORD_QUALITIES.filter((entry) => sameSignature(entry.signature, signature));

  if (signature.length >= 4) {
    const degree = String(finalDegree);
    candidates = candidates.filter((entry) => entry.name.includes(degree));
  }

  return candidates[0]?.name ?? UNKNOWN_QUALITY;
}

/**
 * Parse a note name (e.g., "C#", "Bb", "D") into its components
 */
export function parseNote(note: string): {
  name: NoteName;
  accidental: Accidental;
} {
  const match = note.trim().match(/^([A-Ga-g])([#b]?)$/);
  const name = match ? toNoteName(match[1]) : undefined;
  if (!match || !name) {
    throw new UnknownRootError(note);
  }
  return {
    name,
    accidental: toAccidental(match[2]),
  };
}

/**
 * Parse a note and return it as a table symbol ("c#" -> "C#")
 */
export function normalizeNote(note: string): NoteWithAccidental {
  const { name, accidental } = parseNote(note);
  const symbol: NoteWithAccidental = `${name}${accidental}`;
  return symbol;
}

function toNoteName(letter: string): NoteName | undefined {
  const upper = letter.toUpperCase();
  switch (upper) {
    case "C":
    case "D":
    case "E":
    case "F":
    case "G":
    case "A":
    case "B":
      return upper;
    default:
      return undefined;
  }
}

function toAccidental(value: string | undefined): Accidental {
  if (value === "#" || value === "b") return value;
  return "";
}

/**
 * Convert note name (with optional accidental) to semitone (0-11, C=0)
 */
export function noteToSemitone(note: string): number {
  const { name, accidental } = parseNote(note);
  let semitone = NOTE_TO_SEMITONE[name];

  if (accidental === "#") semitone += 1;
  else if (accidental === "b") semitone -= 1;

  return ((semitone % 12) + 12) % 12; // Normalize to 0-11
}
