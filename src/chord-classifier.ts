import { MusicTheoryError } from "./errors.js";
import {
  chordQualityOf,
  referenceChromaticOf,
  referenceMajorScaleOf,
  rotateTo,
} from "./music-theory.js";
import type { ChordRecord, ChordSlot, NoteWithAccidental } from "./types.js";

// Chords are reported as 7 slots, blank past the last tone
export const CHORD_SLOTS = 7;
export const EMPTY_SLOT = "";

function positionsIn(
  notes: readonly NoteWithAccidental[],
  chromatic: readonly NoteWithAccidental[]
): number[] {
  return notes.map((note) => {
    const position = chromatic.indexOf(note);
    if (position === -1) {
      throw new MusicTheoryError(`Note ${note} is not in the chromatic sequence ${chromatic.join(" ")}`);
    }
    return position;
  });
}

/**
 * Semitone deviation of each mode degree from the major scale on the same root.
 * Ionian gives all zeros; dorian on its own root gives [0, 0, -1, 0, 0, 0, -1].
 */
export function intervalSignature(
  root: NoteWithAccidental,
  modeChromatic: readonly NoteWithAccidental[],
  modeScale: readonly NoteWithAccidental[]
): number[] {
  // 1. Reference chromatic and major scale for the root
  const referenceChromatic = referenceChromaticOf(root);
  const majorScale = referenceMajorScaleOf(root);

  // 2. Mode scale and mode chromatic, both starting on the root
  const rootedScale = rotateTo(modeScale, root);
  const rootedChromatic = rotateTo(modeChromatic, root);

  // 3. Where each scale sits in its chromatic sequence
  const majorPositions = positionsIn(majorScale, referenceChromatic);
  const modePositions = positionsIn(rootedScale, rootedChromatic);

  return modePositions.map((position, i) => position - majorPositions[i]);
}

/**
 * Build and name the chord on `root` made of the given scale positions.
 *
 * Positions index the scale doubled over two octaves, so 8 is the 9th,
 * 10 the 11th and 12 the 13th.
 */
export function classify(
  root: NoteWithAccidental,
  modeChromatic: readonly NoteWithAccidental[],
  modeScale: readonly NoteWithAccidental[],
  positions: readonly number[]
): ChordRecord {
  const signature = intervalSignature(root, modeChromatic, modeScale);
  const rootedScale = rotateTo(modeScale, root);

  const doubledSignature = [...signature, ...signature];
  const doubledScale = [...rootedScale, ...rootedScale];

  if (positions.length === 0) {
    throw new MusicTheoryError("A chord needs at least one position");
  }
  for (const position of positions) {
    if (!Number.isInteger(position) || position < 0 || position >= doubledScale.length) {
      throw new MusicTheoryError(`Chord position out of range: ${position}`);
    }
  }

  const chordDiff = positions.map((position) => doubledSignature[position]);
  const notes: ChordSlot[] = positions.map((position) => doubledScale[position]);
  while (notes.length < CHORD_SLOTS) {
    notes.push(EMPTY_SLOT);
  }

  const degrees = positions.map((position) => position + 1);
  const quality = chordQualityOf(
    chordDiff,
    degrees[degrees.length - 1],
    degrees.length > 1 ? degrees[degrees.length - 2] : undefined
  );

  return {
    root,
    degree: modeScale.indexOf(root) + 1,
    positions: [...positions],
    quality,
    signature: chordDiff,
    notes,
  };
}
