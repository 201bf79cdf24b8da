import { classify, EMPTY_SLOT } from "./chord-classifier.js";
import { UnrecognizedChordSizeError } from "./errors.js";
import { resolveMode } from "./modes.js";
import type { ChordCatalog, ChordRecord, ChordSize, ChordSlot, ModeName, NoteWithAccidental } from "./types.js";

// Scale positions per chord size. Read with +1: [0, 2, 4] is 1-3-5
export const CHORD_PATTERNS: Readonly<Record<ChordSize, readonly (readonly number[])[]>> = {
  3: [[0, 2, 4]],
  4: [
    [0, 2, 4, 5],
    [0, 2, 4, 6],
    [0, 2, 4, 8],
  ],
  5: [
    [0, 2, 4, 5, 8],
    [0, 2, 4, 6, 8],
  ],
  6: [[0, 2, 4, 6, 8, 10]],
  7: [[0, 2, 4, 6, 8, 10, 12]],
};

export const CHORD_SIZES: readonly ChordSize[] = [3, 4, 5, 6, 7];

export function isChordSize(value: unknown): value is ChordSize {
  return CHORD_SIZES.some((size) => size === value);
}

/**
 * Validate requested sizes and put them in ascending order, without repeats
 */
export function normalizeChordSizes(sizes: Iterable<unknown>): ChordSize[] {
  const requested = new Set<ChordSize>();
  for (const size of sizes) {
    if (!isChordSize(size)) {
      throw new UnrecognizedChordSizeError(size);
    }
    requested.add(size);
  }
  return CHORD_SIZES.filter((size) => requested.has(size));
}

/**
 * Parse dash-separated chord sizes, e.g. "3-4-5"
 */
export function parseChordSizes(value: string): ChordSize[] {
  const parts = value
    .split("-")
    .map((part) => part.trim())
    .filter(Boolean);
  return normalizeChordSizes(
    parts.map((part) => (/^\d+$/.test(part) ? Number(part) : part))
  );
}

export function catalogKey(record: Pick<ChordRecord, "root" | "quality">): string {
  return `${record.root}_${record.quality}`;
}

/**
 * Every chord of a mode: each scale degree as root, then each pattern of
 * the requested sizes
 */
export function enumerateChordRecords(
  mode: ModeName,
  key: string,
  sizes: Iterable<unknown>
): ChordRecord[] {
  const chordSizes = normalizeChordSizes(sizes);
  const { scale, chromatic } = resolveMode(key, mode);
  const patterns = chordSizes.flatMap((size) => CHORD_PATTERNS[size]);

  const records: ChordRecord[] = [];
  for (const root of scale) {
    for (const positions of patterns) {
      records.push(classify(root, chromatic, scale, positions));
    }
  }
  return records;
}

/**
 * Chord catalog keyed "{root}_{quality}". When two chords share a name the
 * later one wins.
 */
export function enumerateChords(
  mode: ModeName,
  key: string,
  sizes: Iterable<unknown>
): ChordCatalog {
  return catalogFromRecords(enumerateChordRecords(mode, key, sizes));
}

export function catalogFromRecords(records: readonly ChordRecord[]): ChordCatalog {
  const catalog: ChordCatalog = {};
  for (const record of records) {
    catalog[catalogKey(record)] = record.notes;
  }
  return catalog;
}

/**
 * The tones of a padded chord
 */
export function chordTones(notes: readonly ChordSlot[]): NoteWithAccidental[] {
  const tones: NoteWithAccidental[] = [];
  for (const note of notes) {
    if (note !== EMPTY_SLOT) tones.push(note);
  }
  return tones;
}
