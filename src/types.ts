// Note representation types
export type NoteName = "C" | "D" | "E" | "F" | "G" | "A" | "B";
export type Accidental = "#" | "b" | "";
export type NoteWithAccidental = `${NoteName}${Accidental}`;

// Church modes
export type ModeName =
  | "ionian"
  | "dorian"
  | "phrygian"
  | "lydian"
  | "mixolydian"
  | "aeolian"
  | "locrian";

export type Spelling = "sharps" | "flats";

// Chord sizes (number of chord tones)
export type ChordSize = 3 | 4 | 5 | 6 | 7;

// Padded chord slot: a note, or "" where the chord has fewer than 7 tones
export type ChordSlot = NoteWithAccidental | "";

export interface ModeResolution {
  key: NoteWithAccidental;
  mode: ModeName;
  spelling: Spelling;
  scale: NoteWithAccidental[]; // 7 notes, key first
  chromatic: NoteWithAccidental[]; // 12 notes, key first
}

export interface ChordQualityEntry {
  name: string;
  signature: readonly number[];
}

export interface ChordRecord {
  root: NoteWithAccidental;
  degree: number; // 1-7, position of the root in the mode scale
  positions: readonly number[]; // 0-indexed positions in the doubled scale
  quality: string;
  signature: number[]; // deviation from the major scale per chord tone
  notes: ChordSlot[]; // always 7 slots
}

// "{root}_{quality}" -> 7-slot note list
export type ChordCatalog = Record<string, ChordSlot[]>;

// Shared note input interface (used by the MIDI writer)
export interface NoteInput {
  pitch: number; // MIDI note number
  time: number;
  duration: number;
  velocity?: number;
}

export interface MidiWriteOptions {
  outputDir: string;
  prefix?: string;
  tempo?: number;
  octave?: number;
  beats?: number;
  velocity?: number;
}

// Text result returned by every MCP tool handler
export type ToolResult = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};
