import pkg from "@tonejs/midi";
const { Midi } = pkg;
import { writeFileSync, mkdirSync, existsSync } from "fs";
import { join } from "path";
import { chordTones } from "./chord-catalog.js";
import { NoteOutOfRangeError } from "./errors.js";
import { noteToSemitone } from "./music-theory.js";
import type { ChordCatalog, ChordSlot, MidiWriteOptions, NoteInput } from "./types.js";

export const MIDI_NOTE_MAX = 127;

/**
 * Stack chord tones upwards from the root: every tone sits above the one
 * before it, so a 13th chord spans two octaves. Throws when a tone would
 * climb past MIDI_NOTE_MAX.
 */
export function voiceChord(notes: readonly ChordSlot[], octave: number = 4): number[] {
  const midiNumbers: number[] = [];
  for (const note of chordTones(notes)) {
    let midi = noteToSemitone(note) + (octave + 1) * 12;
    const previous = midiNumbers[midiNumbers.length - 1];
    if (previous !== undefined) {
      while (midi <= previous) midi += 12;
    }
    if (midi > MIDI_NOTE_MAX) {
      throw new NoteOutOfRangeError(note, midi);
    }
    midiNumbers.push(midi);
  }
  return midiNumbers;
}

/**
 * File name for a catalog entry, e.g. "C-dorian_C_Minor-7th.mid"
 */
export function midiFileName(chordName: string, prefix?: string): string {
  const base = prefix ? `${prefix}_${chordName}` : chordName;
  return `${base.trim().replace(/\s+/g, "-")}.mid`;
}

/**
 * Encode one block chord as a single-track MIDI file
 */
export function encodeChordMidi(
  name: string,
  notes: readonly NoteInput[],
  tempo: number = 120
): Uint8Array {
  const midi = new Midi();
  midi.header.setTempo(tempo);
  midi.header.timeSignatures.push({
    ticks: 0,
    timeSignature: [4, 4],
    measures: 0,
  });

  const track = midi.addTrack();
  track.name = name;

  for (const note of notes) {
    const timeInSeconds = note.time * (60 / tempo); // Convert beats to seconds
    const durationInSeconds = note.duration * (60 / tempo);
    const velocity = (note.velocity ?? 100) / 127; // Normalize to 0-1

    track.addNote({
      midi: note.pitch,
      time: timeInSeconds,
      duration: durationInSeconds,
      velocity: velocity,
    });
  }

  return midi.toArray();
}

/**
 * Write one MIDI file per catalog entry and return the written paths.
 * Every chord is voiced before the first file is written.
 */
export function writeCatalogMidi(catalog: ChordCatalog, options: MidiWriteOptions): string[] {
  const { outputDir, prefix, tempo = 120, octave = 4, beats = 4, velocity = 100 } = options;

  const voiced: [string, NoteInput[]][] = [];
  for (const [chordName, slots] of Object.entries(catalog)) {
    const notes: NoteInput[] = voiceChord(slots, octave).map((pitch) => ({
      pitch,
      time: 0,
      duration: beats,
      velocity,
    }));
    if (notes.length === 0) {
      console.warn(`Chord ${chordName} has no tones, skipping`);
      continue;
    }
    voiced.push([chordName, notes]);
  }

  if (!existsSync(outputDir)) {
    mkdirSync(outputDir, { recursive: true });
  }

  const written: string[] = [];
  for (const [chordName, notes] of voiced) {
    const filepath = join(outputDir, midiFileName(chordName, prefix));
    writeFileSync(filepath, Buffer.from(encodeChordMidi(chordName, notes, tempo)));
    written.push(filepath);
  }

  return written;
}
