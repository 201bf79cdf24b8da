/**
 * Tests for the MCP tool handlers: argument validation, result payloads
 * and error results.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdtempSync, readdirSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { getModeScale } from '../src/tools/get-mode-scale.js';
import { getModeChords } from '../src/tools/get-mode-chords.js';
import { getChordTable } from '../src/tools/get-chord-table.js';
import { generateChordMidi } from '../src/tools/generate-chord-midi.js';
import type { Config } from '../src/config.js';
import type { ToolResult } from '../src/types.js';

function text(result: ToolResult): string {
  return result.content[0].text;
}

const config: Config = { outputDir: 'unused', tempo: 120, octave: 4, chordBeats: 4 };

describe('get_mode_scale', () => {
  it('returns the scale, chromatic sequence and MIDI numbers', async () => {
    const result = await getModeScale({ key: 'C', mode: 'lydian' }, config);
    expect(result.isError).toBeUndefined();
    const payload = JSON.parse(text(result));
    expect(payload.scale).toEqual(['C', 'D', 'E', 'F#', 'G', 'A', 'B']);
    expect(payload.chromatic[0]).toBe('C');
    expect(payload.spelling).toBe('sharps');
    expect(payload.midiNumbers).toEqual([60, 62, 64, 66, 67, 69, 71]);
  });

  it('takes the default octave from the configuration', async () => {
    const payload = JSON.parse(text(await getModeScale({ key: 'C', mode: 'ionian' }, { ...config, octave: 2 })));
    expect(payload.octave).toBe(2);
    expect(payload.midiNumbers[0]).toBe(36);
  });

  it('reports scale notes above the MIDI range', async () => {
    const result = await getModeScale({ key: 'B', mode: 'ionian', octave: 8 }, config);
    expect(result.isError).toBe(true);
    expect(text(result)).toMatch(/^Error: Note Ab lands on MIDI 128,/);
  });

  it('normalizes key and mode case', async () => {
    const payload = JSON.parse(text(await getModeScale({ key: 'eb', mode: 'Aeolian', octave: 3 }, config)));
    expect(payload.key).toBe('Eb');
    expect(payload.mode).toBe('aeolian');
    expect(payload.midiNumbers[0]).toBe(51);
  });

  it('reports a missing key', async () => {
    const result = await getModeScale({ mode: 'dorian' }, config);
    expect(result.isError).toBe(true);
    expect(text(result)).toBe('Error: key: Required');
  });

  it('reports an unknown mode', async () => {
    const result = await getModeScale({ key: 'C', mode: 'blues' }, config);
    expect(result.isError).toBe(true);
    expect(text(result)).toMatch(/^Error: Unknown mode: blues\./);
  });
});

describe('get_mode_chords', () => {
  it('returns the catalog for the requested sizes', async () => {
    const payload = JSON.parse(text(await getModeChords({ key: 'C', mode: 'dorian', sizes: [3] })));
    expect(payload.sizes).toEqual([3]);
    expect(payload.chords['C_Minor']).toEqual(['C', 'Eb', 'G', '', '', '', '']);
    expect(Object.keys(payload.chords)).toHaveLength(7);
    expect(payload.records).toBeUndefined();
  });

  it('echoes the sizes it walked', async () => {
    const payload = JSON.parse(text(await getModeChords({ key: 'C', mode: 'ionian', sizes: [4, 3, 4] })));
    expect(payload.sizes).toEqual([3, 4]);
    expect(Object.keys(payload.chords)).toHaveLength(28);
  });

  it('defaults to triads and four-tone chords', async () => {
    const payload = JSON.parse(text(await getModeChords({ key: 'C', mode: 'ionian' })));
    expect(payload.sizes).toEqual([3, 4]);
    expect(Object.keys(payload.chords)).toHaveLength(28);
  });

  it('includes records on request', async () => {
    const payload = JSON.parse(
      text(await getModeChords({ key: 'C', mode: 'ionian', sizes: [3], includeRecords: true }))
    );
    expect(payload.records).toHaveLength(7);
    expect(payload.records[0]).toEqual({
      root: 'C',
      degree: 1,
      positions: [0, 2, 4],
      quality: 'Major',
      signature: [0, 0, 0],
      notes: ['C', 'E', 'G', '', '', '', ''],
    });
  });

  it('reports a key spelled against the mode', async () => {
    const result = await getModeChords({ key: 'D#', mode: 'dorian' });
    expect(result.isError).toBe(true);
    expect(text(result)).toMatch(/^Error: Invalid key D# for dorian/);
  });

  it('reports an unrecognized size', async () => {
    const result = await getModeChords({ key: 'C', mode: 'dorian', sizes: [9] });
    expect(result.isError).toBe(true);
    expect(text(result)).toBe('Error: Unrecognized chord size: 9. Valid sizes: 3, 4, 5, 6, 7.');
  });
});

describe('get_chord_table', () => {
  it('returns a titled Markdown table', async () => {
    const lines = text(await getChordTable({ key: 'C', mode: 'dorian', sizes: [3] })).split('\n');
    expect(lines[0]).toBe('## C dorian');
    expect(lines[2]).toBe('| Chord | 1 | 2 | 3 | 4 | 5 | 6 | 7 |');
    expect(lines).toContain('| C_Minor | C | Eb | G |  |  |  |  |');
  });
});

describe('generate_chord_midi', () => {
  let outputDir: string;

  beforeEach(() => {
    outputDir = mkdtempSync(join(tmpdir(), 'modal-chords-tool-'));
  });

  afterEach(() => {
    rmSync(outputDir, { recursive: true, force: true });
  });

  it('writes one MIDI file per chord', async () => {
    const result = await generateChordMidi(
      { key: 'C', mode: 'ionian', sizes: [3] },
      { outputDir, tempo: 100, octave: 4, chordBeats: 2 }
    );
    expect(result.isError).toBeUndefined();
    const lines = text(result).split('\n');
    expect(lines[0]).toBe('Generated 7 MIDI files for C ionian');
    expect(lines[2]).toBe('Tempo: 100 BPM');
    expect(lines).toContain('- C-ionian_B_Diminished.mid');
    expect(existsSync(join(outputDir, 'C-ionian_C_Major.mid'))).toBe(true);
  });

  it('reports an octave that pushes chords past the MIDI range', async () => {
    const result = await generateChordMidi(
      { key: 'B', mode: 'locrian', sizes: [7], octave: 8 },
      { outputDir, tempo: 120, octave: 4, chordBeats: 4 }
    );
    expect(result.isError).toBe(true);
    expect(text(result)).toMatch(/^Error generating MIDI: Note A lands on MIDI 129,/);
    expect(readdirSync(outputDir)).toEqual([]);
  });

  it('reports invalid arguments without writing', async () => {
    const result = await generateChordMidi(
      { key: 'C', mode: 'ionian', tempo: -5 },
      { outputDir, tempo: 120, octave: 4, chordBeats: 4 }
    );
    expect(result.isError).toBe(true);
    expect(text(result)).toMatch(/^Error generating MIDI: tempo: /);
  });
});
