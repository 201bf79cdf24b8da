export class MusicTheoryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Root or key symbol outside the supported spellings
 */
export class UnknownRootError extends MusicTheoryError {
  constructor(readonly root: string) {
    super(`Unknown root: ${root}. Use a natural, sharp or flat note such as C, F#, Bb.`);
  }
}

/**
 * Key that is not spelled in the chromatic sequence the mode uses
 */
export class InvalidKeyError extends MusicTheoryError {
  constructor(
    readonly key: string,
    readonly mode: string,
    readonly spelling: "sharps" | "flats"
  ) {
    super(
      `Invalid key ${key} for ${mode}: ${mode} is spelled with ${spelling}, ` +
        `so the key must be one of its ${spelling === "sharps" ? "sharp" : "flat"} chromatic notes.`
    );
  }
}

export class UnrecognizedChordSizeError extends MusicTheoryError {
  constructor(readonly size: unknown) {
    super(`Unrecognized chord size: ${String(size)}. Valid sizes: 3, 4, 5, 6, 7.`);
  }
}

export class UnknownModeError extends MusicTheoryError {
  constructor(readonly mode: string) {
    super(
      `Unknown mode: ${mode}. Valid modes: ionian, dorian, phrygian, lydian, mixolydian, aeolian, locrian.`
    );
  }
}

/**
 * Voicing that climbs past the top of the MIDI note range
 */
export class NoteOutOfRangeError extends MusicTheoryError {
  constructor(
    readonly note: string,
    readonly midi: number
  ) {
    super(`Note ${note} lands on MIDI ${midi}, above the highest MIDI note 127. Use a lower octave.`);
  }
}
