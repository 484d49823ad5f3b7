// ─── MIDI File I/O ──────────────────────────────────────────────────────────
//
// Thin wrapper over midi-file's parser and writer. Both directions are
// synchronous and throw on failure; callers decide how to report.
// ─────────────────────────────────────────────────────────────────────────────

import { readFileSync, writeFileSync } from "node:fs";
import { parseMidi, writeMidi, type MidiData } from "midi-file";
import type { DecodedMidi } from "./types.js";

/** Decode a MIDI buffer. Throws if the bytes are not a standard MIDI file. */
export function decodeMidi(buffer: Uint8Array): DecodedMidi {
  const midi = parseMidi(buffer);
  return {
    format: midi.header.format,
    ticksPerBeat: midi.header.ticksPerBeat,
    tracks: midi.tracks,
  };
}

/** Read and decode a MIDI file from disk. */
export function readMidiFile(path: string): DecodedMidi {
  return decodeMidi(readFileSync(path));
}

/** Serialize and write a MIDI file to disk. */
export function writeMidiFile(path: string, data: MidiData): void {
  writeFileSync(path, new Uint8Array(writeMidi(data)));
}
