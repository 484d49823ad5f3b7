// ─── MIDI Diff Types ────────────────────────────────────────────────────────
//
// Tick-based note records shared by the extractor, differ and encoder.
// Timing is always in ticks relative to the start of the source track;
// there is no tempo map and no conversion to seconds.
// ─────────────────────────────────────────────────────────────────────────────

import type { MidiEvent } from "midi-file";

/** One sounded note. Identity is (pitch, start, duration); velocity is carried along. */
export interface NoteEvent {
  /** MIDI note number (0–127). 60 = middle C. */
  readonly pitch: number;
  /** Absolute start in ticks from the beginning of the source track. */
  readonly start: number;
  /** Length in ticks. Always at least 1. */
  readonly duration: number;
  /** Note-on velocity (0–127). Not part of identity. */
  readonly velocity: number;
}

/** Why a note-on/note-off pairing produced no NoteEvent. */
export type DropReason =
  | "unmatched-note-off"
  | "non-positive-duration"
  | "unclosed-note-on"
  | "out-of-range";

/** A pairing the extractor discarded. */
export interface DroppedPairing {
  reason: DropReason;
  /** 0-based track index in the source file. */
  track: number;
  pitch: number;
  /** Tick of the event that caused the drop (the note-on tick for unclosed notes). */
  tick: number;
}

/** One track's events, as produced by the codec. */
export type MidiTrack = readonly MidiEvent[];

/** Result of decoding a standard MIDI file. */
export interface DecodedMidi {
  /** MIDI format (0 = single track, 1 = multi-track, 2 = multi-song). */
  format: number;
  /** Ticks per quarter note. Undefined for SMPTE-timed files. */
  ticksPerBeat: number | undefined;
  tracks: MidiTrack[];
}

/** Which part of the difference to write out. */
export type DiffSide = "a" | "b" | "both";

export const DIFF_SIDES: readonly DiffSide[] = ["a", "b", "both"];
