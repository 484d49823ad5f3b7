// ─── Note Encoding ──────────────────────────────────────────────────────────
//
// Turns NoteEvents back into a single delta-time track for midi-file's
// writer. Events are ordered by (tick, rank, pitch) with note-offs ranked
// before note-ons, so a note released on the same tick another one starts
// never reads as an overlap and deltas are never negative. Pitch only
// settles the order among events of one kind on one tick.
// ─────────────────────────────────────────────────────────────────────────────

import type {
  MidiData,
  MidiEvent,
  MidiNoteOnEvent,
  MidiNoteOffEvent,
  MidiEndOfTrackEvent,
} from "midi-file";
import type { NoteEvent } from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────

export const DEFAULT_CHANNEL = 0;

const RANK_NOTE_OFF = 0;
const RANK_NOTE_ON = 1;

export interface EncodeOptions {
  /** MIDI channel (0–15) for every event. Default: 0. */
  channel?: number;
}

interface TimedEvent {
  tick: number;
  rank: number;
  event: MidiNoteOnEvent | MidiNoteOffEvent;
}

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Encode notes as one track of delta-timed events, ending with endOfTrack.
 * Input order does not matter.
 */
export function encodeNotes(
  notes: readonly NoteEvent[],
  options: EncodeOptions = {},
): MidiEvent[] {
  const channel = options.channel ?? DEFAULT_CHANNEL;
  const timed: TimedEvent[] = [];

  for (const note of notes) {
    timed.push({
      tick: note.start,
      rank: RANK_NOTE_ON,
      event: {
        deltaTime: 0,
        type: "noteOn",
        channel,
        noteNumber: note.pitch,
        // A zero-velocity noteOn would read back as a note-off.
        velocity: Math.max(1, note.velocity),
      },
    });
    timed.push({
      tick: note.start + note.duration,
      rank: RANK_NOTE_OFF,
      event: {
        deltaTime: 0,
        type: "noteOff",
        channel,
        noteNumber: note.pitch,
        velocity: 0,
      },
    });
  }

  timed.sort((a, b) =>
    a.tick - b.tick || a.rank - b.rank || a.event.noteNumber - b.event.noteNumber);

  const events: MidiEvent[] = [];
  let lastTick = 0;
  for (const { tick, event } of timed) {
    events.push({ ...event, deltaTime: tick - lastTick });
    lastTick = tick;
  }

  const endOfTrack: MidiEndOfTrackEvent = { deltaTime: 0, type: "endOfTrack", meta: true };
  events.push(endOfTrack);
  return events;
}

/** Wrap the encoded notes in a single-track, format 0 file. */
export function buildDiffMidi(
  notes: readonly NoteEvent[],
  ticksPerBeat: number,
  options: EncodeOptions = {},
): MidiData {
  return {
    header: { format: 0, numTracks: 1, ticksPerBeat },
    tracks: [encodeNotes(notes, options)],
  };
}
