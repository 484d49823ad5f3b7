// ─── Note Extraction ────────────────────────────────────────────────────────
//
// Pairs note-on and note-off events into NoteEvents, track by track.
//
// Pairing is LIFO per pitch: a pitch re-triggered before it was released
// keeps a stack of open notes, and the next note-off closes the most
// recently opened one. Malformed pairings are dropped without error so
// that non-conformant files still diff; pass `onDrop` to see them.
// ─────────────────────────────────────────────────────────────────────────────

import type { MidiTrack, NoteEvent, DroppedPairing } from "./types.js";
import { createNoteEvent } from "./note-event.js";

export interface ExtractOptions {
  /** Called for every pairing that produced no NoteEvent. */
  onDrop?: (dropped: DroppedPairing) => void;
}

// The codec does not mask data bytes, so a corrupt status/data pair can
// decode with a note number or velocity above 127.
const MAX_DATA_BYTE = 127;

interface OpenNote {
  startTick: number;
  velocity: number;
}

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Extract the notes of every track, sorted by start tick.
 * Notes starting on the same tick stay in track order, then pairing order.
 */
export function extractNotes(
  tracks: readonly MidiTrack[],
  options: ExtractOptions = {},
): NoteEvent[] {
  const notes: NoteEvent[] = [];

  tracks.forEach((track, index) => {
    for (const note of extractTrack(track, index, options.onDrop)) {
      notes.push(note);
    }
  });

  // Array.prototype.sort is stable, so ties keep extraction order.
  notes.sort((a, b) => a.start - b.start);
  return notes;
}

// ─── Internal ───────────────────────────────────────────────────────────────

function extractTrack(
  track: MidiTrack,
  trackIndex: number,
  onDrop: ExtractOptions["onDrop"],
): NoteEvent[] {
  const notes: NoteEvent[] = [];
  const open = new Map<number, OpenNote[]>();
  let tick = 0;

  for (const event of track) {
    tick += event.deltaTime;

    if (
      (event.type === "noteOn" || event.type === "noteOff") &&
      (event.noteNumber > MAX_DATA_BYTE || event.velocity > MAX_DATA_BYTE)
    ) {
      onDrop?.({ reason: "out-of-range", track: trackIndex, pitch: event.noteNumber, tick });
      continue;
    }

    if (event.type === "noteOn" && event.velocity > 0) {
      const stack = open.get(event.noteNumber);
      const entry = { startTick: tick, velocity: event.velocity };
      if (stack) {
        stack.push(entry);
      } else {
        open.set(event.noteNumber, [entry]);
      }
    } else if (event.type === "noteOff" || event.type === "noteOn") {
      // noteOn with velocity 0 is a note-off.
      const pitch = event.noteNumber;
      const started = open.get(pitch)?.pop();

      if (!started) {
        onDrop?.({ reason: "unmatched-note-off", track: trackIndex, pitch, tick });
        continue;
      }

      const duration = tick - started.startTick;
      if (duration <= 0) {
        onDrop?.({ reason: "non-positive-duration", track: trackIndex, pitch, tick });
        continue;
      }

      notes.push(createNoteEvent({
        pitch,
        start: started.startTick,
        duration,
        velocity: started.velocity,
      }));
    }
  }

  if (onDrop) {
    for (const [pitch, stack] of open) {
      for (const left of stack) {
        onDrop({ reason: "unclosed-note-on", track: trackIndex, pitch, tick: left.startTick });
      }
    }
  }

  return notes;
}
