// ─── Note Events ────────────────────────────────────────────────────────────
//
// Construction, identity and display of NoteEvent values. Every NoteEvent
// in the pipeline passes through createNoteEvent, so the range checks here
// hold everywhere downstream.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import type { NoteEvent } from "./types.js";

// ─── Zod Schema ─────────────────────────────────────────────────────────────

export const NoteEventSchema = z.object({
  pitch: z.number().int().min(0).max(127),
  start: z.number().int().min(0),
  duration: z.number().int().min(1),
  velocity: z.number().int().min(0).max(127),
});

const NOTE_NAMES = ["C", "C#", "D", "D#", "E", "F", "F#", "G", "G#", "A", "A#", "B"] as const;

// ─── Public API ─────────────────────────────────────────────────────────────

/**
 * Build a frozen NoteEvent.
 * Throws if any field is out of range or not an integer.
 */
export function createNoteEvent(fields: NoteEvent): NoteEvent {
  const result = NoteEventSchema.safeParse(fields);
  if (!result.success) {
    const issues = result.error.issues
      .map(i => `${i.path.join(".") || "root"}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid note event: ${issues}`);
  }
  return Object.freeze(result.data);
}

/** Identity key: pitch, start and duration. Velocity is ignored. */
export function noteKey(note: NoteEvent): string {
  return `${note.pitch}:${note.start}:${note.duration}`;
}

/** True when both notes have the same placement, whatever their velocities. */
export function isSameNote(a: NoteEvent, b: NoteEvent): boolean {
  return a.pitch === b.pitch && a.start === b.start && a.duration === b.duration;
}

/**
 * Convert a MIDI note number to scientific pitch notation.
 *
 * 60 → "C4", 69 → "A4", 78 → "F#5"
 */
export function pitchToName(pitch: number): string {
  const octave = Math.floor(pitch / 12) - 1;
  return `${NOTE_NAMES[pitch % 12]}${octave}`;
}

/** "C4 (60) @0 +10 v100" */
export function formatNote(note: NoteEvent): string {
  return `${pitchToName(note.pitch)} (${note.pitch}) @${note.start} +${note.duration} v${note.velocity}`;
}
