// ─── Note Diff ──────────────────────────────────────────────────────────────
//
// Symmetric difference of two note collections, keyed by noteKey().
// Duplicate placements within one input count once: the diff reports
// distinct placements, not how often they occur.
// ─────────────────────────────────────────────────────────────────────────────

import type { NoteEvent, DiffSide } from "./types.js";
import { noteKey } from "./note-event.js";

/** Result of diffing two note collections. */
export interface NoteDiff {
  /** Placements present in A but not in B, in first-occurrence order. */
  onlyInA: NoteEvent[];
  /** Placements present in B but not in A, in first-occurrence order. */
  onlyInB: NoteEvent[];
  /** onlyInA followed by onlyInB. */
  combined: NoteEvent[];
}

/**
 * Compute A − B, B − A and their union.
 * For a placement repeated within one input, the first occurrence (and its velocity) survives.
 */
export function diffNotes(
  notesA: readonly NoteEvent[],
  notesB: readonly NoteEvent[],
): NoteDiff {
  const setA = indexByKey(notesA);
  const setB = indexByKey(notesB);

  const onlyInA = [...setA].filter(([key]) => !setB.has(key)).map(([, note]) => note);
  const onlyInB = [...setB].filter(([key]) => !setA.has(key)).map(([, note]) => note);

  return { onlyInA, onlyInB, combined: [...onlyInA, ...onlyInB] };
}

/** The notes of a diff that belong to the requested side. */
export function selectSide(diff: NoteDiff, side: DiffSide): NoteEvent[] {
  switch (side) {
    case "a": return diff.onlyInA;
    case "b": return diff.onlyInB;
    case "both": return diff.combined;
  }
}

function indexByKey(notes: readonly NoteEvent[]): Map<string, NoteEvent> {
  const index = new Map<string, NoteEvent>();
  for (const note of notes) {
    const key = noteKey(note);
    if (!index.has(key)) index.set(key, note);
  }
  return index;
}
