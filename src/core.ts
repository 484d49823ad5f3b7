// ─── midi-diff: Diff Pipeline ───────────────────────────────────────────────
//
// load → extract → diff → encode → save
//
// Every failure is caught here and turned into a reported message plus a
// failed DiffOutcome; nothing is thrown to the caller. Malformed note
// pairings inside the files are not failures (see midi/extract.ts).
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync } from "node:fs";
import type { NoteEvent, DiffSide, DecodedMidi } from "./midi/types.js";
import { extractNotes } from "./midi/extract.js";
import { diffNotes, selectSide } from "./midi/diff.js";
import { buildDiffMidi, DEFAULT_CHANNEL } from "./midi/encode.js";
import { readMidiFile, writeMidiFile } from "./midi/io.js";
import { resolveOutputPath, DEFAULT_EXTENSION } from "./output-path.js";
import { createConsoleReporter, type DiffReporter } from "./reporter.js";

// ─── Constants ──────────────────────────────────────────────────────────────

export const DEFAULT_TICKS_PER_BEAT = 480;

// ─── Types ──────────────────────────────────────────────────────────────────

export interface DiffOptions {
  fileA: string;
  fileB: string;
  /** Requested output path. An existing file is never overwritten. */
  outFile: string;
  /** Which notes to write. Default: "both" (the symmetric difference). */
  side?: DiffSide;
  /** MIDI channel for the output events. Default: 0. */
  channel?: number;
  /** Used when file A has SMPTE timing. Default: 480. */
  defaultTicksPerBeat?: number;
  /** Extension for probed output names. Default: ".mid". */
  defaultExtension?: string;
  /** Report every dropped pairing through reporter.dropped(). */
  reportDropped?: boolean;
}

export type DiffFailureReason = "input-missing" | "decode-failed" | "write-failed";

export type DiffOutcome =
  | {
      ok: true;
      /** Where the diff was actually written (may differ from outFile). */
      outPath: string;
      ticksPerBeat: number;
      onlyInA: NoteEvent[];
      onlyInB: NoteEvent[];
      /** The notes encoded into the output file. */
      written: NoteEvent[];
    }
  | {
      ok: false;
      reason: DiffFailureReason;
      message: string;
    };

// ─── Public API ─────────────────────────────────────────────────────────────

/** Diff two MIDI files and write the differing notes to a new file. */
export function runDiff(
  options: DiffOptions,
  reporter: DiffReporter = createConsoleReporter(),
): DiffOutcome {
  const fail = (reason: DiffFailureReason, message: string): DiffOutcome => {
    reporter.error(message);
    return { ok: false, reason, message };
  };

  // 1. Both inputs must exist before anything is decoded
  const missing = [options.fileA, options.fileB].filter(p => !existsSync(p));
  if (missing.length > 0) {
    return fail("input-missing", missing.map(p => `File not found: "${p}"`).join("\n"));
  }

  // 2. Decode
  let midiA: DecodedMidi;
  let midiB: DecodedMidi;
  try {
    midiA = readMidiFile(options.fileA);
  } catch (err) {
    return fail("decode-failed", `Could not read MIDI file "${options.fileA}": ${errorMessage(err)}`);
  }
  try {
    midiB = readMidiFile(options.fileB);
  } catch (err) {
    return fail("decode-failed", `Could not read MIDI file "${options.fileB}": ${errorMessage(err)}`);
  }

  // 3. Extract + diff
  const notesA = extractNotes(midiA.tracks, {
    onDrop: options.reportDropped ? (d) => reporter.dropped("A", d) : undefined,
  });
  const notesB = extractNotes(midiB.tracks, {
    onDrop: options.reportDropped ? (d) => reporter.dropped("B", d) : undefined,
  });
  const diff = diffNotes(notesA, notesB);

  reporter.info(`Notes only in A: ${diff.onlyInA.length}`);
  reporter.info(`Notes only in B: ${diff.onlyInB.length}`);

  // 4. Encode + save
  const ticksPerBeat = midiA.ticksPerBeat ?? options.defaultTicksPerBeat ?? DEFAULT_TICKS_PER_BEAT;
  if (midiA.ticksPerBeat === undefined) {
    reporter.warn(`"${options.fileA}" uses SMPTE timing; writing ${ticksPerBeat} ticks per beat.`);
  }

  const written = selectSide(diff, options.side ?? "both");
  const outPath = resolveOutputPath(options.outFile, {
    defaultExtension: options.defaultExtension ?? DEFAULT_EXTENSION,
    onMkdirError: (dir, err) => reporter.warn(`Could not create directory "${dir}": ${errorMessage(err)}`),
  });

  try {
    const data = buildDiffMidi(written, ticksPerBeat, { channel: options.channel ?? DEFAULT_CHANNEL });
    writeMidiFile(outPath, data);
  } catch (err) {
    return fail("write-failed", `Could not write diff MIDI "${outPath}": ${errorMessage(err)}`);
  }

  reporter.info(`Saved diff MIDI → ${outPath}`);

  return {
    ok: true,
    outPath,
    ticksPerBeat,
    onlyInA: diff.onlyInA,
    onlyInB: diff.onlyInB,
    written,
  };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
