// ─── midi-diff ──────────────────────────────────────────────────────────────
//
// Compare two MIDI files note by note and write the notes that differ.
//
// Usage:
//   import { runDiff } from "midi-diff";
//   runDiff({ fileA: "take1.mid", fileB: "take2.mid", outFile: "changes.mid" });
//
// Or, in memory:
//   import { extractNotes, diffNotes, buildDiffMidi } from "midi-diff";
// ─────────────────────────────────────────────────────────────────────────────

// Diff pipeline
export { runDiff, DEFAULT_TICKS_PER_BEAT } from "./core.js";
export type { DiffOptions, DiffOutcome, DiffFailureReason } from "./core.js";

// Note events
export {
  createNoteEvent,
  noteKey,
  isSameNote,
  formatNote,
  pitchToName,
  NoteEventSchema,
} from "./midi/note-event.js";

// Extraction, diff, encoding
export { extractNotes } from "./midi/extract.js";
export type { ExtractOptions } from "./midi/extract.js";
export { diffNotes, selectSide } from "./midi/diff.js";
export type { NoteDiff } from "./midi/diff.js";
export { encodeNotes, buildDiffMidi, DEFAULT_CHANNEL } from "./midi/encode.js";
export type { EncodeOptions } from "./midi/encode.js";

// File I/O
export { decodeMidi, readMidiFile, writeMidiFile } from "./midi/io.js";
export { resolveOutputPath, DEFAULT_EXTENSION } from "./output-path.js";
export type { ResolveOutputOptions } from "./output-path.js";

// Reporters
export {
  createConsoleReporter,
  createSilentReporter,
  createRecordingReporter,
  describeDropped,
} from "./reporter.js";
export type { DiffReporter, ReportEntry } from "./reporter.js";

// Configuration
export { loadConfig, defaultConfigPath, DiffConfigSchema, ENV_VARS } from "./config.js";
export type { DiffConfig, LoadConfigOptions } from "./config.js";

// Types
export type {
  NoteEvent,
  DropReason,
  DroppedPairing,
  MidiTrack,
  DecodedMidi,
  DiffSide,
} from "./midi/types.js";
export { DIFF_SIDES } from "./midi/types.js";
