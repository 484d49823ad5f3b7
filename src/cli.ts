#!/usr/bin/env node
// ─── midi-diff: CLI Entry Point ─────────────────────────────────────────────
//
// Usage:
//   midi-diff a.mid b.mid out.mid          # Write the notes that differ
//   midi-diff diff a.mid b.mid out.mid     # Same, explicit
//   midi-diff diff a.mid b.mid out.mid --side a --list
//   midi-diff notes song.mid               # List extracted notes
//   midi-diff debug-info                   # Environment report
//   midi-diff --version
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync } from "node:fs";
import { parseCliArgs, NOTES_USAGE, type CliCommand } from "./cli-args.js";
import { loadConfig, type DiffConfig } from "./config.js";
import { runDiff } from "./core.js";
import { extractNotes } from "./midi/extract.js";
import { readMidiFile } from "./midi/io.js";
import { formatNote } from "./midi/note-event.js";
import type { NoteEvent, DecodedMidi } from "./midi/types.js";
import { createConsoleReporter } from "./reporter.js";
import { versionLines, debugInfoLines } from "./version.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function printNoteList(label: string, notes: readonly NoteEvent[]): void {
  console.log(`\n${label} (${notes.length}):`);
  for (const note of notes) {
    console.log(`  ${formatNote(note)}`);
  }
}

// ─── Commands ───────────────────────────────────────────────────────────────

function cmdDiff(command: Extract<CliCommand, { kind: "diff" }>, config: DiffConfig): void {
  const outcome = runDiff(
    {
      fileA: command.fileA,
      fileB: command.fileB,
      outFile: command.outFile,
      side: command.side,
      channel: command.channel ?? config.channel,
      defaultTicksPerBeat: config.defaultTicksPerBeat,
      defaultExtension: config.defaultExtension,
      reportDropped: command.reportDropped || config.reportDropped,
    },
    createConsoleReporter(),
  );

  if (!outcome.ok) {
    process.exit(1);
  }

  if (command.list) {
    printNoteList("Only in A", outcome.onlyInA);
    printNoteList("Only in B", outcome.onlyInB);
    console.log();
  }
}

function cmdNotes(file: string): void {
  if (!existsSync(file)) {
    console.error(`File not found: "${file}"`);
    process.exit(1);
  }

  let midi: DecodedMidi;
  try {
    midi = readMidiFile(file);
  } catch (err) {
    console.error(`Could not read MIDI file "${file}": ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }

  const notes = extractNotes(midi.tracks);
  const timing = midi.ticksPerBeat !== undefined ? `${midi.ticksPerBeat} ticks/beat` : "SMPTE timing";
  console.log(`\n${file}: format ${midi.format}, ${midi.tracks.length} track(s), ${timing}`);
  printNoteList("Notes", notes);
  console.log();
}

function cmdHelp(): void {
  console.log(`
midi-diff — Write the notes that differ between two MIDI files

Commands:
  diff <a.mid> <b.mid> <out.mid>   Diff two files (the word "diff" is optional)
  notes <file.mid>                 List the notes extracted from a file
  debug-info                       Show version and environment details
  help                             Show this help

Diff options:
  --side <a|b|both>                Notes only in A, only in B, or both (default)
  --channel <0-15>                 MIDI channel for the output (default 0)
  --list                           Print the differing notes
  --report-dropped                 Report note pairings that could not be matched

Notes are compared on pitch, start tick and duration; velocity is ignored.
An existing output file is never overwritten: out.mid becomes out_1.mid, out_2.mid, ...

Environment:
  MIDIDIFF_TICKS_PER_BEAT          Resolution for SMPTE-timed inputs (default 480)
  MIDIDIFF_DEFAULT_EXTENSION       Extension for renamed outputs (default .mid)
  MIDIDIFF_CHANNEL                 Default output channel
  MIDIDIFF_REPORT_DROPPED          1/true/yes to always report dropped pairings

Examples:
  midi-diff take1.mid take2.mid changes.mid
  midi-diff diff take1.mid take2.mid changes.mid --side b --list
  ${NOTES_USAGE.replace("Usage: ", "")}
`);
}

// ─── CLI Router ─────────────────────────────────────────────────────────────

function main(): void {
  const parsed = parseCliArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(parsed.error);
    process.exit(1);
  }

  const command = parsed.command;
  switch (command.kind) {
    case "diff": {
      let config: DiffConfig;
      try {
        config = loadConfig();
      } catch (err) {
        console.error(err instanceof Error ? err.message : String(err));
        process.exit(1);
      }
      cmdDiff(command, config);
      break;
    }
    case "notes":
      cmdNotes(command.file);
      break;
    case "version":
      console.log(versionLines().join("\n"));
      break;
    case "debug-info":
      console.log(debugInfoLines().join("\n"));
      break;
    case "help":
      cmdHelp();
      if (!command.requested) process.exit(1);
      break;
  }
}

main();
