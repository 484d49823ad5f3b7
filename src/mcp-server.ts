#!/usr/bin/env node
// ─── midi-diff: MCP Server ──────────────────────────────────────────────────
//
// Exposes the diff pipeline as MCP tools, so an assistant can compare two
// takes of a piece and read back what changed.
//
// Usage:
//   node dist/mcp-server.js          # stdio transport
//
// Tools:
//   diff_midi   — write the notes that differ between two MIDI files
//   list_notes  — list the notes extracted from one MIDI file
// ─────────────────────────────────────────────────────────────────────────────

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { existsSync } from "node:fs";
import { z } from "zod";
import { loadConfig, type DiffConfig } from "./config.js";
import { runDiff } from "./core.js";
import { extractNotes } from "./midi/extract.js";
import { readMidiFile } from "./midi/io.js";
import { formatNote } from "./midi/note-event.js";
import { createRecordingReporter } from "./reporter.js";
import { readPackageInfo } from "./version.js";

const DEFAULT_NOTE_LIMIT = 200;

// ─── Server ─────────────────────────────────────────────────────────────────

const server = new McpServer({
  name: "midi-diff",
  version: readPackageInfo().version,
});

// ─── Tool: diff_midi ────────────────────────────────────────────────────────

server.tool(
  "diff_midi",
  "Compare two MIDI files and write a new MIDI file containing only the notes that differ. " +
    "Notes match on pitch, start tick and duration; velocity is ignored. An existing output file is never overwritten.",
  {
    fileA: z.string().describe("Path to the first MIDI file"),
    fileB: z.string().describe("Path to the second MIDI file"),
    outFile: z.string().describe("Path for the diff MIDI file"),
    side: z.enum(["a", "b", "both"]).optional().describe("Write notes only in A, only in B, or both (default)"),
  },
  async (params) => {
    let config: DiffConfig;
    try {
      config = loadConfig();
    } catch (err) {
      return {
        content: [{ type: "text" as const, text: err instanceof Error ? err.message : String(err) }],
        isError: true,
      };
    }
    const reporter = createRecordingReporter();

    const outcome = runDiff(
      {
        fileA: params.fileA,
        fileB: params.fileB,
        outFile: params.outFile,
        side: params.side,
        channel: config.channel,
        defaultTicksPerBeat: config.defaultTicksPerBeat,
        defaultExtension: config.defaultExtension,
        reportDropped: config.reportDropped,
      },
      reporter,
    );

    const text = reporter.entries.map(e => e.message).join("\n");
    return {
      content: [{ type: "text" as const, text }],
      isError: !outcome.ok,
    };
  }
);

// ─── Tool: list_notes ───────────────────────────────────────────────────────

server.tool(
  "list_notes",
  "List the notes extracted from a MIDI file, sorted by start tick.",
  {
    file: z.string().describe("Path to the MIDI file"),
    limit: z.number().int().min(1).optional().describe(`Maximum notes to list (default ${DEFAULT_NOTE_LIMIT})`),
  },
  async (params) => {
    if (!existsSync(params.file)) {
      return {
        content: [{ type: "text" as const, text: `File not found: "${params.file}"` }],
        isError: true,
      };
    }

    try {
      const midi = readMidiFile(params.file);
      const notes = extractNotes(midi.tracks);
      const limit = params.limit ?? DEFAULT_NOTE_LIMIT;
      const timing = midi.ticksPerBeat !== undefined ? `${midi.ticksPerBeat} ticks/beat` : "SMPTE timing";

      const lines = [
        `${params.file}: ${notes.length} note(s), ${midi.tracks.length} track(s), ${timing}`,
        ...notes.slice(0, limit).map(formatNote),
      ];
      if (notes.length > limit) lines.push(`… ${notes.length - limit} more`);

      return { content: [{ type: "text" as const, text: lines.join("\n") }] };
    } catch (err) {
      return {
        content: [{
          type: "text" as const,
          text: `Could not read MIDI file "${params.file}": ${err instanceof Error ? err.message : String(err)}`,
        }],
        isError: true,
      };
    }
  }
);

// ─── Start ──────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("midi-diff MCP server running on stdio");
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
