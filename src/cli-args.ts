// ─── midi-diff: Argument Parsing ────────────────────────────────────────────
//
// Pure argv → command mapping, kept out of cli.ts so it can be tested
// without spawning a process.
// ─────────────────────────────────────────────────────────────────────────────

import { DIFF_SIDES, type DiffSide } from "./midi/types.js";

export type CliCommand =
  | {
      kind: "diff";
      fileA: string;
      fileB: string;
      outFile: string;
      side?: DiffSide;
      channel?: number;
      list: boolean;
      reportDropped: boolean;
    }
  | { kind: "notes"; file: string }
  | { kind: "debug-info" }
  | { kind: "version" }
  | {
      kind: "help";
      /** False when no command was given at all; the CLI then exits 1. */
      requested: boolean;
    };

export type ParsedArgs =
  | { ok: true; command: CliCommand }
  | { ok: false; error: string };

export const DIFF_USAGE =
  "Usage: midi-diff diff <a.mid> <b.mid> <out.mid> [--side a|b|both] [--channel N] [--list] [--report-dropped]";
export const NOTES_USAGE = "Usage: midi-diff notes <file.mid>";

/** Commands and flags recognised in first position. Anything else is an implicit `diff`. */
export const KNOWN_COMMANDS: readonly string[] = [
  "diff", "notes", "debug-info", "help", "--help", "-h", "--version", "-V",
];

const VALUE_FLAGS = ["--side", "--channel"];
const BOOLEAN_FLAGS = ["--list", "--report-dropped"];

/** Parse process.argv.slice(2). */
export function parseCliArgs(args: readonly string[]): ParsedArgs {
  const first = args[0];
  if (first === undefined) return { ok: true, command: { kind: "help", requested: false } };

  switch (first) {
    case "help":
    case "--help":
    case "-h":
      return { ok: true, command: { kind: "help", requested: true } };
    case "--version":
    case "-V":
      return { ok: true, command: { kind: "version" } };
    case "debug-info":
      return { ok: true, command: { kind: "debug-info" } };
    case "notes":
      return args.length === 2
        ? { ok: true, command: { kind: "notes", file: args[1] } }
        : { ok: false, error: NOTES_USAGE };
    case "diff":
      return parseDiffArgs(args.slice(1));
    default:
      // Older invocation style: midi-diff a.mid b.mid out.mid
      return parseDiffArgs(args);
  }
}

// ─── Internal ───────────────────────────────────────────────────────────────

function parseDiffArgs(args: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  const values = new Map<string, string>();
  const flags = new Set<string>();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (VALUE_FLAGS.includes(arg)) {
      const value = args[i + 1];
      if (value === undefined) return { ok: false, error: `Missing value for ${arg}.\n${DIFF_USAGE}` };
      values.set(arg, value);
      i++;
    } else if (BOOLEAN_FLAGS.includes(arg)) {
      flags.add(arg);
    } else if (arg.startsWith("--")) {
      return { ok: false, error: `Unknown option: "${arg}".\n${DIFF_USAGE}` };
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 3) return { ok: false, error: DIFF_USAGE };
  const [fileA, fileB, outFile] = positional;

  let side: DiffSide | undefined;
  const sideStr = values.get("--side");
  if (sideStr !== undefined) {
    side = DIFF_SIDES.find(s => s === sideStr);
    if (!side) {
      return { ok: false, error: `Invalid side: "${sideStr}". Available: ${DIFF_SIDES.join(", ")}` };
    }
  }

  let channel: number | undefined;
  const channelStr = values.get("--channel");
  if (channelStr !== undefined) {
    channel = Number(channelStr);
    if (!Number.isInteger(channel) || channel < 0 || channel > 15) {
      return { ok: false, error: `Invalid channel: "${channelStr}". Must be an integer from 0 to 15.` };
    }
  }

  return {
    ok: true,
    command: {
      kind: "diff",
      fileA,
      fileB,
      outFile,
      side,
      channel,
      list: flags.has("--list"),
      reportDropped: flags.has("--report-dropped"),
    },
  };
}
