// ─── midi-diff: Reporters ───────────────────────────────────────────────────
//
// The diff pipeline never prints directly; it reports through a
// DiffReporter. Which one is plugged in decides where messages go.
//
// Implementations:
//   - ConsoleReporter: stdout/stderr (CLI)
//   - SilentReporter: no-op
//   - RecordingReporter: keeps every entry (tests, MCP tool results)
// ─────────────────────────────────────────────────────────────────────────────

import type { DroppedPairing } from "./midi/types.js";

/** Receives everything the diff pipeline has to say. */
export interface DiffReporter {
  /** Progress and results. */
  info(message: string): void;
  /** Something went wrong but the run continues. */
  warn(message: string): void;
  /** The run is aborting. */
  error(message: string): void;
  /** A note pairing was dropped during extraction. `file` is "A" or "B". */
  dropped(file: string, pairing: DroppedPairing): void;
}

/** "track 2, pitch 60 at tick 480: unmatched note-off" */
export function describeDropped(pairing: DroppedPairing): string {
  const what = pairing.reason.replace(/-/g, " ");
  return `track ${pairing.track}, pitch ${pairing.pitch} at tick ${pairing.tick}: ${what}`;
}

// ─── Console Reporter (CLI) ─────────────────────────────────────────────────

export function createConsoleReporter(): DiffReporter {
  return {
    info(message) {
      console.log(message);
    },
    warn(message) {
      console.warn(`Warning: ${message}`);
    },
    error(message) {
      console.error(message);
    },
    dropped(file, pairing) {
      console.error(`  dropped in ${file}: ${describeDropped(pairing)}`);
    },
  };
}

// ─── Silent Reporter ────────────────────────────────────────────────────────

export function createSilentReporter(): DiffReporter {
  return {
    info() {},
    warn() {},
    error() {},
    dropped() {},
  };
}

// ─── Recording Reporter ─────────────────────────────────────────────────────

/** A recorded report entry. */
export interface ReportEntry {
  level: "info" | "warn" | "error" | "dropped";
  message: string;
}

/**
 * Records all entries in order.
 * Use: `const reporter = createRecordingReporter(); ... reporter.entries`
 */
export function createRecordingReporter(): DiffReporter & { entries: ReportEntry[] } {
  const entries: ReportEntry[] = [];

  return {
    entries,

    info(message) {
      entries.push({ level: "info", message });
    },

    warn(message) {
      entries.push({ level: "warn", message });
    },

    error(message) {
      entries.push({ level: "error", message });
    },

    dropped(file, pairing) {
      entries.push({ level: "dropped", message: `${file}: ${describeDropped(pairing)}` });
    },
  };
}
