import { describe, it, expect } from "vitest";
import { parseCliArgs, DIFF_USAGE, NOTES_USAGE } from "./cli-args.js";

describe("parseCliArgs", () => {
  it("shows help with no arguments, marked as not requested", () => {
    expect(parseCliArgs([])).toEqual({ ok: true, command: { kind: "help", requested: false } });
  });

  it("recognises help, version and debug-info", () => {
    expect(parseCliArgs(["-h"])).toEqual({ ok: true, command: { kind: "help", requested: true } });
    expect(parseCliArgs(["help"])).toEqual({ ok: true, command: { kind: "help", requested: true } });
    expect(parseCliArgs(["--version"])).toEqual({ ok: true, command: { kind: "version" } });
    expect(parseCliArgs(["-V"])).toEqual({ ok: true, command: { kind: "version" } });
    expect(parseCliArgs(["debug-info"])).toEqual({ ok: true, command: { kind: "debug-info" } });
  });

  it("parses an explicit diff", () => {
    expect(parseCliArgs(["diff", "a.mid", "b.mid", "out.mid"])).toEqual({
      ok: true,
      command: {
        kind: "diff",
        fileA: "a.mid",
        fileB: "b.mid",
        outFile: "out.mid",
        side: undefined,
        channel: undefined,
        list: false,
        reportDropped: false,
      },
    });
  });

  it("treats bare file arguments as a diff", () => {
    const parsed = parseCliArgs(["a.mid", "b.mid", "out.mid"]);
    expect(parsed.ok && parsed.command.kind).toBe("diff");
  });

  it("parses diff options in any position", () => {
    const parsed = parseCliArgs(["diff", "--side", "a", "a.mid", "--list", "b.mid", "out.mid", "--channel", "9", "--report-dropped"]);
    expect(parsed).toEqual({
      ok: true,
      command: {
        kind: "diff",
        fileA: "a.mid",
        fileB: "b.mid",
        outFile: "out.mid",
        side: "a",
        channel: 9,
        list: true,
        reportDropped: true,
      },
    });
  });

  it("rejects the wrong number of files", () => {
    expect(parseCliArgs(["diff", "a.mid", "b.mid"])).toEqual({ ok: false, error: DIFF_USAGE });
    expect(parseCliArgs(["a.mid", "b.mid", "c.mid", "d.mid"])).toEqual({ ok: false, error: DIFF_USAGE });
  });

  it("rejects bad option values", () => {
    expect(parseCliArgs(["a.mid", "b.mid", "out.mid", "--side", "left"]))
      .toEqual({ ok: false, error: 'Invalid side: "left". Available: a, b, both' });
    expect(parseCliArgs(["a.mid", "b.mid", "out.mid", "--channel", "16"]))
      .toEqual({ ok: false, error: 'Invalid channel: "16". Must be an integer from 0 to 15.' });
    expect(parseCliArgs(["a.mid", "b.mid", "out.mid", "--channel"]))
      .toEqual({ ok: false, error: `Missing value for --channel.\n${DIFF_USAGE}` });
  });

  it("rejects unknown options", () => {
    expect(parseCliArgs(["a.mid", "b.mid", "out.mid", "--fast"]))
      .toEqual({ ok: false, error: `Unknown option: "--fast".\n${DIFF_USAGE}` });
  });

  it("parses notes with exactly one file", () => {
    expect(parseCliArgs(["notes", "song.mid"])).toEqual({ ok: true, command: { kind: "notes", file: "song.mid" } });
    expect(parseCliArgs(["notes"])).toEqual({ ok: false, error: NOTES_USAGE });
  });
});
