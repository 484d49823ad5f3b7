import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync, existsSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { resolveOutputPath } from "./output-path.js";

describe("resolveOutputPath", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "midi-diff-out-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("uses the requested path when it is free", () => {
    expect(resolveOutputPath(join(dir, "out.mid"))).toBe(join(dir, "out.mid"));
  });

  it("appends _1 when the requested path exists", () => {
    writeFileSync(join(dir, "out.mid"), "");
    expect(resolveOutputPath(join(dir, "out.mid"))).toBe(join(dir, "out_1.mid"));
  });

  it("keeps probing until a free name turns up", () => {
    writeFileSync(join(dir, "out.mid"), "");
    writeFileSync(join(dir, "out_1.mid"), "");
    writeFileSync(join(dir, "out_2.mid"), "");
    expect(resolveOutputPath(join(dir, "out.mid"))).toBe(join(dir, "out_3.mid"));
  });

  it("keeps the requested extension", () => {
    writeFileSync(join(dir, "take.midi"), "");
    expect(resolveOutputPath(join(dir, "take.midi"))).toBe(join(dir, "take_1.midi"));
  });

  it("uses an extensionless path as-is when it is free", () => {
    expect(resolveOutputPath(join(dir, "changes"))).toBe(join(dir, "changes"));
  });

  it("adds the default extension when probing an extensionless path", () => {
    writeFileSync(join(dir, "changes"), "");
    expect(resolveOutputPath(join(dir, "changes"))).toBe(join(dir, "changes_1.mid"));
    expect(resolveOutputPath(join(dir, "changes"), { defaultExtension: ".smf" }))
      .toBe(join(dir, "changes_1.smf"));
  });

  it("creates missing parent directories", () => {
    const nested = join(dir, "a", "b", "out.mid");
    expect(resolveOutputPath(nested)).toBe(nested);
    expect(existsSync(join(dir, "a", "b"))).toBe(true);
  });

  it("reports a directory it cannot create and still returns a path", () => {
    // a regular file where a directory is expected
    writeFileSync(join(dir, "blocker"), "");
    const errors: string[] = [];
    const requested = join(dir, "blocker", "sub", "out.mid");

    const resolved = resolveOutputPath(requested, {
      onMkdirError: (d) => errors.push(d),
    });

    expect(resolved).toBe(requested);
    expect(errors).toEqual([join(dir, "blocker", "sub")]);
  });
});
