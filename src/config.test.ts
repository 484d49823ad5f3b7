import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig, isTruthy, ENV_VARS, DiffConfigSchema } from "./config.js";

describe("loadConfig", () => {
  let dir: string;
  let configPath: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "midi-diff-config-"));
    configPath = join(dir, "config.json");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns defaults without a file or environment", () => {
    expect(loadConfig({ env: {}, configPath })).toEqual({
      defaultTicksPerBeat: 480,
      defaultExtension: ".mid",
      channel: 0,
      reportDropped: false,
    });
  });

  it("reads the config file", () => {
    writeFileSync(configPath, JSON.stringify({ channel: 3, defaultExtension: ".midi" }));
    const config = loadConfig({ env: {}, configPath });
    expect(config.channel).toBe(3);
    expect(config.defaultExtension).toBe(".midi");
  });

  it("lets environment variables override the file", () => {
    writeFileSync(configPath, JSON.stringify({ channel: 3, defaultTicksPerBeat: 96 }));
    const config = loadConfig({
      env: { MIDIDIFF_CHANNEL: "9", MIDIDIFF_REPORT_DROPPED: "yes" },
      configPath,
    });
    expect(config.channel).toBe(9);
    expect(config.defaultTicksPerBeat).toBe(96);
    expect(config.reportDropped).toBe(true);
  });

  it("rejects out-of-range values with the field name", () => {
    expect(() => loadConfig({ env: { MIDIDIFF_CHANNEL: "16" }, configPath }))
      .toThrow("channel:");
    expect(() => loadConfig({ env: { MIDIDIFF_TICKS_PER_BEAT: "abc" }, configPath }))
      .toThrow("defaultTicksPerBeat:");
    expect(() => loadConfig({ env: { MIDIDIFF_DEFAULT_EXTENSION: "mid" }, configPath }))
      .toThrow("defaultExtension: must look like .mid");
  });

  it("rejects a config file that is not a JSON object", () => {
    writeFileSync(configPath, "[1, 2]");
    expect(() => loadConfig({ env: {}, configPath })).toThrow("expected a JSON object");

    writeFileSync(configPath, "{ not json");
    expect(() => loadConfig({ env: {}, configPath })).toThrow(`Invalid configuration file ${configPath}`);
  });
});

describe("ENV_VARS", () => {
  it("names one MIDIDIFF_ variable per setting", () => {
    expect(Object.keys(ENV_VARS).sort()).toEqual(Object.keys(DiffConfigSchema.parse({})).sort());
    expect(Object.values(ENV_VARS).every(name => name.startsWith("MIDIDIFF_"))).toBe(true);
  });
});

describe("isTruthy", () => {
  it("accepts 1, true and yes in any case", () => {
    expect(["1", "true", "YES", " yes "].map(isTruthy)).toEqual([true, true, true, true]);
  });

  it("rejects everything else", () => {
    expect([undefined, "", "0", "no", "on"].map(isTruthy)).toEqual([false, false, false, false, false]);
  });
});
