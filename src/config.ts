// ─── midi-diff: Configuration ───────────────────────────────────────────────
//
// Settings come from three layers, later ones winning:
//   1. built-in defaults
//   2. ~/.mididiff/config.json (optional)
//   3. MIDIDIFF_* environment variables
// The merged result is validated with zod.
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";

// ─── Zod Schema ─────────────────────────────────────────────────────────────

export const DiffConfigSchema = z.object({
  /** Resolution written when file A has no ticks-per-beat (SMPTE timing). */
  defaultTicksPerBeat: z.number().int().min(1).max(32767).default(480),
  /** Extension for probed output names when the requested path has none. */
  defaultExtension: z.string().regex(/^\.\w+$/, "must look like .mid").default(".mid"),
  /** MIDI channel for every event in the diff file. */
  channel: z.number().int().min(0).max(15).default(0),
  /** Report pairings the extractor drops. */
  reportDropped: z.boolean().default(false),
});

export type DiffConfig = z.infer<typeof DiffConfigSchema>;

export const ENV_VARS: Record<keyof DiffConfig, string> = {
  defaultTicksPerBeat: "MIDIDIFF_TICKS_PER_BEAT",
  defaultExtension: "MIDIDIFF_DEFAULT_EXTENSION",
  channel: "MIDIDIFF_CHANNEL",
  reportDropped: "MIDIDIFF_REPORT_DROPPED",
};

const TRUTHY = ["1", "true", "yes"];

// ─── Loading ────────────────────────────────────────────────────────────────

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Path of the JSON config file. Default: ~/.mididiff/config.json */
  configPath?: string;
}

export function defaultConfigPath(): string {
  return join(homedir(), ".mididiff", "config.json");
}

/**
 * Load, merge and validate configuration.
 * Throws with one `field: message` line per problem.
 */
export function loadConfig(options: LoadConfigOptions = {}): DiffConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? defaultConfigPath();

  const merged = { ...readConfigFile(configPath), ...fromEnv(env) };
  const result = DiffConfigSchema.safeParse(merged);

  if (!result.success) {
    const issues = result.error.issues
      .map(i => `  ${i.path.join(".") || "root"}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid configuration:\n${issues}`);
  }

  return result.data;
}

/** Parse a MIDIDIFF_* style boolean. */
export function isTruthy(value: string | undefined): boolean {
  return value !== undefined && TRUTHY.includes(value.trim().toLowerCase());
}

// ─── Internal ───────────────────────────────────────────────────────────────

function readConfigFile(path: string): Record<string, unknown> {
  if (!existsSync(path)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new Error(`Invalid configuration file ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }

  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error(`Invalid configuration file ${path}: expected a JSON object`);
  }
  return Object.fromEntries(Object.entries(raw));
}

/** Only variables that are set end up in the result, so file values survive. */
function fromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = {};

  const tpb = env[ENV_VARS.defaultTicksPerBeat];
  if (tpb !== undefined) out.defaultTicksPerBeat = Number(tpb);

  const ext = env[ENV_VARS.defaultExtension];
  if (ext !== undefined) out.defaultExtension = ext;

  const channel = env[ENV_VARS.channel];
  if (channel !== undefined) out.channel = Number(channel);

  const dropped = env[ENV_VARS.reportDropped];
  if (dropped !== undefined) out.reportDropped = isTruthy(dropped);

  return out;
}
