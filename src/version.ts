// ─── midi-diff: Version & Debug Info ────────────────────────────────────────
//
// Text blocks for `--version` and `debug-info`. Everything is local:
// package metadata, the Node.js runtime, and the environment.
// ─────────────────────────────────────────────────────────────────────────────

import { readFileSync } from "node:fs";
import { arch, platform, release } from "node:os";
import { z } from "zod";
import { ENV_VARS, defaultConfigPath } from "./config.js";

const PATH_TRUNCATE_LENGTH = 100;

const PackageJsonSchema = z.object({
  name: z.string(),
  version: z.string(),
  dependencies: z.record(z.string()).default({}),
});

export type PackageInfo = z.infer<typeof PackageJsonSchema>;

/** Read this package's package.json (one level above src/ and dist/). */
export function readPackageInfo(): PackageInfo {
  const raw = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
  return PackageJsonSchema.parse(raw);
}

/** Lines printed by `midi-diff --version`. */
export function versionLines(pkg: PackageInfo = readPackageInfo()): string[] {
  return [
    `${pkg.name} ${pkg.version}`,
    `Node.js: ${process.version}`,
    `Platform: ${platform()} ${release()}`,
    `midi-file: ${pkg.dependencies["midi-file"] ?? "not declared"}`,
  ];
}

/** Lines printed by `midi-diff debug-info`. */
export function debugInfoLines(
  env: NodeJS.ProcessEnv = process.env,
  pkg: PackageInfo = readPackageInfo(),
): string[] {
  const lines = [
    `${pkg.name} debug information`,
    "═".repeat(40),
    ...versionLines(pkg),
    `Arch: ${arch()}`,
    `Working directory: ${process.cwd()}`,
    `Config file: ${defaultConfigPath()}`,
    "",
    "Environment:",
  ];

  for (const name of Object.values(ENV_VARS)) {
    lines.push(`  ${name}: ${env[name] ?? "not set"}`);
  }
  lines.push(`  PATH: ${truncatePath(env.PATH)}`);

  return lines;
}

export function truncatePath(path: string | undefined): string {
  if (path === undefined) return "not set";
  return path.length > PATH_TRUNCATE_LENGTH ? `${path.substring(0, PATH_TRUNCATE_LENGTH)}...` : path;
}
