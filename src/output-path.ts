// ─── Output Path Resolution ─────────────────────────────────────────────────
//
// Never overwrite: if the requested file exists, probe name_1.ext,
// name_2.ext, ... until a free name turns up. This is a plain linear
// probe; two processes racing for the same name can still collide.
// ─────────────────────────────────────────────────────────────────────────────

import { existsSync, mkdirSync } from "node:fs";
import { dirname, join, parse } from "node:path";

export const DEFAULT_EXTENSION = ".mid";

export interface ResolveOutputOptions {
  /** Extension used for probed names when the request has none. Default: ".mid". */
  defaultExtension?: string;
  /** Called if the parent directory cannot be created. Resolution continues. */
  onMkdirError?: (dir: string, err: unknown) => void;
}

/**
 * Pick a path for a new output file, creating its parent directory if needed.
 *
 *   out.mid (free)            → out.mid
 *   out.mid (taken)           → out_1.mid
 *   out.mid, out_1.mid taken  → out_2.mid
 *   out (taken)               → out_1.mid
 */
export function resolveOutputPath(
  requested: string,
  options: ResolveOutputOptions = {},
): string {
  const dir = dirname(requested);
  if (!existsSync(dir)) {
    try {
      mkdirSync(dir, { recursive: true });
    } catch (err) {
      options.onMkdirError?.(dir, err);
    }
  }

  if (!existsSync(requested)) return requested;

  const { name, ext } = parse(requested);
  const extension = ext || (options.defaultExtension ?? DEFAULT_EXTENSION);

  for (let n = 1; ; n++) {
    const candidate = join(dir, `${name}_${n}${extension}`);
    if (!existsSync(candidate)) return candidate;
  }
}
