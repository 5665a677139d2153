/**
 * Purpose: Validate and normalize the relative paths and globs that directives carry.
 * Intent: Reject absolute or malformed literals at parse time, before any file is touched.
 */

import path from "node:path";
import picomatch from "picomatch";

const DRIVE_PREFIX = /^[A-Za-z]:/;

export function relativePathProblem(p: string): string | null {
  if (p.length === 0) return "path must not be empty";
  if (p.startsWith("/") || p.startsWith("\\")) return `path \`${p}\` must be relative`;
  if (DRIVE_PREFIX.test(p)) return `path \`${p}\` must be relative (drive letters are not allowed)`;
  return null;
}

/** Forward slashes, no `./` prefix, no trailing slash; the empty path is `.`. */
export function normalizeRelativePath(p: string): string {
  const normalized = path.posix.normalize(p.replace(/\\/g, "/")).replace(/\/+$/, "");
  if (normalized === "" || normalized === ".") return ".";
  return normalized.startsWith("./") ? normalized.slice(2) : normalized;
}

export function joinRelativePath(dir: string, name: string): string {
  return normalizeRelativePath(dir === "." ? name : `${dir}/${name}`);
}

export function globProblem(pattern: string): string | null {
  const relative = relativePathProblem(pattern);
  if (relative) return relative;

  for (const segment of pattern.split("/")) {
    if (segment.includes("***")) return `invalid wildcard in \`${segment}\``;
    if (segment.includes("**") && segment !== "**") {
      return `recursive wildcard \`**\` must form a whole path component in \`${segment}\``;
    }
  }

  try {
    picomatch.makeRe(pattern, { strictBrackets: true, dot: true });
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
  return null;
}

/** True when `target` is `root` or lies below it. */
export function isWithinRoot(root: string, target: string): boolean {
  const rel = path.relative(path.resolve(root), path.resolve(target));
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}
