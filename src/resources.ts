/**
 * Purpose: Resolve resource globs against the file system and record them in the manifest.
 * Intent: Keep the first registration for each destination and report everything skipped as a warning.
 */

import fs from "node:fs";
import path from "node:path";
import picomatch from "picomatch";
import { errorMessage, IncludeError } from "./errors.js";
import type { Logger } from "./logger.js";
import { isWithinRoot, joinRelativePath } from "./paths.js";
import type { BuildMessage, ResourceManifest, ResourceRequest } from "./types.js";

export interface GlobExpansion {
  /** Absolute paths of matching files and directories, sorted. */
  matches: string[];
  unreadable: { path: string; message: string }[];
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function walk(
  dir: string,
  rel: string,
  depthLeft: number,
  visit: (absolute: string, relative: string) => void,
  unreadable: GlobExpansion["unreadable"]
): void {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    if (!isMissing(err)) unreadable.push({ path: dir, message: errorMessage(err) });
    return;
  }
  for (const entry of entries) {
    const absolute = path.join(dir, entry.name);
    const relative = rel ? `${rel}/${entry.name}` : entry.name;
    visit(absolute, relative);
    if (entry.isDirectory() && depthLeft > 1) walk(absolute, relative, depthLeft - 1, visit, unreadable);
  }
}

/** Expand `pattern` relative to `baseDir`; a pattern without wildcards matches the one path it names, if it exists. */
export function expandGlob(baseDir: string, pattern: string): GlobExpansion {
  const scan = picomatch.scan(pattern);
  const unreadable: GlobExpansion["unreadable"] = [];

  if (!scan.isGlob) {
    // Joined without normalizing, so `..` or `.` stay visible as the last component.
    const literal = `${path.resolve(baseDir)}${path.sep}${pattern}`;
    return { matches: fs.existsSync(literal) ? [literal] : [], unreadable };
  }

  const root = path.resolve(baseDir, scan.base);
  const isMatch = picomatch(scan.glob, { dot: true, strictBrackets: true });
  const depth = scan.glob.split("/").includes("**") ? Infinity : scan.glob.split("/").length;
  const matches: string[] = [];
  walk(
    root,
    "",
    depth,
    (absolute, relative) => {
      if (isMatch(relative)) matches.push(absolute);
    },
    unreadable
  );

  matches.sort();
  return { matches, unreadable };
}

function baseNameOf(p: string): string | null {
  const name = path.basename(p);
  return name === "" || name === "." || name === ".." ? null : name;
}

export interface RegisterContext {
  manifest: ResourceManifest;
  warn(message: BuildMessage): void;
  log: Logger;
  /** When set, matches outside this directory fail the build. */
  confineTo: string | null;
}

/**
 * Register every match of `request` (resolved against `baseDir`) at `dest/<basename>`.
 * A destination that is already taken keeps its first source.
 */
export function registerResources(ctx: RegisterContext, request: ResourceRequest, baseDir: string, file: string): void {
  ctx.log.debug({ pattern: request.pattern, base: baseDir }, "expanding resource glob");
  const { matches, unreadable } = expandGlob(baseDir, request.pattern);

  for (const problem of unreadable) {
    ctx.warn({
      severity: "warning",
      code: "TD_RESOURCE_UNREADABLE",
      message: `failed to get resources in path \`${problem.path}\`: ${problem.message}`,
      file,
    });
  }

  for (const match of matches) {
    if (ctx.confineTo !== null && !isWithinRoot(ctx.confineTo, match)) {
      throw new IncludeError(
        "TD_RESOURCE_OUTSIDE_ROOT",
        `resource \`${match}\` lies outside the theme root \`${ctx.confineTo}\``,
        match
      );
    }

    const name = baseNameOf(match);
    if (name === null) {
      ctx.warn({
        severity: "warning",
        code: "TD_RESOURCE_UNNAMED",
        message: `resource does not have a file name \`${match}\``,
        file,
      });
      continue;
    }

    const destination = joinRelativePath(request.dest, name);
    const existing = ctx.manifest.get(destination);
    if (existing !== undefined) {
      ctx.warn({
        severity: "warning",
        code: "TD_RESOURCE_COLLISION",
        message: `resource \`${match}\` overwrites previous resource at \`${destination}\` (keeping \`${existing}\`)`,
        file,
      });
      continue;
    }
    ctx.manifest.set(destination, match);
  }
}
