/**
 * Purpose: Validate and default the options a theme build accepts.
 * Intent: Fail before any file is read when the caller's options are malformed.
 */

import { z } from "zod";
import { BuildOptionsError } from "./errors.js";

const extension = z
  .string()
  .min(1)
  .transform((ext) => ext.replace(/^\./, "").toLowerCase())
  .refine((ext) => /^[a-z0-9_-]+$/.test(ext), { message: "extension must be a plain file suffix" });

export const buildOptionsSchema = z.object({
  themeName: z.string().min(1),
  logLevel: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
  confineToRoot: z.boolean().default(false),
  configExtensions: z.array(extension).default(["reapertheme", "ini"]),
  scriptExtensions: z.array(extension).default(["lua"]),
  globals: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])).default({}),
  env: z.record(z.string(), z.string().optional()).optional(),
  now: z.date().optional(),
});

export type BuildOptionsInput = z.input<typeof buildOptionsSchema>;
export type BuildOptions = z.output<typeof buildOptionsSchema>;

export function parseBuildOptions(input: unknown): BuildOptions {
  const result = buildOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new BuildOptionsError(
      result.error.issues.map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
    );
  }
  return result.data;
}
