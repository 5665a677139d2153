/**
 * Purpose: Hold the merged section/key/value configuration and read/write its INI-style text.
 * Intent: Keep section and key order stable so written output is deterministic.
 */

import { ConfigSyntaxError } from "./errors.js";

export const GENERAL_SECTION = "";

export class ConfigTable {
  private readonly sections = new Map<string, Map<string, string>>();

  set(section: string, key: string, value: string): void {
    let entries = this.sections.get(section);
    if (!entries) {
      entries = new Map();
      this.sections.set(section, entries);
    }
    entries.set(key, value);
  }

  get(section: string, key: string): string | undefined {
    return this.sections.get(section)?.get(key);
  }

  has(section: string, key: string): boolean {
    return this.sections.get(section)?.has(key) ?? false;
  }

  sectionNames(): string[] {
    return [...this.sections.keys()];
  }

  *entries(): IterableIterator<[section: string, key: string, value: string]> {
    for (const [section, entries] of this.sections) {
      for (const [key, value] of entries) yield [section, key, value];
    }
  }

  /** Copy every entry of `other` into this table; existing keys are overwritten. */
  merge(other: ConfigTable): void {
    for (const [section, key, value] of other.entries()) this.set(section, key, value);
  }

  toObject(): Record<string, Record<string, string>> {
    const out: Record<string, Record<string, string>> = Object.create(null);
    for (const [section, entries] of this.sections) {
      out[section] = Object.assign(Object.create(null), Object.fromEntries(entries));
    }
    return out;
  }
}

/**
 * Read INI-style text: `[section]` headers, `key=value` lines, and whole-line
 * `;` or `#` comments. Keys and values are trimmed; keys before the first
 * header belong to the general section.
 */
export function readConfigTable(text: string, file?: string): ConfigTable {
  const table = new ConfigTable();
  const lines = text.split(/\r?\n/);
  let section = GENERAL_SECTION;

  for (let i = 0; i < lines.length; i++) {
    const trimmed = (lines[i] ?? "").trim();
    if (!trimmed) continue;
    if (trimmed.startsWith(";")) continue;
    if (trimmed.startsWith("#") && !trimmed.startsWith("#{")) continue;

    if (trimmed.startsWith("[")) {
      if (!trimmed.endsWith("]")) throw new ConfigSyntaxError("unterminated section header", i + 1, file);
      section = trimmed.slice(1, -1).trim();
      continue;
    }

    const idx = trimmed.indexOf("=");
    if (idx === -1) throw new ConfigSyntaxError(`expected \`key=value\`, found \`${trimmed}\``, i + 1, file);
    const key = trimmed.slice(0, idx).trim();
    if (!key) throw new ConfigSyntaxError("empty key", i + 1, file);
    table.set(section, key, trimmed.slice(idx + 1).trim());
  }

  return table;
}

export function writeConfigTable(table: ConfigTable): string {
  const blocks: string[] = [];
  const sections = table.sectionNames();
  const ordered = sections.includes(GENERAL_SECTION)
    ? [GENERAL_SECTION, ...sections.filter((s) => s !== GENERAL_SECTION)]
    : sections;
  for (const section of ordered) {
    const lines: string[] = [];
    if (section !== GENERAL_SECTION) lines.push(`[${section}]`);
    for (const [s, key, value] of table.entries()) {
      if (s === section) lines.push(`${key}=${value}`);
    }
    blocks.push(lines.join("\n"));
  }
  return blocks.length > 0 ? `${blocks.join("\n\n")}\n` : "";
}
