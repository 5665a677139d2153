/**
 * Purpose: Split configuration values into literal text and expression parts.
 * Intent: Reuse the descriptor scanner so `#{ … }` spans and string literals behave the same in both places.
 */

import { scanExpressionSpan, SourceScanner } from "./descriptor_scan.js";
import type { ConfigValuePart } from "./types.js";

/** Split a configuration value into literal text and `#{ … }` expression parts. */
export function parseConfigValue(value: string): ConfigValuePart[] {
  const s = new SourceScanner(value);
  const parts: ConfigValuePart[] = [];
  let textStart = s.mark();

  while (!s.atEnd) {
    if (!s.startsWith("#{")) {
      s.advance();
      continue;
    }
    const text = s.sliceFrom(textStart);
    if (text) parts.push({ kind: "text", text });
    const { text: exprText, span } = scanExpressionSpan(s);
    parts.push({ kind: "expression", text: exprText, span });
    textStart = s.mark();
  }

  const tail = s.sliceFrom(textStart);
  if (tail) parts.push({ kind: "text", text: tail });
  return parts;
}
