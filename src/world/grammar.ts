// src/world/grammar.ts
//
// The only places raw text is interpreted. Every deviation is a
// WorldMapFormatError; callers that know the line number pass it along.

import { WorldMapFormatError } from "./errors.js";
import { isInt32 } from "./position.js";

const INT_RE = /^[+-]?\d+$/;
const LABELED_COUNT_RE = /^([a-z]+):(\d+)$/;

export type NumberedRow = Readonly<{ id: number; rest: string }>;

export function parseInt32(token: string, line?: number): number {
  if (!INT_RE.test(token)) throw new WorldMapFormatError(`Invalid integer '${token}'`, line);
  const v = Number(token);
  if (!isInt32(v)) throw new WorldMapFormatError(`Integer out of range '${token}'`, line);
  // Number("-0") is -0; keep the map key and the output "0".
  return v === 0 ? 0 : v;
}

/**
 * Parses "label:N,label:M" (lowercase labels, non-negative counts, no spaces,
 * no repeated labels). The empty string yields an empty map.
 */
export function parseLabeledCounts(
  text: string,
  requireExactlyOne: boolean,
  line?: number,
): Map<string, number> {
  const out = new Map<string, number>();

  if (text !== "") {
    for (const field of text.split(",")) {
      const m = LABELED_COUNT_RE.exec(field);
      if (!m) throw new WorldMapFormatError(`Invalid field '${field}'`, line);

      const label = m[1]!;
      if (out.has(label)) throw new WorldMapFormatError(`Repeated label '${label}'`, line);
      out.set(label, parseInt32(m[2]!, line));
    }
  }

  if (requireExactlyOne && out.size !== 1) {
    throw new WorldMapFormatError(`Expected exactly one field, got ${out.size}`, line);
  }
  return out;
}

/** Parses "<int>" or "<int> <rest>"; rest may be empty but holds no spaces. */
export function parseNumberedRow(text: string, line?: number): NumberedRow {
  const sp = text.indexOf(" ");
  if (sp === -1) return { id: parseInt32(text, line), rest: "" };

  const rest = text.slice(sp + 1);
  if (rest.includes(" ")) throw new WorldMapFormatError(`Too many spaces in '${text}'`, line);
  return { id: parseInt32(text.slice(0, sp), line), rest };
}
