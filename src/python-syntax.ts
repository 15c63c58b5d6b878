// src/python-syntax.ts — Python literal emission and string escaping
// User text only ever reaches generated code through these functions.

import type { ScalarKind, ScalarValue } from "./types.js";

export function scalarKind(value: ScalarValue): ScalarKind {
  if (typeof value === "number") return "number";
  if (typeof value === "boolean") return "boolean";
  return "string";
}

/**
 * Escape text for a double-quoted or triple-quoted Python string.
 * The result never contains a raw quote, newline or control character.
 */
export function escapePythonString(text: string): string {
  let out = "";
  for (const ch of text) {
    const code = ch.codePointAt(0) ?? 0;
    switch (ch) {
      case "\\": out += "\\\\"; break;
      case '"': out += '\\"'; break;
      case "'": out += "\\'"; break;
      case "\n": out += "\\n"; break;
      case "\r": out += "\\r"; break;
      case "\t": out += "\\t"; break;
      default:
        if (code < 0x20 || code === 0x7f || code === 0x2028 || code === 0x2029) {
          out += code > 0xff
            ? `\\u${code.toString(16).padStart(4, "0")}`
            : `\\x${code.toString(16).padStart(2, "0")}`;
        } else {
          out += ch;
        }
    }
  }
  return out;
}

export function pyString(text: string): string {
  return `"${escapePythonString(text)}"`;
}

/** One-line docstring; escaping keeps it on one line whatever the input. */
export function pyDocstring(text: string): string {
  return `"""${escapePythonString(text)}"""`;
}

/** Numbers are emitted as floats: 1800 → "1800.0", 0.95 → "0.95". */
export function pyFloat(n: number): string {
  if (!Number.isFinite(n)) {
    throw new RangeError(`Cannot emit non-finite number ${n}`);
  }
  if (Number.isInteger(n) && Math.abs(n) < 1e16) return `${n}.0`;
  return String(n);
}

export function pyLiteral(value: ScalarValue): string {
  if (typeof value === "number") return pyFloat(value);
  if (typeof value === "boolean") return value ? "True" : "False";
  return pyString(value);
}

export function pyTypeName(value: ScalarValue): "float" | "bool" | "str" {
  switch (scalarKind(value)) {
    case "number": return "float";
    case "boolean": return "bool";
    default: return "str";
  }
}
