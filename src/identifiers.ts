// src/identifiers.ts — Identifier sanitization
// Every name derived from user text passes through here before it can reach generated code.

const PYTHON_KEYWORDS = new Set([
  "False", "None", "True", "and", "as", "assert", "async", "await", "break",
  "class", "continue", "def", "del", "elif", "else", "except", "finally", "for",
  "from", "global", "if", "import", "in", "is", "lambda", "nonlocal", "not",
  "or", "pass", "raise", "return", "try", "while", "with", "yield",
]);

/**
 * Strip characters invalid in a Python identifier, collapse runs of separators
 * into one underscore, and trim underscores from both ends.
 * Returns "" when nothing usable is left; callers must reject that result.
 */
export function sanitizeIdentifier(raw: string): string {
  let s = raw
    .trim()
    .replace(/[^0-9a-zA-Z_]+/g, "_")
    .replace(/_+/g, "_")
    .replace(/^_+|_+$/g, "");
  if (!s) return "";
  if (/^[0-9]/.test(s)) s = `_${s}`;
  if (PYTHON_KEYWORDS.has(s)) s = `${s}_`;
  return s;
}

/**
 * Lower-cased identifier: state and fault names, module names, instance names.
 * "Bearing Wear" → "bearing_wear", "AcSystem" → "acsystem".
 */
export function toLowerIdentifier(raw: string): string {
  return sanitizeIdentifier(raw.toLowerCase());
}

/**
 * PascalCase class name. Inner casing of each word is kept, so "AcSystem"
 * stays "AcSystem" and "air conditioning" becomes "AirConditioning".
 */
export function toClassName(raw: string): string {
  const words = raw.split(/[^0-9a-zA-Z]+/).filter(Boolean);
  let s = words.map((w) => w[0].toUpperCase() + w.slice(1)).join("");
  if (!s) return "";
  if (/^[0-9]/.test(s)) s = `_${s}`;
  if (PYTHON_KEYWORDS.has(s)) s = `${s}_`;
  return s;
}

/** Case-normalized key used to compare entity names. */
export function nameKey(name: string): string {
  return toLowerIdentifier(name);
}

/** Default architecture name for a level name: "pump_system" → "PumpSystemArchitecture". */
export function deriveArchitectureName(levelName: string): string {
  return `${toClassName(levelName) || "Model"}Architecture`;
}
