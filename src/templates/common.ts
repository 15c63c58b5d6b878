// Shared pieces of every generated Python module

import { ENGINE_VERSION } from "../types.js";
import type { StateVariable } from "../types.js";
import { toLowerIdentifier } from "../identifiers.js";
import { pyLiteral, pyTypeName } from "../python-syntax.js";

export const INDENT = "    ";

export const GENERATED_HEADER = `# Generated by fault-model-builder ${ENGINE_VERSION}. Edit freely; re-rendering with --force overwrites.`;

/** Typed field lines of a State container body, one per variable. */
export function stateFieldLines(variables: StateVariable[]): string[] {
  return variables.map(
    (v) => `${INDENT}${toLowerIdentifier(v.name)}: ${pyTypeName(v.default)} = ${pyLiteral(v.default)}`,
  );
}

/** Join lines into file content with exactly one trailing newline. */
export function toSource(lines: string[]): string {
  return lines.join("\n").replace(/\n+$/, "") + "\n";
}
