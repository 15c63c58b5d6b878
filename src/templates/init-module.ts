// Template for __init__.py: re-exports every generated class

import type { LevelSpec } from "../types.js";
import type { NameTable } from "../name-table.js";
import { ARCHITECTURE_MODULE, FLOWS_MODULE } from "../name-table.js";
import { pyDocstring, pyString } from "../python-syntax.js";
import { GENERATED_HEADER, INDENT, toSource } from "./common.js";

export function renderInitModule(spec: LevelSpec, names: NameTable): string {
  const lines: string[] = [GENERATED_HEADER, pyDocstring(`${spec.name} fault model package.`), ""];
  const exported: string[] = [];

  for (const c of names.components) {
    const classes = [c.className, c.stateClass, c.modeClass];
    lines.push(`from .${c.module} import ${classes.join(", ")}`);
    exported.push(...classes);
  }
  if (names.flows.length > 0) {
    const classes = names.flows.flatMap((f) => [f.className, f.stateClass]);
    lines.push(`from .${FLOWS_MODULE} import ${classes.join(", ")}`);
    exported.push(...classes);
  }
  lines.push(
    `from .${ARCHITECTURE_MODULE} import ${names.architectureClass}`,
    `from .${names.levelModule} import ${names.levelClass}`,
  );
  exported.push(names.architectureClass, names.levelClass);

  lines.push("", "__all__ = [", ...exported.map((name) => `${INDENT}${pyString(name)},`), "]");
  return toSource(lines);
}
