// Template for one component module: State container, Mode container, Function class

import type { ComponentSpec } from "../types.js";
import type { ComponentNames } from "../name-table.js";
import { toLowerIdentifier } from "../identifiers.js";
import { pyDocstring, pyFloat, pyString } from "../python-syntax.js";
import { GENERATED_HEADER, INDENT, stateFieldLines, toSource } from "./common.js";

export function renderFunctionModule(component: ComponentSpec, names: ComponentNames): string {
  const summary = component.description || `${component.name} function.`;
  const faults = component.faults.map((f) => ({ id: toLowerIdentifier(f.name), rate: f.rate }));
  const lines: string[] = [
    GENERATED_HEADER,
    pyDocstring(summary),
    "",
    "from fmdtools.define.block.function import Function",
    "from fmdtools.define.container.mode import Mode",
    "from fmdtools.define.container.state import State",
    "",
    "",
    `class ${names.stateClass}(State):`,
    `${INDENT}${pyDocstring(`States of ${component.name}.`)}`,
  ];

  const fields = stateFieldLines(component.states);
  if (fields.length > 0) lines.push("", ...fields);

  lines.push(
    "",
    "",
    `class ${names.modeClass}(Mode):`,
    `${INDENT}${pyDocstring(`Fault modes of ${component.name}.`)}`,
    "",
  );
  if (faults.length === 0) {
    lines.push(`${INDENT}fm_args = {}`);
  } else {
    lines.push(`${INDENT}fm_args = {`);
    for (const fault of faults) {
      const args = fault.rate !== undefined ? `(${pyFloat(fault.rate)},)` : "()";
      lines.push(`${INDENT}${INDENT}${pyString(fault.id)}: ${args},`);
    }
    lines.push(`${INDENT}}`);
  }

  lines.push(
    "",
    "",
    `class ${names.className}(Function):`,
    `${INDENT}${pyDocstring(summary)}`,
    "",
    `${INDENT}__slots__ = ()`,
    `${INDENT}container_s = ${names.stateClass}`,
    `${INDENT}container_m = ${names.modeClass}`,
    "",
    `${INDENT}def dynamic_behavior(self, time):`,
    `${INDENT}${INDENT}${pyDocstring(`Behavior of ${component.name} at each time step.`)}`,
    `${INDENT}${INDENT}# TODO: implement nominal behavior`,
  );
  if (faults.length === 0) {
    lines.push(`${INDENT}${INDENT}pass`);
  }
  for (const fault of faults) {
    lines.push(
      `${INDENT}${INDENT}if self.m.has_fault(${pyString(fault.id)}):`,
      `${INDENT}${INDENT}${INDENT}# TODO: implement behavior under fault ${fault.id}`,
      `${INDENT}${INDENT}${INDENT}pass`,
    );
  }

  return toSource(lines);
}
