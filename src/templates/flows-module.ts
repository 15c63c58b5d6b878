// Template for flows.py: one State container and one Flow class per flow, in declared order

import type { LevelSpec } from "../types.js";
import type { NameTable } from "../name-table.js";
import { pyDocstring } from "../python-syntax.js";
import { GENERATED_HEADER, INDENT, stateFieldLines, toSource } from "./common.js";

export function renderFlowsModule(spec: LevelSpec, names: NameTable): string {
  const lines: string[] = [GENERATED_HEADER, pyDocstring(`Flows of the ${spec.name} model.`), ""];

  if (spec.flows.length === 0) {
    lines.push("# No flows are declared for this model.");
    return toSource(lines);
  }

  lines.push(
    "from fmdtools.define.container.state import State",
    "from fmdtools.define.flow.base import Flow",
  );

  spec.flows.forEach((flow, i) => {
    const flowNames = names.flows[i];
    lines.push(
      "",
      "",
      `class ${flowNames.stateClass}(State):`,
      `${INDENT}${pyDocstring(`Variables carried by ${flow.name}.`)}`,
    );
    const fields = stateFieldLines(flow.variables);
    if (fields.length > 0) lines.push("", ...fields);
    lines.push(
      "",
      "",
      `class ${flowNames.className}(Flow):`,
      `${INDENT}${pyDocstring(flow.description || `${flow.name} flow.`)}`,
      "",
      `${INDENT}__slots__ = ()`,
      `${INDENT}container_s = ${flowNames.stateClass}`,
    );
  });

  return toSource(lines);
}
