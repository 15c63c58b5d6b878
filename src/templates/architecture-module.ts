// Template for architecture.py: adds every flow and function, wiring each function to its flows

import type { LevelSpec } from "../types.js";
import type { ComponentNames, FlowNames, NameTable } from "../name-table.js";
import { FLOWS_MODULE } from "../name-table.js";
import { nameKey } from "../identifiers.js";
import { pyDocstring, pyString } from "../python-syntax.js";
import { GENERATED_HEADER, INDENT, toSource } from "./common.js";

/** Architecture components in listed order, resolved through the name table. */
export function architectureComponents(spec: LevelSpec, names: NameTable): ComponentNames[] {
  const resolved: ComponentNames[] = [];
  for (const name of spec.architecture.components) {
    const entry = names.componentByKey.get(nameKey(name));
    if (entry) resolved.push(entry);
  }
  return resolved;
}

/** Flows a component touches through its connections, in connection order. */
export function connectedFlows(spec: LevelSpec, names: NameTable, component: ComponentNames): FlowNames[] {
  const key = nameKey(component.name);
  const flows: FlowNames[] = [];
  for (const connection of spec.architecture.connections) {
    if (nameKey(connection.from) !== key && nameKey(connection.to) !== key) continue;
    const flow = names.flowByKey.get(nameKey(connection.flow));
    if (flow && !flows.includes(flow)) flows.push(flow);
  }
  return flows;
}

export function renderArchitectureModule(spec: LevelSpec, names: NameTable): string {
  const components = architectureComponents(spec, names);
  const lines: string[] = [
    GENERATED_HEADER,
    pyDocstring(`Architecture of the ${spec.name} model.`),
    "",
    "from fmdtools.define.architecture.function import FunctionArchitecture",
    "",
  ];
  for (const c of components) lines.push(`from .${c.module} import ${c.className}`);
  if (names.flows.length > 0) {
    lines.push(`from .${FLOWS_MODULE} import ${names.flows.map((f) => f.className).join(", ")}`);
  }

  lines.push(
    "",
    "",
    `class ${names.architectureClass}(FunctionArchitecture):`,
    `${INDENT}${pyDocstring(`Functions and flows of ${spec.name}.`)}`,
    "",
    `${INDENT}__slots__ = ()`,
    "",
    `${INDENT}def init_architecture(self, **kwargs):`,
  );

  const body: string[] = [];
  for (const flow of names.flows) {
    body.push(`self.add_flow(${pyString(flow.instance)}, ${flow.className})`);
  }
  for (const connection of spec.architecture.connections) {
    const from = names.componentByKey.get(nameKey(connection.from));
    const to = names.componentByKey.get(nameKey(connection.to));
    const flow = names.flowByKey.get(nameKey(connection.flow));
    if (from && to && flow) {
      body.push(`# Connection: ${from.className} -> ${to.className} via ${flow.className}`);
    }
  }
  for (const component of components) {
    const args = [pyString(component.instance), component.className];
    for (const flow of connectedFlows(spec, names, component)) args.push(pyString(flow.instance));
    body.push(`self.add_fxn(${args.join(", ")})`);
  }
  for (const line of body) lines.push(`${INDENT}${INDENT}${line}`);

  return toSource(lines);
}
