// src/name-table.ts — One source of truth for every generated identifier
// Each artifact looks names up here, so an entity is spelled the same in every file.

import type { LevelSpec } from "./types.js";
import { nameKey, toClassName, toLowerIdentifier } from "./identifiers.js";

export interface ComponentNames {
  name: string;
  module: string;
  className: string;
  stateClass: string;
  modeClass: string;
  instance: string;
}

export interface FlowNames {
  name: string;
  className: string;
  stateClass: string;
  instance: string;
}

export interface NameTable {
  outputDir: string;
  levelModule: string;
  levelClass: string;
  architectureClass: string;
  components: ComponentNames[];
  flows: FlowNames[];
  componentByKey: Map<string, ComponentNames>;
  flowByKey: Map<string, FlowNames>;
}

export const FLOWS_MODULE = "flows";
export const ARCHITECTURE_MODULE = "architecture";
export const INIT_MODULE = "__init__";

export function buildNameTable(spec: LevelSpec): NameTable {
  const slug = toLowerIdentifier(spec.name);
  const components = spec.components.map((c): ComponentNames => {
    const className = toClassName(c.name);
    const module = toLowerIdentifier(c.name);
    return {
      name: c.name,
      module,
      className,
      stateClass: `${className}State`,
      modeClass: `${className}Mode`,
      instance: module,
    };
  });
  const flows = spec.flows.map((f): FlowNames => {
    const className = toClassName(f.name);
    return {
      name: f.name,
      className,
      stateClass: `${className}State`,
      instance: toLowerIdentifier(f.name),
    };
  });

  const componentByKey = new Map<string, ComponentNames>();
  for (const c of components) if (!componentByKey.has(nameKey(c.name))) componentByKey.set(nameKey(c.name), c);
  const flowByKey = new Map<string, FlowNames>();
  for (const f of flows) if (!flowByKey.has(nameKey(f.name))) flowByKey.set(nameKey(f.name), f);

  return {
    outputDir: slug,
    levelModule: `level_${slug}`,
    levelClass: toClassName(spec.name),
    architectureClass: toClassName(spec.architecture.name),
    components,
    flows,
    componentByKey,
    flowByKey,
  };
}

// ─── Claims ──────────────────────────────────────────────────────────────────

/** Classes the generated modules import from fmdtools. */
export const FRAMEWORK_CLASSES = [
  "State",
  "Mode",
  "Function",
  "Flow",
  "FunctionArchitecture",
  "FaultDomain",
  "FaultSample",
] as const;

export type ClaimOwner = "framework" | "component" | "flow" | "architecture" | "level";

export interface ClaimedName {
  label: string;
  value: string;
  owner: ClaimOwner;
}

/** Every generated name a spec occupies, grouped by the namespace it lives in. */
export interface NameClaims {
  classes: ClaimedName[];
  instances: ClaimedName[];
  modules: ClaimedName[];
}

export function nameClaims(spec: LevelSpec, names: NameTable = buildNameTable(spec)): NameClaims {
  const classes: ClaimedName[] = [
    ...FRAMEWORK_CLASSES.map((value): ClaimedName => ({ label: `the fmdtools class "${value}"`, value, owner: "framework" })),
    ...names.components.flatMap((c): ClaimedName[] => [
      { label: `component "${c.name}"`, value: c.className, owner: "component" },
      { label: `state class of component "${c.name}"`, value: c.stateClass, owner: "component" },
      { label: `mode class of component "${c.name}"`, value: c.modeClass, owner: "component" },
    ]),
    ...names.flows.flatMap((f): ClaimedName[] => [
      { label: `flow "${f.name}"`, value: f.className, owner: "flow" },
      { label: `state class of flow "${f.name}"`, value: f.stateClass, owner: "flow" },
    ]),
    { label: `architecture "${spec.architecture.name}"`, value: names.architectureClass, owner: "architecture" },
    { label: `level "${spec.name}"`, value: names.levelClass, owner: "level" },
  ];
  const instances: ClaimedName[] = [
    ...names.components.map((c): ClaimedName => ({ label: `component "${c.name}"`, value: c.instance, owner: "component" })),
    ...names.flows.map((f): ClaimedName => ({ label: `flow "${f.name}"`, value: f.instance, owner: "flow" })),
  ];
  const modules: ClaimedName[] = [
    { label: "the flows module", value: FLOWS_MODULE, owner: "framework" },
    { label: "the architecture module", value: ARCHITECTURE_MODULE, owner: "framework" },
    { label: "the package init module", value: INIT_MODULE, owner: "framework" },
    { label: `the level module of "${spec.name}"`, value: names.outputDir ? names.levelModule : "", owner: "level" },
    ...names.components.map((c): ClaimedName => ({ label: `component "${c.name}"`, value: c.module, owner: "component" })),
  ];
  return { classes, instances, modules };
}
