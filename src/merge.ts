// src/merge.ts — Apply extraction proposals to a copy of the spec
// First writer wins on conflicts, and nothing is added whose generated names would
// clash. The input spec is never touched; merging the same result twice changes
// nothing the second time.

import type {
  AmbiguityNote,
  Change,
  ChangeKind,
  ComponentSpec,
  ExtractionResult,
  LevelSpec,
  MergeConflict,
  MergeOutcome,
  ReadinessPolicy,
  ScalarValue,
  StateVariable,
} from "./types.js";
import { deriveArchitectureName, nameKey, toClassName, toLowerIdentifier } from "./identifiers.js";
import { nameClaims } from "./name-table.js";
import type { ClaimOwner, NameClaims } from "./name-table.js";
import { scalarKind } from "./python-syntax.js";
import { computeStatus, DEFAULT_READINESS, focusComponent } from "./readiness.js";
import { cloneSpec, DEFAULT_SYSTEM_NAME, findComponent, findFlow } from "./spec-model.js";

export interface MergeOptions {
  /** Component untargeted proposals attach to; defaults to the readiness focus. */
  focus?: string;
  policy?: ReadinessPolicy;
  /** A spec still carrying this name accepts a stated system name. */
  defaultName?: string;
}

interface Clash {
  what: string;
  value: string;
  label: string;
}

type WantedNames = Partial<Record<keyof NameClaims, string[]>>;

const NAMESPACES = [
  ["classes", "class name"],
  ["instances", "instance name"],
  ["modules", "module"],
] as const;

class MergeLog {
  readonly changes: Change[] = [];
  readonly conflicts: MergeConflict[] = [];
  readonly notes: AmbiguityNote[];

  constructor(notes: AmbiguityNote[]) {
    this.notes = [...notes];
  }
}

export function formatValue(value: ScalarValue): string {
  return typeof value === "string" ? JSON.stringify(value) : String(value);
}

/** First generated name in `wanted` that something other than `ignore` already holds. */
function findClash(spec: LevelSpec, wanted: WantedNames, ignore: readonly ClaimOwner[] = []): Clash | undefined {
  const claims = nameClaims(spec);
  for (const [namespace, what] of NAMESPACES) {
    for (const value of wanted[namespace] ?? []) {
      const holder = claims[namespace].find((c) => c.value && c.value === value && !ignore.includes(c.owner));
      if (holder) return { what, value, label: holder.label };
    }
  }
  return undefined;
}

// ─── Main Entry ──────────────────────────────────────────────────────────────

export function mergeExtraction(
  spec: LevelSpec,
  result: ExtractionResult,
  options: MergeOptions = {},
): MergeOutcome {
  const next = cloneSpec(spec);
  const log = new MergeLog(result.notes);
  const policy = options.policy ?? DEFAULT_READINESS;

  // Components first: a system name never displaces a component it would clash with.
  mergeComponents(next, result, log);

  if (result.systemName) {
    mergeSystemName(next, result.systemName, options.defaultName ?? DEFAULT_SYSTEM_NAME, log);
  }
  if (result.systemDescription && !next.description) {
    next.description = result.systemDescription;
    log.changes.push({ kind: "system-description", name: "description", value: result.systemDescription });
  }

  const explicitFocus = options.focus ? findComponent(next, options.focus) : undefined;
  const focus = explicitFocus ?? focusComponent(next, policy);

  mergeStates(next, result, focus, log);
  mergeFaults(next, result, focus, log);
  mergeFlows(next, result, log);
  mergeConnections(next, result, log);

  next.status = computeStatus(next, policy);
  return { spec: next, changes: log.changes, conflicts: log.conflicts, notes: log.notes };
}

// ─── System ──────────────────────────────────────────────────────────────────

function mergeSystemName(spec: LevelSpec, name: string, defaultName: string, log: MergeLog): void {
  if (spec.name === name) return;
  if (spec.name && spec.name !== defaultName) {
    log.conflicts.push({
      kind: "value-conflict",
      name: "name",
      message: `system name keeps "${spec.name}"; ignored "${name}"`,
    });
    return;
  }
  const derived = spec.architecture.name === deriveArchitectureName(spec.name);
  const classes = [toClassName(name)];
  if (derived) classes.push(toClassName(deriveArchitectureName(name)));
  const slug = toLowerIdentifier(name);
  const clash = findClash(
    spec,
    { classes, modules: slug ? [`level_${slug}`] : [] },
    derived ? ["level", "architecture"] : ["level"],
  );
  if (clash) {
    log.conflicts.push({
      kind: "name-collision",
      name: "name",
      message: `system name "${name}" would share ${clash.what} "${clash.value}" with ${clash.label}`,
    });
    return;
  }

  if (derived) spec.architecture.name = deriveArchitectureName(name);
  spec.name = name;
  log.changes.push({ kind: "system-name", name });
}

// ─── Components ──────────────────────────────────────────────────────────────

function mergeComponents(spec: LevelSpec, result: ExtractionResult, log: MergeLog): void {
  for (const proposal of result.components) {
    const existing = findComponent(spec, proposal.name);
    if (existing) {
      if (proposal.description && !existing.description) existing.description = proposal.description;
      continue;
    }

    const className = toClassName(proposal.name);
    const module = toLowerIdentifier(proposal.name);
    const clash = findClash(spec, {
      classes: [className, `${className}State`, `${className}Mode`],
      instances: [module],
      modules: [module],
    });
    if (clash) {
      log.conflicts.push({
        kind: "name-collision",
        name: proposal.name,
        message: `component "${proposal.name}" would share ${clash.what} "${clash.value}" with ${clash.label}`,
      });
      continue;
    }

    spec.components.push({
      name: proposal.name,
      description: proposal.description ?? "",
      states: [],
      faults: [],
    });
    const key = nameKey(proposal.name);
    if (!spec.architecture.components.some((n) => nameKey(n) === key)) {
      spec.architecture.components.push(proposal.name);
    }
    log.changes.push({ kind: "component-added", name: proposal.name });
  }
}

function resolveOwner(
  spec: LevelSpec,
  target: string | undefined,
  focus: ComponentSpec | undefined,
  what: string,
  log: MergeLog,
): ComponentSpec | undefined {
  const owner = target ? findComponent(spec, target) : focus;
  if (!owner) {
    log.conflicts.push({
      kind: "unresolved-reference",
      owner: target,
      name: what,
      message: target
        ? `${what} refers to unknown component "${target}"`
        : `${what} has no component to attach to`,
    });
  }
  return owner;
}

// ─── Variables ───────────────────────────────────────────────────────────────

function mergeVariable(
  variables: StateVariable[],
  owner: string,
  name: string,
  value: ScalarValue,
  explicit: boolean,
  added: ChangeKind,
  log: MergeLog,
): void {
  const key = nameKey(name);
  const existing = variables.find((v) => nameKey(v.name) === key);
  if (!existing) {
    variables.push({ name, default: value });
    log.changes.push({ kind: added, owner, name, value });
    return;
  }

  const oldKind = scalarKind(existing.default);
  const newKind = scalarKind(value);
  if (oldKind !== newKind) {
    log.conflicts.push({
      kind: "type-conflict",
      owner,
      name: existing.name,
      message: `${owner}.${existing.name} keeps ${formatValue(existing.default)} (${oldKind}); ignored ${formatValue(value)} (${newKind})`,
    });
    return;
  }
  if (!explicit || existing.default === value) return;

  log.conflicts.push({
    kind: "value-conflict",
    owner,
    name: existing.name,
    message: `${owner}.${existing.name} keeps ${formatValue(existing.default)}; ignored ${formatValue(value)}`,
  });
}

function mergeStates(
  spec: LevelSpec,
  result: ExtractionResult,
  focus: ComponentSpec | undefined,
  log: MergeLog,
): void {
  for (const proposal of result.states) {
    const owner = resolveOwner(spec, proposal.component, focus, `state "${proposal.name}"`, log);
    if (!owner) continue;
    mergeVariable(owner.states, owner.name, proposal.name, proposal.value, proposal.explicit, "state-added", log);
  }
}

// ─── Faults ──────────────────────────────────────────────────────────────────

function mergeFaults(
  spec: LevelSpec,
  result: ExtractionResult,
  focus: ComponentSpec | undefined,
  log: MergeLog,
): void {
  for (const proposal of result.faults) {
    const owner = resolveOwner(spec, proposal.component, focus, `fault "${proposal.name}"`, log);
    if (!owner) continue;

    const key = nameKey(proposal.name);
    const existing = owner.faults.find((f) => nameKey(f.name) === key);
    if (!existing) {
      owner.faults.push(proposal.rate !== undefined ? { name: proposal.name, rate: proposal.rate } : { name: proposal.name });
      log.changes.push({ kind: "fault-added", owner: owner.name, name: proposal.name, value: proposal.rate });
      continue;
    }
    if (proposal.rate === undefined || existing.rate === proposal.rate) continue;
    if (existing.rate === undefined) {
      existing.rate = proposal.rate;
      log.changes.push({ kind: "fault-updated", owner: owner.name, name: existing.name, value: proposal.rate });
      continue;
    }
    log.conflicts.push({
      kind: "rate-conflict",
      owner: owner.name,
      name: existing.name,
      message: `${owner.name}.${existing.name} keeps rate ${existing.rate}; ignored ${proposal.rate}`,
    });
  }
}

// ─── Flows & connections ─────────────────────────────────────────────────────

function mergeFlows(spec: LevelSpec, result: ExtractionResult, log: MergeLog): void {
  for (const proposal of result.flows) {
    let flow = findFlow(spec, proposal.name);
    if (!flow) {
      const className = toClassName(proposal.name);
      const clash = findClash(spec, {
        classes: [className, `${className}State`],
        instances: [toLowerIdentifier(proposal.name)],
      });
      if (clash) {
        log.conflicts.push({
          kind: "name-collision",
          name: proposal.name,
          message: `flow "${proposal.name}" would share ${clash.what} "${clash.value}" with ${clash.label}`,
        });
        continue;
      }
      flow = { name: proposal.name, description: proposal.description ?? "", variables: [] };
      spec.flows.push(flow);
      log.changes.push({ kind: "flow-added", name: proposal.name });
    } else if (proposal.description && !flow.description) {
      flow.description = proposal.description;
    }

    for (const variable of proposal.variables) {
      mergeVariable(flow.variables, flow.name, variable.name, variable.default, true, "flow-variable-added", log);
    }
  }
}

function mergeConnections(spec: LevelSpec, result: ExtractionResult, log: MergeLog): void {
  for (const proposal of result.connections) {
    const label = `${proposal.from} -> ${proposal.to} via ${proposal.flow}`;
    const from = findComponent(spec, proposal.from);
    const to = findComponent(spec, proposal.to);
    const flow = findFlow(spec, proposal.flow);
    const unknown = [
      from ? undefined : `component "${proposal.from}"`,
      to ? undefined : `component "${proposal.to}"`,
      flow ? undefined : `flow "${proposal.flow}"`,
    ].filter((u): u is string => u !== undefined);
    if (!from || !to || !flow) {
      log.conflicts.push({
        kind: "unresolved-reference",
        name: label,
        message: `connection ${label} refers to unknown ${unknown.join(", ")}`,
      });
      continue;
    }

    const duplicate = spec.architecture.connections.some(
      (c) => nameKey(c.from) === nameKey(from.name) && nameKey(c.to) === nameKey(to.name) && nameKey(c.flow) === nameKey(flow.name),
    );
    if (duplicate) continue;
    spec.architecture.connections.push({ from: from.name, to: to.name, flow: flow.name });
    log.changes.push({ kind: "connection-added", name: `${from.name} -> ${to.name}`, value: flow.name });
  }
}
