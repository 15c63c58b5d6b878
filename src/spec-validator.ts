// src/spec-validator.ts — Render-time validation
// Collects every issue in one pass; the renderer refuses to emit anything if any are found.

import type { LevelSpec, ReadinessPolicy, StateVariable, ValidationIssue } from "./types.js";
import { nameKey, toLowerIdentifier } from "./identifiers.js";
import { DEFAULT_READINESS, isComponentComplete } from "./readiness.js";
import { nameClaims } from "./name-table.js";

interface NamedEntry {
  label: string;
  value: string;
}

/** Report every pair of entries that end up with the same generated name. */
function checkUnique(entries: NamedEntry[], what: string, field: string, issues: ValidationIssue[]): void {
  const seen = new Map<string, NamedEntry>();
  for (const entry of entries) {
    if (!entry.value) continue;
    const first = seen.get(entry.value);
    if (first) {
      issues.push({
        field,
        message: `${first.label} and ${entry.label} both sanitize to ${what} "${entry.value}"`,
      });
    } else {
      seen.set(entry.value, entry);
    }
  }
}

function checkVariables(
  variables: StateVariable[],
  owner: string,
  field: string,
  issues: ValidationIssue[],
): void {
  const seen = new Set<string>();
  variables.forEach((v, i) => {
    const id = toLowerIdentifier(v.name);
    if (!id) {
      issues.push({ field: `${field}[${i}].name`, message: `${owner} has a variable name with no usable characters: "${v.name}"` });
      return;
    }
    if (seen.has(id)) issues.push({ field: `${field}[${i}].name`, message: `${owner} declares "${v.name}" more than once` });
    seen.add(id);
    if (typeof v.default === "number" && !Number.isFinite(v.default)) {
      issues.push({ field: `${field}[${i}].default`, message: `${owner}.${v.name} must be a finite number` });
    }
  });
}

export function validateLevelSpec(
  spec: LevelSpec,
  policy: ReadinessPolicy = DEFAULT_READINESS,
): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  // ─── Required fields ───
  if (!spec.name.trim()) {
    issues.push({ field: "name", message: "system name is required" });
  } else if (!toLowerIdentifier(spec.name)) {
    issues.push({ field: "name", message: `system name "${spec.name}" has no usable characters` });
  }
  if (!toLowerIdentifier(spec.architecture.name)) {
    issues.push({ field: "architecture.name", message: `architecture name "${spec.architecture.name}" has no usable characters` });
  }
  if (spec.components.length === 0) {
    issues.push({ field: "components", message: "at least one component is required" });
  }

  // ─── Components ───
  spec.components.forEach((component, i) => {
    const field = `components[${i}]`;
    if (!toLowerIdentifier(component.name)) {
      issues.push({ field: `${field}.name`, message: `component name "${component.name}" has no usable characters` });
      return;
    }
    if (!isComponentComplete(component, policy)) {
      const needs = policy === "states-and-faults" ? "states and faults" : "at least one state or fault";
      issues.push({ field, message: `${component.name} needs ${needs}` });
    }
    checkVariables(component.states, component.name, `${field}.states`, issues);

    const faults = new Set<string>();
    component.faults.forEach((fault, j) => {
      const id = toLowerIdentifier(fault.name);
      const faultField = `${field}.faults[${j}]`;
      if (!id) {
        issues.push({ field: `${faultField}.name`, message: `${component.name} has a fault name with no usable characters: "${fault.name}"` });
        return;
      }
      if (faults.has(id)) issues.push({ field: `${faultField}.name`, message: `${component.name} declares fault "${fault.name}" more than once` });
      faults.add(id);
      if (fault.rate !== undefined && !(Number.isFinite(fault.rate) && fault.rate >= 0)) {
        issues.push({ field: `${faultField}.rate`, message: `${component.name}.${fault.name} rate must be a finite, non-negative number` });
      }
    });
  });

  // ─── Flows ───
  spec.flows.forEach((flow, i) => {
    if (!toLowerIdentifier(flow.name)) {
      issues.push({ field: `flows[${i}].name`, message: `flow name "${flow.name}" has no usable characters` });
      return;
    }
    checkVariables(flow.variables, flow.name, `flows[${i}].variables`, issues);
  });

  // ─── Generated names ───
  const claims = nameClaims(spec);
  checkUnique(claims.classes, "class name", "names", issues);
  checkUnique(claims.instances, "instance name", "names", issues);
  checkUnique(claims.modules, "module", "names", issues);

  // ─── Architecture ───
  const componentKeys = new Set(spec.components.map((c) => nameKey(c.name)));
  const flowKeys = new Set(spec.flows.map((f) => nameKey(f.name)));
  const listed = new Set<string>();
  spec.architecture.components.forEach((name, i) => {
    const key = nameKey(name);
    if (!componentKeys.has(key)) {
      issues.push({ field: `architecture.components[${i}]`, message: `unknown component "${name}"` });
    } else if (listed.has(key)) {
      issues.push({ field: `architecture.components[${i}]`, message: `component "${name}" is listed more than once` });
    }
    listed.add(key);
  });
  for (const component of spec.components) {
    const key = nameKey(component.name);
    if (key && !listed.has(key)) {
      issues.push({ field: "architecture.components", message: `component "${component.name}" is missing from the architecture` });
    }
  }
  spec.architecture.connections.forEach((connection, i) => {
    const field = `architecture.connections[${i}]`;
    if (!componentKeys.has(nameKey(connection.from))) {
      issues.push({ field: `${field}.from`, message: `unknown component "${connection.from}"` });
    }
    if (!componentKeys.has(nameKey(connection.to))) {
      issues.push({ field: `${field}.to`, message: `unknown component "${connection.to}"` });
    }
    if (!flowKeys.has(nameKey(connection.flow))) {
      issues.push({ field: `${field}.flow`, message: `unknown flow "${connection.flow}"` });
    }
  });

  return issues;
}
