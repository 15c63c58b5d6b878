// src/readiness.ts — Completeness predicate and focus selection

import type { ComponentSpec, LevelSpec, ReadinessPolicy, SpecStatus } from "./types.js";

export const DEFAULT_READINESS: ReadinessPolicy = "states-or-faults";

export function isComponentComplete(
  component: ComponentSpec,
  policy: ReadinessPolicy = DEFAULT_READINESS,
): boolean {
  const hasStates = component.states.length > 0;
  const hasFaults = component.faults.length > 0;
  return policy === "states-and-faults" ? hasStates && hasFaults : hasStates || hasFaults;
}

export function isReady(spec: LevelSpec, policy: ReadinessPolicy = DEFAULT_READINESS): boolean {
  return spec.components.length > 0 && spec.components.every((c) => isComponentComplete(c, policy));
}

export function computeStatus(spec: LevelSpec, policy: ReadinessPolicy = DEFAULT_READINESS): SpecStatus {
  return isReady(spec, policy) ? "READY" : "GATHERING";
}

/** Human-readable list of what stands between the spec and READY. Empty when ready. */
export function findMissing(spec: LevelSpec, policy: ReadinessPolicy = DEFAULT_READINESS): string[] {
  if (spec.components.length === 0) return ["at least one component"];
  const missing: string[] = [];
  for (const component of spec.components) {
    if (isComponentComplete(component, policy)) continue;
    if (policy === "states-or-faults") {
      missing.push(`states or faults for ${component.name}`);
      continue;
    }
    if (component.states.length === 0) missing.push(`states for ${component.name}`);
    if (component.faults.length === 0) missing.push(`faults for ${component.name}`);
  }
  return missing;
}

/**
 * The component follow-up questions are about and untargeted proposals attach to:
 * the most recently added incomplete component, else the most recently added one.
 */
export function focusComponent(
  spec: LevelSpec,
  policy: ReadinessPolicy = DEFAULT_READINESS,
): ComponentSpec | undefined {
  for (let i = spec.components.length - 1; i >= 0; i--) {
    if (!isComponentComplete(spec.components[i], policy)) return spec.components[i];
  }
  return spec.components[spec.components.length - 1];
}
