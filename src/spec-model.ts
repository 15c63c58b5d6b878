// src/spec-model.ts — Specification model constructors and lookups

import type {
  ComponentSpec,
  FlowSpec,
  LevelSpec,
  ReadinessPolicy,
  SimulationSpec,
} from "./types.js";
import { deriveArchitectureName, nameKey } from "./identifiers.js";
import { computeStatus, DEFAULT_READINESS } from "./readiness.js";
import {
  levelSpecInputSchema,
  zodIssuesToValidationIssues,
  type LevelSpecInput,
  type ParsedLevelSpec,
} from "./spec-schema.js";
import { SpecValidationError } from "./errors.js";

export const DEFAULT_SYSTEM_NAME = "fault_model";

export const DEFAULT_SIMULATION: SimulationSpec = {
  sampleRun: true,
  faultAnalysis: false,
  parameterStudy: false,
};

/** Empty spec a session starts from. */
export function createEmptySpec(
  name: string = DEFAULT_SYSTEM_NAME,
  simulation: Partial<SimulationSpec> = {},
): LevelSpec {
  return {
    name,
    description: "",
    components: [],
    flows: [],
    architecture: {
      name: deriveArchitectureName(name),
      components: [],
      connections: [],
    },
    simulation: { ...DEFAULT_SIMULATION, ...simulation },
    status: "GATHERING",
  };
}

/**
 * Build a LevelSpec for batch use. Shorthand is normalized; a missing
 * architecture lists every component. Throws SpecValidationError with every
 * schema issue when the input is malformed.
 */
export function createLevelSpec(
  input: LevelSpecInput,
  policy: ReadinessPolicy = DEFAULT_READINESS,
): LevelSpec {
  return parseLevelSpec(input, policy);
}

/** Same as createLevelSpec, for JSON whose shape is not known yet. */
export function parseLevelSpec(
  input: unknown,
  policy: ReadinessPolicy = DEFAULT_READINESS,
): LevelSpec {
  const parsed = levelSpecInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new SpecValidationError(zodIssuesToValidationIssues(parsed.error));
  }
  return fromParsed(parsed.data, policy);
}

function fromParsed(data: ParsedLevelSpec, policy: ReadinessPolicy): LevelSpec {
  const components: ComponentSpec[] = data.components.map((c) => ({
    name: c.name,
    description: c.description,
    states: c.states,
    faults: c.faults,
  }));
  const spec: LevelSpec = {
    name: data.name,
    description: data.description,
    components,
    flows: data.flows.map((f) => ({ name: f.name, description: f.description, variables: f.variables })),
    architecture: {
      name: data.architecture?.name ?? deriveArchitectureName(data.name),
      components: data.architecture?.components ?? components.map((c) => c.name),
      connections: data.architecture?.connections ?? [],
    },
    simulation: { ...DEFAULT_SIMULATION, ...data.simulation },
    status: "GATHERING",
  };
  spec.status = computeStatus(spec, policy);
  return spec;
}

// ─── Lookups ─────────────────────────────────────────────────────────────────

export function findComponent(spec: LevelSpec, name: string): ComponentSpec | undefined {
  const key = nameKey(name);
  return spec.components.find((c) => nameKey(c.name) === key);
}

export function findFlow(spec: LevelSpec, name: string): FlowSpec | undefined {
  const key = nameKey(name);
  return spec.flows.find((f) => nameKey(f.name) === key);
}

export function cloneSpec(spec: LevelSpec): LevelSpec {
  return structuredClone(spec);
}
