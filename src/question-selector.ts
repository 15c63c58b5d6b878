// src/question-selector.ts — Follow-up question policy
// Fixed priority: components → focus states → focus faults → architecture → system name.

import type { LevelSpec, ReadinessPolicy } from "./types.js";
import { DEFAULT_READINESS, focusComponent, isReady } from "./readiness.js";
import { DEFAULT_SYSTEM_NAME, findComponent } from "./spec-model.js";

export const MAX_QUESTIONS = 3;

export interface QuestionOptions {
  policy?: ReadinessPolicy;
  maxQuestions?: number;
  focus?: string;
  defaultName?: string;
}

type ComponentFamily = "engine" | "pump" | "valve" | "sensor" | "electrical" | "climate" | "generic";

const FAMILY_KEYWORDS: Array<[ComponentFamily, string[]]> = [
  ["climate", ["ac", "hvac", "climate", "heater", "radiator", "fan", "cooler"]],
  ["engine", ["engine", "motor", "turbine"]],
  ["pump", ["pump", "compressor"]],
  ["valve", ["valve", "actuator"]],
  ["sensor", ["sensor", "gps", "imu", "camera", "lidar"]],
  ["electrical", ["battery", "generator", "alternator", "power"]],
];

const STATE_EXAMPLES: Record<ComponentFamily, string> = {
  engine: "rpm, temperature, torque",
  pump: "flow_rate, pressure",
  valve: "position, flow_rate",
  sensor: "accuracy, noise",
  electrical: "voltage, charge",
  climate: "temperature, humidity",
  generic: "temperature: 90",
};

const FAULT_EXAMPLES: Record<ComponentFamily, string> = {
  engine: "overheating, stall",
  pump: "leak, clog",
  valve: "stuck, leak",
  sensor: "drift, mechanical_failure",
  electrical: "short_circuit, corrosion",
  climate: "leak, mechanical_failure",
  generic: "wear: 0.001",
};

function familyOf(componentName: string): ComponentFamily {
  const words = componentName
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .toLowerCase()
    .split(/[^a-z0-9]+/);
  for (const [family, keywords] of FAMILY_KEYWORDS) {
    if (keywords.some((k) => words.includes(k))) return family;
  }
  return "generic";
}

/** Clamp a requested question count into 1..3. */
export function clampQuestions(n: number): number {
  if (!Number.isFinite(n)) return MAX_QUESTIONS;
  return Math.min(MAX_QUESTIONS, Math.max(1, Math.floor(n)));
}

export function stateQuestion(componentName: string): string {
  return `What state variables should ${componentName} track (e.g. ${STATE_EXAMPLES[familyOf(componentName)]})?`;
}

export function faultQuestion(componentName: string): string {
  return `How can ${componentName} fail (e.g. ${FAULT_EXAMPLES[familyOf(componentName)]})?`;
}

/**
 * Up to maxQuestions follow-ups for a gathering spec; none once it is ready.
 * Questions whose answer is already in the spec are never asked.
 */
export function selectQuestions(spec: LevelSpec, options: QuestionOptions = {}): string[] {
  const policy = options.policy ?? DEFAULT_READINESS;
  if (isReady(spec, policy)) return [];

  const max = clampQuestions(options.maxQuestions ?? MAX_QUESTIONS);
  const questions: string[] = [];

  if (spec.components.length === 0) {
    questions.push("What components make up the system (e.g. motor, pump, sensor)?");
  } else {
    const explicit = options.focus ? findComponent(spec, options.focus) : undefined;
    const focus = explicit ?? focusComponent(spec, policy);
    if (focus && focus.states.length === 0) questions.push(stateQuestion(focus.name));
    if (focus && focus.faults.length === 0) questions.push(faultQuestion(focus.name));

    if (spec.components.length >= 2) {
      if (spec.flows.length === 0) {
        questions.push("What flows pass between the components (e.g. electricity, fuel, signal)?");
      } else if (spec.architecture.connections.length === 0) {
        const [a, b] = spec.components;
        questions.push(
          `How are the components connected (e.g. "${a.name} sends ${spec.flows[0].name} to ${b.name}")?`,
        );
      }
    }
  }

  const defaultName = options.defaultName ?? DEFAULT_SYSTEM_NAME;
  if (!spec.name || spec.name === defaultName) {
    questions.push("What should the system be called?");
  }

  return questions.slice(0, max);
}
