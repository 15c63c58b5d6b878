// src/vocabulary.ts — Domain vocabulary for the extraction engine
// Bare nouns and verbs that may seed entities when no cue phrase is present.

import type { ScalarValue } from "./types.js";

/** Component nouns → canonical component name. Matched on word boundaries, plural allowed. */
export const COMPONENT_NOUNS: Record<string, string> = {
  engine: "Engine",
  motor: "Motor",
  pump: "Pump",
  valve: "Valve",
  sensor: "Sensor",
  controller: "Controller",
  battery: "Battery",
  tank: "Tank",
  compressor: "Compressor",
  fan: "Fan",
  alternator: "Alternator",
  radiator: "Radiator",
  turbine: "Turbine",
  generator: "Generator",
  heater: "Heater",
  actuator: "Actuator",
};

/** Multi-word component phrases, checked before single nouns. */
export const COMPONENT_PHRASES: Array<{ pattern: RegExp; name: string }> = [
  { pattern: /\b(?:ac|air[\s-]+conditioning)\s+(?:system|unit)\b/i, name: "AcSystem" },
  { pattern: /\b(?:v6|v8|\d\s*cylinder)\s+engine\b/i, name: "Engine" },
];

/** Known state names with the default used when the user names a state without a value. */
export const STATE_DEFAULTS: Record<string, ScalarValue> = {
  temperature: 90.0,
  pressure: 100.0,
  rpm: 1800.0,
  speed: 1800.0,
  voltage: 12.0,
  current: 5.0,
  flow_rate: 10.0,
  power: 200.0,
  power_output: 200.0,
  efficiency: 0.85,
  displacement: 3500.0,
  capacity: 100.0,
  torque: 300.0,
  vibration: 0.1,
  accuracy: 0.95,
  noise: 0.01,
  position: 50.0,
  charge: 80.0,
  fuel: 50.0,
  fuel_level: 50.0,
  velocity: 0.0,
  humidity: 50.0,
};

/** Aliases folded into a canonical state name. */
export const STATE_ALIASES: Record<string, string> = {
  temp: "temperature",
  flowrate: "flow_rate",
  rate_of_flow: "flow_rate",
};

/** "<X> can <verb>" → fault name. */
export const FAULT_VERBS: Record<string, string> = {
  overheat: "overheating",
  leak: "leak",
  fail: "mechanical_failure",
  break: "breakage",
  malfunction: "malfunction",
  explode: "explosion",
  combust: "combustion",
  jam: "jam",
  stall: "stall",
  stick: "stuck",
  short: "short_circuit",
  corrode: "corrosion",
  crack: "crack",
  wear: "wear",
  drift: "drift",
  clog: "clog",
  seize: "seizure",
};

/** Words dropped from the front of a list item: articles and counts. */
export const LEADING_FILLERS = /^(?:a|an|the|some|one|two|three|four|five|several|multiple|many|\d+)\s+/i;

/** Fault names recognized when mentioned on their own, without a cue. */
export const FAULT_NOUNS: ReadonlySet<string> = new Set([
  ...Object.values(FAULT_VERBS),
  "bearing_wear",
  "blockage",
  "overload",
  "rupture",
  "fatigue",
  "contamination",
]);

/** Own keys only; "constructor" and friends are not vocabulary. */
export function lookup<T>(table: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}
