import { describe, it, expect } from "vitest";
import { detectIntent, extract, parseValue, splitClauses, splitList } from "../src/extractor.js";
import { createEmptySpec } from "../src/spec-model.js";
import type { LevelSpec } from "../src/types.js";

function specWith(...components: string[]): LevelSpec {
  const spec = createEmptySpec();
  for (const name of components) {
    spec.components.push({ name, description: "", states: [], faults: [] });
    spec.architecture.components.push(name);
  }
  return spec;
}

describe("detectIntent", () => {
  it("recognizes whole-utterance commands", () => {
    expect(detectIntent("generate")).toBe("generate");
    expect(detectIntent("Generate the files.")).toBe("generate");
    expect(detectIntent("render")).toBe("generate");
    expect(detectIntent("status?")).toBe("status");
    expect(detectIntent("help")).toBe("help");
    expect(detectIntent("?")).toBe("help");
  });

  it("treats commands inside a description as description", () => {
    expect(detectIntent("generate a pump model")).toBe("describe");
    expect(detectIntent("what is the status of the pump")).toBe("describe");
  });

  it("returns no proposals for a command", () => {
    const result = extract("generate", specWith("Motor"));
    expect(result.intent).toBe("generate");
    expect(result.components).toEqual([]);
    expect(result.notes).toEqual([]);
  });
});

describe("splitClauses / splitList", () => {
  it("splits sentences but not decimals", () => {
    expect(splitClauses("Sensor states: accuracy: 0.95. Sensor faults: drift")).toEqual([
      "Sensor states: accuracy: 0.95",
      "Sensor faults: drift",
    ]);
  });

  it("splits a comma before a new cue keyword", () => {
    expect(splitClauses("components: Motor, faults: overheating")).toEqual([
      "components: Motor",
      "faults: overheating",
    ]);
  });

  it("drops articles, counts and a trailing etc", () => {
    expect(splitList("a pump, two valves etc.")).toEqual(["pump", "valves"]);
    expect(splitList("rpm and temperature & pressure")).toEqual(["rpm", "temperature", "pressure"]);
  });

  it("splits on a spaced slash but keeps a unit whole", () => {
    expect(splitList("rpm / temperature")).toEqual(["rpm", "temperature"]);
    expect(splitList("speed: 60 km/h")).toEqual(["speed: 60 km/h"]);
  });
});

describe("parseValue", () => {
  it("parses numbers, ranges and booleans", () => {
    expect(parseValue("3,500")).toBe(3500);
    expect(parseValue("90 C")).toBe(90);
    expect(parseValue("80-120C")).toBe(100);
    expect(parseValue("-5")).toBe(-5);
    expect(parseValue("1e-5")).toBe(0.00001);
    expect(parseValue("yes")).toBe(true);
    expect(parseValue("Off")).toBe(false);
  });

  it("keeps other text as a string", () => {
    expect(parseValue('"hot"')).toBe("hot");
    expect(parseValue("'idle'")).toBe("idle");
    expect(parseValue("fast")).toBe("fast");
    expect(parseValue("   ")).toBeUndefined();
  });
});

describe("extract: components", () => {
  it("proposes each item of a component list", () => {
    const result = extract("components: AcSystem, Engine", createEmptySpec());
    expect(result.components).toEqual([
      { name: "AcSystem", confidence: 0.9, source: "cue" },
      { name: "Engine", confidence: 0.9, source: "cue" },
    ]);
    expect(result.notes).toEqual([
      { kind: "split", message: 'Split "AcSystem, Engine" into 2 separate items', fragment: "AcSystem, Engine" },
    ]);
  });

  it("rejects names with no usable characters and keeps the rest", () => {
    const result = extract("components: @@, Pump", createEmptySpec());
    expect(result.components.map((c) => c.name)).toEqual(["Pump"]);
    expect(result.notes.map((n) => n.kind)).toEqual(["split", "rejected-name"]);
    expect(result.notes[1].message).toBe('Component name "@@" has no usable characters');
  });

  it("maps a repeated or plural name onto the existing component", () => {
    const again = extract("components: pumps", specWith("Pump"));
    expect(again.components).toEqual([]);
    expect(again.notes).toEqual([{ kind: "duplicate", message: "Pump is already a component", fragment: "pumps" }]);

    const plural = extract("components: widgets", specWith("Widget"));
    expect(plural.components).toEqual([]);
    expect(plural.notes[0].message).toBe('Treated "widgets" as the existing component Widget');
  });

  it("finds vocabulary nouns in free text", () => {
    const result = extract("I want to model a pump system", createEmptySpec());
    expect(result.systemName).toBe("pump_system");
    expect(result.components).toEqual([{ name: "Pump", confidence: 0.6, source: "vocabulary" }]);
  });

  it("finds component phrases among the things a subject has", () => {
    const result = extract("I want to model an AC system with a V6 engine", createEmptySpec());
    expect(result.systemName).toBe("ac_system");
    expect(result.components).toEqual([
      { name: "AcSystem", confidence: 0.6, source: "vocabulary" },
      { name: "Engine", confidence: 0.6, source: "vocabulary" },
    ]);
    expect(result.notes).toEqual([]);
  });
});

describe("extract: states", () => {
  it("attaches possessed assignments to the subject", () => {
    const result = extract("The motor has rpm: 1800 and temperature: 25", createEmptySpec());
    expect(result.components).toEqual([{ name: "Motor", confidence: 0.6, source: "vocabulary" }]);
    expect(result.states).toEqual([
      { component: "Motor", name: "rpm", value: 1800, explicit: true, confidence: 0.85, source: "assignment" },
      { component: "Motor", name: "temperature", value: 25, explicit: true, confidence: 0.85, source: "assignment" },
    ]);
  });

  it("gives a bare state under a cue its vocabulary default", () => {
    const result = extract("Pump states: pressure", createEmptySpec());
    expect(result.states).toEqual([
      { component: "Pump", name: "pressure", value: 100, explicit: false, confidence: 0.5, source: "cue" },
    ]);
  });

  it("attaches to the first of several subjects and says so", () => {
    const clause = "The motor and the pump have temperature: 80";
    const result = extract(clause, createEmptySpec());
    expect(result.states.map((s) => [s.component, s.name, s.value])).toEqual([["Motor", "temperature", 80]]);
    expect(result.notes).toEqual([
      { kind: "ambiguous-target", message: `"${clause}" mentions Motor, Pump; attached to Motor`, fragment: clause },
    ]);
  });

  it("leaves an untargeted assignment for the focus component", () => {
    const result = extract("temp = 40", specWith("Motor"));
    expect(result.states).toEqual([
      { component: undefined, name: "temperature", value: 40, explicit: true, confidence: 0.85, source: "assignment" },
    ]);
  });

  it("drops states given before any component exists", () => {
    const result = extract("temperature: 25", createEmptySpec());
    expect(result.states).toEqual([]);
    expect(result.notes).toEqual([
      { kind: "unattached", message: "Ignored 1 state(s) and 0 fault(s) given before any component was named" },
    ]);
  });

  it("keeps a unit with a slash inside one value", () => {
    const result = extract("Motor states: speed: 60 km/h", createEmptySpec());
    expect(result.states).toEqual([
      { component: "Motor", name: "speed", value: 60, explicit: true, confidence: 0.85, source: "cue" },
    ]);
  });

  it("keeps decimal values across sentences", () => {
    const result = extract("Sensor states: accuracy: 0.95. Sensor faults: drift", createEmptySpec());
    expect(result.components.map((c) => c.name)).toEqual(["Sensor"]);
    expect(result.states.map((s) => [s.component, s.name, s.value])).toEqual([["Sensor", "accuracy", 0.95]]);
    expect(result.faults.map((f) => [f.component, f.name])).toEqual([["Sensor", "drift"]]);
  });
});

describe("extract: faults", () => {
  it("reads rates and multi-word fault names", () => {
    const result = extract("Motor faults: overheating: 1e-5, bearing wear", createEmptySpec());
    expect(result.faults).toEqual([
      { component: "Motor", name: "overheating", rate: 0.00001, confidence: 0.9, source: "cue" },
      { component: "Motor", name: "bearing_wear", confidence: 0.9, source: "cue" },
    ]);
    expect(result.notes.map((n) => n.kind)).toEqual(["split"]);
  });

  it("maps capability verbs to fault names", () => {
    const result = extract("The motor can overheat and stall", createEmptySpec());
    expect(result.faults.map((f) => [f.component, f.name])).toEqual([
      ["Motor", "overheating"],
      ["Motor", "stall"],
    ]);
  });

  it("reads a parenthesized rate", () => {
    const result = extract("Valve faults: stuck (rate 0.002)", specWith("Valve"));
    expect(result.faults).toEqual([
      { component: "Valve", name: "stuck", rate: 0.002, confidence: 0.9, source: "cue" },
    ]);
  });
});

describe("extract: bare mentions", () => {
  it("reads a list of known state names as untargeted states", () => {
    const result = extract("rpm, temperature, torque", specWith("Motor"));
    expect(result.states).toEqual([
      { component: undefined, name: "rpm", value: 1800, explicit: false, confidence: 0.5, source: "vocabulary" },
      { component: undefined, name: "temperature", value: 90, explicit: false, confidence: 0.5, source: "vocabulary" },
      { component: undefined, name: "torque", value: 300, explicit: false, confidence: 0.5, source: "vocabulary" },
    ]);
    expect(result.notes).toEqual([]);
  });

  it("reads known fault names on their own", () => {
    const result = extract("overheating and stall", specWith("Motor"));
    expect(result.faults).toEqual([
      { component: undefined, name: "overheating", confidence: 0.6, source: "vocabulary" },
      { component: undefined, name: "stall", confidence: 0.6, source: "vocabulary" },
    ]);
  });

  it("targets a named component and notes an item it cannot place", () => {
    const result = extract("Pump pressure, wobble", specWith("Pump"));
    expect(result.states).toEqual([
      { component: "Pump", name: "pressure", value: 100, explicit: false, confidence: 0.5, source: "vocabulary" },
    ]);
    expect(result.notes).toEqual([{ kind: "discarded", message: 'Could not understand "wobble"', fragment: "wobble" }]);
  });

  it("does not mistake inherited object keys for vocabulary", () => {
    const result = extract("constructor, toString", specWith("Motor"));
    expect(result.states).toEqual([]);
    expect(result.components).toEqual([]);
  });
});

describe("extract: flows and connections", () => {
  it("proposes both endpoints, the flow and the connection", () => {
    const result = extract("Battery sends power to Motor", createEmptySpec());
    expect(result.components.map((c) => [c.name, c.source])).toEqual([
      ["Battery", "reference"],
      ["Motor", "reference"],
    ]);
    expect(result.flows).toEqual([{ name: "Power", variables: [], confidence: 0.9 }]);
    expect(result.connections).toEqual([{ from: "Battery", to: "Motor", flow: "Power", confidence: 0.8 }]);
  });

  it("reads flow variables", () => {
    const result = extract("flow Power carries voltage: 12 and current", createEmptySpec());
    expect(result.flows).toEqual([
      {
        name: "Power",
        variables: [
          { name: "voltage", default: 12 },
          { name: "current", default: 5 },
        ],
        confidence: 0.9,
      },
    ]);
  });
});

describe("extract: system details and leftovers", () => {
  it("reads a stated system name and description", () => {
    expect(extract("system name: Rover Nav", createEmptySpec()).systemName).toBe("rover_nav");
    expect(extract("description: Drives the rover", createEmptySpec()).systemDescription).toBe(
      "Drives the rover",
    );
  });

  it("notes a clause it could not understand", () => {
    const result = extract("hello there", createEmptySpec());
    expect(result.notes).toEqual([
      { kind: "discarded", message: 'Could not understand "hello there"', fragment: "hello there" },
    ]);
  });

  it("returns the same result for the same input", () => {
    const spec = specWith("Motor");
    const text = "Motor faults: overheating, stall. Pump states: pressure: 120";
    expect(extract(text, spec)).toEqual(extract(text, spec));
  });
});
