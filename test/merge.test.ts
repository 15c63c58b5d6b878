import { describe, it, expect } from "vitest";
import { extract } from "../src/extractor.js";
import { mergeExtraction } from "../src/merge.js";
import { createEmptySpec } from "../src/spec-model.js";
import type { ExtractionResult, LevelSpec } from "../src/types.js";

function proposals(partial: Partial<ExtractionResult>): ExtractionResult {
  return {
    intent: "describe",
    components: [],
    states: [],
    faults: [],
    flows: [],
    connections: [],
    notes: [],
    ...partial,
  };
}

function motorSpec(): LevelSpec {
  const spec = createEmptySpec("rig");
  spec.components.push({
    name: "Motor",
    description: "",
    states: [{ name: "temperature", default: 25 }],
    faults: [{ name: "wear" }, { name: "leak", rate: 0.01 }],
  });
  spec.architecture.components.push("Motor");
  spec.status = "READY";
  return spec;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

describe("mergeExtraction", () => {
  it("adds proposed entities and recomputes status", () => {
    const spec = createEmptySpec();
    const text = "components: Motor, Pump. Motor states: rpm: 1800. Pump faults: leak: 0.001";
    const { spec: next, changes } = mergeExtraction(spec, extract(text, spec));

    expect(next.components.map((c) => c.name)).toEqual(["Motor", "Pump"]);
    expect(next.architecture.components).toEqual(["Motor", "Pump"]);
    expect(next.components[0].states).toEqual([{ name: "rpm", default: 1800 }]);
    expect(next.components[1].faults).toEqual([{ name: "leak", rate: 0.001 }]);
    expect(next.status).toBe("READY");
    expect(changes.map((c) => c.kind)).toEqual(["component-added", "component-added", "state-added", "fault-added"]);
  });

  it("changes nothing when the same result is merged twice", () => {
    const spec = createEmptySpec();
    const result = extract("components: Motor, Pump. Motor states: rpm: 1800. Pump faults: leak: 0.001", spec);
    const first = mergeExtraction(spec, result);
    const second = mergeExtraction(first.spec, result);
    expect(second.changes).toEqual([]);
    expect(second.conflicts).toEqual([]);
    expect(second.spec).toEqual(first.spec);
  });

  it("never mutates the spec it is given", () => {
    const spec = deepFreeze(motorSpec());
    const before = JSON.stringify(spec);
    const outcome = mergeExtraction(
      spec,
      proposals({ states: [{ component: "Motor", name: "rpm", value: 900, explicit: true, confidence: 1, source: "cue" }] }),
    );
    expect(JSON.stringify(spec)).toBe(before);
    expect(outcome.spec.components[0].states).toHaveLength(2);
  });

  it("keeps the first value when a state changes type", () => {
    const outcome = mergeExtraction(
      motorSpec(),
      proposals({
        states: [{ component: "Motor", name: "temperature", value: "hot", explicit: true, confidence: 0.85, source: "assignment" }],
      }),
    );
    expect(outcome.changes).toEqual([]);
    expect(outcome.conflicts).toEqual([
      {
        kind: "type-conflict",
        owner: "Motor",
        name: "temperature",
        message: 'Motor.temperature keeps 25 (number); ignored "hot" (string)',
      },
    ]);
    expect(outcome.spec.components[0].states).toEqual([{ name: "temperature", default: 25 }]);
  });

  it("keeps the first value and reports a restated one", () => {
    const inferred = mergeExtraction(
      motorSpec(),
      proposals({ states: [{ component: "Motor", name: "temperature", value: 90, explicit: false, confidence: 0.5, source: "cue" }] }),
    );
    expect(inferred.changes).toEqual([]);
    expect(inferred.conflicts).toEqual([]);

    const stated = mergeExtraction(
      motorSpec(),
      proposals({ states: [{ component: "Motor", name: "temperature", value: 30, explicit: true, confidence: 0.85, source: "cue" }] }),
    );
    expect(stated.changes).toEqual([]);
    expect(stated.conflicts).toEqual([
      { kind: "value-conflict", owner: "Motor", name: "temperature", message: "Motor.temperature keeps 25; ignored 30" },
    ]);
    expect(stated.spec.components[0].states).toEqual([{ name: "temperature", default: 25 }]);
  });

  it("fills a missing fault rate but never replaces a set one", () => {
    const outcome = mergeExtraction(
      motorSpec(),
      proposals({
        faults: [
          { component: "Motor", name: "wear", rate: 0.002, confidence: 0.9, source: "cue" },
          { component: "Motor", name: "leak", rate: 0.05, confidence: 0.9, source: "cue" },
          { component: "Motor", name: "leak", confidence: 0.9, source: "cue" },
        ],
      }),
    );
    expect(outcome.changes).toEqual([{ kind: "fault-updated", owner: "Motor", name: "wear", value: 0.002 }]);
    expect(outcome.conflicts.map((c) => c.message)).toEqual(["Motor.leak keeps rate 0.01; ignored 0.05"]);
    expect(outcome.spec.components[0].faults).toEqual([
      { name: "wear", rate: 0.002 },
      { name: "leak", rate: 0.01 },
    ]);
  });

  it("attaches untargeted proposals to the focus component", () => {
    const spec = motorSpec();
    spec.components.push({ name: "Pump", description: "", states: [], faults: [] });
    spec.architecture.components.push("Pump");
    const untargeted = proposals({
      states: [{ name: "pressure", value: 100, explicit: true, confidence: 0.85, source: "assignment" }],
    });

    expect(mergeExtraction(spec, untargeted).spec.components[1].states).toEqual([{ name: "pressure", default: 100 }]);
    expect(mergeExtraction(spec, untargeted, { focus: "motor" }).spec.components[0].states).toEqual([
      { name: "temperature", default: 25 },
      { name: "pressure", default: 100 },
    ]);
  });

  it("reports references to unknown components and flows", () => {
    const outcome = mergeExtraction(
      motorSpec(),
      proposals({
        states: [{ component: "Ghost", name: "rpm", value: 1, explicit: true, confidence: 0.85, source: "cue" }],
        connections: [{ from: "Motor", to: "Motor", flow: "Signal", confidence: 0.8 }],
      }),
    );
    expect(outcome.conflicts.map((c) => c.message)).toEqual([
      'state "rpm" refers to unknown component "Ghost"',
      'connection Motor -> Motor via Signal refers to unknown flow "Signal"',
    ]);
  });

  it("accepts a system name once and keeps it afterwards", () => {
    const first = mergeExtraction(createEmptySpec(), proposals({ systemName: "rover" }));
    expect(first.spec.name).toBe("rover");
    expect(first.spec.architecture.name).toBe("RoverArchitecture");
    expect(first.changes).toEqual([{ kind: "system-name", name: "rover" }]);

    const second = mergeExtraction(first.spec, proposals({ systemName: "other" }));
    expect(second.spec.name).toBe("rover");
    expect(second.conflicts).toEqual([
      { kind: "value-conflict", name: "name", message: 'system name keeps "rover"; ignored "other"' },
    ]);
  });

  it("refuses a component whose class name a flow already has", () => {
    const spec = motorSpec();
    spec.flows.push({ name: "Power", description: "", variables: [] });
    const outcome = mergeExtraction(spec, proposals({ components: [{ name: "power", confidence: 0.9, source: "cue" }] }));
    expect(outcome.spec.components.map((c) => c.name)).toEqual(["Motor"]);
    expect(outcome.conflicts.map((c) => c.message)).toEqual([
      'component "power" would share class name "Power" with flow "Power"',
    ]);
  });

  it("refuses a component whose class name the level already has", () => {
    const spec = createEmptySpec("ac_system");
    const outcome = mergeExtraction(spec, proposals({ components: [{ name: "AcSystem", confidence: 0.6, source: "vocabulary" }] }));
    expect(outcome.spec.components).toEqual([]);
    expect(outcome.conflicts).toEqual([
      {
        kind: "name-collision",
        name: "AcSystem",
        message: 'component "AcSystem" would share class name "AcSystem" with level "ac_system"',
      },
    ]);
  });

  it("refuses components that would take an imported or derived class name", () => {
    const outcome = mergeExtraction(
      motorSpec(),
      proposals({
        components: [
          { name: "state", confidence: 0.9, source: "cue" },
          { name: "motor state", confidence: 0.9, source: "cue" },
        ],
      }),
    );
    expect(outcome.spec.components.map((c) => c.name)).toEqual(["Motor"]);
    expect(outcome.conflicts.map((c) => c.message)).toEqual([
      'component "state" would share class name "State" with the fmdtools class "State"',
      'component "motor state" would share class name "MotorState" with state class of component "Motor"',
    ]);
  });

  it("refuses a system name whose class a component already has", () => {
    const spec = createEmptySpec();
    spec.components.push({ name: "Motor", description: "", states: [], faults: [] });
    spec.architecture.components.push("Motor");

    const outcome = mergeExtraction(spec, proposals({ systemName: "motor" }));
    expect(outcome.spec.name).toBe("fault_model");
    expect(outcome.changes).toEqual([]);
    expect(outcome.conflicts).toEqual([
      {
        kind: "name-collision",
        name: "name",
        message: 'system name "motor" would share class name "Motor" with component "Motor"',
      },
    ]);
  });

  it("keeps a same-turn component and skips the system name it would clash with", () => {
    const outcome = mergeExtraction(
      createEmptySpec(),
      proposals({ systemName: "ac_system", components: [{ name: "AcSystem", confidence: 0.6, source: "vocabulary" }] }),
    );
    expect(outcome.spec.name).toBe("fault_model");
    expect(outcome.spec.components.map((c) => c.name)).toEqual(["AcSystem"]);
    expect(outcome.conflicts.map((c) => c.kind)).toEqual(["name-collision"]);
  });

  it("adds a connection once", () => {
    const spec = createEmptySpec();
    const result = extract("Battery sends power to Motor", spec);
    const first = mergeExtraction(spec, result);
    expect(first.spec.architecture.connections).toEqual([{ from: "Battery", to: "Motor", flow: "Power" }]);
    expect(first.changes.at(-1)).toEqual({ kind: "connection-added", name: "Battery -> Motor", value: "Power" });
    expect(mergeExtraction(first.spec, result).spec.architecture.connections).toHaveLength(1);
  });
});
