import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadPrefill, prefillProposals } from "../src/prefill.js";
import { createSession } from "../src/dialog-controller.js";
import type { Warning } from "../src/types.js";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "fault-model-prefill-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

function writeJson(name: string, value: unknown): string {
  const path = join(dir, name);
  writeFileSync(path, JSON.stringify(value));
  return path;
}

describe("loadPrefill", () => {
  it("loads a partial spec without a name", () => {
    const warnings: Warning[] = [];
    const partial = loadPrefill(writeJson("diagram.json", { components: [{ name: "Pump" }] }), warnings);
    expect(warnings).toEqual([]);
    expect(partial?.name).toBeUndefined();
    expect(partial?.components).toEqual([{ name: "Pump", description: "", states: [], faults: [] }]);
  });

  it("turns a missing file into a warning", () => {
    const warnings: Warning[] = [];
    const path = join(dir, "missing.json");
    expect(loadPrefill(path, warnings)).toBeNull();
    expect(warnings).toEqual([
      { level: "error", module: "prefill", message: `Pre-fill file not found: ${path}`, file: path },
    ]);
  });

  it("turns schema problems into warnings", () => {
    const warnings: Warning[] = [];
    const path = writeJson("bad.json", { components: [{ name: "" }] });
    expect(loadPrefill(path, warnings)).toBeNull();
    expect(warnings).toEqual([
      { level: "error", module: "prefill", message: "components.0.name: component name is required", file: path },
    ]);
  });

  it("turns malformed JSON into a warning", () => {
    const warnings: Warning[] = [];
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ not json");
    expect(loadPrefill(path, warnings)).toBeNull();
    expect(warnings).toHaveLength(1);
    expect(warnings[0].message.startsWith(`Failed to parse ${path}: `)).toBe(true);
  });
});

describe("prefill", () => {
  it("proposes everything as explicit and fully confident", () => {
    const proposals = prefillProposals({
      name: "Test Rig",
      description: "",
      components: [{ name: "Pump", description: "", states: [{ name: "pressure", default: 100 }], faults: [{ name: "leak" }] }],
      flows: [],
      architecture: { connections: [{ from: "Pump", to: "Pump", flow: "Water" }] },
    });
    expect(proposals.systemName).toBe("test_rig");
    expect(proposals.systemDescription).toBeUndefined();
    expect(proposals.states).toEqual([
      { component: "Pump", name: "pressure", value: 100, explicit: true, confidence: 1, source: "prefill" },
    ]);
    expect(proposals.connections).toEqual([{ from: "Pump", to: "Pump", flow: "Water", confidence: 1 }]);
  });

  it("goes through the same merge as a conversation turn", () => {
    const path = writeJson("rig.json", {
      name: "Rig",
      components: [{ name: "Pump", states: { pressure: 100 }, faults: ["leak"] }],
      simulation: { faultAnalysis: true },
    });
    const partial = loadPrefill(path);
    if (!partial) throw new Error("prefill did not load");

    const session = createSession();
    const turn = session.prefill(partial);
    expect(turn.status).toBe("READY");
    expect(turn.acknowledgment.split("\n")).toEqual([
      "+ system name: rig",
      "+ components: Pump",
      "+ Pump states: pressure=100",
      "+ Pump faults: leak",
      'Ready to generate. Say "generate" when you are done, or keep adding detail.',
    ]);
    expect(session.snapshot().simulation).toEqual({ sampleRun: true, faultAnalysis: true, parameterStudy: false });

    const later = session.advance("Pump states: pressure: 140");
    expect(later.changes).toEqual([]);
    expect(later.acknowledgment).toBe("! conflict: Pump.pressure keeps 100; ignored 140");
    expect(session.snapshot().components[0].states).toEqual([{ name: "pressure", default: 100 }]);
  });
});
