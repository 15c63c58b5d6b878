import { describe, it, expect } from "vitest";
import { formatAcknowledgment, NOTHING_UNDERSTOOD } from "../src/acknowledgment.js";

describe("formatAcknowledgment", () => {
  it("groups changes by kind and owner", () => {
    const text = formatAcknowledgment(
      [
        { kind: "component-added", name: "Motor" },
        { kind: "component-added", name: "Pump" },
        { kind: "state-added", owner: "Motor", name: "rpm", value: 1800 },
        { kind: "state-added", owner: "Motor", name: "label", value: "main" },
        { kind: "fault-added", owner: "Motor", name: "overheating", value: 0.00001 },
        { kind: "fault-added", owner: "Motor", name: "wear" },
        { kind: "fault-updated", owner: "Pump", name: "clog", value: 0.02 },
        { kind: "flow-added", name: "Power" },
        { kind: "connection-added", name: "Battery -> Motor", value: "Power" },
      ],
      [{ kind: "rate-conflict", owner: "Pump", name: "leak", message: "Pump.leak keeps rate 0.01; ignored 0.05" }],
      [{ kind: "split", message: 'Split "Motor, Pump" into 2 separate items' }],
    );
    expect(text.split("\n")).toEqual([
      "+ components: Motor, Pump",
      '+ Motor states: rpm=1800, label="main"',
      "+ Motor faults: overheating (rate 0.00001), wear",
      "~ Pump faults: clog (rate 0.02) (updated)",
      "+ flows: Power",
      "+ connections: Battery -> Motor via Power",
      "! conflict: Pump.leak keeps rate 0.01; ignored 0.05",
      '? note: Split "Motor, Pump" into 2 separate items',
    ]);
  });

  it("says so when nothing was understood", () => {
    expect(formatAcknowledgment([], [], [])).toBe(NOTHING_UNDERSTOOD);
  });
});
