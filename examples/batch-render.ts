// examples/batch-render.ts — Programmatic use without a conversation
// Builds a LevelSpec directly, then renders and writes it.
//
// Usage:
//   npx tsx examples/batch-render.ts [output-dir]

import {
  createLevelSpec,
  createSession,
  findExistingPaths,
  outputDirFor,
  plannedPaths,
  render,
  writeArtifacts,
} from "../src/index.js";

const spec = createLevelSpec({
  name: "drive_train",
  description: "Battery-powered motor driving a coolant pump.",
  components: [
    { name: "Battery", states: { voltage: 12, charge: 80 }, faults: ["short_circuit"] },
    { name: "Motor", states: { rpm: 1800 }, faults: [{ name: "overheating", rate: 1e-5 }] },
    { name: "Pump", states: { flow_rate: 10 }, faults: ["leak", "clog"] },
  ],
  flows: [
    { name: "Power", variables: { voltage: 12 } },
    { name: "Torque", variables: { torque: 300 } },
  ],
  architecture: {
    connections: [
      { from: "Battery", to: "Motor", flow: "Power" },
      { from: "Motor", to: "Pump", flow: "Torque" },
    ],
  },
  simulation: { sampleRun: true, faultAnalysis: true },
});

const baseDir = process.argv[2] ?? ".";
const result = render(spec, {
  force: true,
  existingPaths: findExistingPaths(baseDir, outputDirFor(spec), plannedPaths(spec)),
});
const report = writeArtifacts(result, { baseDir });
process.stderr.write(`Written ${report.written.length} files to ${report.outputDir}\n`);

// The same model, described in sentences.
const session = createSession();
for (const line of [
  "system name: drive_train_chat",
  "components: Battery, Motor",
  "Battery states: voltage: 12",
  "Motor can overheat",
]) {
  const turn = session.advance(line);
  process.stderr.write(`> ${line}\n${turn.acknowledgment}\n`);
}
process.stderr.write(`${session.describeStatus()}\n`);
