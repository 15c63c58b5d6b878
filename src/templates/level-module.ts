// Template for level_<name>.py: the model class, its classification hook and the simulation entry points

import type { LevelSpec } from "../types.js";
import type { NameTable } from "../name-table.js";
import { ARCHITECTURE_MODULE } from "../name-table.js";
import { pyDocstring } from "../python-syntax.js";
import { GENERATED_HEADER, INDENT, toSource } from "./common.js";

export function renderLevelModule(spec: LevelSpec, names: NameTable): string {
  const { sampleRun, faultAnalysis, parameterStudy } = spec.simulation;
  const cls = names.levelClass;
  const lines: string[] = [
    GENERATED_HEADER,
    pyDocstring(spec.description || `Fault model of ${spec.name}.`),
    "",
  ];
  if (sampleRun || faultAnalysis || parameterStudy) {
    lines.push("from fmdtools.sim import propagate as prop");
  }
  if (faultAnalysis) {
    lines.push("from fmdtools.sim.sample import FaultDomain, FaultSample");
  }
  lines.push(
    "",
    `from .${ARCHITECTURE_MODULE} import ${names.architectureClass}`,
    "",
    "",
    `class ${cls}(${names.architectureClass}):`,
    `${INDENT}${pyDocstring(spec.description || `Fault model of ${spec.name}.`)}`,
    "",
    `${INDENT}__slots__ = ()`,
    "",
    `${INDENT}def find_classification(self, scen, mdlhists):`,
    `${INDENT}${INDENT}"""Classify the outcome of a simulated scenario."""`,
    `${INDENT}${INDENT}# TODO: replace with a model-specific cost or severity metric`,
    `${INDENT}${INDENT}rate = getattr(scen, "rate", 1.0)`,
    `${INDENT}${INDENT}return {"rate": rate, "cost": 1.0, "expected_cost": rate * 1.0}`,
  );

  const runs: string[] = [];
  if (sampleRun) {
    runs.push("run_sample");
    lines.push(
      "",
      "",
      "def run_sample():",
      `${INDENT}"""Run the model once in its nominal state."""`,
      `${INDENT}mdl = ${cls}()`,
      `${INDENT}return prop.nominal(mdl)`,
    );
  }
  if (faultAnalysis) {
    runs.push("run_fault_analysis");
    lines.push(
      "",
      "",
      "def run_fault_analysis():",
      `${INDENT}"""Inject every fault mode of every function and propagate it."""`,
      `${INDENT}mdl = ${cls}()`,
      `${INDENT}fd = FaultDomain(mdl)`,
      `${INDENT}fd.add_all()`,
      `${INDENT}fs = FaultSample(fd)`,
      `${INDENT}fs.add_fault_phases()`,
      `${INDENT}return prop.fault_sample(mdl, fs)`,
    );
  }
  if (parameterStudy) {
    runs.push("run_parameter_study");
    lines.push(
      "",
      "",
      "def run_parameter_study(values=(0.5, 1.0, 1.5)):",
      `${INDENT}"""Run the nominal scenario once per value of a study parameter."""`,
      `${INDENT}results = {}`,
      `${INDENT}for value in values:`,
      `${INDENT}${INDENT}mdl = ${cls}()`,
      `${INDENT}${INDENT}# TODO: apply value to a model parameter`,
      `${INDENT}${INDENT}results[value] = prop.nominal(mdl)`,
      `${INDENT}return results`,
    );
  }

  lines.push("", "", 'if __name__ == "__main__":');
  if (runs.length === 0) {
    lines.push(`${INDENT}mdl = ${cls}()`);
  } else {
    for (const run of runs) lines.push(`${INDENT}${run}()`);
  }

  return toSource(lines);
}
