// src/renderer.ts — Deterministic renderer
// Validated LevelSpec → ordered, cross-referencing artifacts. Pure: no I/O, input never mutated.

import type { Artifact, LevelSpec, RenderOptions, RenderResult, Warning } from "./types.js";
import { buildNameTable, type NameTable } from "./name-table.js";
import { nameKey } from "./identifiers.js";
import { DEFAULT_READINESS } from "./readiness.js";
import { validateLevelSpec } from "./spec-validator.js";
import { ArtifactCollisionError, SpecValidationError } from "./errors.js";
import { renderFunctionModule } from "./templates/function-module.js";
import { renderFlowsModule } from "./templates/flows-module.js";
import { renderArchitectureModule } from "./templates/architecture-module.js";
import { renderLevelModule } from "./templates/level-module.js";
import { renderInitModule } from "./templates/init-module.js";

function pathsFor(names: NameTable): string[] {
  return [
    ...names.components.map((c) => `${c.module}.py`),
    "flows.py",
    "architecture.py",
    `${names.levelModule}.py`,
    "__init__.py",
  ];
}

/** Artifact paths, relative to the output directory, in render order. */
export function plannedPaths(spec: LevelSpec): string[] {
  return pathsFor(buildNameTable(spec));
}

/** Output directory (relative) the artifacts belong in. */
export function outputDirFor(spec: LevelSpec): string {
  return buildNameTable(spec).outputDir;
}

/**
 * Render a spec into artifacts. Throws SpecValidationError listing every issue,
 * or ArtifactCollisionError when planned paths already exist and force is off.
 */
export function render(spec: LevelSpec, options: RenderOptions = {}): RenderResult {
  const issues = validateLevelSpec(spec, options.readiness ?? DEFAULT_READINESS);
  if (issues.length > 0) throw new SpecValidationError(issues);

  const names = buildNameTable(spec);
  const paths = pathsFor(names);
  const force = options.force ?? false;
  const existing = new Set<string>(options.existingPaths ?? []);
  const colliding = paths.filter((p) => existing.has(p));
  if (colliding.length > 0 && !force) throw new ArtifactCollisionError(colliding);

  const artifacts: Artifact[] = [];
  spec.components.forEach((component, i) => {
    const entry = names.components[i];
    artifacts.push({ path: `${entry.module}.py`, content: renderFunctionModule(component, entry) });
  });
  artifacts.push({ path: "flows.py", content: renderFlowsModule(spec, names) });
  artifacts.push({ path: "architecture.py", content: renderArchitectureModule(spec, names) });
  artifacts.push({ path: `${names.levelModule}.py`, content: renderLevelModule(spec, names) });
  artifacts.push({ path: "__init__.py", content: renderInitModule(spec, names) });

  return {
    outputDir: names.outputDir,
    artifacts,
    overwrite: colliding.length > 0,
    warnings: collectWarnings(spec),
  };
}

function collectWarnings(spec: LevelSpec): Warning[] {
  const warnings: Warning[] = [];
  const used = new Set(spec.architecture.connections.map((c) => nameKey(c.flow)));
  for (const flow of spec.flows) {
    if (!used.has(nameKey(flow.name))) {
      warnings.push({
        level: "warn",
        module: "renderer",
        message: `Flow "${flow.name}" is declared but no connection uses it`,
      });
    }
  }
  return warnings;
}
