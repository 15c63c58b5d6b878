// src/prefill.ts — Pre-fill loader
// Reads a LevelSpec-shaped JSON payload (e.g. a converted diagram) and turns it
// into proposals, so it goes through the same merge path as conversation turns.

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";
import type { ExtractionResult, Warning } from "./types.js";
import { toLowerIdentifier } from "./identifiers.js";
import { partialLevelSpecSchema, type PartialLevelSpec } from "./spec-schema.js";

/**
 * Load and validate a pre-fill file. Problems become warnings and null,
 * never exceptions.
 */
export function loadPrefill(filePath: string, warnings: Warning[] = []): PartialLevelSpec | null {
  const absPath = resolve(filePath);
  if (!existsSync(absPath)) {
    warnings.push({ level: "error", module: "prefill", message: `Pre-fill file not found: ${filePath}`, file: filePath });
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(absPath, "utf-8"));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({ level: "error", module: "prefill", message: `Failed to parse ${filePath}: ${msg}`, file: filePath });
    return null;
  }

  const parsed = partialLevelSpecSchema.safeParse(raw);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const field = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      warnings.push({ level: "error", module: "prefill", message: `${field}: ${issue.message}`, file: filePath });
    }
    return null;
  }
  return parsed.data;
}

/** Every value in a pre-fill payload is explicit and fully confident. */
export function prefillProposals(partial: PartialLevelSpec): ExtractionResult {
  const systemName = partial.name ? toLowerIdentifier(partial.name) : "";
  return {
    intent: "describe",
    ...(systemName ? { systemName } : {}),
    ...(partial.description ? { systemDescription: partial.description } : {}),
    components: partial.components.map((c) => ({
      name: c.name,
      description: c.description,
      confidence: 1,
      source: "prefill" as const,
    })),
    states: partial.components.flatMap((c) =>
      c.states.map((s) => ({
        component: c.name,
        name: s.name,
        value: s.default,
        explicit: true,
        confidence: 1,
        source: "prefill" as const,
      })),
    ),
    faults: partial.components.flatMap((c) =>
      c.faults.map((f) => ({
        component: c.name,
        name: f.name,
        rate: "rate" in f ? f.rate : undefined,
        confidence: 1,
        source: "prefill" as const,
      })),
    ),
    flows: partial.flows.map((f) => ({
      name: f.name,
      description: f.description,
      variables: f.variables,
      confidence: 1,
    })),
    connections: (partial.architecture?.connections ?? []).map((c) => ({ ...c, confidence: 1 })),
    notes: [],
  };
}
