// src/errors.ts — Typed errors thrown by the builder and renderer

import type { ValidationIssue } from "./types.js";

/** Render-time validation failed. Carries every issue found, not just the first. */
export class SpecValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const lines = issues.map((i) => `- ${i.field}: ${i.message}`);
    super(`Specification is invalid (${issues.length} issue${issues.length === 1 ? "" : "s"}):\n${lines.join("\n")}`);
    this.name = "SpecValidationError";
    this.issues = issues;
  }
}

/** generate() was called while the session is still gathering. */
export class NotReadyError extends Error {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Specification is not ready to generate. Missing: ${missing.join("; ")}`);
    this.name = "NotReadyError";
    this.missing = missing;
  }
}

/** Planned artifacts already exist and force was not set. */
export class ArtifactCollisionError extends Error {
  readonly paths: string[];

  constructor(paths: string[]) {
    super(`Refusing to overwrite existing files (use --force): ${paths.join(", ")}`);
    this.name = "ArtifactCollisionError";
    this.paths = paths;
  }
}
