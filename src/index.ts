// fault-model-builder — Public API
// Turns a multi-turn system description into a validated LevelSpec and renders it
// into a set of fmdtools modules.

export { ENGINE_VERSION } from "./types.js";
export type {
  Artifact,
  ArchitectureSpec,
  Change,
  ChangeKind,
  ComponentSpec,
  ConnectionSpec,
  ExtractionResult,
  FaultMode,
  FlowSpec,
  Intent,
  LevelSpec,
  MergeConflict,
  MergeOutcome,
  ReadinessPolicy,
  RenderOptions,
  RenderResult,
  ResolvedConfig,
  ScalarValue,
  SessionOptions,
  SimulationSpec,
  SpecStatus,
  StateVariable,
  TurnResult,
  ValidationIssue,
  Warning,
} from "./types.js";

// ─── Specification ───
export {
  createEmptySpec,
  createLevelSpec,
  parseLevelSpec,
  DEFAULT_SIMULATION,
  DEFAULT_SYSTEM_NAME,
} from "./spec-model.js";
export type { LevelSpecInput, PartialLevelSpec } from "./spec-schema.js";
export { computeStatus, findMissing, isReady, DEFAULT_READINESS } from "./readiness.js";

// ─── Builder ───
export { extract } from "./extractor.js";
export { mergeExtraction } from "./merge.js";
export { selectQuestions } from "./question-selector.js";
export { BuilderSession, createSession } from "./dialog-controller.js";
export { loadPrefill } from "./prefill.js";

// ─── Renderer ───
export { render, plannedPaths, outputDirFor } from "./renderer.js";
export { validateLevelSpec } from "./spec-validator.js";
export { findExistingPaths, writeArtifacts } from "./artifact-writer.js";
export type { WriteOptions, WriteReport } from "./artifact-writer.js";

// ─── Errors ───
export { ArtifactCollisionError, NotReadyError, SpecValidationError } from "./errors.js";
