// src/types.ts — ALL shared types for the fault model builder
// Specification model, extraction proposals, dialog turn results, render output.

export const ENGINE_VERSION = "0.1.0";

// ─── Specification model ─────────────────────────────────────────────────────

/** Default value of a state or flow variable. Its type is fixed once declared. */
export type ScalarValue = number | boolean | string;

export type ScalarKind = "number" | "boolean" | "string";

export interface FaultMode {
  name: string;
  rate?: number; // unset → framework default failrate
}

export interface StateVariable {
  name: string;
  default: ScalarValue;
}

/** A "function" in fmdtools terms. */
export interface ComponentSpec {
  name: string;
  description: string;
  states: StateVariable[];
  faults: FaultMode[];
}

export interface FlowSpec {
  name: string;
  description: string;
  variables: StateVariable[];
}

export interface ConnectionSpec {
  from: string;
  to: string;
  flow: string;
}

export interface ArchitectureSpec {
  name: string;
  components: string[];
  connections: ConnectionSpec[];
}

export interface SimulationSpec {
  sampleRun: boolean;
  faultAnalysis: boolean;
  parameterStudy: boolean;
}

export type SpecStatus = "GATHERING" | "READY";

export interface LevelSpec {
  name: string;
  description: string;
  components: ComponentSpec[];
  flows: FlowSpec[];
  architecture: ArchitectureSpec;
  simulation: SimulationSpec;
  status: SpecStatus; // conversation-only
}

/**
 * Completeness policy. "states-or-faults": every component needs at least one
 * state or one fault. "states-and-faults": every component needs both.
 */
export type ReadinessPolicy = "states-or-faults" | "states-and-faults";

// ─── Warnings ────────────────────────────────────────────────────────────────

export interface Warning {
  level: "info" | "warn" | "error";
  module: string;
  message: string;
  file?: string;
}

// ─── Extraction ──────────────────────────────────────────────────────────────

export type Intent = "describe" | "generate" | "status" | "help";

/** How a proposal was found in the utterance. */
export type ProposalSource = "cue" | "reference" | "vocabulary" | "assignment" | "prefill";

export interface ComponentProposal {
  name: string;
  description?: string;
  confidence: number;
  source: ProposalSource;
}

export interface StateProposal {
  component?: string; // undefined → controller attaches to the focus component
  name: string;
  value: ScalarValue;
  explicit: boolean; // false when the value came from the vocabulary
  confidence: number;
  source: ProposalSource;
}

export interface FaultProposal {
  component?: string;
  name: string;
  rate?: number;
  confidence: number;
  source: ProposalSource;
}

export interface FlowProposal {
  name: string;
  description?: string;
  variables: StateVariable[];
  confidence: number;
}

export interface ConnectionProposal extends ConnectionSpec {
  confidence: number;
}

export type NoteKind =
  | "split"
  | "duplicate"
  | "discarded"
  | "rejected-name"
  | "ambiguous-target"
  | "unattached";

export interface AmbiguityNote {
  kind: NoteKind;
  message: string;
  fragment?: string;
}

export interface ExtractionResult {
  intent: Intent;
  systemName?: string;
  systemDescription?: string;
  components: ComponentProposal[];
  states: StateProposal[];
  faults: FaultProposal[];
  flows: FlowProposal[];
  connections: ConnectionProposal[];
  notes: AmbiguityNote[];
}

// ─── Merge ───────────────────────────────────────────────────────────────────

export type ChangeKind =
  | "system-name"
  | "system-description"
  | "component-added"
  | "state-added"
  | "fault-added"
  | "fault-updated"
  | "flow-added"
  | "flow-variable-added"
  | "connection-added";

export interface Change {
  kind: ChangeKind;
  /** Owning entity (component or flow); undefined for spec-level changes. */
  owner?: string;
  name: string;
  value?: ScalarValue;
}

export type ConflictKind =
  | "type-conflict"
  | "rate-conflict"
  | "value-conflict"
  | "name-collision"
  | "unresolved-reference";

export interface MergeConflict {
  kind: ConflictKind;
  owner?: string;
  name: string;
  message: string;
}

export interface MergeOutcome {
  spec: LevelSpec;
  changes: Change[];
  conflicts: MergeConflict[];
  notes: AmbiguityNote[];
}

// ─── Dialog ──────────────────────────────────────────────────────────────────

export interface TurnResult {
  acknowledgment: string;
  questions: string[];
  status: SpecStatus;
  changes: Change[];
  conflicts: MergeConflict[];
  notes: AmbiguityNote[];
  /** The utterance asked to generate; the caller should invoke generate(). */
  generateRequested: boolean;
}

export interface SessionOptions {
  /** Starting system name; a name equal to defaultName can still be replaced from the conversation. */
  name?: string;
  defaultName?: string;
  readiness?: ReadinessPolicy;
  maxQuestions?: number;
  simulation?: Partial<SimulationSpec>;
}

// ─── Rendering ───────────────────────────────────────────────────────────────

export interface Artifact {
  path: string; // relative to outputDir
  content: string;
}

export interface RenderOptions {
  force?: boolean;
  /** Paths (relative to outputDir) the caller reports as already present. */
  existingPaths?: Iterable<string>;
  readiness?: ReadinessPolicy;
}

export interface RenderResult {
  outputDir: string;
  artifacts: Artifact[];
  overwrite: boolean;
  warnings: Warning[];
}

export interface ValidationIssue {
  field: string;
  message: string;
}

// ─── Config ──────────────────────────────────────────────────────────────────

export interface ResolvedConfig {
  readiness: ReadinessPolicy;
  maxQuestions: number;
  defaultName: string;
  output: {
    dir: string;
  };
  simulation: SimulationSpec;
  force: boolean;
  dryRun: boolean;
  verbose: boolean;
}
