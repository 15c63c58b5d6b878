// src/dialog-controller.ts — Dialog Controller
// Owns one session's spec. Each turn: extract → merge → status → acknowledgment → questions.
// The spec is replaced only by a completed merge; generate() is the only way to render.

import type {
  ExtractionResult,
  LevelSpec,
  ReadinessPolicy,
  RenderOptions,
  RenderResult,
  SessionOptions,
  SpecStatus,
  TurnResult,
} from "./types.js";
import { extract } from "./extractor.js";
import { mergeExtraction } from "./merge.js";
import { DEFAULT_READINESS, findMissing, focusComponent } from "./readiness.js";
import { clampQuestions, MAX_QUESTIONS, selectQuestions } from "./question-selector.js";
import { formatAcknowledgment } from "./acknowledgment.js";
import { cloneSpec, createEmptySpec, DEFAULT_SYSTEM_NAME } from "./spec-model.js";
import { prefillProposals } from "./prefill.js";
import type { PartialLevelSpec } from "./spec-schema.js";
import { render } from "./renderer.js";
import { NotReadyError } from "./errors.js";

export const SESSION_HELP = [
  "Describe the system in plain sentences, for example:",
  '  "components: Motor, Pump"',
  '  "Motor states: rpm: 1800, temperature: 90"',
  '  "Motor faults: overheating, bearing wear"',
  '  "flows: Power" then "Battery sends Power to Motor"',
  'Say "status" to see progress and "generate" when the model is ready.',
].join("\n");

const READY_LINE = 'Ready to generate. Say "generate" when you are done, or keep adding detail.';

export class BuilderSession {
  private spec: LevelSpec;
  private readonly policy: ReadinessPolicy;
  private readonly maxQuestions: number;
  private readonly defaultName: string;
  private readonly utterances: string[] = [];

  constructor(options: SessionOptions = {}) {
    this.policy = options.readiness ?? DEFAULT_READINESS;
    this.maxQuestions = clampQuestions(options.maxQuestions ?? MAX_QUESTIONS);
    this.defaultName = options.defaultName ?? DEFAULT_SYSTEM_NAME;
    this.spec = createEmptySpec(options.name ?? this.defaultName, options.simulation);
  }

  get status(): SpecStatus {
    return this.spec.status;
  }

  /** Utterances processed so far, in order. */
  get transcript(): readonly string[] {
    return this.utterances;
  }

  /** Deep copy of the current spec; mutating it does not affect the session. */
  snapshot(): LevelSpec {
    return cloneSpec(this.spec);
  }

  missing(): string[] {
    return findMissing(this.spec, this.policy);
  }

  /** One-line progress summary. */
  describeStatus(): string {
    const { components, flows, architecture } = this.spec;
    const parts = [
      `${this.spec.status}: ${this.spec.name}`,
      `${components.length} component${components.length === 1 ? "" : "s"}${components.length > 0 ? ` (${components.map((c) => c.name).join(", ")})` : ""}`,
      `${flows.length} flow${flows.length === 1 ? "" : "s"}`,
      `${architecture.connections.length} connection${architecture.connections.length === 1 ? "" : "s"}`,
    ];
    const missing = this.missing();
    const tail = missing.length > 0 ? `. Missing: ${missing.join("; ")}` : "";
    return `${parts.join(", ")}${tail}`;
  }

  advance(utterance: string): TurnResult {
    this.utterances.push(utterance);
    const result = extract(utterance, this.spec);

    switch (result.intent) {
      case "generate":
        return this.commandTurn(
          this.status === "READY"
            ? "Generating the model files."
            : `Not ready to generate yet. Missing: ${this.missing().join("; ")}`,
          true,
        );
      case "status":
        return this.commandTurn(this.describeStatus(), false);
      case "help":
        return this.commandTurn(SESSION_HELP, false);
      default:
        return this.apply(result);
    }
  }

  /** Merge a LevelSpec-shaped payload through the same path as a turn. */
  prefill(partial: PartialLevelSpec): TurnResult {
    const turn = this.apply(prefillProposals(partial));
    if (partial.simulation) {
      this.spec.simulation = { ...this.spec.simulation, ...partial.simulation };
    }
    return turn;
  }

  /**
   * Render the current spec. Throws NotReadyError naming what is missing while
   * the session is still gathering; nothing is rendered in that case.
   */
  generate(options: Omit<RenderOptions, "readiness"> = {}): RenderResult {
    if (this.spec.status !== "READY") throw new NotReadyError(this.missing());
    return render(this.snapshot(), { ...options, readiness: this.policy });
  }

  private apply(result: ExtractionResult): TurnResult {
    const outcome = mergeExtraction(this.spec, result, {
      focus: focusComponent(this.spec, this.policy)?.name,
      policy: this.policy,
      defaultName: this.defaultName,
    });
    this.spec = outcome.spec;

    const ack = formatAcknowledgment(outcome.changes, outcome.conflicts, outcome.notes);
    return {
      acknowledgment: this.spec.status === "READY" && outcome.changes.length > 0 ? `${ack}\n${READY_LINE}` : ack,
      questions: this.questions(),
      status: this.spec.status,
      changes: outcome.changes,
      conflicts: outcome.conflicts,
      notes: outcome.notes,
      generateRequested: false,
    };
  }

  private commandTurn(acknowledgment: string, generateRequested: boolean): TurnResult {
    return {
      acknowledgment,
      questions: this.questions(),
      status: this.spec.status,
      changes: [],
      conflicts: [],
      notes: [],
      generateRequested,
    };
  }

  private questions(): string[] {
    if (this.spec.status === "READY") return [];
    return selectQuestions(this.spec, {
      policy: this.policy,
      maxQuestions: this.maxQuestions,
      defaultName: this.defaultName,
    });
  }
}

export function createSession(options: SessionOptions = {}): BuilderSession {
  return new BuilderSession(options);
}
