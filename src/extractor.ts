// src/extractor.ts — Extraction Engine
// Pure proposal function: one utterance + the current spec → candidate entities and ambiguity notes.
// Pattern/heuristic matching over clauses, not a grammar. No I/O, no hidden state.

import type {
  ExtractionResult,
  Intent,
  LevelSpec,
  ProposalSource,
  ScalarValue,
} from "./types.js";
import { nameKey, toClassName, toLowerIdentifier } from "./identifiers.js";
import {
  COMPONENT_NOUNS,
  COMPONENT_PHRASES,
  FAULT_NOUNS,
  FAULT_VERBS,
  LEADING_FILLERS,
  lookup,
  STATE_ALIASES,
  STATE_DEFAULTS,
} from "./vocabulary.js";

const CONFIDENCE = {
  cue: 0.9,
  assignment: 0.85,
  reference: 0.8,
  vocabulary: 0.6,
  inferred: 0.5,
} as const;

// ─── Command intents ─────────────────────────────────────────────────────────

const GENERATE_COMMAND =
  /^(?:please\s+)?(?:generate|render|build\s+(?:the\s+)?files|make\s+(?:the\s+)?files)(?:\s+(?:it|now|the\s+model|the\s+files|files))?\s*[.!]*$/i;
const STATUS_COMMAND = /^status\s*[?.!]*$/i;
const HELP_COMMAND = /^(?:help|\?)\s*$/i;

export function detectIntent(utterance: string): Intent {
  const text = utterance.trim();
  if (GENERATE_COMMAND.test(text)) return "generate";
  if (STATUS_COMMAND.test(text)) return "status";
  if (HELP_COMMAND.test(text)) return "help";
  return "describe";
}

// ─── Cue patterns ────────────────────────────────────────────────────────────

const CUE_KEYWORDS =
  "faults?|fault\\s+modes|failure\\s+modes|states?|state\\s+variables|flows?|components?";

const CLAUSE_SEPARATOR = new RegExp(
  `[;\\n]+|\\.(?!\\d)|[!?]+|,\\s*(?=(?:${CUE_KEYWORDS})\\s*:)`,
  "i",
);

// A slash splits only with space on one side, so "km/h" stays one item.
const LIST_SEPARATOR = /\s*(?:(?<!\d),|,(?!\d)|\band\b|&|(?<=\s)\/|\/(?=\s)|\|)\s*/i;

const DESCRIPTION_CUE = /^(?:system\s+)?description\s*:\s*(?<text>.+)$/i;

const SYSTEM_NAME_CUES: Array<{ pattern: RegExp; consume: boolean }> = [
  {
    pattern: /\b(?:system|model)\s+name\s*(?::|\bis\b)\s*["']?(?<name>\w[\w -]*?)["']?\s*$/i,
    consume: true,
  },
  {
    pattern: /\b(?:called|named)\s+["']?(?<name>\w[\w-]*(?:\s+[\w-]+){0,3}?)["']?(?=\s*$|\s+(?:with|that|which|and|has)\b|,)/i,
    consume: true,
  },
  {
    pattern: /\b(?:model|build|design|simulate)\s+(?:a|an|the)\s+(?<name>[a-z0-9][\w-]*(?:\s+[\w-]+){0,2}?\s+system)\b/i,
    consume: false,
  },
];

const CONNECTION_CUES: RegExp[] = [
  /^(?:the\s+)?(?<from>\w[\w ]*?)\s+(?:sends|supplies|provides|feeds|delivers|passes)\s+(?:the\s+)?(?<flow>\w[\w ]*?)\s+to\s+(?:the\s+)?(?<to>\w[\w ]*?)$/i,
  /^connect\s+(?:the\s+)?(?<from>\w[\w ]*?)\s+to\s+(?:the\s+)?(?<to>\w[\w ]*?)\s+(?:via|with|using|through)\s+(?:the\s+)?(?<flow>\w[\w ]*?)$/i,
  /^(?<from>\w+)\s*->\s*(?<to>\w+)\s+(?:via|with|using|through)\s+(?<flow>\w+)$/i,
];

const FLOW_LIST_CUE = /^(?:the\s+)?flows?\s*(?::|\bare\b|\binclude\b)\s*(?<list>.+)$/i;
const FLOW_VARIABLES_CUE =
  /^(?:the\s+)?(?:flow\s+(?<named>\w+)|(?<phrase>\w[\w ]*?\s+flow))\s+(?:carries|has|with|contains)\s+(?<list>.+)$/i;

const COMPONENT_CUES: RegExp[] = [
  /^(?<subject>.*?)\b(?:components?|subsystems?|parts)\s*(?::|\bare\b|\binclude\b)\s*(?<list>.+)$/i,
  /^(?<subject>.*?)\b(?:consists\s+of|is\s+made\s+up\s+of|is\s+composed\s+of|comprises)\s+(?<list>.+)$/i,
];

const FAULT_CUES: RegExp[] = [
  /^(?<subject>.*?)\b(?:faults?|fault\s+modes|failure\s+modes|failures)\s*(?::|\bare\b|\binclude\b)\s*(?<list>.+)$/i,
  /^(?<subject>.*?)\bcan\s+fail\s+(?:due\s+to|by|from|because\s+of|with)\s+(?<list>.+)$/i,
];

const STATE_CUES: RegExp[] = [
  /^(?<subject>.*?)\b(?:has|have)\s+(?:the\s+)?(?:states?|state\s+variables|parameters)\s*:?\s*(?<list>.+)$/i,
  /^(?<subject>.*?)\b(?:states?|state\s+variables|parameters|properties)\s*(?::|\bare\b|\binclude\b)\s*(?<list>.+)$/i,
  /^(?<subject>.*?)\b(?:tracks|monitors|measures)\s+(?<list>.+)$/i,
  /^(?<subject>.*?)\bwith\s+(?<list>.+?)\s+(?:states?|state\s+variables)$/i,
];

const CAPABILITY_CUE = /^(?<subject>.*?)\bcan\s+(?:also\s+)?(?<list>.+)$/i;
const POSSESSION_CUE = /^(?<subject>.*?)\b(?:has|have|with)\s+(?<list>.+)$/i;

const ASSIGNMENT = /^(?<name>[A-Za-z_][\w ]*?)\s*(?:[:=]|\s+(?:of|at|is)\s+)\s*(?<value>.+)$/i;
const NAME_THEN_NUMBER = /^(?<name>[A-Za-z_][\w ]*?)\s+(?<value>-?\d[\d.,]*(?:e[-+]?\d+)?\b.*)$/i;
const PARENTHESIZED_RATE = /^(?<name>.*?)\s*\((?:rate\s*[:=]?\s*)?(?<value>[^)]*)\)$/i;

const NUMBER_PREFIX = /^(-?\d[\d,]*(?:\.\d+)?(?:e[-+]?\d+)?)/i;
const RANGE = /^(-?\d+(?:\.\d+)?)\s*(?:-|to)\s*(-?\d+(?:\.\d+)?)/i;
const QUOTED = /^"([^"]*)"$|^'([^']*)'$/;

// ─── Context ─────────────────────────────────────────────────────────────────

interface ExtractionContext {
  result: ExtractionResult;
  /** key → canonical name; spec components plus those introduced by this utterance. */
  components: Map<string, string>;
  flows: Map<string, string>;
  introduced: Set<string>;
}

function proposalCount(result: ExtractionResult): number {
  return (
    result.components.length +
    result.states.length +
    result.faults.length +
    result.flows.length +
    result.connections.length +
    (result.systemName ? 1 : 0) +
    (result.systemDescription ? 1 : 0)
  );
}

// ─── Main Entry ──────────────────────────────────────────────────────────────

/**
 * Extract proposed additions from one utterance against the current spec.
 * Deterministic for identical input; the spec is only read.
 */
export function extract(utterance: string, spec: LevelSpec): ExtractionResult {
  const result: ExtractionResult = {
    intent: detectIntent(utterance),
    components: [],
    states: [],
    faults: [],
    flows: [],
    connections: [],
    notes: [],
  };
  if (result.intent !== "describe") return result;

  const ctx: ExtractionContext = {
    result,
    components: new Map(spec.components.map((c) => [nameKey(c.name), c.name])),
    flows: new Map(spec.flows.map((f) => [nameKey(f.name), f.name])),
    introduced: new Set(),
  };

  for (const clause of splitClauses(utterance)) {
    const before = proposalCount(result);
    const notesBefore = result.notes.length;
    extractClause(clause, ctx);
    if (proposalCount(result) === before && result.notes.length === notesBefore) {
      result.notes.push({
        kind: "discarded",
        message: `Could not understand "${clause}"`,
        fragment: clause,
      });
    }
  }

  dropUnattached(ctx);
  return result;
}

export function splitClauses(text: string): string[] {
  return text
    .split(CLAUSE_SEPARATOR)
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

export function splitList(text: string): string[] {
  return text
    .split(LIST_SEPARATOR)
    .map(cleanItem)
    .filter((item) => item.length > 0);
}

function cleanItem(item: string): string {
  let s = item.trim().replace(/[.!?,]+$/, "").replace(/\betc\.?$/i, "").trim();
  while (LEADING_FILLERS.test(s)) s = s.replace(LEADING_FILLERS, "");
  return s.trim();
}

// ─── Clause dispatch ─────────────────────────────────────────────────────────

function extractClause(rawClause: string, ctx: ExtractionContext): void {
  const description = DESCRIPTION_CUE.exec(rawClause);
  if (description?.groups) {
    ctx.result.systemDescription ??= description.groups.text.trim();
    return;
  }

  const clause = extractSystemName(rawClause, ctx);
  if (!clause) return;

  if (extractConnection(clause, ctx)) return;
  if (extractFlows(clause, ctx)) return;
  if (extractComponentList(clause, ctx)) return;
  if (extractCueList(clause, FAULT_CUES, ctx, proposeFaults)) return;
  if (extractCueList(clause, STATE_CUES, ctx, proposeStates)) return;
  if (extractCapability(clause, ctx)) return;
  if (extractPossession(clause, ctx)) return;
  if (extractAssignments(clause, ctx)) return;
  if (extractMentions(clause, ctx)) return;

  scanVocabulary(clause, ctx);
}

/** Records a system name if one is stated; returns the clause text still left to read. */
function extractSystemName(clause: string, ctx: ExtractionContext): string {
  for (const { pattern, consume } of SYSTEM_NAME_CUES) {
    const match = pattern.exec(clause);
    if (!match?.groups) continue;
    const name = toLowerIdentifier(match.groups.name);
    if (!name) {
      ctx.result.notes.push({
        kind: "rejected-name",
        message: `System name "${match.groups.name}" has no usable characters`,
        fragment: clause,
      });
    } else {
      ctx.result.systemName ??= name;
    }
    return consume ? clause.replace(match[0], "").trim() : clause;
  }
  return clause;
}

// ─── Components ──────────────────────────────────────────────────────────────

function componentNoun(word: string): string | undefined {
  const lower = word.toLowerCase();
  return lookup(COMPONENT_NOUNS, lower) ?? (lower.endsWith("s") ? lookup(COMPONENT_NOUNS, lower.slice(0, -1)) : undefined);
}

function canonicalComponentName(raw: string): string {
  const cleaned = cleanItem(raw);
  return componentNoun(cleaned) ?? toClassName(cleaned);
}

/**
 * Propose a component, or map it onto an existing one. Returns the canonical
 * name the rest of the utterance should use, or undefined when rejected.
 */
function proposeComponent(
  raw: string,
  source: ProposalSource,
  ctx: ExtractionContext,
): string | undefined {
  const name = canonicalComponentName(raw);
  if (!name) {
    ctx.result.notes.push({
      kind: "rejected-name",
      message: `Component name "${raw}" has no usable characters`,
      fragment: raw,
    });
    return undefined;
  }

  const key = nameKey(name);
  const exact = ctx.components.get(key);
  if (exact) {
    if (source === "cue" && !ctx.introduced.has(key)) {
      ctx.result.notes.push({
        kind: "duplicate",
        message: `${exact} is already a component`,
        fragment: raw,
      });
    }
    return exact;
  }

  const singular = key.endsWith("s") ? ctx.components.get(key.slice(0, -1)) : undefined;
  if (singular) {
    ctx.result.notes.push({
      kind: "duplicate",
      message: `Treated "${raw}" as the existing component ${singular}`,
      fragment: raw,
    });
    return singular;
  }

  ctx.components.set(key, name);
  ctx.introduced.add(key);
  ctx.result.components.push({
    name,
    confidence: source === "vocabulary" ? CONFIDENCE.vocabulary : source === "cue" ? CONFIDENCE.cue : CONFIDENCE.reference,
    source,
  });
  return name;
}

function extractComponentList(clause: string, ctx: ExtractionContext): boolean {
  for (const pattern of COMPONENT_CUES) {
    const match = pattern.exec(clause);
    if (!match?.groups) continue;
    const items = splitListNoting(match.groups.list, ctx);
    for (const item of items) proposeComponent(item, "cue", ctx);
    return true;
  }
  return false;
}

/** Propose components for vocabulary nouns found in free text; true if any were named. */
function scanVocabulary(text: string, ctx: ExtractionContext): boolean {
  let found = false;
  let rest = text;
  for (const { pattern, name } of COMPONENT_PHRASES) {
    if (pattern.test(rest)) {
      found = proposeComponent(name, "vocabulary", ctx) !== undefined || found;
      rest = rest.replace(pattern, " ");
    }
  }
  const words = rest.toLowerCase().match(/[a-z]+/g) ?? [];
  for (const word of words) {
    const noun = componentNoun(word);
    if (noun) found = proposeComponent(noun, "vocabulary", ctx) !== undefined || found;
  }
  return found;
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Known component names mentioned in the text, in order of first appearance. */
function findReferences(text: string, ctx: ExtractionContext): string[] {
  const found: Array<{ name: string; index: number }> = [];
  for (const name of ctx.components.values()) {
    const words = name
      .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
      .split(/[\s_]+/)
      .filter(Boolean)
      .map(escapeRegExp);
    const pattern = new RegExp(`\\b${words.join("[\\s_-]*")}s?\\b`, "i");
    const match = pattern.exec(text);
    if (match) found.push({ name, index: match.index });
  }
  return found.sort((a, b) => a.index - b.index).map((f) => f.name);
}

/** The component a clause is about, from its subject text. */
function resolveSubject(subject: string, clause: string, ctx: ExtractionContext): string | undefined {
  if (!subject.trim()) return undefined;
  scanVocabulary(subject, ctx);
  const refs = findReferences(subject, ctx);
  if (refs.length > 1) {
    ctx.result.notes.push({
      kind: "ambiguous-target",
      message: `"${clause}" mentions ${refs.join(", ")}; attached to ${refs[0]}`,
      fragment: clause,
    });
  }
  return refs[0];
}

// ─── Lists ───────────────────────────────────────────────────────────────────

function splitListNoting(text: string, ctx: ExtractionContext): string[] {
  const items = splitList(text);
  if (items.length > 1) {
    ctx.result.notes.push({
      kind: "split",
      message: `Split "${text.trim()}" into ${items.length} separate items`,
      fragment: text.trim(),
    });
  }
  return items;
}

type ListHandler = (items: string[], target: string | undefined, ctx: ExtractionContext) => void;

function extractCueList(
  clause: string,
  patterns: RegExp[],
  ctx: ExtractionContext,
  handler: ListHandler,
): boolean {
  for (const pattern of patterns) {
    const match = pattern.exec(clause);
    if (!match?.groups) continue;
    const target = resolveSubject(match.groups.subject ?? "", clause, ctx);
    handler(splitListNoting(match.groups.list, ctx), target, ctx);
    return true;
  }
  return false;
}

// ─── Values ──────────────────────────────────────────────────────────────────

/** Parse a user-written value: numbers (units ignored), ranges, booleans, quoted or bare strings. */
export function parseValue(raw: string): ScalarValue | undefined {
  const s = raw.trim();
  if (!s) return undefined;
  const quoted = QUOTED.exec(s);
  if (quoted) return quoted[1] ?? quoted[2] ?? "";
  const range = RANGE.exec(s);
  if (range) return (Number(range[1]) + Number(range[2])) / 2;
  const num = NUMBER_PREFIX.exec(s);
  if (num) {
    const n = Number(num[1].replace(/,/g, ""));
    if (Number.isFinite(n)) return n;
  }
  const lower = s.toLowerCase();
  if (lower === "true" || lower === "yes" || lower === "on") return true;
  if (lower === "false" || lower === "no" || lower === "off") return false;
  return s;
}

interface Assignment {
  name: string;
  value: ScalarValue;
}

function parseAssignment(item: string): Assignment | undefined {
  const match = ASSIGNMENT.exec(item) ?? NAME_THEN_NUMBER.exec(item);
  if (!match?.groups) return undefined;
  const value = parseValue(match.groups.value);
  if (value === undefined) return undefined;
  return { name: cleanItem(match.groups.name), value };
}

function stateName(raw: string): string {
  const id = toLowerIdentifier(cleanItem(raw));
  return lookup(STATE_ALIASES, id) ?? id;
}

/**
 * Split "Motor rpm" into a component reference and the remaining name when the
 * first words name a known component.
 */
function splitComponentPrefix(
  name: string,
  ctx: ExtractionContext,
): { component?: string; rest: string } {
  const words = name.trim().split(/\s+/);
  for (let n = Math.min(2, words.length - 1); n >= 1; n--) {
    const head = words.slice(0, n).join(" ");
    const known = ctx.components.get(nameKey(canonicalComponentName(head)));
    if (known) return { component: known, rest: words.slice(n).join(" ") };
  }
  return { rest: name };
}

// ─── States ──────────────────────────────────────────────────────────────────

function pushState(
  rawName: string,
  value: ScalarValue,
  explicit: boolean,
  target: string | undefined,
  source: ProposalSource,
  ctx: ExtractionContext,
): boolean {
  const prefixed = target ? { rest: rawName } : splitComponentPrefix(rawName, ctx);
  const name = stateName(prefixed.rest);
  if (!name) {
    ctx.result.notes.push({
      kind: "rejected-name",
      message: `State name "${rawName}" has no usable characters`,
      fragment: rawName,
    });
    return false;
  }
  ctx.result.states.push({
    component: target ?? prefixed.component,
    name,
    value,
    explicit,
    confidence: explicit ? CONFIDENCE.assignment : CONFIDENCE.inferred,
    source,
  });
  return true;
}

/** Items under an explicit states cue: a bare name is accepted with a default value. */
function proposeStates(items: string[], target: string | undefined, ctx: ExtractionContext): void {
  for (const item of items) {
    const assignment = parseAssignment(item);
    if (assignment) {
      pushState(assignment.name, assignment.value, true, target, "cue", ctx);
      continue;
    }
    const name = stateName(item);
    pushState(item, lookup(STATE_DEFAULTS, name) ?? 0, false, target, "cue", ctx);
  }
}

function extractAssignments(clause: string, ctx: ExtractionContext): boolean {
  if (!/[:=]/.test(clause)) return false;
  const items = splitList(clause);
  const parsed = items.map((item) => ({ item, assignment: parseAssignment(item) }));
  if (!parsed.some((p) => p.assignment)) return false;
  for (const { item, assignment } of parsed) {
    if (!assignment) {
      ctx.result.notes.push({ kind: "discarded", message: `Could not understand "${item}"`, fragment: item });
      continue;
    }
    pushState(assignment.name, assignment.value, true, undefined, "assignment", ctx);
  }
  return true;
}

// ─── Faults ──────────────────────────────────────────────────────────────────

function proposeFaults(
  items: string[],
  target: string | undefined,
  ctx: ExtractionContext,
  source: ProposalSource = "cue",
): void {
  for (const item of items) {
    let rawName = item;
    let rate: number | undefined;

    const parenthesized = PARENTHESIZED_RATE.exec(item);
    const assignment = parenthesized?.groups
      ? { name: parenthesized.groups.name, value: parseValue(parenthesized.groups.value) }
      : parseAssignment(item);
    if (assignment && typeof assignment.value === "number" && assignment.value >= 0) {
      rawName = assignment.name;
      rate = assignment.value;
    }

    const prefixed = target ? { rest: rawName } : splitComponentPrefix(rawName, ctx);
    const verb = lookup(FAULT_VERBS, prefixed.rest.trim().toLowerCase());
    const name = verb ?? toLowerIdentifier(cleanItem(prefixed.rest));
    if (!name) {
      ctx.result.notes.push({
        kind: "rejected-name",
        message: `Fault name "${item}" has no usable characters`,
        fragment: item,
      });
      continue;
    }

    const component = target ?? prefixed.component;
    const duplicate = ctx.result.faults.some((f) => f.component === component && f.name === name);
    if (duplicate) continue;
    ctx.result.faults.push({
      component,
      name,
      ...(rate !== undefined ? { rate } : {}),
      confidence: source === "cue" ? CONFIDENCE.cue : CONFIDENCE.vocabulary,
      source,
    });
  }
}

function extractCapability(clause: string, ctx: ExtractionContext): boolean {
  const match = CAPABILITY_CUE.exec(clause);
  if (!match?.groups) return false;
  const items = splitList(match.groups.list);
  const verbs = items.map((item) => ({ item, fault: lookup(FAULT_VERBS, item.split(/\s+/)[0].toLowerCase()) }));
  if (!verbs.some((v) => v.fault)) return false;

  const target = resolveSubject(match.groups.subject, clause, ctx);
  for (const { item, fault } of verbs) {
    if (!fault) {
      ctx.result.notes.push({ kind: "discarded", message: `Could not understand "${item}"`, fragment: item });
      continue;
    }
    proposeFaults([fault], target, ctx);
  }
  return true;
}

// ─── Possession ──────────────────────────────────────────────────────────────

function extractPossession(clause: string, ctx: ExtractionContext): boolean {
  const match = POSSESSION_CUE.exec(clause);
  if (!match?.groups) return false;
  const target = resolveSubject(match.groups.subject, clause, ctx);

  for (const item of splitList(match.groups.list)) {
    const assignment = parseAssignment(item);
    if (assignment) {
      pushState(assignment.name, assignment.value, true, target, "assignment", ctx);
      continue;
    }
    const known = lookup(STATE_DEFAULTS, stateName(item));
    if (known !== undefined) {
      pushState(item, known, false, target, "vocabulary", ctx);
      continue;
    }
    if (componentNoun(item)) {
      proposeComponent(item, "vocabulary", ctx);
      continue;
    }
    if (scanVocabulary(item, ctx)) continue;
    ctx.result.notes.push({ kind: "discarded", message: `Could not understand "${item}"`, fragment: item });
  }
  return true;
}

// ─── Bare mentions ───────────────────────────────────────────────────────────

type Mention =
  | { kind: "state"; rawName: string; value: ScalarValue }
  | { kind: "fault"; rawName: string };

/** A known state or fault named on its own, optionally after a component: "Motor rpm", "overheating". */
function recognizeMention(item: string, ctx: ExtractionContext): Mention | undefined {
  const { rest } = splitComponentPrefix(item, ctx);
  const value = lookup(STATE_DEFAULTS, stateName(rest));
  if (value !== undefined) return { kind: "state", rawName: item, value };
  if (FAULT_NOUNS.has(toLowerIdentifier(cleanItem(rest)))) return { kind: "fault", rawName: item };
  return undefined;
}

/**
 * A clause made of known state and fault names, such as "rpm, temperature" or
 * "overheating and stall". Untargeted, so merge attaches them to the focus.
 */
function extractMentions(clause: string, ctx: ExtractionContext): boolean {
  const items = splitList(clause).map((item) => ({ item, mention: recognizeMention(item, ctx) }));
  if (!items.some((i) => i.mention)) return false;

  for (const { item, mention } of items) {
    if (mention?.kind === "state") {
      pushState(mention.rawName, mention.value, false, undefined, "vocabulary", ctx);
    } else if (mention?.kind === "fault") {
      proposeFaults([mention.rawName], undefined, ctx, "vocabulary");
    } else if (!scanVocabulary(item, ctx)) {
      ctx.result.notes.push({ kind: "discarded", message: `Could not understand "${item}"`, fragment: item });
    }
  }
  return true;
}

// ─── Flows & connections ─────────────────────────────────────────────────────

function proposeFlow(raw: string, ctx: ExtractionContext): string | undefined {
  const name = toClassName(cleanItem(raw));
  if (!name) {
    ctx.result.notes.push({
      kind: "rejected-name",
      message: `Flow name "${raw}" has no usable characters`,
      fragment: raw,
    });
    return undefined;
  }
  const key = nameKey(name);
  const existing = ctx.flows.get(key);
  if (existing) return existing;
  ctx.flows.set(key, name);
  ctx.result.flows.push({ name, variables: [], confidence: CONFIDENCE.cue });
  return name;
}

function extractFlows(clause: string, ctx: ExtractionContext): boolean {
  const list = FLOW_LIST_CUE.exec(clause);
  if (list?.groups) {
    for (const item of splitListNoting(list.groups.list, ctx)) proposeFlow(item, ctx);
    return true;
  }

  const vars = FLOW_VARIABLES_CUE.exec(clause);
  if (!vars?.groups) return false;
  const flowName = proposeFlow(vars.groups.named ?? vars.groups.phrase ?? "", ctx);
  if (!flowName) return true;

  let proposal = ctx.result.flows.find((f) => f.name === flowName);
  if (!proposal) {
    proposal = { name: flowName, variables: [], confidence: CONFIDENCE.cue };
    ctx.result.flows.push(proposal);
  }
  for (const item of splitListNoting(vars.groups.list, ctx)) {
    const assignment = parseAssignment(item);
    const name = stateName(assignment ? assignment.name : item);
    if (!name) {
      ctx.result.notes.push({ kind: "rejected-name", message: `Variable name "${item}" has no usable characters`, fragment: item });
      continue;
    }
    proposal.variables.push({ name, default: assignment ? assignment.value : lookup(STATE_DEFAULTS, name) ?? 0 });
  }
  return true;
}

function extractConnection(clause: string, ctx: ExtractionContext): boolean {
  for (const pattern of CONNECTION_CUES) {
    const match = pattern.exec(clause);
    if (!match?.groups) continue;
    const from = proposeComponent(match.groups.from, "reference", ctx);
    const to = proposeComponent(match.groups.to, "reference", ctx);
    const flow = proposeFlow(match.groups.flow, ctx);
    if (from && to && flow) {
      ctx.result.connections.push({ from, to, flow, confidence: CONFIDENCE.reference });
    }
    return true;
  }
  return false;
}

// ─── Post-processing ─────────────────────────────────────────────────────────

/** States and faults with nowhere to go are dropped rather than guessed. */
function dropUnattached(ctx: ExtractionContext): void {
  if (ctx.components.size > 0) return;
  const states = ctx.result.states.length;
  const faults = ctx.result.faults.length;
  if (states + faults === 0) return;
  ctx.result.states = [];
  ctx.result.faults = [];
  ctx.result.notes.push({
    kind: "unattached",
    message: `Ignored ${states} state(s) and ${faults} fault(s) given before any component was named`,
  });
}
