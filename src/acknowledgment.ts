// src/acknowledgment.ts — Per-turn summary of what was understood
// Built only from this turn's changes, conflicts and notes.

import type { AmbiguityNote, Change, ChangeKind, MergeConflict } from "./types.js";
import { formatValue } from "./merge.js";

export const NOTHING_UNDERSTOOD = "Nothing new understood.";

function ofKind(changes: Change[], kind: ChangeKind): Change[] {
  return changes.filter((c) => c.kind === kind);
}

/** Group by owner, keeping first-seen order. */
function byOwner(changes: Change[]): Array<[string, Change[]]> {
  const groups = new Map<string, Change[]>();
  for (const change of changes) {
    const owner = change.owner ?? "";
    const group = groups.get(owner);
    if (group) group.push(change);
    else groups.set(owner, [change]);
  }
  return [...groups.entries()];
}

function assignment(change: Change): string {
  return change.value === undefined ? change.name : `${change.name}=${formatValue(change.value)}`;
}

function fault(change: Change): string {
  return typeof change.value === "number" ? `${change.name} (rate ${change.value})` : change.name;
}

function ownedLines(
  changes: Change[],
  prefix: "+" | "~",
  label: string,
  item: (c: Change) => string,
): string[] {
  const suffix = prefix === "~" ? " (updated)" : "";
  return byOwner(changes).map(
    ([owner, group]) => `${prefix} ${owner} ${label}: ${group.map(item).join(", ")}${suffix}`,
  );
}

export function formatAcknowledgment(
  changes: Change[],
  conflicts: MergeConflict[],
  notes: AmbiguityNote[],
): string {
  const lines: string[] = [];

  for (const c of ofKind(changes, "system-name")) lines.push(`+ system name: ${c.name}`);
  for (const c of ofKind(changes, "system-description")) {
    if (typeof c.value === "string") lines.push(`+ description: ${c.value}`);
  }

  const components = ofKind(changes, "component-added");
  if (components.length > 0) lines.push(`+ components: ${components.map((c) => c.name).join(", ")}`);

  lines.push(...ownedLines(ofKind(changes, "state-added"), "+", "states", assignment));
  lines.push(...ownedLines(ofKind(changes, "fault-added"), "+", "faults", fault));
  lines.push(...ownedLines(ofKind(changes, "fault-updated"), "~", "faults", fault));

  const flows = ofKind(changes, "flow-added");
  if (flows.length > 0) lines.push(`+ flows: ${flows.map((c) => c.name).join(", ")}`);
  lines.push(...ownedLines(ofKind(changes, "flow-variable-added"), "+", "variables", assignment));

  const connections = ofKind(changes, "connection-added");
  if (connections.length > 0) {
    const items = connections.map((c) => (typeof c.value === "string" ? `${c.name} via ${c.value}` : c.name));
    lines.push(`+ connections: ${items.join(", ")}`);
  }

  for (const conflict of conflicts) lines.push(`! conflict: ${conflict.message}`);
  for (const note of notes) lines.push(`? note: ${note.message}`);

  return lines.length > 0 ? lines.join("\n") : NOTHING_UNDERSTOOD;
}
