// src/spec-schema.ts — Runtime schema for LevelSpec-shaped JSON
// Accepts the hand-written shorthand (states as a record, faults as plain names)
// and normalizes it into the model's array form.

import { z } from "zod";
import type { ValidationIssue } from "./types.js";

const scalarSchema = z.union([z.number().finite(), z.boolean(), z.string()]);

const variableSchema = z.object({
  name: z.string().min(1, "name is required"),
  default: scalarSchema,
});

/** `[{ name, default }]` or `{ rpm: 1800, label: "x" }`. */
const variableListSchema = z.union([
  z.array(variableSchema),
  z.record(scalarSchema).transform((record) =>
    Object.entries(record).map(([name, value]) => ({ name, default: value })),
  ),
]);

const faultSchema = z.union([
  z.string().min(1, "fault name is required").transform((name) => ({ name })),
  z.object({
    name: z.string().min(1, "fault name is required"),
    rate: z.number().finite().nonnegative("fault rate must not be negative").optional(),
  }),
]);

const componentSchema = z.object({
  name: z.string().min(1, "component name is required"),
  description: z.string().default(""),
  states: variableListSchema.default([]),
  faults: z.array(faultSchema).default([]),
});

const flowSchema = z.object({
  name: z.string().min(1, "flow name is required"),
  description: z.string().default(""),
  variables: variableListSchema.default([]),
});

const connectionSchema = z.object({
  from: z.string().min(1),
  to: z.string().min(1),
  flow: z.string().min(1),
});

const architectureSchema = z.object({
  name: z.string().min(1).optional(),
  components: z.array(z.string().min(1)).optional(),
  connections: z.array(connectionSchema).default([]),
});

const simulationSchema = z.object({
  sampleRun: z.boolean().default(true),
  faultAnalysis: z.boolean().default(false),
  parameterStudy: z.boolean().default(false),
});

export const levelSpecInputSchema = z.object({
  name: z.string().min(1, "system name is required"),
  description: z.string().default(""),
  components: z.array(componentSchema).default([]),
  flows: z.array(flowSchema).default([]),
  architecture: architectureSchema.optional(),
  simulation: simulationSchema.optional(),
  // Conversation-only; recomputed on load.
  status: z.enum(["GATHERING", "READY"]).optional(),
});

/** Pre-fill payloads may leave out anything, including the name. */
export const partialLevelSpecSchema = levelSpecInputSchema.extend({
  name: z.string().optional(),
  simulation: simulationSchema.partial().optional(),
});

export type LevelSpecInput = z.input<typeof levelSpecInputSchema>;
export type ParsedLevelSpec = z.output<typeof levelSpecInputSchema>;
export type PartialLevelSpec = z.output<typeof partialLevelSpecSchema>;

export function zodIssuesToValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : "(root)",
    message: issue.message,
  }));
}
