#!/usr/bin/env node
// CLI entry point for fault-model-builder

import { readFileSync } from "node:fs";
import { intro, isCancel, log, note, outro, text } from "@clack/prompts";
import pc from "picocolors";
import {
  ArtifactCollisionError,
  createSession,
  ENGINE_VERSION,
  findExistingPaths,
  loadPrefill,
  outputDirFor,
  parseLevelSpec,
  plannedPaths,
  render,
  SpecValidationError,
  writeArtifacts,
} from "../index.js";
import type { BuilderSession } from "../index.js";
import { parseCliArgs, resolveConfig, type ParsedArgs } from "../config.js";
import { toLowerIdentifier } from "../identifiers.js";
import type { LevelSpec, RenderResult, ResolvedConfig, TurnResult, Warning } from "../types.js";

const HELP_TEXT = `
fault-model-builder v${ENGINE_VERSION}

Usage:
  fault-model-builder create [--from <spec.json>] [--name <name>]
                                         Describe a system interactively, then generate it
  fault-model-builder render <spec.json>...
                                         Render one or more LevelSpec JSON files

Options:
  --output, -o         Directory the model directory is created in (default: current directory)
  --config, -c         Path to config file (default: fault-model.config.json)
  --from               Pre-fill the session from a LevelSpec-shaped JSON file
  --name               Starting system name
  --readiness          states-or-faults (default) or states-and-faults
  --max-questions      Follow-up questions per turn, 1-3 (default: 3)
  --force              Overwrite existing generated files
  --dry-run            Print the generated files instead of writing them
  --quiet, -q          Suppress warnings
  --verbose, -v        Print progress details
  --help, -h           Show this help text

In a create session, type "help", "status", "generate" or "quit".

Examples:
  fault-model-builder create -o ./models
  fault-model-builder create --from diagram-spec.json
  fault-model-builder render motor.json pump.json --dry-run
`.trim();

function vlog(verbose: boolean, msg: string): void {
  if (verbose) process.stderr.write(`[INFO] ${msg}\n`);
}

function printWarnings(warnings: Warning[], quiet: boolean): void {
  if (quiet) return;
  for (const w of warnings) {
    process.stderr.write(`[${w.level}] ${w.module}: ${w.message}\n`);
  }
}

async function main() {
  const args = await parseCliArgs(process.argv.slice(2));

  if (args.help || !args.command) {
    process.stdout.write(HELP_TEXT + "\n");
    process.exit(0);
  }

  const warnings: Warning[] = [];
  const config = resolveConfig(args, warnings);
  vlog(config.verbose, `Output directory: ${config.output.dir}; readiness: ${config.readiness}`);

  if (args.command === "create") {
    await runCreate(args, config, warnings);
    printWarnings(warnings, args.quiet);
    process.exit(0);
  }

  if (args.command === "render") {
    const failures = runRender(args, config, warnings);
    printWarnings(warnings, args.quiet);
    process.exit(failures > 0 ? 1 : 0);
  }

  process.stderr.write(`Unknown command "${args.command}"\n\n${HELP_TEXT}\n`);
  process.exit(1);
}

// ─── Output ──────────────────────────────────────────────────────────────────

function writeResult(result: RenderResult, config: ResolvedConfig, args: ParsedArgs, warnings: Warning[]): void {
  warnings.push(...result.warnings);
  const report = writeArtifacts(result, { baseDir: config.output.dir, dryRun: config.dryRun });

  if (config.dryRun) {
    for (const artifact of result.artifacts) {
      process.stdout.write(`\n--- ${result.outputDir}/${artifact.path} ---\n${artifact.content}`);
    }
    return;
  }
  if (!args.quiet) {
    const suffix = result.overwrite ? " (existing files overwritten)" : "";
    process.stderr.write(`Written ${report.written.length} files to ${report.outputDir}${suffix}\n`);
  }
}

function existingFor(spec: LevelSpec, config: ResolvedConfig): string[] {
  return findExistingPaths(config.output.dir, outputDirFor(spec), plannedPaths(spec));
}

// ─── render ──────────────────────────────────────────────────────────────────

/** Render each file independently; returns the number that failed. */
function runRender(args: ParsedArgs, config: ResolvedConfig, warnings: Warning[]): number {
  if (args.files.length === 0) {
    throw new Error("render needs at least one LevelSpec JSON file");
  }

  let failures = 0;
  for (const file of args.files) {
    try {
      vlog(config.verbose, `Rendering ${file}`);
      const spec = parseLevelSpec(JSON.parse(readFileSync(file, "utf-8")), config.readiness);
      const result = render(spec, {
        force: config.force,
        existingPaths: existingFor(spec, config),
        readiness: config.readiness,
      });
      writeResult(result, config, args, warnings);
    } catch (err: unknown) {
      failures++;
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push({ level: "error", module: "render", message: msg, file });
      process.stderr.write(`${pc.red("✗")} ${file}\n`);
    }
  }
  return failures;
}

// ─── create ──────────────────────────────────────────────────────────────────

function showTurn(turn: TurnResult): void {
  if (turn.conflicts.length > 0) log.warn(turn.acknowledgment);
  else if (turn.status === "READY") log.success(turn.acknowledgment);
  else log.info(turn.acknowledgment);
  if (turn.questions.length > 0) note(turn.questions.join("\n"), "Next");
}

/** Returns true once files were generated (or printed, under --dry-run). */
function tryGenerate(session: BuilderSession, config: ResolvedConfig, args: ParsedArgs, warnings: Warning[]): boolean {
  try {
    const result = session.generate({
      force: config.force,
      existingPaths: existingFor(session.snapshot(), config),
    });
    writeResult(result, config, args, warnings);
    return true;
  } catch (err: unknown) {
    if (err instanceof ArtifactCollisionError || err instanceof SpecValidationError) {
      log.error(err.message);
      return false;
    }
    throw err;
  }
}

async function runCreate(args: ParsedArgs, config: ResolvedConfig, warnings: Warning[]): Promise<void> {
  const name = args.name ? toLowerIdentifier(args.name) : "";
  const session = createSession({
    name: name || undefined,
    defaultName: config.defaultName,
    readiness: config.readiness,
    maxQuestions: config.maxQuestions,
    simulation: config.simulation,
  });

  intro(pc.bgCyan(pc.black(" fault-model-builder ")));

  if (args.from) {
    const partial = loadPrefill(args.from, warnings);
    if (partial) {
      vlog(config.verbose, `Pre-filled from ${args.from}`);
      showTurn(session.prefill(partial));
    }
  }
  log.info('Describe your system. Type "help", "status", "generate" or "quit".');

  for (;;) {
    const answer = await text({ message: pc.cyan("Describe"), placeholder: "components: Motor, Pump" });
    if (isCancel(answer) || /^(?:quit|exit)$/i.test(answer.trim())) {
      outro("Session ended without generating.");
      return;
    }
    if (!answer.trim()) continue;

    const turn = session.advance(answer);
    if (!turn.generateRequested) {
      showTurn(turn);
      continue;
    }
    if (turn.status !== "READY") {
      log.warn(turn.acknowledgment);
      if (turn.questions.length > 0) note(turn.questions.join("\n"), "Next");
      continue;
    }
    if (tryGenerate(session, config, args, warnings)) {
      outro(pc.green(`Model ${session.snapshot().name} generated.`));
      return;
    }
  }
}

main().catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Fatal error: ${msg}\n`);
  process.exit(1);
});
