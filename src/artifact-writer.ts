// src/artifact-writer.ts — Persist rendered artifacts
// The only place generated files touch the disk.

import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import type { RenderResult } from "./types.js";

export interface WriteOptions {
  /** Directory the output directory is created under. */
  baseDir: string;
  dryRun?: boolean;
}

export interface WriteReport {
  outputDir: string;
  written: string[];
  dryRun: boolean;
}

/** Planned paths (relative to outputDir) that already exist under baseDir/outputDir. */
export function findExistingPaths(baseDir: string, outputDir: string, paths: string[]): string[] {
  const root = resolve(baseDir, outputDir);
  return paths.filter((p) => existsSync(join(root, p)));
}

export function writeArtifacts(result: RenderResult, options: WriteOptions): WriteReport {
  const outputDir = resolve(options.baseDir, result.outputDir);
  const written: string[] = [];
  for (const artifact of result.artifacts) {
    const target = join(outputDir, artifact.path);
    if (!options.dryRun) writeFileSafe(target, artifact.content);
    written.push(target);
  }
  return { outputDir, written, dryRun: options.dryRun ?? false };
}

function writeFileSafe(filePath: string, content: string): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
}
