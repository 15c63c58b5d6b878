// src/config.ts — Config Resolver
// Merges defaults ← config file ← CLI args. Bad values become warnings and fall back to defaults.

import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { z } from "zod";
import type { ReadinessPolicy, ResolvedConfig, Warning } from "./types.js";
import { toLowerIdentifier } from "./identifiers.js";
import { DEFAULT_READINESS } from "./readiness.js";
import { clampQuestions, MAX_QUESTIONS } from "./question-selector.js";
import { DEFAULT_SIMULATION, DEFAULT_SYSTEM_NAME } from "./spec-model.js";

export const CONFIG_FILENAME = "fault-model.config.json";
export const PACKAGE_JSON_KEY = "faultModel";

export interface ParsedArgs {
  command?: string;
  files: string[];
  output?: string;
  config?: string;
  from?: string;
  name?: string;
  readiness?: string;
  maxQuestions?: number;
  force: boolean;
  quiet: boolean;
  verbose: boolean;
  dryRun: boolean;
  help: boolean;
}

const READINESS_POLICIES = ["states-or-faults", "states-and-faults"] as const;

const configFileSchema = z.object({
  readiness: z.enum(READINESS_POLICIES).optional(),
  maxQuestions: z.number().int().optional(),
  defaultName: z.string().min(1).optional(),
  output: z.object({ dir: z.string().min(1).optional() }).optional(),
  simulation: z
    .object({
      sampleRun: z.boolean().optional(),
      faultAnalysis: z.boolean().optional(),
      parameterStudy: z.boolean().optional(),
    })
    .optional(),
  force: z.boolean().optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

const DEFAULTS: ResolvedConfig = {
  readiness: DEFAULT_READINESS,
  maxQuestions: MAX_QUESTIONS,
  defaultName: DEFAULT_SYSTEM_NAME,
  output: {
    dir: ".",
  },
  simulation: DEFAULT_SIMULATION,
  force: false,
  dryRun: false,
  verbose: false,
};

function isReadinessPolicy(value: string): value is ReadinessPolicy {
  return READINESS_POLICIES.some((p) => p === value);
}

/**
 * Resolve config from CLI args, config file, and defaults.
 */
export function resolveConfig(
  args: ParsedArgs,
  warnings: Warning[] = [],
  cwd: string = process.cwd(),
): ResolvedConfig {
  const fileConfig = loadConfigFile(args.config, warnings, cwd);

  let readiness = fileConfig?.readiness ?? DEFAULTS.readiness;
  if (args.readiness !== undefined) {
    if (isReadinessPolicy(args.readiness)) {
      readiness = args.readiness;
    } else {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Unknown readiness policy "${args.readiness}"; using "${readiness}". Expected one of: ${READINESS_POLICIES.join(", ")}`,
      });
    }
  }

  const requested = args.maxQuestions ?? fileConfig?.maxQuestions ?? DEFAULTS.maxQuestions;
  const maxQuestions = clampQuestions(requested);
  if (maxQuestions !== requested) {
    warnings.push({
      level: "warn",
      module: "config",
      message: `maxQuestions must be between 1 and ${MAX_QUESTIONS}; using ${maxQuestions}`,
    });
  }

  let defaultName = DEFAULTS.defaultName;
  if (fileConfig?.defaultName) {
    const sanitized = toLowerIdentifier(fileConfig.defaultName);
    if (sanitized) {
      defaultName = sanitized;
    } else {
      warnings.push({
        level: "warn",
        module: "config",
        message: `defaultName "${fileConfig.defaultName}" has no usable characters; using "${defaultName}"`,
      });
    }
  }

  return {
    readiness,
    maxQuestions,
    defaultName,
    output: {
      dir: resolve(cwd, args.output ?? fileConfig?.output?.dir ?? DEFAULTS.output.dir),
    },
    simulation: { ...DEFAULTS.simulation, ...fileConfig?.simulation },
    force: args.force || (fileConfig?.force ?? DEFAULTS.force),
    dryRun: args.dryRun,
    verbose: args.verbose,
  };
}

function loadConfigFile(
  configPath: string | undefined,
  warnings: Warning[],
  cwd: string,
): ConfigFile | null {
  // Explicit config path
  if (configPath) {
    const absPath = resolve(cwd, configPath);
    if (!existsSync(absPath)) {
      warnings.push({
        level: "warn",
        module: "config",
        message: `Config file not found: ${configPath}`,
      });
      return null;
    }
    return parseConfigFile(absPath, warnings);
  }

  const jsonConfig = join(cwd, CONFIG_FILENAME);
  if (existsSync(jsonConfig)) {
    return parseConfigFile(jsonConfig, warnings);
  }

  const pkgJson = join(cwd, "package.json");
  if (existsSync(pkgJson)) {
    try {
      const pkg: unknown = JSON.parse(readFileSync(pkgJson, "utf-8"));
      if (typeof pkg === "object" && pkg !== null && PACKAGE_JSON_KEY in pkg) {
        return validateConfig(pkg[PACKAGE_JSON_KEY], pkgJson, warnings);
      }
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      warnings.push({ level: "info", module: "config", message: `Ignoring unreadable ${pkgJson}: ${msg}` });
    }
  }

  return null;
}

function parseConfigFile(filePath: string, warnings: Warning[]): ConfigFile | null {
  try {
    const content = readFileSync(filePath, "utf-8");
    return validateConfig(JSON.parse(content), filePath, warnings);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "config",
      message: `Failed to parse config file ${filePath}: ${msg}`,
    });
    return null;
  }
}

function validateConfig(raw: unknown, filePath: string, warnings: Warning[]): ConfigFile | null {
  const parsed = configFileSchema.safeParse(raw);
  if (parsed.success) return parsed.data;
  for (const issue of parsed.error.issues) {
    warnings.push({
      level: "warn",
      module: "config",
      message: `Ignoring config file ${filePath}: ${issue.path.join(".") || "(root)"}: ${issue.message}`,
      file: filePath,
    });
  }
  return null;
}

function stringArg(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/**
 * Parse CLI args using mri.
 */
export async function parseCliArgs(argv: string[]): Promise<ParsedArgs> {
  const mri = (await import("mri")).default;
  const args = mri(argv, {
    alias: { o: "output", c: "config", q: "quiet", v: "verbose", h: "help" },
    boolean: ["force", "dry-run", "quiet", "verbose", "help"],
    string: ["output", "config", "from", "name", "readiness", "max-questions"],
  });

  const [command, ...files] = args._.map(String);
  const maxQuestions = stringArg(args["max-questions"]);
  return {
    command,
    files,
    output: stringArg(args.output),
    config: stringArg(args.config),
    from: stringArg(args.from),
    name: stringArg(args.name),
    readiness: stringArg(args.readiness),
    maxQuestions: maxQuestions !== undefined ? Number(maxQuestions) : undefined,
    force: args.force === true,
    quiet: args.quiet === true,
    verbose: args.verbose === true,
    dryRun: args["dry-run"] === true,
    help: args.help === true,
  };
}
