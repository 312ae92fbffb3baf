// src/core/config/config.ts
// Configuration for the interpreter and its REPL

import * as fs from "fs";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { DEFAULT_MAX_DEPTH } from "../eval/evaluate";

// =========================================================================
// Configuration Types
// =========================================================================

export type ReplConfig = {
  /** Printed before each input line */
  prompt: string;
  /** Printed before each result */
  outputPrefix: string;
  /** A line equal to this ends the session */
  exitCommand: string;
};

export type RuntimeConfig = {
  /** Maximum evaluation nesting before a resource error */
  maxDepth: number;
};

export type CarlaeConfig = {
  repl: ReplConfig;
  runtime: RuntimeConfig;
};

export type PartialConfig = {
  repl?: Partial<ReplConfig>;
  runtime?: Partial<RuntimeConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_REPL_CONFIG: ReplConfig = {
  prompt: "in> ",
  outputPrefix: "out> ",
  exitCommand: "EXIT",
};

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
  maxDepth: DEFAULT_MAX_DEPTH,
};

export const DEFAULT_CONFIG: CarlaeConfig = {
  repl: DEFAULT_REPL_CONFIG,
  runtime: DEFAULT_RUNTIME_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["carlae.config.json", "carlae.config.yaml", "carlae.config.yml"];

// =========================================================================
// Configuration Loading
// =========================================================================

function intOrUndefined(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const n = Number(raw);
  return Number.isInteger(n) ? n : undefined;
}

/**
 * Load configuration from environment variables. Unset variables are left
 * out so that merging keeps whatever came before.
 */
export function configFromEnv(prefix = "CARLAE"): PartialConfig {
  const repl: Partial<ReplConfig> = {};
  const runtime: Partial<RuntimeConfig> = {};

  const prompt = process.env[`${prefix}_PROMPT`];
  if (prompt !== undefined) repl.prompt = prompt;
  const outputPrefix = process.env[`${prefix}_OUTPUT_PREFIX`];
  if (outputPrefix !== undefined) repl.outputPrefix = outputPrefix;
  const exitCommand = process.env[`${prefix}_EXIT_COMMAND`];
  if (exitCommand !== undefined) repl.exitCommand = exitCommand;

  const maxDepth = intOrUndefined(process.env[`${prefix}_MAX_DEPTH`]);
  if (maxDepth !== undefined) runtime.maxDepth = maxDepth;

  return { repl, runtime };
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): PartialConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;
  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    data = parseYaml(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  if (!isRecord(data)) {
    throw new Error(`Config file must contain an object: ${filePath}`);
  }
  return configFromObject(data);
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function pickString(obj: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const k of keys) {
    const v = obj[k];
    if (typeof v === "string") return v;
  }
  return undefined;
}

function pickNumber(obj: Record<string, unknown>, ...keys: string[]): number | undefined {
  for (const k of keys) {
    const v = obj[k];
    if (typeof v === "number" && Number.isFinite(v)) return v;
  }
  return undefined;
}

/**
 * Create configuration from a plain object (e.g., from parsed JSON/YAML).
 * Accepts camelCase and snake_case keys; values of the wrong type are ignored.
 */
export function configFromObject(data: Record<string, unknown>): PartialConfig {
  const replRaw = data.repl;
  const runtimeRaw = data.runtime;
  const replData = isRecord(replRaw) ? replRaw : {};
  const runtimeData = isRecord(runtimeRaw) ? runtimeRaw : {};

  const repl: Partial<ReplConfig> = {};
  const prompt = pickString(replData, "prompt");
  if (prompt !== undefined) repl.prompt = prompt;
  const outputPrefix = pickString(replData, "outputPrefix", "output_prefix");
  if (outputPrefix !== undefined) repl.outputPrefix = outputPrefix;
  const exitCommand = pickString(replData, "exitCommand", "exit_command");
  if (exitCommand !== undefined) repl.exitCommand = exitCommand;

  const runtime: Partial<RuntimeConfig> = {};
  const maxDepth = pickNumber(runtimeData, "maxDepth", "max_depth");
  if (maxDepth !== undefined) runtime.maxDepth = maxDepth;

  return { repl, runtime };
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: PartialConfig[]): CarlaeConfig {
  const result: CarlaeConfig = {
    repl: { ...DEFAULT_CONFIG.repl },
    runtime: { ...DEFAULT_CONFIG.runtime },
  };

  for (const cfg of configs) {
    if (cfg.repl) {
      result.repl = { ...result.repl, ...cfg.repl };
    }
    if (cfg.runtime) {
      result.runtime = { ...result.runtime, ...cfg.runtime };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialConfig;
  cwd?: string;
}): CarlaeConfig {
  const layers: PartialConfig[] = [configFromEnv()];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    const found = DEFAULT_CONFIG_FILES.map(f => path.join(cwd, f)).find(p => fs.existsSync(p));
    if (found) layers.push(configFromFile(found));
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: CarlaeConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!Number.isInteger(config.runtime.maxDepth) || config.runtime.maxDepth < 1) {
    errors.push("maxDepth must be a positive integer");
  } else if (config.runtime.maxDepth < 32) {
    warnings.push("maxDepth is very low, ordinary programs may hit it");
  }

  if (config.repl.exitCommand.trim() === "") {
    errors.push("exitCommand must not be empty");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
