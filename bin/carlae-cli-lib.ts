// bin/carlae-cli-lib.ts
// Shared CLI utilities for the carlae command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import { loadConfig, type CarlaeConfig, type PartialConfig } from "../src/core/config";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  eval?: string;
  file?: string;
  verbose?: boolean;
  maxDepth?: number;
  configFile?: string;
  mode?: "repl" | "exec";
  errors?: string[];
};

export type CliConfig = {
  mode: "repl" | "exec";
  verbose: boolean;
  code?: string;
  file?: string;
  configFile?: string;
  overrides: PartialConfig;
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = {};
  const errors: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--verbose") {
      result.verbose = true;
    } else if (arg === "--eval" || arg === "-e") {
      result.eval = args[++i] ?? "";
      result.mode = "exec";
    } else if (arg === "--config" || arg === "-c") {
      result.configFile = args[++i];
    } else if (arg === "--max-depth") {
      const raw = args[++i];
      const n = raw === undefined || raw.trim() === "" ? NaN : Number(raw);
      if (!Number.isInteger(n)) errors.push(`--max-depth expects a number, got ${raw ?? "nothing"}`);
      else result.maxDepth = n;
    } else if (!arg.startsWith("-")) {
      // First non-flag argument is the file
      if (!result.file) {
        result.file = arg;
        result.mode = "exec";
      }
    }
    // Ignore unknown flags
  }

  if (!result.mode) {
    result.mode = "repl";
  }
  if (errors.length > 0) {
    result.errors = errors;
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
carlae - Carlae interpreter

USAGE:
  carlae [options]                    Start the interactive REPL
  carlae [options] <file>             Evaluate every form in a file
  carlae --eval <code>                Evaluate code directly

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -e, --eval <code>                  Evaluate code and exit
  -c, --config <file>                Load configuration from a JSON or YAML file
  --max-depth <n>                    Maximum evaluation depth
  --verbose                          Show error details and stack traces

REPL:
  Type an expression and press enter. Unbalanced input continues on the
  next line. EXIT (or the configured exit command) ends the session.

EXAMPLES:
  carlae                             # Start REPL
  carlae program.carlae              # Run a file
  carlae --eval "(+ 1 2)"            # Evaluate expression
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  // bin/ when run from source, dist/bin/ once built
  const candidates = [
    path.join(__dirname, "..", "package.json"),
    path.join(__dirname, "..", "..", "package.json"),
  ];
  for (const pkgPath of candidates) {
    if (!fs.existsSync(pkgPath)) continue;
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return `carlae v${pkg.version}`;
    }
  }
  return "carlae v0.1.0";
}

// ═══════════════════════════════════════════════════════════════════════════════
// MODE DETECTION
// ═══════════════════════════════════════════════════════════════════════════════

export function detectMode(args: Partial<CliArgs>): "repl" | "exec" {
  if (args.mode) {
    return args.mode;
  }
  if (args.eval !== undefined || args.file) {
    return "exec";
  }
  return "repl";
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

export function buildConfig(args: Partial<CliArgs>): CliConfig {
  const config: CliConfig = {
    mode: detectMode(args),
    verbose: args.verbose || false,
    overrides: args.maxDepth !== undefined ? { runtime: { maxDepth: args.maxDepth } } : {},
  };

  if (args.eval !== undefined) {
    config.code = args.eval;
  }

  if (args.file) {
    config.file = args.file;
  }

  if (args.configFile) {
    config.configFile = args.configFile;
  }

  return config;
}

/** CLI overrides layered over env vars and config file. */
export function resolveConfig(cli: CliConfig): CarlaeConfig {
  return loadConfig({ configFile: cli.configFile, overrides: cli.overrides });
}
