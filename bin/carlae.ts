#!/usr/bin/env node
// bin/carlae.ts
// Carlae CLI - interactive REPL, file execution and expression evaluation
//
// Run:  npx tsx bin/carlae.ts [options] [file]

import * as readline from "readline";
import * as fs from "fs";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  buildConfig,
  resolveConfig,
  type CliConfig,
} from "./carlae-cli-lib";
import { validateConfig, type CarlaeConfig } from "../src/core/config";
import { runProgram } from "../src/core/eval/run";
import { formatValue } from "../src/core/eval/values";
import { isCarlaeError } from "../src/core/errors";
import { formatDiagnostic } from "../src/outcome/diagnostic";
import { ReplSession } from "../src/repl/session";

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<void> {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(getHelpText());
    return;
  }

  if (cliArgs.version) {
    console.log(getVersion());
    return;
  }

  if (cliArgs.errors) {
    for (const err of cliArgs.errors) console.error(`Error: ${err}`);
    process.exitCode = 2;
    return;
  }

  const cli = buildConfig(cliArgs);
  const config = resolveConfig(cli);

  const validation = validateConfig(config);
  for (const w of validation.warnings) console.error(`Warning: ${w}`);
  if (!validation.valid) {
    for (const err of validation.errors) console.error(`Error: ${err}`);
    process.exitCode = 2;
    return;
  }

  if (cli.mode === "exec") {
    executeMode(cli, config);
  } else {
    await replMode(cli, config);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXECUTE MODE (file or --eval)
// ═══════════════════════════════════════════════════════════════════════════════

function executeMode(cli: CliConfig, config: CarlaeConfig): void {
  let code: string;
  if (cli.file) {
    code = fs.readFileSync(cli.file, "utf8");
  } else if (cli.code !== undefined) {
    code = cli.code;
  } else {
    console.error("Error: No code or file specified");
    process.exitCode = 1;
    return;
  }

  if (cli.verbose) {
    console.error("Executing...");
  }

  try {
    const [value] = runProgram(code, undefined, { maxDepth: config.runtime.maxDepth });
    console.log(formatValue(value));
  } catch (error) {
    if (!isCarlaeError(error)) throw error;
    console.error(`Error: ${error.name}: ${error.message}`);
    if (cli.verbose) {
      console.error(formatDiagnostic(error.diagnostic));
      console.error(error.stack);
    }
    process.exitCode = 1;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// REPL MODE
// ═══════════════════════════════════════════════════════════════════════════════

async function replMode(cli: CliConfig, config: CarlaeConfig): Promise<void> {
  const session = new ReplSession(config, { verbose: cli.verbose });
  const interactive = Boolean(process.stdin.isTTY);

  const rl = readline.createInterface({
    input: process.stdin,
    output: interactive ? process.stdout : undefined,
    prompt: session.prompt,
  });

  if (interactive) rl.prompt();

  try {
    for await (const line of rl) {
      const out = session.feed(line);
      if (out.tag === "Exit") break;
      if (out.tag === "Value") console.log(out.text);
      if (out.tag === "Error") console.log(out.text);
      if (interactive) {
        rl.setPrompt(session.prompt);
        rl.prompt();
      }
    }
  } finally {
    rl.close();
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

main().catch((error: unknown) => {
  console.error("Fatal error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
