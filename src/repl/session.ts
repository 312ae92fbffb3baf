// src/repl/session.ts
// Line-oriented REPL state: buffers unbalanced input, threads the environment
// between evaluations and classifies errors for display.

import { run } from "../core/eval/run";
import type { Environment } from "../core/eval/env";
import { formatValue } from "../core/eval/values";
import { tokenize, LPAREN, RPAREN } from "../core/reader/tokenize";
import { isCarlaeError } from "../core/errors";
import { formatDiagnostic } from "../outcome/diagnostic";
import type { CarlaeConfig } from "../core/config/config";
import { createSessionEnv } from "../core/prims";

export type ReplOutput =
  | { tag: "Value"; text: string }
  | { tag: "Error"; text: string }
  | { tag: "Continue" }
  | { tag: "Skip" }
  | { tag: "Exit" };

export type ReplSessionOptions = {
  verbose?: boolean;
  env?: Environment;
};

/** Net paren depth of a line, ignoring anything inside comments. */
export function parenBalance(line: string): number {
  let depth = 0;
  for (const t of tokenize(line)) {
    if (t === LPAREN) depth++;
    else if (t === RPAREN) depth--;
  }
  return depth;
}

export class ReplSession {
  private buffer: string[] = [];
  private depth = 0;
  private readonly verbose: boolean;
  env: Environment;

  constructor(private readonly config: CarlaeConfig, options: ReplSessionOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.env = options.env ?? createSessionEnv();
  }

  /** True while an unbalanced expression is being accumulated. */
  get pending(): boolean {
    return this.buffer.length > 0;
  }

  get prompt(): string {
    return this.pending ? ".. " : this.config.repl.prompt;
  }

  feed(line: string): ReplOutput {
    if (!this.pending && line.trim() === this.config.repl.exitCommand) return { tag: "Exit" };
    if (!this.pending && tokenize(line).length === 0) return { tag: "Skip" };

    this.buffer.push(line);
    this.depth += parenBalance(line);
    if (this.depth > 0) return { tag: "Continue" };

    const src = this.buffer.join("\n");
    this.buffer = [];
    this.depth = 0;
    return this.evaluate(src);
  }

  evaluate(src: string): ReplOutput {
    try {
      const [value, env] = run(src, this.env, { maxDepth: this.config.runtime.maxDepth });
      this.env = env;
      return { tag: "Value", text: `${this.config.repl.outputPrefix}${formatValue(value)}` };
    } catch (e) {
      if (!isCarlaeError(e)) throw e;
      return {
        tag: "Error",
        text: this.verbose ? `${e.name}: ${formatDiagnostic(e.diagnostic)}` : e.name,
      };
    }
  }
}
