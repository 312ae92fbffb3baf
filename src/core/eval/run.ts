// src/core/eval/run.ts
// Source text in, value out. The environment is handed back so callers
// (the REPL in particular) can thread bindings from one call to the next.

import type { Val } from "./values";
import { VNil } from "./values";
import type { Environment } from "./env";
import { evaluate, DEFAULT_MAX_DEPTH, type EvalOptions } from "./evaluate";
import { parseSource, parseProgram } from "../reader/parse";
import { createSessionEnv } from "../prims";
import { CarlaeResourceError } from "../errors";

export type RunOptions = EvalOptions;

export type RunResult = [value: Val, env: Environment];

export function run(src: string, env?: Environment, options: RunOptions = {}): RunResult {
  const target = env ?? createSessionEnv();
  const value = guardStack(() => evaluate(parseSource(src), target, options), options);
  return [value, target];
}

/** Evaluate each top-level form in turn; the value of the last one is returned. */
export function runProgram(src: string, env?: Environment, options: RunOptions = {}): RunResult {
  const target = env ?? createSessionEnv();
  const value = guardStack(() => {
    let last: Val = VNil;
    for (const expr of parseProgram(src)) last = evaluate(expr, target, options);
    return last;
  }, options);
  return [value, target];
}

/**
 * Host stack overflow surfaces as a CarlaeResourceError rather than a bare
 * RangeError, whichever limit is hit first.
 */
function guardStack<T>(thunk: () => T, options: RunOptions): T {
  try {
    return thunk();
  } catch (e) {
    if (e instanceof RangeError && /call stack/i.test(e.message)) {
      throw new CarlaeResourceError(options.maxDepth ?? DEFAULT_MAX_DEPTH);
    }
    throw e;
  }
}
