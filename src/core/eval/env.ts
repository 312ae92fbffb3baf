// src/core/eval/env.ts
// Lexical environments: one frame of bindings plus an optional parent.

import type { Val } from "./values";
import { CarlaeNameError } from "../errors";

export class Environment {
  private readonly frame = new Map<string, Val>();

  constructor(public readonly parent?: Environment, bindings?: Iterable<[string, Val]>) {
    if (bindings) {
      for (const [name, value] of bindings) this.frame.set(name, value);
    }
  }

  /**
   * Innermost binding of `name`, or undefined when no frame in the chain has it.
   * Presence is decided per frame with `has`, so any bound value is found.
   */
  lookup(name: string): Val | undefined {
    for (let cur: Environment | undefined = this; cur; cur = cur.parent) {
      if (cur.frame.has(name)) return cur.frame.get(name);
    }
    return undefined;
  }

  get(name: string): Val {
    const hit = this.lookup(name);
    if (hit === undefined) throw new CarlaeNameError(name);
    return hit;
  }

  /** Bind in this frame only; a same-named binding in a parent is shadowed, not changed. */
  set(name: string, value: Val): Val {
    this.frame.set(name, value);
    return value;
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  hasOwn(name: string): boolean {
    return this.frame.has(name);
  }

  /** New child frame (call frame) with `bindings` in it. */
  extend(bindings: Iterable<[string, Val]> = []): Environment {
    return new Environment(this, bindings);
  }

  names(): string[] {
    return Array.from(this.frame.keys()).sort();
  }
}
