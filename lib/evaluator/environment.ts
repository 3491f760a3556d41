/**
 * Lexical environments.
 *
 * An environment is a chain of frames. Each frame maps names to thunks and
 * points at its parent; frames never point at their children. The top-level
 * frame is updated in place by bindings, while the frame built for each
 * closure application is fixed once created.
 *
 * @module
 */
import type { Thunk } from "./thunk.js";

export class Environment {
  private readonly frame: Map<string, Thunk>;
  readonly parent: Environment | null;

  constructor(parent: Environment | null = null) {
    this.frame = new Map();
    this.parent = parent;
  }

  /**
   * Finds the innermost binding of `name`.
   */
  lookup(name: string): Thunk | undefined {
    for (let env: Environment | null = this; env !== null; env = env.parent) {
      const found = env.frame.get(name);
      if (found !== undefined) {
        return found;
      }
    }
    return undefined;
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  /**
   * Binds or rebinds `name` in this frame.
   */
  define(name: string, thunk: Thunk): void {
    this.frame.set(name, thunk);
  }

  /**
   * Creates a child frame binding `name` to `thunk`. A null name yields an
   * empty child frame.
   */
  extend(name: string | null, thunk: Thunk): Environment {
    const child = new Environment(this);
    if (name !== null) {
      child.frame.set(name, thunk);
    }
    return child;
  }

  /**
   * Names bound directly in this frame, in binding order.
   */
  ownNames(): string[] {
    return [...this.frame.keys()];
  }
}
