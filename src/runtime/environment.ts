/**
 * Stack of scope frames mapping names to values.
 */

import { ScopeError } from "../errors/errors.js";
import type { Value } from "../object/object.js";
import type { Span } from "../token/token.js";

/**
 * One level of the binding stack.
 */
export type ScopeFrame = Map<string, Value>;

/**
 * Environment owns the scope stack of one program run. The global frame is
 * created with it and can never be popped.
 *
 * Two binding operations are deliberately distinct:
 * - `set` mutates the innermost existing binding, or creates one in the
 *   current frame when none exists ("flat" assignment).
 * - `bind` always creates or overwrites in the current frame, shadowing any
 *   outer binding ("block-local" declaration).
 */
export class Environment {
  private frames: ScopeFrame[] = [new Map()];

  /** Number of frames, including the global frame. */
  get depth(): number {
    return this.frames.length;
  }

  pushScope(): void {
    this.frames.push(new Map());
  }

  popScope(): void {
    if (this.frames.length === 1) {
      throw new ScopeError("cannot pop the global scope");
    }
    this.frames.pop();
  }

  /**
   * Run fn inside a fresh frame. The frame is popped on every exit path,
   * whether fn returns normally or throws.
   */
  withScope<T>(fn: () => T): T {
    this.pushScope();
    const depth = this.frames.length;
    try {
      return fn();
    } finally {
      // Drop anything fn left behind as well as our own frame
      this.frames.length = depth - 1;
    }
  }

  /**
   * Look a name up from the innermost frame outwards.
   */
  lookup(name: string): Value | undefined {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const value = this.frames[i].get(name);
      if (value !== undefined) {
        return value;
      }
    }
    return undefined;
  }

  /**
   * Look a name up, failing with a scope error when it is not bound.
   */
  get(name: string, span?: Span): Value {
    const value = this.lookup(name);
    if (value === undefined) {
      throw new ScopeError(`undefined variable '${name}'`, span);
    }
    return value;
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }

  set(name: string, value: Value): void {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const frame = this.frames[i];
      if (frame.has(name)) {
        frame.set(name, value);
        return;
      }
    }
    this.current().set(name, value);
  }

  bind(name: string, value: Value): void {
    this.current().set(name, value);
  }

  /** Names bound in the current frame. */
  localNames(): string[] {
    return [...this.current().keys()];
  }

  private current(): ScopeFrame {
    return this.frames[this.frames.length - 1];
  }
}
