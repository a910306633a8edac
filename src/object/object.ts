/**
 * Value capability interface. The kernel never looks inside a value; it
 * clones, compares, displays and downcasts through this interface only.
 * Concrete value types belong to the languages.
 */

import { RuntimeTypeError } from "../errors/errors.js";
import type { Span } from "../token/token.js";

export interface Value {
  /** Type name used in error messages. */
  readonly typeName: string;
  /** Copy for binding into another frame. Immutable values may return themselves. */
  clone(): Value;
  equals(other: Value): boolean;
  /** User-facing representation. */
  display(): string;
  /** Unambiguous representation, also used as a memoization key. */
  debug(): string;
  /** Present on values usable as branch and loop conditions. */
  asBoolean?(): boolean;
}

/**
 * Narrow a value to a concrete type, or fail with a runtime type error.
 */
export function downcast<T extends Value>(
  value: Value,
  ctor: abstract new (...args: never[]) => T,
  expected: string,
  span?: Span
): T {
  if (value instanceof ctor) {
    return value;
  }
  throw new RuntimeTypeError(`expected ${expected}, got ${value.typeName}`, span);
}

/**
 * Truth value of a boolean-capable value.
 */
export function requireBoolean(value: Value, span?: Span): boolean {
  if (value.asBoolean === undefined) {
    throw new RuntimeTypeError(`expected a boolean condition, got ${value.typeName}`, span);
  }
  return value.asBoolean();
}

/**
 * A user-defined function. Each execution strategy supplies its own body type.
 */
export class FunctionValue<Body> implements Value {
  readonly typeName = "function";

  constructor(
    public readonly name: string,
    public readonly params: readonly string[],
    public readonly body: Body
  ) {}

  clone(): Value {
    return this;
  }

  equals(other: Value): boolean {
    return other === this;
  }

  display(): string {
    return `<function ${this.name}>`;
  }

  debug(): string {
    return `<function ${this.name}(${this.params.join(", ")})>`;
  }
}
