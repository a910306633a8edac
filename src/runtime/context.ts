/**
 * Per-run execution state shared by both execution strategies.
 */

import { StackOverflowError } from "../errors/errors.js";
import type { ExternDispatcher } from "../extern/extern.js";
import type { Value } from "../object/object.js";
import type { Span } from "../token/token.js";
import { Environment } from "./environment.js";

/**
 * Execution options.
 */
export interface ExecutionOptions {
  /** Sink for user-visible output. Defaults to console.log. */
  output?: (line: string) => void;
  /** Cache results of functions the language marks memoizable. */
  memoize?: boolean;
  /** Maximum nesting of user function calls. Unlimited by default. */
  maxCallDepth?: number;
  /** Maximum expression nesting accepted by the parser. */
  maxParseDepth?: number;
}

/**
 * ExecutionContext owns the environment of one program run.
 */
export class ExecutionContext {
  readonly env: Environment;
  readonly externs: ExternDispatcher;
  /** Value of statements and calls that produce nothing. */
  readonly unit: Value;
  readonly options: ExecutionOptions;
  private callDepth = 0;

  constructor(externs: ExternDispatcher, unit: Value, options: ExecutionOptions = {}, env: Environment = new Environment()) {
    this.env = env;
    this.externs = externs;
    this.unit = unit;
    this.options = options;
  }

  /** Current nesting of user function calls. */
  get depth(): number {
    return this.callDepth;
  }

  /**
   * Track one level of user function call around fn.
   */
  withCall<T>(name: string, span: Span | undefined, fn: () => T): T {
    const limit = this.options.maxCallDepth;
    if (limit !== undefined && this.callDepth >= limit) {
      throw new StackOverflowError(`maximum call depth ${limit} exceeded calling '${name}'`, span);
    }
    this.callDepth++;
    try {
      return fn();
    } finally {
      this.callDepth--;
    }
  }
}
