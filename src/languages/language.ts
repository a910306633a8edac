/**
 * What a front-end language supplies to the runner.
 */

import type { Value } from "../object/object.js";
import type { ExecutionContext } from "../runtime/context.js";

export interface CompileOptions {
  maxParseDepth?: number;
}

/**
 * A program parsed by some language, ready to run in a context.
 */
export interface CompiledProgram {
  execute(context: ExecutionContext): Value;
  /** Printable form of the parsed program. */
  toString(): string;
}

export interface Language {
  readonly name: string;
  readonly description: string;
  /** File extensions, including the dot */
  readonly extensions: readonly string[];
  /** Value of statements and calls that produce nothing */
  readonly unit: Value;
  /** Tokenize, normalize and parse a source text. */
  compile(source: string, options?: CompileOptions): CompiledProgram;
}
