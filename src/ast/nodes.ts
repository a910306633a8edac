/**
 * Executable nodes for the tree-walking strategy. Concrete node classes
 * belong to the languages; the kernel only knows these two operations.
 */

import type { Span } from "../token/token.js";
import type { Value } from "../object/object.js";
import type { Outcome } from "../runtime/signal.js";
import type { Interpreter } from "../interpreter/interpreter.js";

/**
 * Base interface for all executable nodes.
 */
export interface ExecutableNode {
  readonly span: Span;
  /** Evaluate to a value. Statements with no value return the unit value. */
  evaluate(interp: Interpreter): Value;
  /** Execute for effect, producing a control signal. */
  execute(interp: Interpreter): Outcome;
  /** Source form; parsing it again yields an equivalent tree. */
  toString(): string;
}

/**
 * A parsed program: a sequence of top-level statements.
 */
export class Program {
  constructor(public readonly statements: readonly ExecutableNode[]) {}

  toString(): string {
    return this.statements.map((s) => s.toString()).join("\n");
  }
}
