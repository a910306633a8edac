/**
 * Executable nodes of the offside language. Blocks share the enclosing
 * frame; only function calls open a new one.
 */

import type { ExecutableNode } from "../../ast/nodes.js";
import { TreeFunction, Interpreter } from "../../interpreter/interpreter.js";
import type { Value } from "../../object/object.js";
import { Outcome, breakSignal, continueSignal, normal, returnSignal } from "../../runtime/signal.js";
import { requireBoolean } from "../../object/object.js";
import type { Span } from "../../token/token.js";
import { semantics } from "./semantics.js";

/** Selector used by the print statement. */
export const PRINT_SELECTOR = "console:print";

/**
 * Nodes evaluated for a value; executing one yields that value normally.
 */
abstract class Expression implements ExecutableNode {
  constructor(public readonly span: Span) {}

  abstract evaluate(interp: Interpreter): Value;
  abstract toString(): string;

  execute(interp: Interpreter): Outcome {
    return normal(this.evaluate(interp));
  }
}

/**
 * Nodes executed for effect; evaluating one executes it.
 */
abstract class Statement implements ExecutableNode {
  constructor(public readonly span: Span) {}

  abstract execute(interp: Interpreter): Outcome;
  abstract toString(): string;

  evaluate(interp: Interpreter): Value {
    return this.execute(interp).value;
  }
}

function indent(text: string): string {
  return text
    .split("\n")
    .map((line) => "    " + line)
    .join("\n");
}

function block(body: readonly ExecutableNode[]): string {
  return body.map((s) => indent(s.toString())).join("\n");
}

function argList(args: readonly ExecutableNode[]): string {
  return args.map((a) => a.toString()).join(", ");
}

// ============================================================================
// Expressions
// ============================================================================

/**
 * Number, string or constant keyword literal. Prints as written.
 */
export class Literal extends Expression {
  constructor(
    span: Span,
    public readonly text: string,
    public readonly value: Value
  ) {
    super(span);
  }

  evaluate(): Value {
    return this.value;
  }

  toString(): string {
    return this.text;
  }
}

export class Identifier extends Expression {
  constructor(
    span: Span,
    public readonly name: string
  ) {
    super(span);
  }

  evaluate(interp: Interpreter): Value {
    return interp.env.get(this.name, this.span);
  }

  toString(): string {
    return this.name;
  }
}

export class UnaryExpr extends Expression {
  constructor(
    span: Span,
    public readonly op: string,
    public readonly operand: ExecutableNode
  ) {
    super(span);
  }

  evaluate(interp: Interpreter): Value {
    return semantics.unary(this.op, interp.evaluate(this.operand), this.span);
  }

  toString(): string {
    return `(${this.op} ${this.operand})`;
  }
}

export class BinaryExpr extends Expression {
  constructor(
    span: Span,
    public readonly op: string,
    public readonly left: ExecutableNode,
    public readonly right: ExecutableNode,
    public readonly shortCircuit?: "and" | "or"
  ) {
    super(span);
  }

  evaluate(interp: Interpreter): Value {
    const left = interp.evaluate(this.left);
    if (this.shortCircuit !== undefined) {
      const truth = requireBoolean(left, this.left.span);
      if (this.shortCircuit === "and" ? !truth : truth) {
        return left;
      }
      return interp.evaluate(this.right);
    }
    return semantics.binary(this.op, left, interp.evaluate(this.right), this.span);
  }

  toString(): string {
    return `(${this.left} ${this.op} ${this.right})`;
  }
}

/**
 * Call of a user function bound to a name.
 */
export class CallExpr extends Expression {
  constructor(
    span: Span,
    public readonly callee: Identifier,
    public readonly args: readonly ExecutableNode[]
  ) {
    super(span);
  }

  evaluate(interp: Interpreter): Value {
    const fn = interp.evaluate(this.callee);
    const args = this.args.map((a) => interp.evaluate(a));
    return interp.callFunction(fn, args, this.span);
  }

  toString(): string {
    return `${this.callee}(${argList(this.args)})`;
  }
}

/**
 * Host capability call through the extern dispatcher.
 */
export class ExternCall extends Expression {
  constructor(
    span: Span,
    public readonly selector: string,
    public readonly args: readonly ExecutableNode[]
  ) {
    super(span);
  }

  evaluate(interp: Interpreter): Value {
    const args = this.args.map((a) => interp.evaluate(a));
    return interp.context.externs.invoke(this.selector, args, this.span);
  }

  toString(): string {
    return `extern "${this.selector}"(${argList(this.args)})`;
  }
}

// ============================================================================
// Statements
// ============================================================================

/**
 * `let name = value` declares in the current frame.
 */
export class LetStmt extends Statement {
  constructor(
    span: Span,
    public readonly name: string,
    public readonly value: ExecutableNode
  ) {
    super(span);
  }

  execute(interp: Interpreter): Outcome {
    interp.env.bind(this.name, interp.evaluate(this.value));
    return normal(interp.unit);
  }

  toString(): string {
    return `let ${this.name} = ${this.value}`;
  }
}

/**
 * `name = value` updates the nearest existing binding.
 */
export class AssignStmt extends Statement {
  constructor(
    span: Span,
    public readonly name: string,
    public readonly value: ExecutableNode
  ) {
    super(span);
  }

  execute(interp: Interpreter): Outcome {
    interp.env.set(this.name, interp.evaluate(this.value));
    return normal(interp.unit);
  }

  toString(): string {
    return `${this.name} = ${this.value}`;
  }
}

export class PrintStmt extends Statement {
  constructor(
    span: Span,
    public readonly args: readonly ExecutableNode[]
  ) {
    super(span);
  }

  execute(interp: Interpreter): Outcome {
    const args = this.args.map((a) => interp.evaluate(a));
    interp.context.externs.invoke(PRINT_SELECTOR, args, this.span);
    return normal(interp.unit);
  }

  toString(): string {
    return `print(${argList(this.args)})`;
  }
}

export class IfStmt extends Statement {
  constructor(
    span: Span,
    public readonly condition: ExecutableNode,
    public readonly then: readonly ExecutableNode[],
    public readonly otherwise?: readonly ExecutableNode[]
  ) {
    super(span);
  }

  execute(interp: Interpreter): Outcome {
    if (interp.test(this.condition)) {
      return interp.executeSequence(this.then);
    }
    return this.otherwise ? interp.executeSequence(this.otherwise) : normal(interp.unit);
  }

  toString(): string {
    const head = `if ${this.condition}\n${block(this.then)}`;
    return this.otherwise ? `${head}\nelse\n${block(this.otherwise)}` : head;
  }
}

export class WhileStmt extends Statement {
  constructor(
    span: Span,
    public readonly condition: ExecutableNode,
    public readonly body: readonly ExecutableNode[]
  ) {
    super(span);
  }

  execute(interp: Interpreter): Outcome {
    return interp.runLoop(this.condition, (i) => i.executeSequence(this.body));
  }

  toString(): string {
    return `while ${this.condition}\n${block(this.body)}`;
  }
}

/**
 * `fn name(params)` binds a function in the current frame.
 */
export class FnStmt extends Statement {
  constructor(
    span: Span,
    public readonly name: string,
    public readonly params: readonly string[],
    public readonly body: readonly ExecutableNode[]
  ) {
    super(span);
  }

  execute(interp: Interpreter): Outcome {
    interp.env.bind(this.name, new TreeFunction(this.name, this.params, this.body));
    return normal(interp.unit);
  }

  toString(): string {
    return `fn ${this.name}(${this.params.join(", ")})\n${block(this.body)}`;
  }
}

export class ReturnStmt extends Statement {
  constructor(
    span: Span,
    public readonly value?: ExecutableNode
  ) {
    super(span);
  }

  execute(interp: Interpreter): Outcome {
    const value = this.value ? interp.evaluate(this.value) : interp.unit;
    return { value, signal: returnSignal(value) };
  }

  toString(): string {
    return this.value ? `return ${this.value}` : "return";
  }
}

export class BreakStmt extends Statement {
  execute(interp: Interpreter): Outcome {
    return { value: interp.unit, signal: breakSignal(this.span) };
  }

  toString(): string {
    return "break";
  }
}

export class ContinueStmt extends Statement {
  execute(interp: Interpreter): Outcome {
    return { value: interp.unit, signal: continueSignal(this.span) };
  }

  toString(): string {
    return "continue";
  }
}
