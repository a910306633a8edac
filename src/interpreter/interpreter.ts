/**
 * Tree-walking execution strategy. Nodes dispatch their own behavior; the
 * interpreter supplies the shared mechanics: statement sequences, scoped
 * blocks, loops, function calls and signal containment.
 */

import type { ExecutableNode, Program } from "../ast/nodes.js";
import { ScopeError, RuntimeError, KernelError } from "../errors/errors.js";
import { FunctionValue, Value, downcast, requireBoolean } from "../object/object.js";
import type { ExecutionContext } from "../runtime/context.js";
import type { Environment } from "../runtime/environment.js";
import { Outcome, isNormal, normal } from "../runtime/signal.js";
import type { Span } from "../token/token.js";

/**
 * A user function whose body is a list of executable nodes.
 */
export class TreeFunction extends FunctionValue<readonly ExecutableNode[]> {}

export class Interpreter {
  readonly context: ExecutionContext;

  constructor(context: ExecutionContext) {
    this.context = context;
  }

  get env(): Environment {
    return this.context.env;
  }

  get unit(): Value {
    return this.context.unit;
  }

  /**
   * Run a program. A top-level return ends the program with its value;
   * a top-level break or continue is a scope error.
   */
  run(program: Program): Value {
    const outcome = this.executeSequence(program.statements);
    switch (outcome.signal.kind) {
      case "return":
        return outcome.signal.value;
      case "break":
      case "continue":
        throw new ScopeError(`${outcome.signal.kind} outside loop`, outcome.signal.span);
      default:
        return outcome.value;
    }
  }

  /**
   * Execute statements in order in the current frame. The first signal stops
   * the sequence and is propagated unchanged.
   */
  executeSequence(statements: readonly ExecutableNode[]): Outcome {
    let value = this.unit;
    for (const stmt of statements) {
      const outcome = this.execute(stmt);
      if (!isNormal(outcome)) {
        return outcome;
      }
      value = outcome.value;
    }
    return normal(value);
  }

  /**
   * Execute statements inside a fresh frame.
   */
  executeScoped(statements: readonly ExecutableNode[]): Outcome {
    return this.env.withScope(() => this.executeSequence(statements));
  }

  /**
   * Execute a node, attaching its span to errors raised without one.
   */
  execute(node: ExecutableNode): Outcome {
    try {
      return node.execute(this);
    } catch (err) {
      throw attachSpan(err, node.span);
    }
  }

  evaluate(node: ExecutableNode): Value {
    try {
      return node.evaluate(this);
    } catch (err) {
      throw attachSpan(err, node.span);
    }
  }

  /**
   * Truth value of a condition node.
   */
  test(node: ExecutableNode): boolean {
    return requireBoolean(this.evaluate(node), node.span);
  }

  /**
   * Repeat body while condition holds. Break and continue are consumed here;
   * return propagates to the enclosing call.
   */
  runLoop(condition: ExecutableNode, body: (interp: Interpreter) => Outcome): Outcome {
    while (this.test(condition)) {
      const outcome = body(this);
      switch (outcome.signal.kind) {
        case "break":
          return normal(this.unit);
        case "return":
          return outcome;
        default:
          break;
      }
    }
    return normal(this.unit);
  }

  /**
   * Call a function value. Parameters are bound in a new frame that is
   * released on every exit path. A return signal becomes the call's value;
   * break or continue reaching the call boundary is a scope error.
   */
  callFunction(callee: Value, args: readonly Value[], span?: Span): Value {
    const fn = downcast(callee, TreeFunction, "a function", span);
    if (args.length !== fn.params.length) {
      throw new RuntimeError(
        `function '${fn.name}' takes ${fn.params.length} argument(s), got ${args.length}`,
        span
      );
    }

    return this.context.withCall(fn.name, span, () =>
      this.env.withScope(() => {
        fn.params.forEach((param, i) => this.env.bind(param, args[i].clone()));
        const outcome = this.executeSequence(fn.body);
        switch (outcome.signal.kind) {
          case "return":
            return outcome.signal.value;
          case "break":
          case "continue":
            throw new ScopeError(`${outcome.signal.kind} outside loop`, outcome.signal.span);
          default:
            return this.unit;
        }
      })
    );
  }
}

function attachSpan(err: unknown, span: Span): unknown {
  return err instanceof KernelError ? err.withSpan(span) : err;
}
