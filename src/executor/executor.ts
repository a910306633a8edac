/**
 * Canonical-instruction executor: one dispatch over the instruction tags.
 */

import { KernelError, RuntimeError, ScopeError } from "../errors/errors.js";
import { Instruction, InstructionKind, OperateInstr, TransferInstr } from "../instruction/instruction.js";
import { FunctionValue, Value, downcast, requireBoolean } from "../object/object.js";
import type { ExecutionContext } from "../runtime/context.js";
import { Outcome, breakSignal, continueSignal, isNormal, normal, returnSignal } from "../runtime/signal.js";
import type { OperatorSemantics } from "../schema/schema.js";
import type { Span } from "../token/token.js";

/**
 * A user function whose body is an instruction.
 */
export class InstructionFunction extends FunctionValue<Instruction> {}

export interface ExecutorConfig {
  semantics: OperatorSemantics;
  /** Names of functions whose results may be cached. */
  memoizable?: readonly string[];
}

export class Executor {
  private context: ExecutionContext;
  private semantics: OperatorSemantics;
  private memoizable: ReadonlySet<string>;
  private memo: WeakMap<InstructionFunction, Map<string, Value>> = new WeakMap();

  constructor(context: ExecutionContext, config: ExecutorConfig) {
    this.context = context;
    this.semantics = config.semantics;
    this.memoizable = new Set(context.options.memoize ? (config.memoizable ?? []) : []);
  }

  /**
   * Run a program. A top-level return ends it with its value; a top-level
   * break or continue is a scope error.
   */
  run(program: Instruction): Value {
    const outcome = this.execute(program);
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
   * Execute one instruction, attaching its span to errors raised without one.
   */
  execute(instr: Instruction): Outcome {
    try {
      return this.dispatch(instr);
    } catch (err) {
      throw err instanceof KernelError ? err.withSpan(instr.span) : err;
    }
  }

  /**
   * Execute an instruction in expression position, where no signal may arise.
   */
  evaluate(instr: Instruction): Value {
    const outcome = this.execute(instr);
    if (outcome.signal.kind !== "none") {
      throw new ScopeError(`${outcome.signal.kind} is not allowed inside an expression`, instr.span);
    }
    return outcome.value;
  }

  private dispatch(instr: Instruction): Outcome {
    const env = this.context.env;
    const unit = this.context.unit;

    switch (instr.kind) {
      case InstructionKind.Sequence: {
        let value = unit;
        for (const child of instr.body) {
          const outcome = this.execute(child);
          if (!isNormal(outcome)) {
            return outcome;
          }
          value = outcome.value;
        }
        return normal(value);
      }

      case InstructionKind.Scope: {
        const body = instr.body;
        return env.withScope(() => this.execute(body));
      }

      case InstructionKind.Branch:
        if (requireBoolean(this.evaluate(instr.condition), instr.condition.span)) {
          return this.execute(instr.then);
        }
        return instr.otherwise ? this.execute(instr.otherwise) : normal(unit);

      case InstructionKind.Assign: {
        const value = this.evaluate(instr.value);
        if (instr.mode === "bind") {
          env.bind(instr.name, value);
        } else {
          env.set(instr.name, value);
        }
        return normal(unit);
      }

      case InstructionKind.Invoke: {
        const args = instr.args.map((a) => this.evaluate(a));
        if (instr.target === "extern") {
          return normal(this.context.externs.invoke(instr.selector, args, instr.span));
        }
        return normal(this.call(instr.selector, args, instr.span));
      }

      case InstructionKind.Operate:
        return normal(this.operate(instr));

      case InstructionKind.Transfer:
        return this.transfer(instr);

      case InstructionKind.Loop:
        while (requireBoolean(this.evaluate(instr.condition), instr.condition.span)) {
          const outcome = this.execute(instr.body);
          if (outcome.signal.kind === "break") break;
          if (outcome.signal.kind === "return") return outcome;
        }
        return normal(unit);
    }
  }

  private transfer(instr: TransferInstr): Outcome {
    const unit = this.context.unit;
    switch (instr.transfer) {
      case "break":
        return { value: unit, signal: breakSignal(instr.span) };
      case "continue":
        return { value: unit, signal: continueSignal(instr.span) };
      case "return": {
        const value = instr.value ? this.evaluate(instr.value) : unit;
        return { value, signal: returnSignal(value) };
      }
    }
  }

  private operate(instr: OperateInstr): Value {
    const op = instr.op;
    switch (op.kind) {
      case "literal":
        return op.value;
      case "load":
        return this.context.env.get(op.name, instr.span);
      case "function":
        return new InstructionFunction(op.name, op.params, op.body);
      case "unary":
        return this.semantics.unary(op.symbol, this.evaluate(instr.operands[0]), instr.span);
      case "binary": {
        const [lhs, rhs] = instr.operands;
        const left = this.evaluate(lhs);
        if (op.shortCircuit !== undefined) {
          const truth = requireBoolean(left, lhs.span);
          if (op.shortCircuit === "and" ? !truth : truth) {
            return left;
          }
          return this.evaluate(rhs);
        }
        return this.semantics.binary(op.symbol, left, this.evaluate(rhs), instr.span);
      }
    }
  }

  /**
   * Call a user function by name in a fresh frame released on every exit path.
   */
  private call(name: string, args: readonly Value[], span: Span): Value {
    const fn = downcast(this.context.env.get(name, span), InstructionFunction, "a function", span);
    if (args.length !== fn.params.length) {
      throw new RuntimeError(`function '${fn.name}' takes ${fn.params.length} argument(s), got ${args.length}`, span);
    }

    // Cached per function value, so a shadowing redefinition starts empty.
    const cache = this.memoizable.has(name) ? this.cacheFor(fn) : undefined;
    const key = args.map((a) => a.debug()).join(", ");
    const cached = cache?.get(key);
    if (cached !== undefined) return cached;

    const result = this.context.withCall(fn.name, span, () =>
      this.context.env.withScope(() => {
        fn.params.forEach((param, i) => this.context.env.bind(param, args[i].clone()));
        const outcome = this.execute(fn.body);
        switch (outcome.signal.kind) {
          case "return":
            return outcome.signal.value;
          case "break":
          case "continue":
            throw new ScopeError(`${outcome.signal.kind} outside loop`, outcome.signal.span);
          default:
            return this.context.unit;
        }
      })
    );

    cache?.set(key, result);
    return result;
  }

  private cacheFor(fn: InstructionFunction): Map<string, Value> {
    let cache = this.memo.get(fn);
    if (!cache) {
      cache = new Map();
      this.memo.set(fn, cache);
    }
    return cache;
  }
}
