/**
 * Standard extern backends available to every bundled language.
 */

import { RuntimeError } from "../errors/errors.js";
import type { Capability, ExternDispatcher } from "../extern/extern.js";
import { Value, downcast } from "../object/object.js";
import { NONE, NumberValue, StringValue } from "../languages/common/values.js";

/**
 * Fail unless exactly n arguments were passed.
 */
function arity(name: string, args: readonly Value[], n: number): void {
  if (args.length !== n) {
    throw new RuntimeError(`${name}() takes exactly ${n} argument(s), got ${args.length}`);
  }
}

/**
 * The `console` backend: output and introspection.
 */
export function createConsoleBackend(output: (line: string) => void = console.log): Record<string, Capability> {
  return {
    // print - display form of each argument, space separated
    print: (args) => {
      output(args.map((a) => a.display()).join(" "));
      return NONE;
    },

    // debug - debug form of each argument
    debug: (args) => {
      output(args.map((a) => a.debug()).join(" "));
      return NONE;
    },

    // type - type name of a value
    type: (args) => {
      arity("type", args, 1);
      return new StringValue(args[0].typeName);
    },
  };
}

/**
 * The `math` backend: numeric helpers.
 */
export function createMathBackend(): Record<string, Capability> {
  const unary = (name: string, fn: (n: number) => number): Capability => (args, span) => {
    arity(name, args, 1);
    return new NumberValue(fn(downcast(args[0], NumberValue, "a number", span).value));
  };

  return {
    abs: unary("abs", Math.abs),
    floor: unary("floor", Math.floor),
    ceil: unary("ceil", Math.ceil),
    sqrt: (args, span) => {
      arity("sqrt", args, 1);
      const n = downcast(args[0], NumberValue, "a number", span).value;
      if (n < 0) {
        throw new RuntimeError("sqrt() of a negative number", span);
      }
      return new NumberValue(Math.sqrt(n));
    },
    min: (args, span) => {
      arity("min", args, 2);
      const [a, b] = args.map((v) => downcast(v, NumberValue, "a number", span).value);
      return new NumberValue(Math.min(a, b));
    },
    max: (args, span) => {
      arity("max", args, 2);
      const [a, b] = args.map((v) => downcast(v, NumberValue, "a number", span).value);
      return new NumberValue(Math.max(a, b));
    },
  };
}

/**
 * Register the standard backends on a dispatcher.
 */
export function registerStandardBackends(
  dispatcher: ExternDispatcher,
  output: (line: string) => void = console.log
): ExternDispatcher {
  return dispatcher
    .registerBackend("console", createConsoleBackend(output))
    .registerBackend("math", createMathBackend());
}
