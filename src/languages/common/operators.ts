/**
 * Operator semantics shared by the bundled languages. Each language maps its
 * own spelling of an operator onto one of these canonical operations.
 */

import { RuntimeError, RuntimeTypeError } from "../../errors/errors.js";
import { Value, downcast } from "../../object/object.js";
import type { OperatorSemantics } from "../../schema/schema.js";
import type { Span } from "../../token/token.js";
import { BoolValue, NumberValue, StringValue, toBool } from "./values.js";

export type BinaryOp = "+" | "-" | "*" | "/" | "%" | "pow" | "==" | "!=" | "<" | ">" | "<=" | ">=";
export type UnaryOp = "neg" | "not";

/**
 * Apply a canonical binary operation.
 */
export function applyBinary(op: BinaryOp, left: Value, right: Value, span?: Span): Value {
  switch (op) {
    case "==":
      return toBool(left.equals(right));
    case "!=":
      return toBool(!left.equals(right));
    case "+":
      if (left instanceof StringValue && right instanceof StringValue) {
        return new StringValue(left.value + right.value);
      }
      return arithmetic(op, left, right, span);
    case "<":
    case ">":
    case "<=":
    case ">=":
      return compare(op, left, right, span);
    default:
      return arithmetic(op, left, right, span);
  }
}

/**
 * Apply a canonical unary operation.
 */
export function applyUnary(op: UnaryOp, operand: Value, span?: Span): Value {
  if (op === "neg") {
    return new NumberValue(-downcast(operand, NumberValue, "a number", span).value);
  }
  return toBool(!downcast(operand, BoolValue, "a boolean", span).value);
}

function arithmetic(op: BinaryOp, left: Value, right: Value, span?: Span): Value {
  if (!(left instanceof NumberValue) || !(right instanceof NumberValue)) {
    throw new RuntimeTypeError(`unsupported operand types for ${op}: ${left.typeName} and ${right.typeName}`, span);
  }
  const a = left.value;
  const b = right.value;
  switch (op) {
    case "+":
      return new NumberValue(a + b);
    case "-":
      return new NumberValue(a - b);
    case "*":
      return new NumberValue(a * b);
    case "/":
      if (b === 0) throw new RuntimeError("division by zero", span);
      return new NumberValue(a / b);
    case "%":
      if (b === 0) throw new RuntimeError("modulo by zero", span);
      return new NumberValue(a % b);
    case "pow":
      return new NumberValue(a ** b);
    default:
      throw new RuntimeTypeError(`'${op}' is not an arithmetic operator`, span);
  }
}

function compare(op: "<" | ">" | "<=" | ">=", left: Value, right: Value, span?: Span): Value {
  let a: number | string;
  let b: number | string;
  if (left instanceof NumberValue && right instanceof NumberValue) {
    a = left.value;
    b = right.value;
  } else if (left instanceof StringValue && right instanceof StringValue) {
    a = left.value;
    b = right.value;
  } else {
    throw new RuntimeTypeError(`cannot compare ${left.typeName} with ${right.typeName}`, span);
  }
  switch (op) {
    case "<":
      return toBool(a < b);
    case ">":
      return toBool(a > b);
    case "<=":
      return toBool(a <= b);
    case ">=":
      return toBool(a >= b);
  }
}

/**
 * Operator semantics for a language, given its spellings of the canonical operations.
 */
export function createSemantics(
  binary: Readonly<Record<string, BinaryOp>>,
  unary: Readonly<Record<string, UnaryOp>>
): OperatorSemantics {
  const binaryOps = new Map(Object.entries(binary));
  const unaryOps = new Map(Object.entries(unary));
  return {
    binary(symbol, left, right, span) {
      const op = binaryOps.get(symbol);
      if (op === undefined) {
        throw new RuntimeError(`unknown operator '${symbol}'`, span);
      }
      return applyBinary(op, left, right, span);
    },
    unary(symbol, operand, span) {
      const op = unaryOps.get(symbol);
      if (op === undefined) {
        throw new RuntimeError(`unknown prefix operator '${symbol}'`, span);
      }
      return applyUnary(op, operand, span);
    },
  };
}
