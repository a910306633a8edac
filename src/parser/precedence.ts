/**
 * Operator precedence and associativity for precedence climbing.
 * Higher numbers bind tighter; the lowest usable precedence is 1.
 */

export const enum Associativity {
  Left = "left",
  Right = "right",
  None = "none",
}

/** Threshold that admits every infix operator. */
export const LOWEST = 0;

/**
 * Binary operator entry of an operator table.
 */
export interface OperatorInfo {
  readonly precedence: number;
  readonly associativity: Associativity;
  /** Evaluate the right operand only when the left one does not decide the result. */
  readonly shortCircuit?: "and" | "or";
}

/**
 * Prefix operator entry. The operand is parsed at this precedence.
 */
export interface PrefixOperatorInfo {
  readonly precedence: number;
}

/**
 * Minimum precedence for the right operand of an operator.
 * Right-associative operators recurse at the same level, all others one above.
 */
export function nextMinPrecedence(info: { precedence: number; associativity: Associativity }): number {
  return info.associativity === Associativity.Right ? info.precedence : info.precedence + 1;
}

/**
 * Check that a precedence is a positive integer.
 */
export function isValidPrecedence(precedence: number): boolean {
  return Number.isInteger(precedence) && precedence > LOWEST;
}
