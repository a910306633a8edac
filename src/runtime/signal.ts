/**
 * Control signals drive non-local control flow. Statements produce them;
 * loops consume break and continue, function calls consume return.
 */

import type { Value } from "../object/object.js";
import type { Span } from "../token/token.js";

/** Break and continue carry the span of the statement that raised them. */
export type ControlSignal =
  | { readonly kind: "none" }
  | { readonly kind: "break"; readonly span: Span }
  | { readonly kind: "continue"; readonly span: Span }
  | { readonly kind: "return"; readonly value: Value };

export const NORMAL: ControlSignal = Object.freeze({ kind: "none" });

export function breakSignal(span: Span): ControlSignal {
  return { kind: "break", span };
}

export function continueSignal(span: Span): ControlSignal {
  return { kind: "continue", span };
}

export function returnSignal(value: Value): ControlSignal {
  return { kind: "return", value };
}

/**
 * Result of executing a statement or instruction.
 */
export interface Outcome {
  readonly value: Value;
  readonly signal: ControlSignal;
}

/** Outcome of normal completion. */
export function normal(value: Value): Outcome {
  return { value, signal: NORMAL };
}

export function isNormal(outcome: Outcome): boolean {
  return outcome.signal.kind === "none";
}
