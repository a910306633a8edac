/**
 * Canonical instructions for the schema-driven strategy. This closed set is
 * the whole executable vocabulary of that strategy; Loop is kept as a
 * convenience primitive that follows the same signal rules.
 */

import type { Value } from "../object/object.js";
import type { Span } from "../token/token.js";

export const enum InstructionKind {
  Sequence = "Sequence",
  Scope = "Scope",
  Branch = "Branch",
  Assign = "Assign",
  Invoke = "Invoke",
  Operate = "Operate",
  Transfer = "Transfer",
  Loop = "Loop",
}

export type TransferKind = "return" | "break" | "continue";

/** `set` mutates the nearest binding, `bind` declares in the current frame. */
export type AssignMode = "set" | "bind";

/** `local` calls a user function by name, `extern` goes through the dispatcher. */
export type InvokeTarget = "local" | "extern";

/**
 * What an Operate instruction computes from its operands.
 */
export type Operation =
  | { readonly kind: "literal"; readonly value: Value }
  | { readonly kind: "load"; readonly name: string }
  | { readonly kind: "unary"; readonly symbol: string }
  | { readonly kind: "binary"; readonly symbol: string; readonly shortCircuit?: "and" | "or" }
  | {
      readonly kind: "function";
      readonly name: string;
      readonly params: readonly string[];
      readonly body: Instruction;
    };

export interface SequenceInstr {
  readonly kind: InstructionKind.Sequence;
  readonly span: Span;
  readonly body: readonly Instruction[];
}

export interface ScopeInstr {
  readonly kind: InstructionKind.Scope;
  readonly span: Span;
  readonly body: Instruction;
}

export interface BranchInstr {
  readonly kind: InstructionKind.Branch;
  readonly span: Span;
  readonly condition: Instruction;
  readonly then: Instruction;
  readonly otherwise?: Instruction;
}

export interface AssignInstr {
  readonly kind: InstructionKind.Assign;
  readonly span: Span;
  readonly name: string;
  readonly value: Instruction;
  readonly mode: AssignMode;
}

export interface InvokeInstr {
  readonly kind: InstructionKind.Invoke;
  readonly span: Span;
  readonly selector: string;
  readonly args: readonly Instruction[];
  readonly target: InvokeTarget;
}

export interface OperateInstr {
  readonly kind: InstructionKind.Operate;
  readonly span: Span;
  readonly op: Operation;
  readonly operands: readonly Instruction[];
}

export interface TransferInstr {
  readonly kind: InstructionKind.Transfer;
  readonly span: Span;
  readonly transfer: TransferKind;
  readonly value?: Instruction;
}

export interface LoopInstr {
  readonly kind: InstructionKind.Loop;
  readonly span: Span;
  readonly condition: Instruction;
  readonly body: Instruction;
}

export type Instruction =
  | SequenceInstr
  | ScopeInstr
  | BranchInstr
  | AssignInstr
  | InvokeInstr
  | OperateInstr
  | TransferInstr
  | LoopInstr;

// ============================================================================
// Constructors
// ============================================================================

export function sequence(body: readonly Instruction[], span: Span): SequenceInstr {
  return { kind: InstructionKind.Sequence, span, body };
}

export function scope(body: Instruction, span: Span): ScopeInstr {
  return { kind: InstructionKind.Scope, span, body };
}

export function branch(condition: Instruction, then: Instruction, otherwise: Instruction | undefined, span: Span): BranchInstr {
  return { kind: InstructionKind.Branch, span, condition, then, otherwise };
}

export function assign(name: string, value: Instruction, mode: AssignMode, span: Span): AssignInstr {
  return { kind: InstructionKind.Assign, span, name, value, mode };
}

export function invoke(selector: string, args: readonly Instruction[], target: InvokeTarget, span: Span): InvokeInstr {
  return { kind: InstructionKind.Invoke, span, selector, args, target };
}

export function operate(op: Operation, operands: readonly Instruction[], span: Span): OperateInstr {
  return { kind: InstructionKind.Operate, span, op, operands };
}

export function literal(value: Value, span: Span): OperateInstr {
  return operate({ kind: "literal", value }, [], span);
}

export function load(name: string, span: Span): OperateInstr {
  return operate({ kind: "load", name }, [], span);
}

export function transfer(kind: TransferKind, value: Instruction | undefined, span: Span): TransferInstr {
  return { kind: InstructionKind.Transfer, span, transfer: kind, value };
}

export function loop(condition: Instruction, body: Instruction, span: Span): LoopInstr {
  return { kind: InstructionKind.Loop, span, condition, body };
}

// ============================================================================
// Printing
// ============================================================================

/**
 * S-expression form of an instruction tree, for debugging and tests.
 */
export function formatInstruction(instr: Instruction): string {
  switch (instr.kind) {
    case InstructionKind.Sequence:
      return `(seq${instr.body.map((i) => " " + formatInstruction(i)).join("")})`;
    case InstructionKind.Scope:
      return `(scope ${formatInstruction(instr.body)})`;
    case InstructionKind.Branch:
      return instr.otherwise
        ? `(if ${formatInstruction(instr.condition)} ${formatInstruction(instr.then)} ${formatInstruction(instr.otherwise)})`
        : `(if ${formatInstruction(instr.condition)} ${formatInstruction(instr.then)})`;
    case InstructionKind.Assign:
      return `(${instr.mode} ${instr.name} ${formatInstruction(instr.value)})`;
    case InstructionKind.Invoke:
      return `(${instr.target === "extern" ? "extern" : "call"} ${instr.selector}${instr.args
        .map((a) => " " + formatInstruction(a))
        .join("")})`;
    case InstructionKind.Operate:
      return formatOperate(instr);
    case InstructionKind.Transfer:
      return instr.value ? `(${instr.transfer} ${formatInstruction(instr.value)})` : `(${instr.transfer})`;
    case InstructionKind.Loop:
      return `(loop ${formatInstruction(instr.condition)} ${formatInstruction(instr.body)})`;
  }
}

function formatOperate(instr: OperateInstr): string {
  const operands = instr.operands.map((o) => " " + formatInstruction(o)).join("");
  const op = instr.op;
  switch (op.kind) {
    case "literal":
      return op.value.debug();
    case "load":
      return op.name;
    case "unary":
    case "binary":
      return `(${op.symbol}${operands})`;
    case "function":
      return `(fn ${op.name} (${op.params.join(" ")}) ${formatInstruction(op.body)})`;
  }
}
