/**
 * Error taxonomy for the kernel. Every failure raised while lexing, parsing,
 * configuring or executing a program is a KernelError.
 */

import { Span, locate } from "../token/token.js";

export const enum ErrorKind {
  Lexical = "lexical",
  Parse = "parse",
  Config = "configuration",
  Type = "type",
  Scope = "scope",
  Extern = "extern",
  Runtime = "runtime",
  StackOverflow = "stack overflow",
}

/**
 * Base class for kernel errors. The span may be filled in later by the
 * executor when the error was raised somewhere that had no source position.
 */
export class KernelError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    public span?: Span
  ) {
    super(message);
    this.name = "KernelError";
  }

  /**
   * Attach a span if none is set yet.
   */
  withSpan(span: Span): this {
    if (this.span === undefined) {
      this.span = span;
    }
    return this;
  }
}

/**
 * No registered lexeme or fallback rule matches at a position.
 */
export class LexerError extends KernelError {
  constructor(message: string, span: Span) {
    super(message, ErrorKind.Lexical, span);
    this.name = "LexerError";
  }
}

/**
 * Unexpected token, unmatched bracket or premature end of input.
 */
export class ParserError extends KernelError {
  constructor(message: string, span: Span) {
    super(message, ErrorKind.Parse, span);
    this.name = "ParserError";
  }
}

/**
 * Ambiguous or duplicate registration.
 */
export class ConfigError extends KernelError {
  constructor(message: string) {
    super(message, ErrorKind.Config);
    this.name = "ConfigError";
  }
}

/**
 * A value was not of the type an operation expects.
 */
export class RuntimeTypeError extends KernelError {
  constructor(message: string, span?: Span) {
    super(message, ErrorKind.Type, span);
    this.name = "RuntimeTypeError";
  }
}

/**
 * Undefined variable, or break/continue outside a loop.
 */
export class ScopeError extends KernelError {
  constructor(message: string, span?: Span) {
    super(message, ErrorKind.Scope, span);
    this.name = "ScopeError";
  }
}

/**
 * A selector could not be resolved, or a capability failed.
 */
export class ExternError extends KernelError {
  constructor(
    message: string,
    public readonly selector: string,
    span?: Span
  ) {
    super(message, ErrorKind.Extern, span);
    this.name = "ExternError";
  }
}

/**
 * Language-level failure such as division by zero or a bad call.
 */
export class RuntimeError extends KernelError {
  constructor(message: string, span?: Span) {
    super(message, ErrorKind.Runtime, span);
    this.name = "RuntimeError";
  }
}

/**
 * Call depth exceeded, either the configured limit or the host stack.
 */
export class StackOverflowError extends KernelError {
  constructor(message: string, span?: Span) {
    super(message, ErrorKind.StackOverflow, span);
    this.name = "StackOverflowError";
  }
}

/**
 * Whether err is the host's own call stack exhaustion.
 */
export function isHostStackOverflow(err: unknown): err is RangeError {
  return err instanceof RangeError && /call stack/i.test(err.message);
}

/**
 * Render an error as `file:line:column: <kind> error: message`.
 */
export function formatDiagnostic(err: KernelError, source: string, file: string = "<input>"): string {
  if (err.span === undefined) {
    return `${file}: ${err.kind} error: ${err.message}`;
  }
  const { line, column } = locate(source, err.span.start);
  return `${file}:${line}:${column}: ${err.kind} error: ${err.message}`;
}
