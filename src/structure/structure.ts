/**
 * Structural normalizers turn the raw token stream into one with explicit
 * block structure. The kernel does not know which style a language uses;
 * each language picks a normalizer.
 */

import { ParserError } from "../errors/errors.js";
import { Token, Role, Span, newSpan, newToken } from "../token/token.js";

/**
 * Transforms raw tokens (ending with EOF) into structured tokens (ending with EOF).
 */
export type StructuralNormalizer = (tokens: readonly Token[], source: string) => Token[];

/** Normalizer that leaves the stream untouched. */
export const identityNormalizer: StructuralNormalizer = (tokens) => [...tokens];

// ============================================================================
// Indentation
// ============================================================================

export interface IndentationOptions {
  /** Spaces per indentation level */
  indentWidth: number;
  /** Bracket pairs inside which line breaks and indentation are ignored */
  brackets?: ReadonlyArray<readonly [string, string]>;
}

interface Line {
  /** Byte offset of the first byte of the line */
  start: number;
  /** Leading spaces */
  indent: number;
  tokens: Token[];
}

const SPACE = 0x20;
const TAB = 0x09;
const LF = 0x0a;

/**
 * Offside-rule normalizer. Emits NEWLINE after each logical line and
 * INDENT/DEDENT when the indentation level changes. Blank and comment-only
 * lines produce nothing. Raw line-break tokens are consumed.
 */
export function indentationNormalizer(options: IndentationOptions): StructuralNormalizer {
  const width = options.indentWidth;
  const openers = new Set((options.brackets ?? []).map(([open]) => open));
  const closers = new Set((options.brackets ?? []).map(([, close]) => close));

  return (tokens, source) => {
    const bytes = Buffer.from(source, "utf8");
    const lines = splitLines(tokens, bytes, openers, closers);
    const out: Token[] = [];
    const stack = [0];
    const eof = tokens[tokens.length - 1];
    const end = eof ? eof.span.end : bytes.length;

    for (const line of lines) {
      const current = stack[stack.length - 1];
      const at = newSpan(line.start, line.start + line.indent);

      if (line.indent > current) {
        if ((line.indent - current) % width !== 0) {
          throw new ParserError(`invalid indentation: expected a multiple of ${width} spaces`, at);
        }
        for (let level = current + width; level <= line.indent; level += width) {
          stack.push(level);
          out.push(newToken("", Role.INDENT, at));
        }
      } else if (line.indent < current) {
        while (stack.length > 1 && stack[stack.length - 1] > line.indent) {
          stack.pop();
          out.push(newToken("", Role.DEDENT, at));
        }
        if (stack[stack.length - 1] !== line.indent) {
          throw new ParserError("indentation mismatch: dedent does not match any outer level", at);
        }
      }

      out.push(...line.tokens);
      const last = line.tokens[line.tokens.length - 1];
      out.push(newToken("", Role.NEWLINE, newSpan(last.span.end, last.span.end)));
    }

    const eofSpan = newSpan(end, end);
    while (stack.length > 1) {
      stack.pop();
      out.push(newToken("", Role.DEDENT, eofSpan));
    }
    out.push(newToken("", Role.EOF, eofSpan));
    return out;
  };
}

/**
 * Group tokens into logical lines. A line break inside open brackets joins
 * the next physical line onto the current logical one.
 */
function splitLines(
  tokens: readonly Token[],
  bytes: Buffer,
  openers: ReadonlySet<string>,
  closers: ReadonlySet<string>
): Line[] {
  const lines: Line[] = [];
  let current: Line | null = null;
  let depth = 0;

  for (const tok of tokens) {
    if (tok.role === Role.EOF) break;
    if (tok.role === Role.LINE_BREAK) {
      if (depth === 0) current = null;
      continue;
    }
    if (current === null) {
      const start = lineStart(bytes, tok.span.start);
      current = { start, indent: leadingSpaces(bytes, start, tok.span.start), tokens: [] };
      lines.push(current);
    }
    current.tokens.push(tok);
    if (openers.has(tok.lexeme)) depth++;
    if (closers.has(tok.lexeme) && depth > 0) depth--;
  }
  return lines;
}

function lineStart(bytes: Buffer, offset: number): number {
  let i = offset;
  while (i > 0 && bytes[i - 1] !== LF) i--;
  return i;
}

function leadingSpaces(bytes: Buffer, start: number, firstToken: number): number {
  for (let i = start; i < firstToken; i++) {
    if (bytes[i] === TAB) {
      throw new ParserError("invalid indentation: tabs are not allowed", newSpan(i, i + 1));
    }
    if (bytes[i] !== SPACE && bytes[i] !== 0x0d) {
      return i - start;
    }
  }
  return firstToken - start;
}

// ============================================================================
// Delimiters
// ============================================================================

export interface DelimiterOptions {
  pairs: ReadonlyArray<readonly [string, string]>;
}

/**
 * Validates that bracket pairs are balanced and properly nested, and drops
 * raw line-break tokens. The stream is otherwise unchanged.
 */
export function delimiterNormalizer(options: DelimiterOptions): StructuralNormalizer {
  const closing = new Map(options.pairs.map(([open, close]) => [open, close]));
  const closers = new Set(options.pairs.map(([, close]) => close));

  return (tokens) => {
    const open: { lexeme: string; span: Span }[] = [];
    const out: Token[] = [];

    for (const tok of tokens) {
      if (tok.role === Role.LINE_BREAK) continue;
      out.push(tok);
      if (tok.role === Role.STRING) continue;

      if (closing.has(tok.lexeme)) {
        open.push({ lexeme: tok.lexeme, span: tok.span });
      } else if (closers.has(tok.lexeme)) {
        const top = open.pop();
        if (!top) {
          throw new ParserError(`unmatched '${tok.lexeme}'`, tok.span);
        }
        const expected = closing.get(top.lexeme);
        if (expected !== tok.lexeme) {
          throw new ParserError(`expected '${expected}' to close '${top.lexeme}', got '${tok.lexeme}'`, tok.span);
        }
      }
    }

    const unclosed = open.pop();
    if (unclosed) {
      throw new ParserError(`unmatched '${unclosed.lexeme}'`, unclosed.span);
    }
    return out;
  };
}
