/**
 * Tokens, roles and source spans shared by every stage of the kernel.
 */

/**
 * Roles the kernel itself assigns or relies on. Languages are free to use
 * any other role string for their own lexemes.
 */
export const enum Role {
  // Fallback rule roles
  IDENTIFIER = "identifier",
  NUMBER = "number",
  STRING = "string",

  // Registered lexeme roles
  KEYWORD = "keyword",
  OPERATOR = "operator",
  PUNCTUATION = "punctuation",
  SKIP = "skip",

  // Raw line break, consumed by structural normalizers
  LINE_BREAK = "line-break",

  // Structural roles emitted by normalizers
  NEWLINE = "NEWLINE",
  INDENT = "INDENT",
  DEDENT = "DEDENT",
  EOF = "EOF",
}

/**
 * Half-open interval of UTF-8 byte offsets into the source text.
 */
export interface Span {
  readonly start: number;
  readonly end: number;
}

/**
 * A token produced by the lexer or a structural normalizer.
 */
export interface Token {
  readonly lexeme: string;
  readonly role: string;
  readonly span: Span;
}

/**
 * Human-readable location, derived on demand for diagnostics only.
 */
export interface Location {
  /** 1-indexed line number */
  line: number;
  /** 1-indexed column, counted in characters */
  column: number;
}

/**
 * Create a new Span.
 */
export function newSpan(start: number, end: number): Span {
  return { start, end };
}

/**
 * Smallest span covering both a and b.
 */
export function joinSpans(a: Span, b: Span): Span {
  return { start: Math.min(a.start, b.start), end: Math.max(a.end, b.end) };
}

/**
 * Create a new Token.
 */
export function newToken(lexeme: string, role: string, span: Span): Token {
  return { lexeme, role, span };
}

/**
 * Number of UTF-8 bytes needed to encode text.
 */
export function byteLength(text: string): number {
  return Buffer.byteLength(text, "utf8");
}

/**
 * Translate a byte offset into a 1-indexed line and column.
 */
export function locate(source: string, offset: number): Location {
  const bytes = Buffer.from(source, "utf8");
  const prefix = bytes.subarray(0, Math.max(0, Math.min(offset, bytes.length))).toString("utf8");
  const lastBreak = prefix.lastIndexOf("\n");
  let line = 1;
  for (const ch of prefix) {
    if (ch === "\n") line++;
  }
  const column = [...prefix.slice(lastBreak + 1)].length + 1;
  return { line, column };
}

/**
 * Source text covered by a span.
 */
export function sliceSpan(source: string, span: Span): string {
  return Buffer.from(source, "utf8").subarray(span.start, span.end).toString("utf8");
}
