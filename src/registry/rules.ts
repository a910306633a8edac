/**
 * Fallback lexing rules, tried when no registered lexeme matches.
 */

import { Role } from "../token/token.js";

/**
 * A pattern matched at the current offset. The regular expression must be
 * sticky so that it only matches at `lastIndex`.
 */
export interface LexRule {
  readonly name: string;
  readonly role: string;
  readonly pattern: RegExp;
  /** Recognized but never emitted */
  readonly skip?: boolean;
}

/**
 * Build a rule from a regular expression source, forcing the sticky flag.
 */
export function newRule(name: string, role: string, source: string, skip = false): LexRule {
  return { name, role, pattern: new RegExp(source, "uy"), skip };
}

/** Letter or underscore followed by letters, digits or underscores. */
export function identifierRule(): LexRule {
  return newRule("identifier", Role.IDENTIFIER, "[A-Za-z_][A-Za-z0-9_]*");
}

/** Decimal integer or float, with an optional exponent. */
export function numberRule(): LexRule {
  return newRule("number", Role.NUMBER, "[0-9]+(?:\\.[0-9]+)?(?:[eE][+-]?[0-9]+)?");
}

/** Double-quoted string with backslash escapes. Never spans lines. */
export function stringRule(): LexRule {
  return newRule("string", Role.STRING, '"(?:[^"\\\\\\n]|\\\\.)*"');
}

/** Spaces, tabs and carriage returns. */
export function whitespaceRule(): LexRule {
  return newRule("whitespace", Role.SKIP, "[ \\t\\r]+", true);
}

/** Line breaks, emitted so that a structural normalizer can see them. */
export function lineBreakRule(skip = false): LexRule {
  return newRule("line-break", Role.LINE_BREAK, "\\n", skip);
}

/** Comment running from a marker to the end of the line. */
export function lineCommentRule(marker: string): LexRule {
  return newRule(`comment(${marker})`, Role.SKIP, `${escapeRegExp(marker)}[^\\n]*`, true);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
