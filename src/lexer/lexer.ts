/**
 * Table-driven lexer. Knows nothing about any language beyond the frozen
 * registry tables it is given.
 */

import { LexerError } from "../errors/errors.js";
import type { Tables, LexemeEntry } from "../registry/registry.js";
import type { LexRule } from "../registry/rules.js";
import { Token, Role, byteLength, newSpan, newToken } from "../token/token.js";

const WORD_CHAR = /[A-Za-z0-9_]/;
const WORD_LEXEME = /^[A-Za-z0-9_]+$/;

interface Candidate {
  text: string;
  role: string;
  skip: boolean;
}

/**
 * Lexer produces tokens one at a time. Offsets in spans are UTF-8 bytes.
 */
export class Lexer {
  private input: string;
  private tables: Tables;
  /** Index into input (UTF-16 code units) */
  private position = 0;
  /** Byte offset matching position */
  private offset = 0;

  constructor(input: string, tables: Tables) {
    this.input = input;
    this.tables = tables;
  }

  /**
   * Get the next emitted token, skipping skip-marked matches.
   * Returns an EOF token once the input is exhausted.
   */
  nextToken(): Token {
    for (;;) {
      if (this.position >= this.input.length) {
        return newToken("", Role.EOF, newSpan(this.offset, this.offset));
      }

      const candidate = this.match();
      if (!candidate) {
        const ch = String.fromCodePoint(this.input.codePointAt(this.position) ?? 0);
        throw new LexerError(
          `unexpected character '${ch}'`,
          newSpan(this.offset, this.offset + byteLength(ch))
        );
      }

      const start = this.offset;
      this.position += candidate.text.length;
      this.offset += byteLength(candidate.text);

      if (!candidate.skip) {
        return newToken(candidate.text, candidate.role, newSpan(start, this.offset));
      }
    }
  }

  /**
   * Longest match at the current position. Registered lexemes are tried
   * longest first; a fallback rule wins only with a strictly longer match.
   */
  private match(): Candidate | undefined {
    const lexeme = this.matchLexeme();
    const rule = this.matchRule();
    if (lexeme && rule) {
      return rule.text.length > lexeme.text.length ? rule : lexeme;
    }
    return lexeme ?? rule;
  }

  private matchLexeme(): Candidate | undefined {
    for (const entry of this.tables.lexemes) {
      if (this.input.startsWith(entry.pattern, this.position) && this.atBoundary(entry)) {
        return { text: entry.pattern, role: entry.role, skip: entry.skip };
      }
    }
    return undefined;
  }

  /**
   * A lexeme made of word characters must not run into another word character,
   * so `if` never matches the head of `iffy`.
   */
  private atBoundary(entry: LexemeEntry): boolean {
    if (!WORD_LEXEME.test(entry.pattern)) {
      return true;
    }
    const next = this.input.charAt(this.position + entry.pattern.length);
    return next === "" || !WORD_CHAR.test(next);
  }

  private matchRule(): Candidate | undefined {
    let best: Candidate | undefined;
    for (const rule of this.tables.rules) {
      const text = this.exec(rule);
      // Ties go to the earlier rule
      if (text && (!best || text.length > best.text.length)) {
        best = { text, role: rule.role, skip: rule.skip ?? false };
      }
    }
    return best;
  }

  private exec(rule: LexRule): string | undefined {
    rule.pattern.lastIndex = this.position;
    const m = rule.pattern.exec(this.input);
    return m && m[0].length > 0 ? m[0] : undefined;
  }
}

/**
 * Tokenize an input string into an array of tokens ending with EOF.
 */
export function tokenize(input: string, tables: Tables): Token[] {
  const lexer = new Lexer(input, tables);
  const tokens: Token[] = [];
  let tok: Token;
  do {
    tok = lexer.nextToken();
    tokens.push(tok);
  } while (tok.role !== Role.EOF);
  return tokens;
}
