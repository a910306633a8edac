/**
 * Cursor over a structured token stream, shared by both parser variants.
 */

import { ParserError } from "../errors/errors.js";
import { Token, Role, newSpan, newToken } from "../token/token.js";

export class TokenStream {
  private tokens: readonly Token[];
  private index = 0;

  constructor(tokens: readonly Token[]) {
    const last = tokens[tokens.length - 1];
    if (last === undefined || last.role !== Role.EOF) {
      const end = last === undefined ? 0 : last.span.end;
      this.tokens = [...tokens, newToken("", Role.EOF, newSpan(end, end))];
    } else {
      this.tokens = tokens;
    }
  }

  /**
   * Look ahead without consuming. Past the end, the EOF token is returned.
   */
  peek(offset = 0): Token {
    const i = Math.min(this.index + offset, this.tokens.length - 1);
    return this.tokens[i];
  }

  /**
   * Consume and return the current token. EOF is never consumed.
   */
  advance(): Token {
    const tok = this.peek();
    if (tok.role !== Role.EOF) {
      this.index++;
    }
    return tok;
  }

  /** The most recently consumed token. */
  previous(): Token {
    return this.tokens[Math.max(0, this.index - 1)];
  }

  isAtEnd(): boolean {
    return this.peek().role === Role.EOF;
  }

  /** Current token is the given non-string lexeme. */
  check(lexeme: string): boolean {
    const tok = this.peek();
    return tok.lexeme === lexeme && tok.role !== Role.STRING;
  }

  checkRole(role: string): boolean {
    return this.peek().role === role;
  }

  /**
   * Consume the current token if it is the given lexeme.
   */
  match(lexeme: string): boolean {
    if (this.check(lexeme)) {
      this.advance();
      return true;
    }
    return false;
  }

  /**
   * Consume the given lexeme or fail with a parse error at the current token.
   */
  expect(lexeme: string): Token {
    if (!this.check(lexeme)) {
      throw this.error(`expected '${lexeme}', got ${describe(this.peek())}`);
    }
    return this.advance();
  }

  /**
   * Consume a token with the given role or fail.
   */
  expectRole(role: string, what: string = role): Token {
    if (!this.checkRole(role)) {
      throw this.error(`expected ${what}, got ${describe(this.peek())}`);
    }
    return this.advance();
  }

  /** Consume every consecutive token with one of the given roles or lexemes. */
  skip(kinds: ReadonlySet<string>): void {
    while (!this.isAtEnd() && (kinds.has(this.peek().role) || kinds.has(this.peek().lexeme))) {
      this.advance();
    }
  }

  /** Parse error at the current token. */
  error(message: string): ParserError {
    return new ParserError(message, this.peek().span);
  }
}

/**
 * Short description of a token for error messages.
 */
export function describe(tok: Token): string {
  switch (tok.role) {
    case Role.EOF:
      return "end of input";
    case Role.NEWLINE:
      return "end of line";
    case Role.INDENT:
      return "indent";
    case Role.DEDENT:
      return "dedent";
    default:
      return `'${tok.lexeme}'`;
  }
}
