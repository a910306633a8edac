/**
 * Handler-driven Pratt parser. Languages register prefix, infix and
 * statement handlers; the parser supplies precedence climbing, grouping,
 * depth limiting and error reporting. The node type is opaque.
 */

import { ParserError } from "../errors/errors.js";
import { Token, Span, Role } from "../token/token.js";
import { Associativity, LOWEST, OperatorInfo, PrefixOperatorInfo, nextMinPrecedence } from "./precedence.js";
import { TokenStream, describe } from "./stream.js";

/** Default limit on nested expressions. */
export const MAX_PARSE_DEPTH = 500;

/**
 * Parses the term that starts with a token. The token has been consumed
 * when `parse` is called.
 */
export interface PrefixHandler<N> {
  matches(token: Token): boolean;
  parse(parser: Parser<N>, token: Token): N;
}

/**
 * Parses an operator that follows a complete left operand. The operator
 * token has been consumed when `parse` is called.
 */
export interface InfixHandler<N> {
  readonly precedence: number;
  readonly associativity: Associativity;
  matches(token: Token): boolean;
  parse(parser: Parser<N>, left: N, token: Token): N;
}

/**
 * Parses a statement starting at the current (unconsumed) token.
 */
export interface StatementHandler<N> {
  matches(token: Token, parser: Parser<N>): boolean;
  parse(parser: Parser<N>): N;
}

export interface ParserOptions {
  maxDepth?: number;
}

/**
 * Pratt parser over a structured token stream.
 */
export class Parser<N> {
  readonly stream: TokenStream;
  private prefixHandlers: PrefixHandler<N>[] = [];
  private infixHandlers: InfixHandler<N>[] = [];
  private statementHandlers: StatementHandler<N>[] = [];
  private maxDepth: number;
  private depth = 0;

  constructor(tokens: readonly Token[], options: ParserOptions = {}) {
    this.stream = new TokenStream(tokens);
    this.maxDepth = options.maxDepth ?? MAX_PARSE_DEPTH;
  }

  // =========================================================================
  // Registration
  // =========================================================================

  /** Handlers are consulted in registration order; the first match wins. */
  registerPrefix(handler: PrefixHandler<N>): this {
    this.prefixHandlers.push(handler);
    return this;
  }

  registerInfix(handler: InfixHandler<N>): this {
    this.infixHandlers.push(handler);
    return this;
  }

  registerStatement(handler: StatementHandler<N>): this {
    this.statementHandlers.push(handler);
    return this;
  }

  // =========================================================================
  // Expressions
  // =========================================================================

  /**
   * Parse an expression whose infix operators all bind at least as tightly
   * as minPrecedence.
   */
  parseExpression(minPrecedence: number = LOWEST): N {
    this.depth++;
    try {
      if (this.depth > this.maxDepth) {
        throw this.stream.error("maximum expression depth exceeded");
      }

      const token = this.stream.peek();
      const prefix = this.prefixHandlers.find((h) => h.matches(token));
      if (!prefix) {
        throw this.stream.error(`unexpected ${describe(token)}, expected an expression`);
      }
      this.stream.advance();
      let left = prefix.parse(this, token);

      // Precedence of the last non-associative operator applied at this level
      let nonAssociative: number | undefined;

      for (;;) {
        const op = this.stream.peek();
        const infix = this.infixHandlers.find((h) => h.matches(op));
        if (!infix || infix.precedence < minPrecedence) {
          break;
        }
        if (nonAssociative === infix.precedence) {
          throw new ParserError(`operator '${op.lexeme}' is non-associative and cannot be chained`, op.span);
        }
        this.stream.advance();
        left = infix.parse(this, left, op);
        nonAssociative = infix.associativity === Associativity.None ? infix.precedence : undefined;
      }

      return left;
    } finally {
      this.depth--;
    }
  }

  /**
   * Parse the right operand of an infix operator.
   */
  parseOperand(infix: { precedence: number; associativity: Associativity }): N {
    return this.parseExpression(nextMinPrecedence(infix));
  }

  /**
   * Parse a bracketed group, resetting the precedence threshold inside.
   * The opening token has already been consumed.
   */
  parseGroup(open: Token, close: string): N {
    const inner = this.parseExpression(LOWEST);
    this.expectClosing(open, close);
    return inner;
  }

  /**
   * Parse a separated list of expressions up to a closing lexeme.
   * The opening token has already been consumed.
   */
  parseList(open: Token, close: string, separator: string): N[] {
    const items: N[] = [];
    if (this.stream.match(close)) {
      return items;
    }
    do {
      items.push(this.parseExpression(LOWEST));
    } while (this.stream.match(separator));
    this.expectClosing(open, close);
    return items;
  }

  /**
   * Expect the closing lexeme of a bracket pair. An exhausted stream is
   * reported at the opening bracket.
   */
  expectClosing(open: Token, close: string): Token {
    if (this.stream.check(close)) {
      return this.stream.advance();
    }
    if (this.stream.isAtEnd()) {
      throw new ParserError(`unmatched '${open.lexeme}'`, open.span);
    }
    throw this.stream.error(`expected '${close}' to close '${open.lexeme}', got ${describe(this.stream.peek())}`);
  }

  // =========================================================================
  // Statements
  // =========================================================================

  /**
   * Parse one statement with the first matching statement handler.
   */
  parseStatement(): N {
    const token = this.stream.peek();
    const handler = this.statementHandlers.find((h) => h.matches(token, this));
    if (!handler) {
      throw this.stream.error(`unexpected ${describe(token)}, expected a statement`);
    }
    return handler.parse(this);
  }

  /**
   * Parse statements until `atEnd` holds, skipping separator tokens
   * (matched by role or lexeme) between them. Running out of input before
   * `atEnd` holds is a parse error reported at `opening`, if given.
   */
  parseStatements(atEnd: (token: Token) => boolean, separators: ReadonlySet<string>, opening?: Span): N[] {
    const statements: N[] = [];
    this.stream.skip(separators);
    while (!atEnd(this.stream.peek())) {
      if (this.stream.isAtEnd()) {
        if (opening) {
          throw new ParserError("block is never closed", opening);
        }
        break;
      }
      statements.push(this.parseStatement());
      this.stream.skip(separators);
    }
    return statements;
  }
}

// ============================================================================
// Operator tables
// ============================================================================

/**
 * Infix handlers for every binary operator of an operator table.
 */
export function binaryHandlers<N>(
  operators: ReadonlyMap<string, OperatorInfo>,
  build: (op: Token, info: OperatorInfo, left: N, right: N) => N
): InfixHandler<N>[] {
  return [...operators].map(([lexeme, info]) => ({
    precedence: info.precedence,
    associativity: info.associativity,
    matches: (token: Token) => token.role === Role.OPERATOR && token.lexeme === lexeme,
    parse: (parser: Parser<N>, left: N, token: Token) => build(token, info, left, parser.parseOperand(info)),
  }));
}

/**
 * Prefix handlers for every prefix operator of an operator table. The operand
 * is parsed at the operator's precedence.
 */
export function prefixOperatorHandlers<N>(
  operators: ReadonlyMap<string, PrefixOperatorInfo>,
  build: (op: Token, operand: N) => N
): PrefixHandler<N>[] {
  return [...operators].map(([lexeme, info]) => ({
    matches: (token: Token) => token.role === Role.OPERATOR && token.lexeme === lexeme,
    parse: (parser: Parser<N>, token: Token) => build(token, parser.parseExpression(info.precedence)),
  }));
}
