/**
 * Schema-driven parser: matches statement patterns by their leading keyword
 * and climbs the operator table for expressions, producing canonical
 * instructions.
 */

import { ParserError } from "../errors/errors.js";
import * as ins from "../instruction/instruction.js";
import type { Instruction } from "../instruction/instruction.js";
import { MAX_PARSE_DEPTH } from "../parser/parser.js";
import { Associativity, LOWEST, nextMinPrecedence } from "../parser/precedence.js";
import { TokenStream, describe } from "../parser/stream.js";
import type { Tables } from "../registry/registry.js";
import { Role, Span, Token, joinSpans } from "../token/token.js";
import type { LanguageSchema, PatternElement, StatementAction, StatementPattern, ValueFactory } from "./schema.js";

type Capture =
  | { readonly kind: "instruction"; readonly value: Instruction }
  | { readonly kind: "name"; readonly value: string }
  | { readonly kind: "names"; readonly value: readonly string[] }
  | { readonly kind: "list"; readonly value: readonly Instruction[] };

export interface SchemaParserOptions {
  maxDepth?: number;
}

export class SchemaParser {
  private stream: TokenStream;
  private tables: Tables<StatementPattern>;
  private schema: LanguageSchema;
  private values: ValueFactory;
  private terminators: ReadonlySet<string>;
  private literalRoles: ReadonlySet<string>;
  private constants: ReadonlySet<string>;
  private maxDepth: number;
  private depth = 0;

  constructor(
    tokens: readonly Token[],
    tables: Tables<StatementPattern>,
    schema: LanguageSchema,
    values: ValueFactory,
    options: SchemaParserOptions = {}
  ) {
    this.stream = new TokenStream(tokens);
    this.tables = tables;
    this.schema = schema;
    this.values = values;
    this.terminators = new Set([...schema.terminators, Role.NEWLINE]);
    this.literalRoles = new Set(schema.literalRoles);
    this.constants = new Set(schema.constants);
    this.maxDepth = options.maxDepth ?? MAX_PARSE_DEPTH;
  }

  /**
   * Parse the whole program as a sequence executed in the global frame.
   */
  parseProgram(): Instruction {
    const start = this.stream.peek().span;
    const body: Instruction[] = [];
    this.stream.skip(this.terminators);
    while (!this.stream.isAtEnd()) {
      body.push(this.parseStatement());
      this.stream.skip(this.terminators);
    }
    return ins.sequence(body, joinSpans(start, this.stream.peek().span));
  }

  // =========================================================================
  // Statements
  // =========================================================================

  private parseStatement(): Instruction {
    const token = this.stream.peek();
    const pattern = token.role === Role.KEYWORD ? this.tables.statements.get(token.lexeme) : undefined;
    if (pattern) {
      return this.parsePattern(pattern);
    }
    return this.parseExpressionStatement();
  }

  private parsePattern(pattern: StatementPattern): Instruction {
    const keyword = this.stream.advance();
    const captures = new Map<string, Capture>();
    this.parseElements(pattern.elements, captures);
    return this.compile(pattern.action, captures, joinSpans(keyword.span, this.stream.previous().span));
  }

  private parseElements(elements: readonly PatternElement[], captures: Map<string, Capture>): void {
    for (const el of elements) {
      switch (el.role) {
        case "literal":
          this.stream.expect(el.lexeme);
          break;
        case "identifier":
          captures.set(el.field, { kind: "name", value: this.stream.expectRole(Role.IDENTIFIER, "a name").lexeme });
          break;
        case "expression":
          captures.set(el.field, { kind: "instruction", value: this.parseExpression(LOWEST) });
          break;
        case "optional-expression":
          if (!this.atStatementEnd()) {
            captures.set(el.field, { kind: "instruction", value: this.parseExpression(LOWEST) });
          }
          break;
        case "block":
          if (el.chain !== undefined && this.stream.check(el.chain)) {
            captures.set(el.field, { kind: "instruction", value: this.parseStatement() });
          } else {
            captures.set(el.field, { kind: "instruction", value: this.parseBlock() });
          }
          break;
        case "parameters":
          captures.set(el.field, { kind: "names", value: this.parseParameters() });
          break;
        case "arguments": {
          const open = this.stream.expect(this.schema.call.open);
          captures.set(el.field, { kind: "list", value: this.parseArguments(open) });
          break;
        }
        case "optional":
          if (this.stream.match(el.lexeme)) {
            this.parseElements(el.elements, captures);
          }
          break;
      }
    }
  }

  private compile(action: StatementAction, captures: ReadonlyMap<string, Capture>, span: Span): Instruction {
    const instr = (field: string): Instruction => {
      const c = captures.get(field);
      if (c?.kind !== "instruction") throw new ParserError(`missing ${field}`, span);
      return c.value;
    };
    const optionalInstr = (field: string | undefined): Instruction | undefined =>
      field !== undefined && captures.has(field) ? instr(field) : undefined;
    const name = (field: string): string => {
      const c = captures.get(field);
      if (c?.kind !== "name") throw new ParserError(`missing ${field}`, span);
      return c.value;
    };

    switch (action.kind) {
      case "bind":
        return ins.assign(name(action.name), instr(action.value), "bind", span);
      case "branch":
        return ins.branch(instr(action.condition), instr(action.then), optionalInstr(action.otherwise), span);
      case "loop":
        return ins.loop(instr(action.condition), instr(action.body), span);
      case "transfer":
        return ins.transfer(action.transfer, optionalInstr(action.value), span);
      case "function": {
        const params = captures.get(action.params);
        if (params?.kind !== "names") throw new ParserError(`missing ${action.params}`, span);
        const fnName = name(action.name);
        const fn = ins.operate({ kind: "function", name: fnName, params: params.value, body: instr(action.body) }, [], span);
        return ins.assign(fnName, fn, "bind", span);
      }
      case "invoke": {
        const args = captures.get(action.args);
        if (args?.kind !== "list") throw new ParserError(`missing ${action.args}`, span);
        return ins.invoke(action.selector, args.value, "extern", span);
      }
    }
  }

  /**
   * `target = value` assigns to the nearest existing binding; anything else
   * is an expression evaluated for effect.
   */
  private parseExpressionStatement(): Instruction {
    const expr = this.parseExpression(LOWEST);
    if (!this.stream.check(this.schema.assignment)) {
      return expr;
    }
    const eq = this.stream.advance();
    if (expr.kind !== ins.InstructionKind.Operate || expr.op.kind !== "load") {
      throw new ParserError("invalid assignment target", eq.span);
    }
    const value = this.parseExpression(LOWEST);
    return ins.assign(expr.op.name, value, "set", joinSpans(expr.span, value.span));
  }

  /**
   * A delimited block, executed in its own frame.
   */
  private parseBlock(): Instruction {
    const { open, close } = this.schema.block;
    const opening = this.stream.expect(open);
    const body: Instruction[] = [];
    this.stream.skip(this.terminators);
    while (!this.stream.check(close)) {
      if (this.stream.isAtEnd()) {
        throw new ParserError(`unmatched '${open}'`, opening.span);
      }
      body.push(this.parseStatement());
      this.stream.skip(this.terminators);
    }
    const closing = this.stream.advance();
    const span = joinSpans(opening.span, closing.span);
    return ins.scope(ins.sequence(body, span), span);
  }

  private parseParameters(): string[] {
    const { open, close, separator } = this.schema.call;
    const opening = this.stream.expect(open);
    const names: string[] = [];
    if (!this.stream.check(close)) {
      do {
        const tok = this.stream.expectRole(Role.IDENTIFIER, "a parameter name");
        if (names.includes(tok.lexeme)) {
          throw new ParserError(`duplicate parameter '${tok.lexeme}'`, tok.span);
        }
        names.push(tok.lexeme);
      } while (this.stream.match(separator));
    }
    this.expectClosing(opening, close);
    return names;
  }

  private parseArguments(open: Token): Instruction[] {
    const { close, separator } = this.schema.call;
    const args: Instruction[] = [];
    if (!this.stream.check(close)) {
      do {
        args.push(this.parseExpression(LOWEST));
      } while (this.stream.match(separator));
    }
    this.expectClosing(open, close);
    return args;
  }

  private atStatementEnd(): boolean {
    const tok = this.stream.peek();
    return (
      tok.role === Role.EOF ||
      this.terminators.has(tok.role) ||
      (tok.role !== Role.STRING && this.terminators.has(tok.lexeme)) ||
      this.stream.check(this.schema.block.close)
    );
  }

  private expectClosing(open: Token, close: string): Token {
    if (this.stream.check(close)) {
      return this.stream.advance();
    }
    if (this.stream.isAtEnd()) {
      throw new ParserError(`unmatched '${open.lexeme}'`, open.span);
    }
    throw this.stream.error(`expected '${close}' to close '${open.lexeme}', got ${describe(this.stream.peek())}`);
  }

  // =========================================================================
  // Expressions
  // =========================================================================

  private parseExpression(minPrecedence: number): Instruction {
    this.depth++;
    try {
      if (this.depth > this.maxDepth) {
        throw this.stream.error("maximum expression depth exceeded");
      }
      let left = this.parsePrefix();
      let nonAssociative: number | undefined;

      for (;;) {
        const op = this.stream.peek();
        const info = op.role === Role.OPERATOR ? this.tables.operators.get(op.lexeme) : undefined;
        if (!info || info.precedence < minPrecedence) {
          break;
        }
        if (nonAssociative === info.precedence) {
          throw new ParserError(`operator '${op.lexeme}' is non-associative and cannot be chained`, op.span);
        }
        this.stream.advance();
        const right = this.parseExpression(nextMinPrecedence(info));
        left = ins.operate(
          { kind: "binary", symbol: op.lexeme, shortCircuit: info.shortCircuit },
          [left, right],
          joinSpans(left.span, right.span)
        );
        nonAssociative = info.associativity === Associativity.None ? info.precedence : undefined;
      }
      return left;
    } finally {
      this.depth--;
    }
  }

  private parsePrefix(): Instruction {
    const token = this.stream.peek();

    if (token.role === Role.OPERATOR) {
      const info = this.tables.prefixOperators.get(token.lexeme);
      if (info) {
        this.stream.advance();
        const operand = this.parseExpression(info.precedence);
        return ins.operate({ kind: "unary", symbol: token.lexeme }, [operand], joinSpans(token.span, operand.span));
      }
    }

    if (this.literalRoles.has(token.role) || (token.role === Role.KEYWORD && this.constants.has(token.lexeme))) {
      this.stream.advance();
      const value = this.values.literal(token);
      if (value === undefined) {
        throw new ParserError(`invalid literal ${token.lexeme}`, token.span);
      }
      return ins.literal(value, token.span);
    }

    if (token.role === Role.IDENTIFIER) {
      this.stream.advance();
      if (this.stream.check(this.schema.call.open)) {
        const open = this.stream.advance();
        const args = this.parseArguments(open);
        return ins.invoke(token.lexeme, args, "local", joinSpans(token.span, this.stream.previous().span));
      }
      return ins.load(token.lexeme, token.span);
    }

    if (this.schema.extern !== undefined && token.role === Role.KEYWORD && token.lexeme === this.schema.extern) {
      this.stream.advance();
      const selector = this.stream.expectRole(Role.STRING, "a quoted selector");
      const open = this.stream.expect(this.schema.call.open);
      const args = this.parseArguments(open);
      return ins.invoke(selector.lexeme.slice(1, -1), args, "extern", joinSpans(token.span, this.stream.previous().span));
    }

    if (this.stream.check(this.schema.grouping.open)) {
      const open = this.stream.advance();
      const inner = this.parseExpression(LOWEST);
      this.expectClosing(open, this.schema.grouping.close);
      return inner;
    }

    throw this.stream.error(`unexpected ${describe(token)}, expected an expression`);
  }
}

/**
 * Parse structured tokens into a program instruction.
 */
export function parseInstructions(
  tokens: readonly Token[],
  tables: Tables<StatementPattern>,
  schema: LanguageSchema,
  values: ValueFactory,
  options?: SchemaParserOptions
): Instruction {
  return new SchemaParser(tokens, tables, schema, values, options).parseProgram();
}
