/**
 * Offside: an indentation-structured language run by the tree-walking
 * strategy. Blocks are opened by a line ending in a statement header and
 * closed by dedenting.
 */

import { Program } from "../../ast/nodes.js";
import type { ExecutableNode } from "../../ast/nodes.js";
import { Interpreter } from "../../interpreter/interpreter.js";
import { tokenize } from "../../lexer/lexer.js";
import { Parser, StatementHandler, binaryHandlers, prefixOperatorHandlers } from "../../parser/parser.js";
import { Associativity } from "../../parser/precedence.js";
import { describe } from "../../parser/stream.js";
import { Registry, Tables } from "../../registry/registry.js";
import {
  identifierRule,
  lineBreakRule,
  lineCommentRule,
  numberRule,
  stringRule,
  whitespaceRule,
} from "../../registry/rules.js";
import { indentationNormalizer } from "../../structure/structure.js";
import { Role, Token, joinSpans } from "../../token/token.js";
import { ParserError } from "../../errors/errors.js";
import type { CompileOptions, CompiledProgram, Language } from "../language.js";
import { NONE, literalValue } from "../common/values.js";
import {
  AssignStmt,
  BinaryExpr,
  BreakStmt,
  CallExpr,
  ContinueStmt,
  ExternCall,
  FnStmt,
  Identifier,
  IfStmt,
  LetStmt,
  Literal,
  PrintStmt,
  ReturnStmt,
  UnaryExpr,
  WhileStmt,
} from "./nodes.js";

const KEYWORDS = ["let", "if", "else", "while", "fn", "return", "break", "continue", "print", "extern"];
const CONSTANTS = ["true", "false", "none"];
const PUNCTUATION = ["(", ")", ",", "="];
const INDENT_WIDTH = 4;

/**
 * Build the frozen lexeme and operator tables of the language.
 */
export function createTables(): Tables {
  const registry = new Registry();
  for (const keyword of [...KEYWORDS, ...CONSTANTS]) {
    registry.registerLexeme(keyword, Role.KEYWORD);
  }
  for (const p of PUNCTUATION) {
    registry.registerLexeme(p, Role.PUNCTUATION);
  }

  registry
    .registerOperator("or", { precedence: 1, associativity: Associativity.Left, shortCircuit: "or" })
    .registerOperator("and", { precedence: 2, associativity: Associativity.Left, shortCircuit: "and" })
    .registerOperator("==", { precedence: 4, associativity: Associativity.None })
    .registerOperator("!=", { precedence: 4, associativity: Associativity.None })
    .registerOperator("<", { precedence: 5, associativity: Associativity.None })
    .registerOperator(">", { precedence: 5, associativity: Associativity.None })
    .registerOperator("<=", { precedence: 5, associativity: Associativity.None })
    .registerOperator(">=", { precedence: 5, associativity: Associativity.None })
    .registerOperator("+", { precedence: 6, associativity: Associativity.Left })
    .registerOperator("-", { precedence: 6, associativity: Associativity.Left })
    .registerOperator("*", { precedence: 7, associativity: Associativity.Left })
    .registerOperator("/", { precedence: 7, associativity: Associativity.Left })
    .registerOperator("%", { precedence: 7, associativity: Associativity.Left })
    .registerOperator("^", { precedence: 8, associativity: Associativity.Right })
    .registerPrefixOperator("not", { precedence: 3 })
    .registerPrefixOperator("-", { precedence: 8 });

  registry
    .registerRule(identifierRule())
    .registerRule(numberRule())
    .registerRule(stringRule())
    .registerRule(whitespaceRule())
    .registerRule(lineCommentRule("#"))
    .registerRule(lineBreakRule());

  return registry.freeze();
}

// ============================================================================
// Parsing
// ============================================================================

type P = Parser<ExecutableNode>;

const SEPARATORS: ReadonlySet<string> = new Set([Role.NEWLINE]);

/**
 * A simple statement must be the last thing on its line.
 */
function endStatement(parser: P): void {
  const tok = parser.stream.peek();
  if (tok.role !== Role.NEWLINE && tok.role !== Role.EOF && tok.role !== Role.DEDENT) {
    throw parser.stream.error(`unexpected ${describe(tok)} after statement`);
  }
}

/**
 * Indented block following a header line.
 */
function parseBlock(parser: P, header: Token): ExecutableNode[] {
  parser.stream.expectRole(Role.NEWLINE, "end of line");
  if (!parser.stream.checkRole(Role.INDENT)) {
    throw parser.stream.error(`expected an indented block after '${header.lexeme}'`);
  }
  parser.stream.advance();
  const body = parser.parseStatements((t) => t.role === Role.DEDENT, SEPARATORS, header.span);
  parser.stream.expectRole(Role.DEDENT, "dedent");
  return body;
}

function keyword(lexeme: string, parse: (parser: P, token: Token) => ExecutableNode): StatementHandler<ExecutableNode> {
  return {
    matches: (token) => token.role === Role.KEYWORD && token.lexeme === lexeme,
    parse: (parser) => parse(parser, parser.stream.advance()),
  };
}

function parseIf(parser: P, token: Token): ExecutableNode {
  const condition = parser.parseExpression();
  const then = parseBlock(parser, token);
  let otherwise: ExecutableNode[] | undefined;
  if (parser.stream.check("else")) {
    const elseToken = parser.stream.advance();
    otherwise = parser.stream.check("if")
      ? [parseIf(parser, parser.stream.advance())]
      : parseBlock(parser, elseToken);
  }
  return new IfStmt(joinSpans(token.span, parser.stream.previous().span), condition, then, otherwise);
}

const statementHandlers: StatementHandler<ExecutableNode>[] = [
  keyword("let", (parser, token) => {
    const name = parser.stream.expectRole(Role.IDENTIFIER, "a name");
    parser.stream.expect("=");
    const value = parser.parseExpression();
    endStatement(parser);
    return new LetStmt(joinSpans(token.span, value.span), name.lexeme, value);
  }),
  keyword("if", parseIf),
  keyword("while", (parser, token) => {
    const condition = parser.parseExpression();
    const body = parseBlock(parser, token);
    return new WhileStmt(joinSpans(token.span, parser.stream.previous().span), condition, body);
  }),
  keyword("fn", (parser, token) => {
    const name = parser.stream.expectRole(Role.IDENTIFIER, "a function name");
    const open = parser.stream.expect("(");
    const params: string[] = [];
    if (!parser.stream.check(")")) {
      do {
        const param = parser.stream.expectRole(Role.IDENTIFIER, "a parameter name");
        if (params.includes(param.lexeme)) {
          throw new ParserError(`duplicate parameter '${param.lexeme}'`, param.span);
        }
        params.push(param.lexeme);
      } while (parser.stream.match(","));
    }
    parser.expectClosing(open, ")");
    const body = parseBlock(parser, token);
    return new FnStmt(joinSpans(token.span, parser.stream.previous().span), name.lexeme, params, body);
  }),
  keyword("return", (parser, token) => {
    const tok = parser.stream.peek();
    if (tok.role === Role.NEWLINE || tok.role === Role.EOF || tok.role === Role.DEDENT) {
      return new ReturnStmt(token.span);
    }
    const value = parser.parseExpression();
    endStatement(parser);
    return new ReturnStmt(joinSpans(token.span, value.span), value);
  }),
  keyword("break", (parser, token) => {
    endStatement(parser);
    return new BreakStmt(token.span);
  }),
  keyword("continue", (parser, token) => {
    endStatement(parser);
    return new ContinueStmt(token.span);
  }),
  keyword("print", (parser, token) => {
    const open = parser.stream.expect("(");
    const args = parser.parseList(open, ")", ",");
    endStatement(parser);
    return new PrintStmt(joinSpans(token.span, parser.stream.previous().span), args);
  }),
  // Expression statement, or assignment when followed by '='
  {
    matches: () => true,
    parse: (parser) => {
      const expr = parser.parseExpression();
      if (parser.stream.check("=")) {
        const eq = parser.stream.advance();
        if (!(expr instanceof Identifier)) {
          throw new ParserError("invalid assignment target", eq.span);
        }
        const value = parser.parseExpression();
        endStatement(parser);
        return new AssignStmt(joinSpans(expr.span, value.span), expr.name, value);
      }
      endStatement(parser);
      return expr;
    },
  },
];

/**
 * Create a parser over structured tokens with every offside handler registered.
 */
export function createParser(tables: Tables, tokens: readonly Token[], options: CompileOptions = {}): P {
  const parser = new Parser<ExecutableNode>(tokens, { maxDepth: options.maxParseDepth });

  for (const handler of prefixOperatorHandlers<ExecutableNode>(
    tables.prefixOperators,
    (op, operand) => new UnaryExpr(joinSpans(op.span, operand.span), op.lexeme, operand)
  )) {
    parser.registerPrefix(handler);
  }

  parser
    .registerPrefix({
      matches: (t) => t.role === Role.NUMBER || t.role === Role.STRING || (t.role === Role.KEYWORD && CONSTANTS.includes(t.lexeme)),
      parse: (_, token) => {
        const value = literalValue(token);
        if (value === undefined) {
          throw new ParserError(`invalid literal ${token.lexeme}`, token.span);
        }
        return new Literal(token.span, token.lexeme, value);
      },
    })
    .registerPrefix({
      matches: (t) => t.role === Role.IDENTIFIER,
      parse: (p, token) => {
        const ident = new Identifier(token.span, token.lexeme);
        if (!p.stream.check("(")) {
          return ident;
        }
        const open = p.stream.advance();
        const args = p.parseList(open, ")", ",");
        return new CallExpr(joinSpans(token.span, p.stream.previous().span), ident, args);
      },
    })
    .registerPrefix({
      matches: (t) => t.role === Role.KEYWORD && t.lexeme === "extern",
      parse: (p, token) => {
        const selector = p.stream.expectRole(Role.STRING, "a quoted selector");
        const open = p.stream.expect("(");
        const args = p.parseList(open, ")", ",");
        return new ExternCall(joinSpans(token.span, p.stream.previous().span), selector.lexeme.slice(1, -1), args);
      },
    })
    .registerPrefix({
      matches: (t) => t.role === Role.PUNCTUATION && t.lexeme === "(",
      parse: (p, token) => p.parseGroup(token, ")"),
    });

  for (const handler of binaryHandlers<ExecutableNode>(
    tables.operators,
    (op, info, left, right) =>
      new BinaryExpr(joinSpans(left.span, right.span), op.lexeme, left, right, info.shortCircuit)
  )) {
    parser.registerInfix(handler);
  }

  for (const handler of statementHandlers) {
    parser.registerStatement(handler);
  }
  return parser;
}

/**
 * Parse offside source into a program.
 */
export function parseOffside(source: string, options: CompileOptions = {}, tables: Tables = createTables()): Program {
  const normalize = indentationNormalizer({ indentWidth: INDENT_WIDTH, brackets: [["(", ")"]] });
  const tokens = normalize(tokenize(source, tables), source);
  const parser = createParser(tables, tokens, options);
  const statements = parser.parseStatements((t) => t.role === Role.EOF, SEPARATORS);
  return new Program(statements);
}

const TABLES = createTables();

export const offside: Language = {
  name: "offside",
  description: "indentation blocks, tree-walking interpreter",
  extensions: [".off"],
  unit: NONE,
  compile(source: string, options?: CompileOptions): CompiledProgram {
    const program = parseOffside(source, options, TABLES);
    return {
      execute: (context) => new Interpreter(context).run(program),
      toString: () => program.toString(),
    };
  },
};
