import { describe, it, expect } from "vitest";
import { ParserError } from "../errors/errors.js";
import { tokenize } from "../lexer/lexer.js";
import { Registry } from "../registry/registry.js";
import { identifierRule, numberRule, whitespaceRule } from "../registry/rules.js";
import { Role } from "../token/token.js";
import { Parser, ParserOptions, binaryHandlers, prefixOperatorHandlers } from "./parser.js";
import { Associativity } from "./precedence.js";

const tables = new Registry()
  .registerLexeme("(", Role.PUNCTUATION)
  .registerLexeme(")", Role.PUNCTUATION)
  .registerLexeme(";", Role.PUNCTUATION)
  .registerOperator("==", { precedence: 2, associativity: Associativity.None })
  .registerOperator("<", { precedence: 3, associativity: Associativity.None })
  .registerOperator("+", { precedence: 4, associativity: Associativity.Left })
  .registerOperator("-", { precedence: 4, associativity: Associativity.Left })
  .registerOperator("*", { precedence: 5, associativity: Associativity.Left })
  .registerOperator("^", { precedence: 6, associativity: Associativity.Right })
  .registerPrefixOperator("-", { precedence: 5 })
  .registerRule(identifierRule())
  .registerRule(numberRule())
  .registerRule(whitespaceRule())
  .freeze();

/**
 * Parser producing S-expression strings, enough to observe tree shape.
 */
function createParser(source: string, options: ParserOptions = {}): Parser<string> {
  const parser = new Parser<string>(tokenize(source, tables), options);
  for (const handler of prefixOperatorHandlers<string>(tables.prefixOperators, (op, x) => `(${op.lexeme} ${x})`)) {
    parser.registerPrefix(handler);
  }
  parser
    .registerPrefix({
      matches: (t) => t.role === Role.NUMBER || t.role === Role.IDENTIFIER,
      parse: (_, t) => t.lexeme,
    })
    .registerPrefix({
      matches: (t) => t.lexeme === "(",
      parse: (p, t) => p.parseGroup(t, ")"),
    })
    .registerStatement({
      matches: () => true,
      parse: (p) => p.parseExpression(),
    });
  for (const handler of binaryHandlers<string>(tables.operators, (op, _, l, r) => `(${op.lexeme} ${l} ${r})`)) {
    parser.registerInfix(handler);
  }
  return parser;
}

function parse(source: string): string {
  return createParser(source).parseExpression();
}

function parseError(source: string, options: ParserOptions = {}): ParserError {
  try {
    createParser(source, options).parseExpression();
  } catch (err) {
    if (err instanceof ParserError) return err;
    throw err;
  }
  throw new Error("expected a parse error");
}

describe("Parser", () => {
  describe("precedence", () => {
    it("should bind multiplication tighter than addition", () => {
      expect(parse("1 + 2 * 3")).toBe("(+ 1 (* 2 3))");
    });

    it("should let grouping override precedence", () => {
      expect(parse("(1 + 2) * 3")).toBe("(* (+ 1 2) 3)");
    });

    it("should group left-associative operators to the left", () => {
      expect(parse("1 - 2 - 3")).toBe("(- (- 1 2) 3)");
    });

    it("should group right-associative operators to the right", () => {
      expect(parse("2 ^ 3 ^ 2")).toBe("(^ 2 (^ 3 2))");
    });

    it("should parse a prefix operand at the prefix precedence", () => {
      expect(parse("-2 ^ 2")).toBe("(- (^ 2 2))");
      expect(parse("-2 * 3")).toBe("(* (- 2) 3)");
    });

    it("should allow non-associative operators of different levels", () => {
      expect(parse("a < b == c")).toBe("(== (< a b) c)");
    });

    it("should reject chained non-associative operators", () => {
      const err = parseError("a < b < c");

      expect(err.message).toBe("operator '<' is non-associative and cannot be chained");
      expect(err.span).toEqual({ start: 6, end: 7 });
    });
  });

  describe("errors", () => {
    it("should report an unclosed group at its opening bracket", () => {
      const err = parseError("(1 + 2");

      expect(err.message).toBe("unmatched '('");
      expect(err.span).toEqual({ start: 0, end: 1 });
    });

    it("should report a missing operand", () => {
      const err = parseError("1 +");

      expect(err.message).toBe("unexpected end of input, expected an expression");
      expect(err.span).toEqual({ start: 3, end: 3 });
    });

    it("should report a wrong closing token", () => {
      const err = parseError("(1 2)");

      expect(err.message).toBe("expected ')' to close '(', got '2'");
      expect(err.span).toEqual({ start: 3, end: 4 });
    });

    it("should limit expression nesting", () => {
      const source = "(".repeat(12) + "1" + ")".repeat(12);

      expect(parseError(source, { maxDepth: 10 }).message).toBe("maximum expression depth exceeded");
      expect(createParser(source, { maxDepth: 20 }).parseExpression()).toBe("1");
    });
  });

  describe("handlers", () => {
    it("should use the first matching prefix handler", () => {
      const parser = new Parser<string>(tokenize("x", tables))
        .registerPrefix({ matches: () => true, parse: () => "first" })
        .registerPrefix({ matches: () => true, parse: () => "second" });

      expect(parser.parseExpression()).toBe("first");
    });

    it("should parse separated statements", () => {
      const parser = createParser("1; ; 2 + 3;");

      expect(parser.parseStatements((t) => t.role === Role.EOF, new Set([";"]))).toEqual(["1", "(+ 2 3)"]);
    });

    it("should report a block that runs out of input", () => {
      const parser = createParser("1; 2");

      expect(() => parser.parseStatements((t) => t.lexeme === "}", new Set([";"]), { start: 0, end: 1 })).toThrow(
        "block is never closed"
      );
    });

    it("should parse an empty or separated list", () => {
      const parser = createParser(") a, b + 1)");
      const open = { lexeme: "(", role: Role.PUNCTUATION, span: { start: 0, end: 0 } };

      expect(parser.parseList(open, ")", ",")).toEqual([]);
      expect(parser.parseList(open, ")", ",")).toEqual(["a", "(+ b 1)"]);
      expect(parser.stream.isAtEnd()).toBe(true);
    });
  });
});
