import { describe, it, expect } from "vitest";
import { ParserError } from "../errors/errors.js";
import { tokenize } from "../lexer/lexer.js";
import { Registry } from "../registry/registry.js";
import { identifierRule, lineBreakRule, lineCommentRule, whitespaceRule } from "../registry/rules.js";
import { Role } from "../token/token.js";
import { delimiterNormalizer, identityNormalizer, indentationNormalizer, StructuralNormalizer } from "./structure.js";

const tables = new Registry()
  .registerLexeme("(", Role.PUNCTUATION)
  .registerLexeme(")", Role.PUNCTUATION)
  .registerLexeme("{", Role.PUNCTUATION)
  .registerLexeme("}", Role.PUNCTUATION)
  .registerLexeme(",", Role.PUNCTUATION)
  .registerRule(identifierRule())
  .registerRule(whitespaceRule())
  .registerRule(lineCommentRule("#"))
  .registerRule(lineBreakRule())
  .freeze();

const indented = indentationNormalizer({ indentWidth: 4, brackets: [["(", ")"]] });
const delimited = delimiterNormalizer({
  pairs: [
    ["(", ")"],
    ["{", "}"],
  ],
});

function normalize(normalizer: StructuralNormalizer, source: string) {
  return normalizer(tokenize(source, tables), source);
}

function roles(normalizer: StructuralNormalizer, source: string): string[] {
  return normalize(normalizer, source).map((t) => t.role);
}

function structureError(normalizer: StructuralNormalizer, source: string): ParserError {
  try {
    normalize(normalizer, source);
  } catch (err) {
    if (err instanceof ParserError) return err;
    throw err;
  }
  throw new Error("expected a parse error");
}

describe("indentationNormalizer", () => {
  it("should emit indent and dedent around a block", () => {
    expect(roles(indented, "a\n    b\n    c\nd\n")).toEqual([
      Role.IDENTIFIER,
      Role.NEWLINE,
      Role.INDENT,
      Role.IDENTIFIER,
      Role.NEWLINE,
      Role.IDENTIFIER,
      Role.NEWLINE,
      Role.DEDENT,
      Role.IDENTIFIER,
      Role.NEWLINE,
      Role.EOF,
    ]);
  });

  it("should ignore blank and comment-only lines", () => {
    expect(roles(indented, "a\n\n        # note\n    b")).toEqual([
      Role.IDENTIFIER,
      Role.NEWLINE,
      Role.INDENT,
      Role.IDENTIFIER,
      Role.NEWLINE,
      Role.DEDENT,
      Role.EOF,
    ]);
  });

  it("should close every open block at end of input", () => {
    expect(roles(indented, "a\n    b\n        c")).toEqual([
      Role.IDENTIFIER,
      Role.NEWLINE,
      Role.INDENT,
      Role.IDENTIFIER,
      Role.NEWLINE,
      Role.INDENT,
      Role.IDENTIFIER,
      Role.NEWLINE,
      Role.DEDENT,
      Role.DEDENT,
      Role.EOF,
    ]);
  });

  it("should join lines inside brackets", () => {
    const tokens = normalize(indented, "f(a,\n      b)\nc");

    expect(tokens.map((t) => t.lexeme)).toEqual(["f", "(", "a", ",", "b", ")", "", "c", "", ""]);
    expect(tokens.map((t) => t.role)).not.toContain(Role.INDENT);
  });

  it("should reject indentation that is not a multiple of the width", () => {
    const err = structureError(indented, "a\n  b");

    expect(err.message).toBe("invalid indentation: expected a multiple of 4 spaces");
    expect(err.span).toEqual({ start: 2, end: 4 });
  });

  it("should reject a dedent to a level that was never opened", () => {
    const err = structureError(indented, "a\n    b\n  c");

    expect(err.message).toBe("indentation mismatch: dedent does not match any outer level");
  });

  it("should reject tabs in indentation", () => {
    const err = structureError(indented, "a\n\tb");

    expect(err.message).toBe("invalid indentation: tabs are not allowed");
    expect(err.span).toEqual({ start: 2, end: 3 });
  });
});

describe("delimiterNormalizer", () => {
  it("should drop line breaks and keep everything else", () => {
    expect(normalize(delimited, "{ (a)\n}").map((t) => t.lexeme)).toEqual(["{", "(", "a", ")", "}", ""]);
  });

  it("should report an unclosed bracket at the opening bracket", () => {
    const err = structureError(delimited, "a (b");

    expect(err.message).toBe("unmatched '('");
    expect(err.span).toEqual({ start: 2, end: 3 });
  });

  it("should report a stray closing bracket", () => {
    const err = structureError(delimited, "a)");

    expect(err.message).toBe("unmatched ')'");
    expect(err.span).toEqual({ start: 1, end: 2 });
  });

  it("should report a mismatched closing bracket", () => {
    const err = structureError(delimited, "(a}");

    expect(err.message).toBe("expected ')' to close '(', got '}'");
    expect(err.span).toEqual({ start: 2, end: 3 });
  });
});

describe("identityNormalizer", () => {
  it("should copy the stream unchanged", () => {
    const tokens = tokenize("a\nb", tables);

    expect(identityNormalizer(tokens, "a\nb")).toEqual(tokens);
  });
});
