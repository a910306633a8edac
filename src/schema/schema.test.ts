import { describe, it, expect } from "vitest";
import { ConfigError } from "../errors/errors.js";
import { schema } from "../languages/braces/braces.js";
import { Associativity } from "../parser/precedence.js";
import { Role } from "../token/token.js";
import { LanguageSchema, StatementPattern, buildTables, validateSchema } from "./schema.js";

function withStatement(pattern: StatementPattern): LanguageSchema {
  return { ...schema, statements: [...schema.statements, pattern] };
}

describe("validateSchema", () => {
  it("should accept a complete schema", () => {
    expect(() => validateSchema(schema)).not.toThrow();
  });

  it("should require at least one statement", () => {
    expect(() => validateSchema({ ...schema, statements: [] })).toThrow(
      new ConfigError("schema 'braces' defines no statements")
    );
  });

  it("should reject empty delimiters", () => {
    expect(() => validateSchema({ ...schema, block: { open: "", close: "}" } })).toThrow(
      "schema 'braces' has empty block delimiters"
    );
  });

  it("should require patterns to start with a keyword", () => {
    const pattern: StatementPattern = { keyword: "+", elements: [], action: { kind: "transfer", transfer: "break" } };

    expect(() => validateSchema(withStatement(pattern))).toThrow("statement pattern must start with a keyword, got '+'");
  });

  it("should reject an action field that no element captures", () => {
    const pattern: StatementPattern = {
      keyword: "say",
      elements: [],
      action: { kind: "invoke", selector: "console:print", args: "args" },
    };

    expect(() => validateSchema(withStatement(pattern))).toThrow(
      "pattern 'say': action field 'args' refers to undeclared 'args'"
    );
  });

  it("should reject a field captured with the wrong role", () => {
    const pattern: StatementPattern = {
      keyword: "say",
      elements: [{ role: "identifier", field: "x" }],
      action: { kind: "loop", condition: "x", body: "x" },
    };

    expect(() => validateSchema(withStatement(pattern))).toThrow(
      "pattern 'say': field 'x' is a identifier, cannot be used as condition"
    );
  });

  it("should reject an optional field where a value is required", () => {
    const pattern: StatementPattern = {
      keyword: "repeat",
      elements: [
        { role: "optional", lexeme: "when", elements: [{ role: "expression", field: "cond" }] },
        { role: "block", field: "body" },
      ],
      action: { kind: "loop", condition: "cond", body: "body" },
    };

    expect(() => validateSchema(withStatement(pattern))).toThrow(
      "pattern 'repeat': optional field 'cond' cannot be used as condition"
    );
  });

  it("should reject a field declared twice", () => {
    const pattern: StatementPattern = {
      keyword: "swap",
      elements: [
        { role: "identifier", field: "name" },
        { role: "identifier", field: "name" },
      ],
      action: { kind: "transfer", transfer: "break" },
    };

    expect(() => validateSchema(withStatement(pattern))).toThrow("pattern 'swap' declares field 'name' twice");
  });
});

describe("buildTables", () => {
  it("should register every lexeme the schema names", () => {
    const tables = buildTables(schema);

    expect(tables.roleOf("let")).toBe(Role.KEYWORD);
    expect(tables.roleOf("else")).toBe(Role.KEYWORD);
    expect(tables.roleOf("extern")).toBe(Role.KEYWORD);
    expect(tables.roleOf("{")).toBe(Role.PUNCTUATION);
    expect(tables.roleOf(";")).toBe(Role.PUNCTUATION);
    expect(tables.roleOf("**")).toBe(Role.OPERATOR);
    expect(tables.statements.get("while")?.action.kind).toBe("loop");
  });

  it("should reject two patterns with the same keyword", () => {
    const pattern: StatementPattern = { keyword: "let", elements: [], action: { kind: "transfer", transfer: "break" } };

    expect(() => buildTables(withStatement(pattern))).toThrow(
      "ambiguous statement patterns: more than one starts with 'let'"
    );
  });

  it("should reject a lexeme used as both operator and keyword", () => {
    const conflicting: LanguageSchema = {
      ...schema,
      operators: { ...schema.operators, else: { precedence: 1, associativity: Associativity.Left } },
    };

    expect(() => buildTables(conflicting)).toThrow("lexeme 'else' registered as both operator and keyword");
  });
});
