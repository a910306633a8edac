/**
 * Braces: a curly-brace language defined entirely by a schema and run by
 * the canonical-instruction executor. Every block opens its own frame.
 *
 * Line breaks are whitespace: only `;` or a closing brace ends a statement.
 * A bare `return` takes the expression on the following line as its value,
 * so write `return;` to return nothing.
 */

import { Executor } from "../../executor/executor.js";
import { formatInstruction } from "../../instruction/instruction.js";
import { tokenize } from "../../lexer/lexer.js";
import { Associativity } from "../../parser/precedence.js";
import type { Tables } from "../../registry/registry.js";
import {
  identifierRule,
  lineBreakRule,
  lineCommentRule,
  numberRule,
  stringRule,
  whitespaceRule,
} from "../../registry/rules.js";
import { parseInstructions } from "../../schema/parser.js";
import { LanguageSchema, StatementPattern, ValueFactory, buildTables } from "../../schema/schema.js";
import { delimiterNormalizer } from "../../structure/structure.js";
import { Role } from "../../token/token.js";
import { createSemantics } from "../common/operators.js";
import { NONE, literalValue } from "../common/values.js";
import type { CompileOptions, CompiledProgram, Language } from "../language.js";

export const schema: LanguageSchema = {
  name: "braces",
  keywords: ["else"],
  punctuation: [],
  rules: [
    identifierRule(),
    numberRule(),
    stringRule(),
    whitespaceRule(),
    lineCommentRule("//"),
    lineBreakRule(true),
  ],
  operators: {
    "||": { precedence: 1, associativity: Associativity.Left, shortCircuit: "or" },
    "&&": { precedence: 2, associativity: Associativity.Left, shortCircuit: "and" },
    "==": { precedence: 3, associativity: Associativity.None },
    "!=": { precedence: 3, associativity: Associativity.None },
    "<": { precedence: 4, associativity: Associativity.None },
    ">": { precedence: 4, associativity: Associativity.None },
    "<=": { precedence: 4, associativity: Associativity.None },
    ">=": { precedence: 4, associativity: Associativity.None },
    "+": { precedence: 5, associativity: Associativity.Left },
    "-": { precedence: 5, associativity: Associativity.Left },
    "*": { precedence: 6, associativity: Associativity.Left },
    "/": { precedence: 6, associativity: Associativity.Left },
    "%": { precedence: 6, associativity: Associativity.Left },
    "**": { precedence: 8, associativity: Associativity.Right },
  },
  prefixOperators: {
    "!": { precedence: 7 },
    "-": { precedence: 7 },
  },
  literalRoles: [Role.NUMBER, Role.STRING],
  constants: ["true", "false", "none"],
  grouping: { open: "(", close: ")" },
  block: { open: "{", close: "}" },
  call: { open: "(", close: ")", separator: "," },
  terminators: [";"],
  assignment: "=",
  extern: "extern",
  statements: [
    {
      keyword: "let",
      elements: [
        { role: "identifier", field: "name" },
        { role: "literal", lexeme: "=" },
        { role: "expression", field: "value" },
      ],
      action: { kind: "bind", name: "name", value: "value" },
    },
    {
      keyword: "if",
      elements: [
        { role: "expression", field: "condition" },
        { role: "block", field: "then" },
        { role: "optional", lexeme: "else", elements: [{ role: "block", field: "otherwise", chain: "if" }] },
      ],
      action: { kind: "branch", condition: "condition", then: "then", otherwise: "otherwise" },
    },
    {
      keyword: "while",
      elements: [
        { role: "expression", field: "condition" },
        { role: "block", field: "body" },
      ],
      action: { kind: "loop", condition: "condition", body: "body" },
    },
    {
      keyword: "fn",
      elements: [
        { role: "identifier", field: "name" },
        { role: "parameters", field: "params" },
        { role: "block", field: "body" },
      ],
      action: { kind: "function", name: "name", params: "params", body: "body" },
    },
    {
      keyword: "return",
      elements: [{ role: "optional-expression", field: "value" }],
      action: { kind: "transfer", transfer: "return", value: "value" },
    },
    { keyword: "break", elements: [], action: { kind: "transfer", transfer: "break" } },
    { keyword: "continue", elements: [], action: { kind: "transfer", transfer: "continue" } },
    {
      keyword: "print",
      elements: [{ role: "arguments", field: "args" }],
      action: { kind: "invoke", selector: "console:print", args: "args" },
    },
  ],
  memoizable: ["fib", "fact"],
};

export const values: ValueFactory = {
  unit: NONE,
  literal: literalValue,
};

export const semantics = createSemantics(
  {
    "+": "+",
    "-": "-",
    "*": "*",
    "/": "/",
    "%": "%",
    "**": "pow",
    "==": "==",
    "!=": "!=",
    "<": "<",
    ">": ">",
    "<=": "<=",
    ">=": ">=",
  },
  { "-": "neg", "!": "not" }
);

const normalize = delimiterNormalizer({
  pairs: [
    ["(", ")"],
    ["{", "}"],
  ],
});

let tables: Tables<StatementPattern> | undefined;

/**
 * Frozen tables for the schema, built on first use.
 */
export function bracesTables(): Tables<StatementPattern> {
  tables ??= buildTables(schema);
  return tables;
}

export const braces: Language = {
  name: "braces",
  description: "curly-brace blocks, schema-driven instruction executor",
  extensions: [".brc"],
  unit: NONE,
  compile(source: string, options: CompileOptions = {}): CompiledProgram {
    const t = bracesTables();
    const tokens = normalize(tokenize(source, t), source);
    const program = parseInstructions(tokens, t, schema, values, { maxDepth: options.maxParseDepth });
    return {
      execute: (context) => new Executor(context, { semantics, memoizable: schema.memoizable }).run(program),
      toString: () => formatInstruction(program),
    };
  },
};
