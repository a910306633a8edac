/**
 * Declarative language schemas for the schema-driven strategy: lexemes,
 * operator tables and statement patterns, validated and compiled into
 * frozen registry tables before any program is parsed.
 */

import { ConfigError } from "../errors/errors.js";
import type { TransferKind } from "../instruction/instruction.js";
import type { Value } from "../object/object.js";
import type { OperatorInfo, PrefixOperatorInfo } from "../parser/precedence.js";
import { Registry, Tables } from "../registry/registry.js";
import type { LexRule } from "../registry/rules.js";
import { Role, Span, Token } from "../token/token.js";

// ============================================================================
// Statement patterns
// ============================================================================

/**
 * One expected element of a statement after its leading keyword.
 */
export type PatternElement =
  /** Required punctuation or keyword */
  | { readonly role: "literal"; readonly lexeme: string }
  | { readonly role: "identifier"; readonly field: string }
  | { readonly role: "expression"; readonly field: string }
  /** Absent when the statement ends right after the keyword */
  | { readonly role: "optional-expression"; readonly field: string }
  /** A block, or, when `chain` is given, a statement starting with that keyword */
  | { readonly role: "block"; readonly field: string; readonly chain?: string }
  /** Parenthesized identifier list */
  | { readonly role: "parameters"; readonly field: string }
  /** Parenthesized expression list */
  | { readonly role: "arguments"; readonly field: string }
  /** Elements present only when the lexeme follows */
  | { readonly role: "optional"; readonly lexeme: string; readonly elements: readonly PatternElement[] };

export type ElementRole = PatternElement["role"];

/**
 * Canonical action a matched pattern compiles to. Field names refer to
 * the pattern's captures.
 */
export type StatementAction =
  | { readonly kind: "bind"; readonly name: string; readonly value: string }
  | { readonly kind: "branch"; readonly condition: string; readonly then: string; readonly otherwise?: string }
  | { readonly kind: "loop"; readonly condition: string; readonly body: string }
  | { readonly kind: "transfer"; readonly transfer: TransferKind; readonly value?: string }
  | { readonly kind: "function"; readonly name: string; readonly params: string; readonly body: string }
  | { readonly kind: "invoke"; readonly selector: string; readonly args: string };

export interface StatementPattern {
  readonly keyword: string;
  readonly elements: readonly PatternElement[];
  readonly action: StatementAction;
}

export interface Delimiters {
  readonly open: string;
  readonly close: string;
}

/**
 * Everything the schema-driven strategy needs to know about a language's syntax.
 */
export interface LanguageSchema {
  readonly name: string;
  /** Keywords that start no statement, such as `else` */
  readonly keywords: readonly string[];
  readonly punctuation: readonly string[];
  readonly skip?: readonly string[];
  readonly rules: readonly LexRule[];
  readonly operators: Readonly<Record<string, OperatorInfo>>;
  readonly prefixOperators: Readonly<Record<string, PrefixOperatorInfo>>;
  /** Token roles that denote literal values */
  readonly literalRoles: readonly string[];
  /** Keywords that denote literal values */
  readonly constants: readonly string[];
  readonly grouping: Delimiters;
  readonly block: Delimiters;
  readonly call: Delimiters & { readonly separator: string };
  /** Optional statement terminators */
  readonly terminators: readonly string[];
  readonly assignment: string;
  /** Keyword introducing `keyword "selector"(args)` */
  readonly extern?: string;
  readonly statements: readonly StatementPattern[];
  /** Functions whose results may be cached when memoization is enabled */
  readonly memoizable?: readonly string[];
}

/**
 * Turns literal tokens into the language's values.
 */
export interface ValueFactory {
  readonly unit: Value;
  /** Value of a literal token, or undefined if the token is not one. */
  literal(token: Token): Value | undefined;
}

/**
 * Meaning of the language's operators.
 */
export interface OperatorSemantics {
  binary(symbol: string, left: Value, right: Value, span: Span): Value;
  unary(symbol: string, operand: Value, span: Span): Value;
}

// ============================================================================
// Validation
// ============================================================================

/** Element roles that may fill each action field. */
const FIELD_ROLES: Record<StatementAction["kind"], Record<string, readonly ElementRole[]>> = {
  bind: { name: ["identifier"], value: ["expression"] },
  branch: { condition: ["expression"], then: ["block"], otherwise: ["block"] },
  loop: { condition: ["expression"], body: ["block"] },
  transfer: { value: ["expression", "optional-expression"] },
  function: { name: ["identifier"], params: ["parameters"], body: ["block"] },
  invoke: { args: ["arguments"] },
};

/** Action fields that may be left unfilled. */
const OPTIONAL_FIELDS: Record<StatementAction["kind"], readonly string[]> = {
  bind: [],
  branch: ["otherwise"],
  loop: [],
  transfer: ["value"],
  function: [],
  invoke: [],
};

interface Declared {
  role: ElementRole;
  optional: boolean;
}

/**
 * Check a schema for mistakes that would otherwise surface while parsing.
 */
export function validateSchema(schema: LanguageSchema): void {
  if (schema.statements.length === 0) {
    throw new ConfigError(`schema '${schema.name}' defines no statements`);
  }
  for (const [label, d] of [
    ["block", schema.block],
    ["grouping", schema.grouping],
    ["call", schema.call],
  ] as const) {
    if (d.open.length === 0 || d.close.length === 0) {
      throw new ConfigError(`schema '${schema.name}' has empty ${label} delimiters`);
    }
  }
  if (schema.assignment.length === 0) {
    throw new ConfigError(`schema '${schema.name}' has an empty assignment lexeme`);
  }
  for (const pattern of schema.statements) {
    validatePattern(pattern);
  }
}

function validatePattern(pattern: StatementPattern): void {
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(pattern.keyword)) {
    throw new ConfigError(`statement pattern must start with a keyword, got '${pattern.keyword}'`);
  }

  const declared = new Map<string, Declared>();
  collectFields(pattern, pattern.elements, false, declared);

  const action = pattern.action;
  const roles = FIELD_ROLES[action.kind];
  const optional = OPTIONAL_FIELDS[action.kind];
  for (const [key, field] of actionFields(action)) {
    const found = declared.get(field);
    if (!found) {
      throw new ConfigError(`pattern '${pattern.keyword}': action field '${key}' refers to undeclared '${field}'`);
    }
    if (!roles[key].includes(found.role)) {
      throw new ConfigError(`pattern '${pattern.keyword}': field '${field}' is a ${found.role}, cannot be used as ${key}`);
    }
    if ((found.optional || found.role === "optional-expression") && !optional.includes(key)) {
      throw new ConfigError(`pattern '${pattern.keyword}': optional field '${field}' cannot be used as ${key}`);
    }
  }
  for (const key of Object.keys(roles)) {
    if (!optional.includes(key) && !actionFields(action).some(([k]) => k === key)) {
      throw new ConfigError(`pattern '${pattern.keyword}': action ${action.kind} is missing '${key}'`);
    }
  }
}

function collectFields(
  pattern: StatementPattern,
  elements: readonly PatternElement[],
  optional: boolean,
  declared: Map<string, Declared>
): void {
  for (const el of elements) {
    if (el.role === "optional") {
      collectFields(pattern, el.elements, true, declared);
      continue;
    }
    if (el.role === "literal") continue;
    if (declared.has(el.field)) {
      throw new ConfigError(`pattern '${pattern.keyword}' declares field '${el.field}' twice`);
    }
    declared.set(el.field, { role: el.role, optional });
  }
}

/** [action key, captured field] pairs of an action. */
function actionFields(action: StatementAction): [string, string][] {
  const pairs: [string, string][] = [];
  for (const [key, value] of Object.entries(action)) {
    if (key !== "kind" && key !== "transfer" && key !== "selector" && typeof value === "string") {
      pairs.push([key, value]);
    }
  }
  return pairs;
}

// ============================================================================
// Registry
// ============================================================================

/**
 * Register everything a schema declares and freeze the result.
 */
export function buildTables(schema: LanguageSchema): Tables<StatementPattern> {
  validateSchema(schema);
  const registry = new Registry<StatementPattern>();

  for (const pattern of schema.statements) {
    registry.registerStatement(pattern);
  }
  for (const [lexeme, info] of Object.entries(schema.operators)) {
    registry.registerOperator(lexeme, info);
  }
  for (const [lexeme, info] of Object.entries(schema.prefixOperators)) {
    registry.registerPrefixOperator(lexeme, info);
  }
  for (const keyword of [...schema.keywords, ...schema.constants]) {
    registry.registerLexeme(keyword, Role.KEYWORD);
  }
  if (schema.extern !== undefined) {
    registry.registerLexeme(schema.extern, Role.KEYWORD);
  }
  const delimiters = [
    schema.grouping.open,
    schema.grouping.close,
    schema.block.open,
    schema.block.close,
    schema.call.open,
    schema.call.close,
    schema.call.separator,
    schema.assignment,
    ...schema.terminators,
    ...schema.punctuation,
  ];
  for (const lexeme of delimiters) {
    registry.registerLexeme(lexeme, Role.PUNCTUATION);
  }
  for (const lexeme of schema.skip ?? []) {
    registry.registerSkip(lexeme);
  }
  for (const rule of schema.rules) {
    registry.registerRule(rule);
  }
  for (const pattern of schema.statements) {
    registerElementLexemes(registry, pattern.elements);
  }
  return registry.freeze();
}

function registerElementLexemes(registry: Registry<StatementPattern>, elements: readonly PatternElement[]): void {
  for (const el of elements) {
    if (el.role === "literal" || el.role === "optional") {
      const role = /^[A-Za-z_]/.test(el.lexeme) ? Role.KEYWORD : Role.PUNCTUATION;
      registry.registerLexeme(el.lexeme, role);
    }
    if (el.role === "optional") {
      registerElementLexemes(registry, el.elements);
    }
  }
}
