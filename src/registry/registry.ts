/**
 * Write-once registry of lexemes, fallback rules, operators and statement
 * patterns. A language fills it in, then freezes it into immutable tables
 * that are passed explicitly to the lexer and parsers.
 */

import { ConfigError } from "../errors/errors.js";
import { Role } from "../token/token.js";
import {
  OperatorInfo,
  PrefixOperatorInfo,
  isValidPrecedence,
} from "../parser/precedence.js";
import type { LexRule } from "./rules.js";

/**
 * A literal lexeme and the role of the tokens it produces.
 */
export interface LexemeEntry {
  readonly pattern: string;
  readonly role: string;
  readonly skip: boolean;
}

/**
 * An ordered, purely descriptive statement pattern. The registry only needs
 * the leading keyword; the rest is interpreted by whoever consumes it.
 */
export interface RegisteredPattern {
  readonly keyword: string;
}

/**
 * Frozen registry contents.
 */
export interface Tables<P extends RegisteredPattern = RegisteredPattern> {
  /** Sorted by descending pattern length, then by pattern. */
  readonly lexemes: readonly LexemeEntry[];
  readonly rules: readonly LexRule[];
  readonly operators: ReadonlyMap<string, OperatorInfo>;
  readonly prefixOperators: ReadonlyMap<string, PrefixOperatorInfo>;
  readonly statements: ReadonlyMap<string, P>;
  /** Role registered for a literal lexeme. */
  roleOf(lexeme: string): string | undefined;
}

/**
 * Registry collects a language's lexical and grammatical configuration.
 */
export class Registry<P extends RegisteredPattern = RegisteredPattern> {
  private lexemes: Map<string, LexemeEntry> = new Map();
  private rules: LexRule[] = [];
  private operators: Map<string, OperatorInfo> = new Map();
  private prefixOperators: Map<string, PrefixOperatorInfo> = new Map();
  private statements: Map<string, P> = new Map();
  private frozen = false;

  /**
   * Register a literal lexeme with a role.
   * Registering the same lexeme again with the same role is a no-op.
   */
  registerLexeme(pattern: string, role: string): this {
    return this.addLexeme(pattern, role, false);
  }

  /**
   * Register a literal lexeme that is recognized but never emitted.
   */
  registerSkip(pattern: string): this {
    return this.addLexeme(pattern, Role.SKIP, true);
  }

  /**
   * Register a fallback rule. Rules are tried in registration order.
   */
  registerRule(rule: LexRule): this {
    this.checkMutable();
    if (!rule.pattern.sticky) {
      throw new ConfigError(`fallback rule '${rule.name}' must use a sticky pattern`);
    }
    if (this.rules.some((r) => r.name === rule.name)) {
      throw new ConfigError(`duplicate fallback rule '${rule.name}'`);
    }
    this.rules.push(rule);
    return this;
  }

  /**
   * Register a binary operator. The lexeme is registered with the operator role.
   */
  registerOperator(lexeme: string, info: OperatorInfo): this {
    this.checkMutable();
    if (!isValidPrecedence(info.precedence)) {
      throw new ConfigError(`operator '${lexeme}' has invalid precedence ${info.precedence}`);
    }
    const existing = this.operators.get(lexeme);
    if (
      existing &&
      (existing.precedence !== info.precedence ||
        existing.associativity !== info.associativity ||
        existing.shortCircuit !== info.shortCircuit)
    ) {
      throw new ConfigError(`operator '${lexeme}' registered twice with different settings`);
    }
    this.addLexeme(lexeme, Role.OPERATOR, false);
    this.operators.set(lexeme, info);
    return this;
  }

  /**
   * Register a prefix operator. The same lexeme may also be a binary operator.
   */
  registerPrefixOperator(lexeme: string, info: PrefixOperatorInfo): this {
    this.checkMutable();
    if (!isValidPrecedence(info.precedence)) {
      throw new ConfigError(`prefix operator '${lexeme}' has invalid precedence ${info.precedence}`);
    }
    const existing = this.prefixOperators.get(lexeme);
    if (existing && existing.precedence !== info.precedence) {
      throw new ConfigError(`prefix operator '${lexeme}' registered twice with different settings`);
    }
    this.addLexeme(lexeme, Role.OPERATOR, false);
    this.prefixOperators.set(lexeme, info);
    return this;
  }

  /**
   * Register a statement pattern. Its leading keyword becomes a keyword lexeme
   * and may start no other pattern.
   */
  registerStatement(pattern: P): this {
    this.checkMutable();
    if (this.statements.has(pattern.keyword)) {
      throw new ConfigError(`ambiguous statement patterns: more than one starts with '${pattern.keyword}'`);
    }
    this.addLexeme(pattern.keyword, Role.KEYWORD, false);
    this.statements.set(pattern.keyword, pattern);
    return this;
  }

  /**
   * Freeze the registry and return its tables. Further registration fails.
   */
  freeze(): Tables<P> {
    this.frozen = true;
    const sorted = [...this.lexemes.values()].sort(
      (a, b) => b.pattern.length - a.pattern.length || (a.pattern < b.pattern ? -1 : a.pattern > b.pattern ? 1 : 0)
    );
    const roles = new Map(sorted.map((e) => [e.pattern, e.role]));
    return Object.freeze({
      lexemes: Object.freeze(sorted),
      rules: Object.freeze([...this.rules]),
      operators: new Map(this.operators),
      prefixOperators: new Map(this.prefixOperators),
      statements: new Map(this.statements),
      roleOf: (lexeme: string) => roles.get(lexeme),
    });
  }

  private addLexeme(pattern: string, role: string, skip: boolean): this {
    this.checkMutable();
    if (pattern.length === 0) {
      throw new ConfigError("cannot register an empty lexeme");
    }
    const existing = this.lexemes.get(pattern);
    if (existing) {
      if (existing.role !== role) {
        throw new ConfigError(
          `lexeme '${pattern}' registered as both ${existing.role} and ${role}`
        );
      }
      return this;
    }
    this.lexemes.set(pattern, Object.freeze({ pattern, role, skip }));
    return this;
  }

  private checkMutable(): void {
    if (this.frozen) {
      throw new ConfigError("registry is frozen");
    }
  }
}
