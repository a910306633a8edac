/**
 * Glossa - a language-hosting execution kernel.
 *
 * @packageDocumentation
 */

// Token exports
export * from "./token/token.js";

// Error exports
export * from "./errors/errors.js";

// Registry exports
export * from "./registry/registry.js";
export * from "./registry/rules.js";

// Lexer and structure exports
export { Lexer, tokenize } from "./lexer/lexer.js";
export * from "./structure/structure.js";

// Parser exports
export * from "./parser/precedence.js";
export { TokenStream, describe } from "./parser/stream.js";
export * from "./parser/parser.js";

// Value and runtime exports
export * from "./object/object.js";
export * from "./runtime/signal.js";
export { Environment } from "./runtime/environment.js";
export type { ScopeFrame } from "./runtime/environment.js";
export { ExecutionContext } from "./runtime/context.js";
export type { ExecutionOptions } from "./runtime/context.js";
export * from "./extern/extern.js";

// Tree-walking strategy
export * from "./ast/nodes.js";
export { Interpreter, TreeFunction } from "./interpreter/interpreter.js";

// Schema-driven strategy
export * from "./instruction/instruction.js";
export * from "./schema/schema.js";
export { SchemaParser, parseInstructions } from "./schema/parser.js";
export type { SchemaParserOptions } from "./schema/parser.js";
export { Executor, InstructionFunction } from "./executor/executor.js";
export type { ExecutorConfig } from "./executor/executor.js";

// Builtins and languages
export * from "./builtins/builtins.js";
export * from "./languages/index.js";

// Runner exports
export { runCode, runFile } from "./runner.js";
export type { RunOptions, RunResult } from "./runner.js";
