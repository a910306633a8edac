/**
 * Runner - compile and execute programs, converting failures into results.
 */

import * as fs from "fs";
import * as path from "path";
import { registerStandardBackends } from "./builtins/builtins.js";
import { KernelError, StackOverflowError, formatDiagnostic, isHostStackOverflow } from "./errors/errors.js";
import { ExternDispatcher } from "./extern/extern.js";
import type { Language } from "./languages/language.js";
import { languageForFile } from "./languages/index.js";
import type { Value } from "./object/object.js";
import { ExecutionContext, ExecutionOptions } from "./runtime/context.js";

export interface RunOptions extends ExecutionOptions {
  /** File name used in diagnostics */
  file?: string;
  /** Dispatcher to use instead of one with the standard backends */
  externs?: ExternDispatcher;
}

export type RunResult =
  | { readonly ok: true; readonly value: Value }
  | { readonly ok: false; readonly error: KernelError; readonly diagnostic: string };

/**
 * Compile and run source in a fresh environment. Kernel errors become a
 * failed result; anything else is a bug and propagates.
 */
export function runCode(language: Language, source: string, options: RunOptions = {}): RunResult {
  const file = options.file ?? "<input>";
  const externs = options.externs ?? registerStandardBackends(new ExternDispatcher(), options.output);

  try {
    const program = language.compile(source, { maxParseDepth: options.maxParseDepth });
    const context = new ExecutionContext(externs, language.unit, options);
    return { ok: true, value: program.execute(context) };
  } catch (err) {
    const error = toKernelError(err);
    return { ok: false, error, diagnostic: formatDiagnostic(error, source, file) };
  }
}

/**
 * Run a file, choosing the language by its extension unless one is given.
 */
export function runFile(filepath: string, options: RunOptions = {}, language?: Language): RunResult {
  const resolved = path.resolve(filepath);

  if (!fs.existsSync(resolved)) {
    throw new Error(`File not found: ${filepath}`);
  }

  const lang = language ?? languageForFile(resolved);
  if (!lang) {
    throw new Error(`No language registered for ${path.extname(resolved) || "files without an extension"}`);
  }

  const code = fs.readFileSync(resolved, "utf-8");
  return runCode(lang, code, { ...options, file: options.file ?? filepath });
}

function toKernelError(err: unknown): KernelError {
  if (err instanceof KernelError) {
    return err;
  }
  if (isHostStackOverflow(err)) {
    return new StackOverflowError("host call stack exhausted");
  }
  throw err;
}
