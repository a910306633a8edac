/**
 * Bundled languages and lookup by name or file extension.
 */

import * as path from "path";
import type { Language } from "./language.js";
import { offside } from "./offside/offside.js";
import { braces } from "./braces/braces.js";

export const languages: readonly Language[] = [offside, braces];

export function findLanguage(name: string): Language | undefined {
  return languages.find((l) => l.name === name);
}

/**
 * Language for a file, chosen by its extension.
 */
export function languageForFile(file: string): Language | undefined {
  const ext = path.extname(file).toLowerCase();
  return languages.find((l) => l.extensions.includes(ext));
}

export type { Language, CompiledProgram, CompileOptions } from "./language.js";
export { offside, braces };
