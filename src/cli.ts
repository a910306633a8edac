#!/usr/bin/env node
/**
 * Glossa CLI - run programs written in any bundled language.
 */

import { findLanguage, languages } from "./languages/index.js";
import type { Language } from "./languages/language.js";
import { RunResult, runCode, runFile } from "./runner.js";

const VERSION = "0.1.0";

function printUsage(): void {
  console.log(`
Glossa v${VERSION} - language-hosting execution kernel

Usage:
  glossa [options] [file]

Options:
  -h, --help         Show this help message
  -v, --version      Show version
  -e, --eval         Evaluate code from command line
  --lang <name>      Language for -e, or to override a file's extension
  -l, --languages    List bundled languages
  --memoize          Cache results of memoizable functions
  --max-depth <n>    Limit nested function calls

Examples:
  glossa script.off                        Run a script file
  glossa --lang braces -e "print(1 + 2)"   Evaluate code
`);
}

function printVersion(): void {
  console.log(`Glossa ${VERSION}`);
}

function printLanguages(): void {
  for (const lang of languages) {
    console.log(`${lang.name.padEnd(10)} ${lang.extensions.join(", ").padEnd(8)} ${lang.description}`);
  }
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

function main(): void {
  const args = process.argv.slice(2);
  let evalCode: string | null = null;
  let language: Language | undefined;
  let memoize = false;
  let maxCallDepth: number | undefined;
  let file: string | null = null;

  // Parse arguments
  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      printUsage();
      process.exit(0);
    } else if (arg === "-v" || arg === "--version") {
      printVersion();
      process.exit(0);
    } else if (arg === "-l" || arg === "--languages") {
      printLanguages();
      process.exit(0);
    } else if (arg === "-e" || arg === "--eval") {
      i++;
      if (i >= args.length) fail("-e requires an argument");
      evalCode = args[i];
    } else if (arg === "--lang") {
      i++;
      if (i >= args.length) fail("--lang requires an argument");
      language = findLanguage(args[i]);
      if (!language) fail(`Unknown language: ${args[i]}`);
    } else if (arg === "--memoize") {
      memoize = true;
    } else if (arg === "--max-depth") {
      i++;
      const n = Number(args[i]);
      if (!Number.isInteger(n) || n <= 0) fail("--max-depth requires a positive integer");
      maxCallDepth = n;
    } else if (arg.startsWith("-")) {
      console.error(`Error: Unknown option: ${arg}`);
      printUsage();
      process.exit(1);
    } else {
      file = arg;
      break;
    }
    i++;
  }

  const options = { memoize, maxCallDepth };
  let result: RunResult;

  try {
    if (evalCode !== null) {
      result = runCode(language ?? fail("-e requires --lang"), evalCode, { ...options, file: "<eval>" });
    } else if (file !== null) {
      result = runFile(file, options, language);
    } else {
      printUsage();
      process.exit(1);
    }
  } catch (err) {
    fail(err instanceof Error ? err.message : String(err));
  }

  if (!result.ok) {
    console.error(result.diagnostic);
    process.exit(1);
  }
}

main();
