import { describe, it, expect } from "vitest";
import { registerStandardBackends } from "../../builtins/builtins.js";
import { StackOverflowError } from "../../errors/errors.js";
import { ExternDispatcher } from "../../extern/extern.js";
import { ExecutionContext } from "../../runtime/context.js";
import { RunOptions, runCode } from "../../runner.js";
import { NONE } from "../common/values.js";
import { braces } from "./braces.js";

function run(source: string, options: RunOptions = {}) {
  const lines: string[] = [];
  const result = runCode(braces, source, { ...options, output: (line) => lines.push(line) });
  return { lines, result };
}

function output(source: string, options: RunOptions = {}): string[] {
  const { lines, result } = run(source, options);
  if (!result.ok) {
    throw new Error(result.diagnostic);
  }
  return lines;
}

function diagnostic(source: string, options: RunOptions = {}): string {
  const { result } = run(source, options);
  return result.ok ? "no error" : result.diagnostic;
}

const FIB = "fn fib(n) {\n  if n < 2 { return n; }\n  return fib(n - 1) + fib(n - 2);\n}\n";

describe("braces", () => {
  describe("execution", () => {
    it("should run a counting loop", () => {
      expect(output("let x = 0;\nwhile x < 3 {\n  print(x);\n  x = x + 1;\n}")).toEqual(["0", "1", "2"]);
    });

    it("should respect operator precedence and associativity", () => {
      expect(output("print(1 + 2 * 3, (1 + 2) * 3, 2 ** 3 ** 2, 7 % 4 - 1);")).toEqual(["7 9 512 2"]);
    });

    it("should shadow inside a block and restore after it", () => {
      expect(output("let x = 1;\nif true { let x = 2; print(x); }\nprint(x);")).toEqual(["2", "1"]);
    });

    it("should mutate an outer binding by assignment", () => {
      expect(output("let x = 1;\nif true { x = 2; }\nprint(x);")).toEqual(["2"]);
    });

    it("should skip to the next iteration on continue", () => {
      const source = "let i = 0;\nwhile i < 4 {\n  i = i + 1;\n  if i == 2 { continue; }\n  print(i);\n}";

      expect(output(source)).toEqual(["1", "3", "4"]);
    });

    it("should short-circuit logical operators", () => {
      expect(output("print(false && missing, true || missing, !false);")).toEqual(["false true true"]);
    });

    it("should call recursive functions", () => {
      expect(output(FIB + "print(fib(20));")).toEqual(["6765"]);
    });

    it("should memoize listed functions when asked", () => {
      expect(output(FIB + "print(fib(60));", { memoize: true })).toEqual(["1548008755920"]);
    });

    it("should not reuse cached results for a shadowing redefinition", () => {
      const source = "fn fib(n) { return n; }\nprint(fib(1));\nif true {\n  fn fib(n) { return n * 100; }\n  print(fib(1));\n}";

      expect(output(source, { memoize: true })).toEqual(["1", "100"]);
    });

    it("should read a return value from the next line, since line breaks end nothing", () => {
      expect(output("fn f() {\n  return\n  1 + 1;\n}\nprint(f());")).toEqual(["2"]);
    });

    it("should call host capabilities by selector", () => {
      expect(output('print(extern "math:max"(2, 5), extern "console|math:type"(none));')).toEqual(["5 none"]);
    });
  });

  describe("control signals", () => {
    it("should restore the environment after an early return from a loop", () => {
      const source = [
        "fn find(limit) {",
        "  let i = 0;",
        "  while true {",
        "    if i == limit { return i; }",
        "    i = i + 1;",
        "  }",
        "}",
        "print(find(2));",
        "print(find(2));",
      ].join("\n");
      const lines: string[] = [];
      const context = new ExecutionContext(
        registerStandardBackends(new ExternDispatcher(), (line) => lines.push(line)),
        NONE
      );

      braces.compile(source).execute(context);

      expect(lines).toEqual(["2", "2"]);
      expect(context.env.depth).toBe(1);
    });

    it("should contain break inside the function's loop", () => {
      const source = "fn f() {\n  while true { break; }\n  return 1;\n}\nprint(f());\nprint(2);";

      expect(output(source)).toEqual(["1", "2"]);
    });

    it("should reject break outside a loop", () => {
      expect(diagnostic("break;")).toBe("<input>:1:1: scope error: break outside loop");
    });

    it("should report a nested stray break at the break statement", () => {
      expect(diagnostic("let x = 1; if true { break; }")).toBe("<input>:1:22: scope error: break outside loop");
    });

    it("should stop runaway recursion at the call depth limit", () => {
      expect(diagnostic("fn f() { return f(); } f();", { maxCallDepth: 100 })).toBe(
        "<input>:1:17: stack overflow error: maximum call depth 100 exceeded calling 'f'"
      );
    });

    it("should turn host stack exhaustion into a stack overflow error", () => {
      const { result } = run("fn f() { return f(); } f();");

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(StackOverflowError);
        expect(result.diagnostic).toBe("<input>: stack overflow error: host call stack exhausted");
      }
    });
  });

  describe("errors", () => {
    it("should report division by zero at the operator expression", () => {
      expect(diagnostic("print(1 / 0);")).toBe("<input>:1:7: runtime error: division by zero");
    });

    it("should report an unclosed block", () => {
      expect(diagnostic("if x {\n  print(1);")).toBe("<input>:1:6: parse error: unmatched '{'");
    });

    it("should report a mismatched bracket", () => {
      expect(diagnostic("print(1};")).toBe("<input>:1:8: parse error: expected ')' to close '(', got '}'");
    });

    it("should name the missing backend", () => {
      expect(diagnostic('extern "backendX:abs"(1);')).toBe(
        "<input>:1:1: extern error: cannot resolve 'backendX:abs': backend 'backendX' is not registered"
      );
    });

    it("should require a boolean condition", () => {
      expect(diagnostic("if 1 { }")).toBe("<input>:1:4: type error: expected a boolean condition, got number");
    });
  });

  describe("printing", () => {
    it("should print the instruction tree", () => {
      expect(braces.compile("let x = -1;").toString()).toBe("(seq (bind x (- 1)))");
    });
  });
});
