import { afterAll, beforeAll, describe, it, expect } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { ExternDispatcher } from "./extern/extern.js";
import { NONE, StringValue } from "./languages/common/values.js";
import { braces, findLanguage, languageForFile, offside } from "./languages/index.js";
import type { Language } from "./languages/language.js";
import { runCode, runFile } from "./runner.js";

let dir: string;

function write(name: string, content: string): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, content);
  return file;
}

beforeAll(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "glossa-"));
});

afterAll(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("languages", () => {
  it("should find a language by name", () => {
    expect(findLanguage("offside")).toBe(offside);
    expect(findLanguage("braces")).toBe(braces);
    expect(findLanguage("cobol")).toBeUndefined();
  });

  it("should choose a language by file extension", () => {
    expect(languageForFile("a/b/prog.off")).toBe(offside);
    expect(languageForFile("PROG.BRC")).toBe(braces);
    expect(languageForFile("notes.txt")).toBeUndefined();
  });
});

describe("runFile", () => {
  it("should run each file in the language of its extension", () => {
    const lines: string[] = [];
    const output = (line: string) => lines.push(line);

    runFile(write("a.off", 'print("offside")\n'), { output });
    runFile(write("b.brc", 'print("braces");\n'), { output });

    expect(lines).toEqual(["offside", "braces"]);
  });

  it("should let an explicit language override the extension", () => {
    const lines: string[] = [];

    const result = runFile(write("c.txt", "print(1);"), { output: (line) => lines.push(line) }, braces);

    expect(result.ok).toBe(true);
    expect(lines).toEqual(["1"]);
  });

  it("should name the file in diagnostics", () => {
    const file = write("bad.off", "let x = 1\nprint(y)\n");

    const result = runFile(file, { output: () => undefined });

    expect(result.ok ? "" : result.diagnostic).toBe(`${file}:2:7: scope error: undefined variable 'y'`);
  });

  it("should fail for a missing file", () => {
    expect(() => runFile(path.join(dir, "missing.off"))).toThrow(`File not found: ${path.join(dir, "missing.off")}`);
  });

  it("should fail for an unknown extension", () => {
    expect(() => runFile(write("d.xyz", ""))).toThrow("No language registered for .xyz");
  });
});

describe("runCode", () => {
  it("should use a supplied dispatcher", () => {
    const seen: string[] = [];
    const externs = new ExternDispatcher().register("console", "print", (args) => {
      seen.push(args.map((a) => a.display()).join("|"));
      return NONE;
    });

    const result = runCode(offside, 'print("a", 1)', { externs });

    expect(result.ok).toBe(true);
    expect(seen).toEqual(["a|1"]);
  });

  it("should report a host range error as an extern error", () => {
    const externs = new ExternDispatcher().register("host", "pad", () => new StringValue("x".repeat(-1)));

    const result = runCode(offside, 'extern "host:pad"()', { externs });

    expect(result.ok ? "" : result.diagnostic).toBe(
      "<input>:1:1: extern error: 'host:pad' failed: Invalid count value: -1"
    );
  });

  it("should return the program's value", () => {
    const result = runCode(braces, 'return "done";');

    expect(result.ok && result.value).toEqual(new StringValue("done"));
  });

  it("should apply the parse depth limit", () => {
    const result = runCode(braces, "print(((1)));", { maxParseDepth: 2, output: () => undefined });

    expect(result.ok ? "" : result.diagnostic).toBe("<input>:1:9: parse error: maximum expression depth exceeded");
  });

  it("should propagate errors that are not kernel errors", () => {
    const broken: Language = {
      ...offside,
      compile: () => {
        throw new TypeError("bug");
      },
    };

    expect(() => runCode(broken, "")).toThrow(TypeError);
  });
});
