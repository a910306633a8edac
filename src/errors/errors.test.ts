import { describe, it, expect } from "vitest";
import {
  ErrorKind,
  ExternError,
  KernelError,
  LexerError,
  ScopeError,
  formatDiagnostic,
  isHostStackOverflow,
} from "./errors.js";

describe("errors", () => {
  it("should format a diagnostic with line and column", () => {
    const err = new LexerError("unexpected character '$'", { start: 8, end: 9 });

    expect(formatDiagnostic(err, "a = 1\nb $", "prog.off")).toBe(
      "prog.off:2:3: lexical error: unexpected character '$'"
    );
  });

  it("should format a diagnostic without a span", () => {
    expect(formatDiagnostic(new ScopeError("break outside loop"), "break")).toBe(
      "<input>: scope error: break outside loop"
    );
  });

  it("should keep the first span attached", () => {
    const err = new ExternError("failed", "a:b").withSpan({ start: 1, end: 2 }).withSpan({ start: 5, end: 9 });

    expect(err.span).toEqual({ start: 1, end: 2 });
    expect(err.kind).toBe(ErrorKind.Extern);
    expect(err).toBeInstanceOf(KernelError);
    expect(err.name).toBe("ExternError");
  });

  it("should recognize host stack exhaustion", () => {
    expect(isHostStackOverflow(new RangeError("Maximum call stack size exceeded"))).toBe(true);
    expect(isHostStackOverflow(new RangeError("Invalid array length"))).toBe(false);
    expect(isHostStackOverflow(new Error("Maximum call stack size exceeded"))).toBe(false);
  });
});
