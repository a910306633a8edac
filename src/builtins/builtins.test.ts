import { describe, it, expect } from "vitest";
import { RuntimeError, RuntimeTypeError } from "../errors/errors.js";
import { ExternDispatcher } from "../extern/extern.js";
import { NONE, NumberValue, StringValue, TRUE } from "../languages/common/values.js";
import { registerStandardBackends } from "./builtins.js";

function createDispatcher(lines: string[] = []): ExternDispatcher {
  return registerStandardBackends(new ExternDispatcher(), (line) => lines.push(line));
}

describe("builtins", () => {
  describe("console", () => {
    it("should print display forms separated by spaces", () => {
      const lines: string[] = [];

      const result = createDispatcher(lines).invoke("console:print", [new StringValue("a b"), new NumberValue(2), TRUE]);

      expect(lines).toEqual(["a b 2 true"]);
      expect(result).toBe(NONE);
    });

    it("should print debug forms", () => {
      const lines: string[] = [];

      createDispatcher(lines).invoke("console:debug", [new StringValue("a"), new NumberValue(-0), NONE]);

      expect(lines).toEqual(['"a" 0 none']);
    });

    it("should report type names", () => {
      expect(createDispatcher().invoke("type", [new NumberValue(1)])).toEqual(new StringValue("number"));
      expect(() => createDispatcher().invoke("type", [])).toThrow(
        new RuntimeError("type() takes exactly 1 argument(s), got 0")
      );
    });
  });

  describe("math", () => {
    it("should compute numeric helpers", () => {
      const d = createDispatcher();
      const n = (x: number) => new NumberValue(x);

      expect(d.invoke("math:abs", [n(-3)])).toEqual(n(3));
      expect(d.invoke("math:floor", [n(2.7)])).toEqual(n(2));
      expect(d.invoke("math:ceil", [n(2.1)])).toEqual(n(3));
      expect(d.invoke("math:sqrt", [n(9)])).toEqual(n(3));
      expect(d.invoke("math:min", [n(4), n(1)])).toEqual(n(1));
      expect(d.invoke("math:max", [n(4), n(1)])).toEqual(n(4));
    });

    it("should reject bad arguments", () => {
      const d = createDispatcher();

      expect(() => d.invoke("math:sqrt", [new NumberValue(-1)])).toThrow("sqrt() of a negative number");
      expect(() => d.invoke("math:abs", [new StringValue("x")])).toThrow(
        new RuntimeTypeError("expected a number, got string")
      );
    });
  });
});
