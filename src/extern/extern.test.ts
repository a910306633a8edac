import { describe, it, expect } from "vitest";
import { ExternError, RuntimeError } from "../errors/errors.js";
import { StringValue } from "../languages/common/values.js";
import type { Value } from "../object/object.js";
import { ExternDispatcher, parseSelector } from "./extern.js";

function text(value: Value): string {
  return value instanceof StringValue ? value.value : value.display();
}

function createDispatcher(): ExternDispatcher {
  return new ExternDispatcher()
    .registerBackend("fast", {
      hash: () => new StringValue("fast"),
      boom: () => {
        throw new Error("kaboom");
      },
      strict: () => {
        throw new RuntimeError("bad input");
      },
    })
    .registerBackend("slow", {
      hash: () => new StringValue("slow"),
      echo: (args) => new StringValue(args.map((a) => a.display()).join(",")),
    });
}

describe("parseSelector", () => {
  it("should parse a bare capability", () => {
    expect(parseSelector("print")).toEqual({ text: "print", backends: [], capability: "print" });
  });

  it("should parse alternate backends in order", () => {
    expect(parseSelector("slow|fast:hash")).toEqual({
      text: "slow|fast:hash",
      backends: ["slow", "fast"],
      capability: "hash",
    });
  });

  it.each(["", "a:", ":b", "a::b", "a b", "a|:b", "a:b:c"])("should reject malformed selector %j", (selector) => {
    expect(() => parseSelector(selector)).toThrow(new ExternError(`malformed selector '${selector}'`, selector));
  });
});

describe("ExternDispatcher", () => {
  it("should try named backends left to right", () => {
    const dispatcher = createDispatcher();

    expect(text(dispatcher.invoke("slow|fast:hash", []))).toBe("slow");
    expect(text(dispatcher.invoke("fast|slow:hash", []))).toBe("fast");
    expect(text(dispatcher.invoke("missing|slow:hash", []))).toBe("slow");
  });

  it("should take the first registered backend for a bare selector", () => {
    const dispatcher = createDispatcher();

    expect(text(dispatcher.invoke("hash", []))).toBe("fast");
    expect(text(dispatcher.invoke("echo", []))).toBe("");
  });

  it("should pass arguments through", () => {
    const args = [new StringValue("a"), new StringValue("b")];

    expect(text(createDispatcher().invoke("slow:echo", args))).toBe("a,b");
  });

  it("should never substitute an unnamed backend", () => {
    const dispatcher = createDispatcher();

    expect(() => dispatcher.invoke("backendX:hash", [])).toThrow(
      "cannot resolve 'backendX:hash': backend 'backendX' is not registered"
    );
  });

  it("should explain every failed alternative", () => {
    const dispatcher = createDispatcher();

    expect(() => dispatcher.resolve("backendX|slow:boom")).toThrow(
      "cannot resolve 'backendX|slow:boom': backend 'backendX' is not registered; backend 'slow' has no capability 'boom'"
    );
  });

  it("should fail when no backend provides a bare capability", () => {
    expect(() => createDispatcher().resolve("nope")).toThrow("no backend provides capability 'nope'");
  });

  it("should wrap a host failure in an extern error", () => {
    const span = { start: 1, end: 9 };

    try {
      createDispatcher().invoke("fast:boom", [], span);
      expect.fail("expected an extern error");
    } catch (err) {
      expect(err).toBeInstanceOf(ExternError);
      expect(err instanceof ExternError && [err.message, err.selector, err.span]).toEqual([
        "'fast:boom' failed: kaboom",
        "fast:boom",
        span,
      ]);
    }
  });

  it("should pass kernel errors through with the call span attached", () => {
    const span = { start: 2, end: 5 };

    try {
      createDispatcher().invoke("fast:strict", [], span);
      expect.fail("expected a runtime error");
    } catch (err) {
      expect(err).toBeInstanceOf(RuntimeError);
      expect(err instanceof RuntimeError && err.span).toEqual(span);
    }
  });

  it("should wrap a host range error in an extern error", () => {
    const dispatcher = new ExternDispatcher().register("host", "pad", () => new StringValue("x".repeat(-1)));

    expect(() => dispatcher.invoke("host:pad", [])).toThrow(
      new ExternError("'host:pad' failed: Invalid count value: -1", "host:pad")
    );
  });

  it("should let host stack exhaustion through unwrapped", () => {
    const dispatcher = new ExternDispatcher().register("host", "deep", () => {
      throw new RangeError("Maximum call stack size exceeded");
    });

    expect(() => dispatcher.invoke("host:deep", [])).toThrow(RangeError);
  });

  it("should list backends in registration order", () => {
    expect(createDispatcher().backendNames()).toEqual(["fast", "slow"]);
  });
});
