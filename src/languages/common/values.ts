/**
 * Values shared by the bundled languages: numbers, strings, booleans and none.
 */

import type { Value } from "../../object/object.js";
import { ParserError } from "../../errors/errors.js";
import { Role, Token } from "../../token/token.js";

export const enum ValueType {
  None = "none",
  Bool = "bool",
  Number = "number",
  String = "string",
}

/**
 * None - represents absence of value.
 */
export class NoneValue implements Value {
  readonly typeName = ValueType.None;

  clone(): Value {
    return this;
  }

  equals(other: Value): boolean {
    return other instanceof NoneValue;
  }

  display(): string {
    return "none";
  }

  debug(): string {
    return "none";
  }
}

/** The singleton none value. */
export const NONE = Object.freeze(new NoneValue());

/**
 * Boolean value.
 */
export class BoolValue implements Value {
  readonly typeName = ValueType.Bool;

  constructor(public readonly value: boolean) {}

  clone(): Value {
    return this;
  }

  equals(other: Value): boolean {
    return other instanceof BoolValue && other.value === this.value;
  }

  display(): string {
    return this.value ? "true" : "false";
  }

  debug(): string {
    return this.display();
  }

  asBoolean(): boolean {
    return this.value;
  }
}

/** Singleton true value. */
export const TRUE = Object.freeze(new BoolValue(true));
/** Singleton false value. */
export const FALSE = Object.freeze(new BoolValue(false));

/** Get boolean singleton. */
export function toBool(value: boolean): BoolValue {
  return value ? TRUE : FALSE;
}

/**
 * Double-precision number.
 */
export class NumberValue implements Value {
  readonly typeName = ValueType.Number;

  constructor(public readonly value: number) {}

  clone(): Value {
    return new NumberValue(this.value);
  }

  equals(other: Value): boolean {
    return other instanceof NumberValue && other.value === this.value;
  }

  display(): string {
    return formatNumber(this.value);
  }

  debug(): string {
    return formatNumber(this.value);
  }
}

/**
 * Immutable string.
 */
export class StringValue implements Value {
  readonly typeName = ValueType.String;

  constructor(public readonly value: string) {}

  clone(): Value {
    return new StringValue(this.value);
  }

  equals(other: Value): boolean {
    return other instanceof StringValue && other.value === this.value;
  }

  display(): string {
    return this.value;
  }

  debug(): string {
    return JSON.stringify(this.value);
  }
}

/**
 * Integers print without a fraction, other numbers in shortest round-trip form.
 */
export function formatNumber(n: number): string {
  if (Number.isNaN(n)) return "nan";
  if (!Number.isFinite(n)) return n > 0 ? "inf" : "-inf";
  if (Object.is(n, -0)) return "0";
  return String(n);
}

const ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "0": "\0",
  '"': '"',
  "\\": "\\",
};

/**
 * Decode the body of a double-quoted string token.
 */
export function unquote(token: Token): string {
  const body = token.lexeme.slice(1, -1);
  let out = "";
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch !== "\\") {
      out += ch;
      continue;
    }
    const next = body[++i];
    const decoded = ESCAPES[next];
    if (decoded === undefined) {
      throw new ParserError(`unknown escape sequence '\\${next}'`, token.span);
    }
    out += decoded;
  }
  return out;
}

/**
 * Value of a number, string or constant-keyword token.
 */
export function literalValue(token: Token): Value | undefined {
  switch (token.role) {
    case Role.NUMBER:
      return new NumberValue(Number(token.lexeme));
    case Role.STRING:
      return new StringValue(unquote(token));
    default:
      break;
  }
  switch (token.lexeme) {
    case "true":
      return TRUE;
    case "false":
      return FALSE;
    case "none":
      return NONE;
    default:
      return undefined;
  }
}
