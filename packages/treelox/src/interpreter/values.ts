import type { Interpreter } from "./interpreter";

export type LoxValue = null | boolean | number | string | LoxCallable;

export abstract class LoxCallable {
  abstract arity(): number;
  abstract call(interpreter: Interpreter, args: LoxValue[]): LoxValue;
  abstract toString(): string;
}

export type NativeImpl = (args: LoxValue[]) => LoxValue;

export class NativeFunction extends LoxCallable {
  readonly name: string;
  private readonly paramCount: number;
  private readonly impl: NativeImpl;

  constructor(name: string, arity: number, impl: NativeImpl) {
    super();
    this.name = name;
    this.paramCount = arity;
    this.impl = impl;
  }

  arity(): number {
    return this.paramCount;
  }

  call(_interpreter: Interpreter, args: LoxValue[]): LoxValue {
    return this.impl(args);
  }

  toString(): string {
    return "<native fn>";
  }
}

/** Only nil and false are falsey. */
export function isTruthy(value: LoxValue): boolean {
  if (value === null) return false;
  if (typeof value === "boolean") return value;
  return true;
}

// Primitives compare by value and callables by identity, which is exactly ===.
// Values of different variants are never ===.
export function isEqual(a: LoxValue, b: LoxValue): boolean {
  return a === b;
}

/** Rewrites `1e+21` or `1.5e-7` as plain decimal digits. */
function expandExponent(text: string): string {
  const match = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (match === null) return text;
  const [, sign, lead, fraction = "", exponent] = match;
  const digits = lead + fraction;
  // Index in `digits` where the decimal point belongs
  const point = 1 + Number(exponent);
  if (point <= 0) return `${sign}0.${"0".repeat(-point)}${digits}`;
  if (point >= digits.length) return sign + digits + "0".repeat(point - digits.length);
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

export function formatNumber(n: number): string {
  if (Object.is(n, -0)) return "-0";
  return expandExponent(String(n));
}

export function stringify(value: LoxValue): string {
  if (value === null) return "nil";
  if (typeof value === "number") return formatNumber(value);
  if (typeof value === "boolean") return value ? "true" : "false";
  if (typeof value === "string") return value;
  return value.toString();
}
