import type { z } from "zod";

export abstract class Result<T> {
  static of = <T>(value: T): Ok<T> => Ok.of(value);
  static throw = (error: Error | string): Err => Err.throw(error);
  static try = <T, Args extends unknown[]>(
    fn: (...args: Args) => T,
    ...args: Args
  ): Result<T> => {
    try {
      return Ok.of(fn(...args));
    } catch (error) {
      return Err.throw(error instanceof Error ? error : String(error));
    }
  };

  abstract isOk(): this is Ok<T>;
  abstract flat(): T;
  abstract fold<U>(onOk: (value: T) => U, onErr: (error: Error) => U): U;
  abstract map<U>(fn: (value: T) => U): Result<U>;

  flatMap = <U>(fn: (value: T) => Result<U>): Result<U> =>
    this.fold<Result<U>>(fn, error => Err.throw(error));
  toPromise = (): Promise<T> =>
    this.fold(
      res => Promise.resolve(res),
      error => Promise.reject(error)
    );
}

export class Ok<T> extends Result<T> {
  private readonly value: T;

  private constructor(value: T) {
    super();
    this.value = value;
  }

  static of = <T>(value: T): Ok<T> => new Ok(value);

  isOk = (): this is Ok<T> => true;
  map = <U>(fn: (value: T) => U): Ok<U> => Ok.of(fn(this.value));
  fold = <U>(fn: (value: T) => U): U => fn(this.value);
  flat = (): T => this.value;
}

export class Err extends Result<never> {
  readonly error: Error;

  private constructor(error: Error | string) {
    super();
    this.error = typeof error === "string" ? new Error(error) : error;
  }

  static throw = (error: Error | string): Err => new Err(error);

  isOk = (): this is Ok<never> => false;
  map = <U>(_: (value: never) => U): Err => this;
  fold = <U>(_: never, onErr: (error: Error) => U): U => onErr(this.error);
  flat = (): never => {
    throw this.error;
  };
}

export const safeParse = <T extends z.ZodType>(
  value: unknown,
  schema: T
): Result<z.infer<T>> => {
  const parsed = schema.safeParse(value);
  return parsed.success ? Result.of(parsed.data) : Result.throw(parsed.error);
};

/**
 * Deep equality for plain JSON-like values (primitives, arrays, objects)
 *
 * @example
 * fastDeepEqual({ r: 1, g: 2, b: 3 }, { b: 3, g: 2, r: 1 }) // true
 * fastDeepEqual([1, 2], [1, 2, 3]) // false
 */
export function fastDeepEqual<T = unknown>(a: T, b: T): boolean {
  if (a === b) return true;

  if (
    typeof a !== "object" ||
    typeof b !== "object" ||
    a === null ||
    b === null
  ) {
    return a === b;
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!fastDeepEqual(a[i], b[i])) return false;
    }
    return true;
  }

  if (Array.isArray(a) || Array.isArray(b)) {
    return false;
  }

  const recordA = a as Record<string, unknown>;
  const recordB = b as Record<string, unknown>;
  const keysA = Object.keys(recordA);

  if (keysA.length !== Object.keys(recordB).length) {
    return false;
  }

  return keysA.every(key => fastDeepEqual(recordA[key], recordB[key]));
}

export const mapDict = <K extends PropertyKey, V, U>(
  obj: Record<K, V>,
  fn: (key: K, value: V) => [K, U]
): Record<K, U> =>
  Object.fromEntries(
    Object.entries(obj).map(([key, value]) => fn(key as K, value as V))
  ) as Record<K, U>;

export const cloak = (str: string, unmaskedChars = 4): string => {
  if (str.length <= unmaskedChars) {
    return "*".repeat(str.length);
  }
  const maskedPart = "*".repeat(str.length - unmaskedChars);
  const unmaskedPart = str.slice(-unmaskedChars);
  return maskedPart + unmaskedPart;
};

export const truncate = (value: unknown, maxLength: number): string => {
  let str: string;
  try {
    str = JSON.stringify(value) ?? String(value);
  } catch {
    str = String(value);
  }

  return str.length <= maxLength ? str : str.slice(0, maxLength) + "...";
};

export const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));
