/**
 * Runtime shape of a value as seen by the encoder.
 *
 * Every JavaScript value classifies into exactly one kind via `kindOf`.
 */
export enum Kind {
  /** `undefined`: no value at all */
  Invalid = 0,
  Bool,
  String,
  /** Integral `number` */
  Int,
  Int8,
  Int16,
  Int32,
  Int64,
  Uint,
  Uint8,
  Uint16,
  Uint32,
  Uint64,
  Float32,
  /** Non-integral `number`, or -0 */
  Float64,
  /** Uint8Array / Uint8ClampedArray, written as one raw byte string */
  Bytes,
  /** JS array */
  Slice,
  /** Fixed-size typed array other than bytes */
  Array,
  /** `Map` or plain object */
  Map,
  /** Class instance */
  Struct,
  /** `Ref` box */
  Pointer,
  /** `null`: an interface holding no concrete value */
  Interface,
  Func,
  Symbol,
  /** Objects with no defined encoding (Set, WeakMap, Promise, ...) */
  Unsupported,
}

/**
 * Character encoding hint passed with string writes.
 */
export enum CharEncoding {
  Raw = 0,
  Utf8 = 1,
  Utf16LE = 2,
  Utf16BE = 3,
  Utf32LE = 4,
  Utf32BE = 5,
}

/**
 * Signed and unsigned 64-bit integer bounds.
 */
export const MinInt64 = BigInt("-9223372036854775808"); // -2^63
export const MaxInt64 = BigInt("9223372036854775807"); // 2^63 - 1
export const MaxUint64 = BigInt("0xffffffffffffffff");

export const MinInt32 = -0x80000000;
export const MaxInt32 = 0x7fffffff;

export type IntKind = Kind.Int | Kind.Int8 | Kind.Int16 | Kind.Int32 | Kind.Int64;
export type UintKind = Kind.Uint | Kind.Uint8 | Kind.Uint16 | Kind.Uint32 | Kind.Uint64;
export type ScalarKind = IntKind | UintKind | Kind.Float32;

const SCALAR_BOUNDS: Record<Exclude<ScalarKind, Kind.Float32>, [bigint, bigint]> = {
  [Kind.Int]: [MinInt64, MaxInt64],
  [Kind.Int8]: [-128n, 127n],
  [Kind.Int16]: [-32768n, 32767n],
  [Kind.Int32]: [BigInt(MinInt32), BigInt(MaxInt32)],
  [Kind.Int64]: [MinInt64, MaxInt64],
  [Kind.Uint]: [0n, MaxUint64],
  [Kind.Uint8]: [0n, 255n],
  [Kind.Uint16]: [0n, 65535n],
  [Kind.Uint32]: [0n, 0xffffffffn],
  [Kind.Uint64]: [0n, MaxUint64],
};

/**
 * A number carrying an explicit width, the way a typed field would.
 * Integer boxes hold their value as a bigint.
 */
export class Scalar<K extends ScalarKind = ScalarKind> {
  constructor(
    readonly kind: K,
    readonly value: bigint | number,
  ) {}

  isZero(): boolean {
    return this.value === 0 || this.value === 0n;
  }
}

function integer<K extends IntKind | UintKind>(kind: K, input: number | bigint): Scalar<K> {
  if (typeof input === "number" && !Number.isInteger(input)) {
    throw new RangeError(`${Kind[kind]} requires an integer, got ${input}`);
  }
  const value = BigInt(input);
  const [min, max] = SCALAR_BOUNDS[kind];
  if (value < min || value > max) {
    throw new RangeError(`${value} is outside ${Kind[kind]} range [${min}, ${max}]`);
  }
  return new Scalar(kind, value);
}

export const int = (v: number | bigint): Scalar<Kind.Int> => integer(Kind.Int, v);
export const int8 = (v: number | bigint): Scalar<Kind.Int8> => integer(Kind.Int8, v);
export const int16 = (v: number | bigint): Scalar<Kind.Int16> => integer(Kind.Int16, v);
export const int32 = (v: number | bigint): Scalar<Kind.Int32> => integer(Kind.Int32, v);
export const int64 = (v: number | bigint): Scalar<Kind.Int64> => integer(Kind.Int64, v);
export const uint = (v: number | bigint): Scalar<Kind.Uint> => integer(Kind.Uint, v);
export const uint8 = (v: number | bigint): Scalar<Kind.Uint8> => integer(Kind.Uint8, v);
export const uint16 = (v: number | bigint): Scalar<Kind.Uint16> => integer(Kind.Uint16, v);
export const uint32 = (v: number | bigint): Scalar<Kind.Uint32> => integer(Kind.Uint32, v);
export const uint64 = (v: number | bigint): Scalar<Kind.Uint64> => integer(Kind.Uint64, v);
export const float32 = (v: number): Scalar<Kind.Float32> => new Scalar(Kind.Float32, Math.fround(v));

/**
 * A reference to a value. `ref(null)` is a nil pointer.
 */
export class Ref<T = unknown> {
  constructor(readonly target: T | null) {}

  get isNil(): boolean {
    return this.target === null;
  }
}

export function ref<T>(target: T | null): Ref<T> {
  return new Ref(target);
}

export type TypedArray =
  | Int8Array
  | Int16Array
  | Int32Array
  | BigInt64Array
  | Uint16Array
  | Uint32Array
  | BigUint64Array
  | Float32Array
  | Float64Array;

const UNSUPPORTED_OBJECTS: ReadonlyArray<abstract new (...args: never[]) => unknown> = [
  Set,
  WeakMap,
  WeakSet,
  Promise,
];

export function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

export function isTypedArray(value: unknown): value is TypedArray {
  return (
    value instanceof Int8Array ||
    value instanceof Int16Array ||
    value instanceof Int32Array ||
    value instanceof BigInt64Array ||
    value instanceof Uint16Array ||
    value instanceof Uint32Array ||
    value instanceof BigUint64Array ||
    value instanceof Float32Array ||
    value instanceof Float64Array
  );
}

/**
 * Element kind of a fixed-size typed array.
 */
export function elementKind(array: TypedArray): IntKind | UintKind | Kind.Float32 | Kind.Float64 {
  if (array instanceof Int8Array) return Kind.Int8;
  if (array instanceof Int16Array) return Kind.Int16;
  if (array instanceof Int32Array) return Kind.Int32;
  if (array instanceof BigInt64Array) return Kind.Int64;
  if (array instanceof Uint16Array) return Kind.Uint16;
  if (array instanceof Uint32Array) return Kind.Uint32;
  if (array instanceof BigUint64Array) return Kind.Uint64;
  if (array instanceof Float32Array) return Kind.Float32;
  return Kind.Float64;
}

/**
 * The constructor a value was created by, or undefined for objects
 * without a prototype.
 */
export function constructorOf(value: object): unknown {
  const proto: unknown = Object.getPrototypeOf(value);
  if (typeof proto !== "object" || proto === null) {
    return undefined;
  }
  return Reflect.get(proto, "constructor");
}

/**
 * A value paired with its kind. Switching on `kind` narrows `value`.
 */
export type Shape =
  | { readonly kind: Kind.Invalid | Kind.Interface; readonly value: null | undefined }
  | { readonly kind: Kind.Bool; readonly value: boolean }
  | { readonly kind: Kind.String; readonly value: string }
  | { readonly kind: IntKind | UintKind; readonly value: bigint }
  | { readonly kind: Kind.Float32 | Kind.Float64; readonly value: number }
  | { readonly kind: Kind.Bytes; readonly value: Uint8Array }
  | { readonly kind: Kind.Slice; readonly value: readonly unknown[] }
  | { readonly kind: Kind.Array; readonly value: TypedArray }
  | { readonly kind: Kind.Map; readonly value: Map<unknown, unknown> | Record<string, unknown> }
  | { readonly kind: Kind.Struct; readonly value: object }
  | { readonly kind: Kind.Pointer; readonly value: Ref }
  | { readonly kind: Kind.Func | Kind.Symbol | Kind.Unsupported; readonly value: unknown };

/**
 * Classifies a value's runtime shape.
 */
export function shapeOf(value: unknown): Shape {
  switch (typeof value) {
    case "undefined":
      return { kind: Kind.Invalid, value };
    case "boolean":
      return { kind: Kind.Bool, value };
    case "string":
      return { kind: Kind.String, value };
    case "number":
      return Number.isSafeInteger(value) && !Object.is(value, -0)
        ? { kind: Kind.Int, value: BigInt(value) }
        : { kind: Kind.Float64, value };
    case "bigint":
      if (value >= MinInt64 && value <= MaxInt64) return { kind: Kind.Int64, value };
      if (value >= 0n && value <= MaxUint64) return { kind: Kind.Uint64, value };
      return { kind: Kind.Unsupported, value };
    case "function":
      return { kind: Kind.Func, value };
    case "symbol":
      return { kind: Kind.Symbol, value };
    case "object":
      break;
  }

  if (value === null || typeof value !== "object") {
    return { kind: Kind.Interface, value: null };
  }
  if (value instanceof Scalar) {
    if (value.kind === Kind.Float32) {
      return { kind: Kind.Float32, value: Number(value.value) };
    }
    return { kind: value.kind, value: BigInt(value.value) };
  }
  if (value instanceof Ref) return { kind: Kind.Pointer, value };
  if (value instanceof Uint8Array) return { kind: Kind.Bytes, value };
  if (value instanceof Uint8ClampedArray) {
    return {
      kind: Kind.Bytes,
      value: new Uint8Array(value.buffer, value.byteOffset, value.byteLength),
    };
  }
  if (Array.isArray(value)) return { kind: Kind.Slice, value };
  if (isTypedArray(value)) return { kind: Kind.Array, value };
  if (value instanceof Map) return { kind: Kind.Map, value };
  if (isPlainObject(value)) return { kind: Kind.Map, value };
  for (const ctor of UNSUPPORTED_OBJECTS) {
    if (value instanceof ctor) return { kind: Kind.Unsupported, value };
  }
  if (ArrayBuffer.isView(value) || value instanceof ArrayBuffer) {
    return { kind: Kind.Unsupported, value };
  }
  return { kind: Kind.Struct, value };
}

/**
 * Returns the kind of a value.
 */
export function kindOf(value: unknown): Kind {
  return shapeOf(value).kind;
}

export function isIntKind(kind: Kind): kind is IntKind {
  return kind >= Kind.Int && kind <= Kind.Int64;
}

export function isUintKind(kind: Kind): kind is UintKind {
  return kind >= Kind.Uint && kind <= Kind.Uint64;
}

/**
 * Reports whether a value counts as empty for omit-empty struct fields:
 * false, numeric zero, nil, or a zero-length array, map or string.
 * Struct values are never empty.
 */
export function isEmptyValue(value: unknown): boolean {
  switch (typeof value) {
    case "undefined":
      return true;
    case "boolean":
      return !value;
    case "string":
      return value.length === 0;
    case "number":
      return value === 0;
    case "bigint":
      return value === 0n;
    case "function":
    case "symbol":
      return false;
  }

  if (value === null) return true;
  if (value instanceof Scalar) return value.isZero();
  if (value instanceof Ref) return value.isNil;
  if (Array.isArray(value)) return value.length === 0;
  if (ArrayBuffer.isView(value) && !(value instanceof DataView)) {
    return value.byteLength === 0;
  }
  if (value instanceof Map) return value.size === 0;
  if (typeof value === "object" && value !== null && isPlainObject(value)) {
    return Object.keys(value).length === 0;
  }
  return false;
}

/**
 * Short description of a value for error messages.
 */
export function describeValue(value: unknown): string {
  switch (typeof value) {
    case "function":
      return `[function ${value.name || "anonymous"}]`;
    case "symbol":
      return value.toString();
    case "bigint":
      return `${value}n`;
    case "string":
      return JSON.stringify(value);
    case "undefined":
      return "undefined";
  }
  if (value === null) return "null";
  if (typeof value === "object") {
    const ctor = constructorOf(value);
    return typeof ctor === "function" && ctor.name ? `[object ${ctor.name}]` : "[object]";
  }
  return String(value);
}
