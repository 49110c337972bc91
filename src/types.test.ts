import { describe, it, expect } from "vitest";
import {
  Kind,
  Ref,
  describeValue,
  float32,
  int8,
  int16,
  int32,
  int64,
  isEmptyValue,
  kindOf,
  ref,
  shapeOf,
  uint,
  uint8,
  uint16,
  uint32,
  uint64,
  MaxUint64,
  MinInt64,
} from "./types";

class Point {
  constructor(
    public x = 0,
    public y = 0,
  ) {}
}

describe("kindOf", () => {
  it("classifies primitives", () => {
    expect(kindOf(undefined)).toBe(Kind.Invalid);
    expect(kindOf(null)).toBe(Kind.Interface);
    expect(kindOf(true)).toBe(Kind.Bool);
    expect(kindOf("x")).toBe(Kind.String);
    expect(kindOf(42)).toBe(Kind.Int);
    expect(kindOf(-7)).toBe(Kind.Int);
    expect(kindOf(1.5)).toBe(Kind.Float64);
    expect(kindOf(NaN)).toBe(Kind.Float64);
    expect(kindOf(2 ** 60)).toBe(Kind.Float64);
    expect(kindOf(-0)).toBe(Kind.Float64);
    expect(kindOf(0)).toBe(Kind.Int);
  });

  it("classifies bigints by range", () => {
    expect(kindOf(-1n)).toBe(Kind.Int64);
    expect(kindOf(MinInt64)).toBe(Kind.Int64);
    expect(kindOf(2n ** 63n)).toBe(Kind.Uint64);
    expect(kindOf(MaxUint64)).toBe(Kind.Uint64);
    expect(kindOf(MaxUint64 + 1n)).toBe(Kind.Unsupported);
    expect(kindOf(MinInt64 - 1n)).toBe(Kind.Unsupported);
  });

  it("classifies scalar boxes by their width", () => {
    expect(kindOf(int8(1))).toBe(Kind.Int8);
    expect(kindOf(int16(1))).toBe(Kind.Int16);
    expect(kindOf(int32(1))).toBe(Kind.Int32);
    expect(kindOf(int64(1))).toBe(Kind.Int64);
    expect(kindOf(uint(1))).toBe(Kind.Uint);
    expect(kindOf(uint8(1))).toBe(Kind.Uint8);
    expect(kindOf(uint16(1))).toBe(Kind.Uint16);
    expect(kindOf(uint32(1))).toBe(Kind.Uint32);
    expect(kindOf(uint64(1))).toBe(Kind.Uint64);
    expect(kindOf(float32(1))).toBe(Kind.Float32);
  });

  it("classifies containers", () => {
    expect(kindOf(new Uint8Array(2))).toBe(Kind.Bytes);
    expect(kindOf(new Uint8ClampedArray(2))).toBe(Kind.Bytes);
    expect(kindOf([1, 2])).toBe(Kind.Slice);
    expect(kindOf(new Int16Array(2))).toBe(Kind.Array);
    expect(kindOf(new Float64Array(2))).toBe(Kind.Array);
    expect(kindOf(new Map())).toBe(Kind.Map);
    expect(kindOf({ a: 1 })).toBe(Kind.Map);
    expect(kindOf(Object.create(null))).toBe(Kind.Map);
    expect(kindOf(new Point())).toBe(Kind.Struct);
    expect(kindOf(new Date(0))).toBe(Kind.Struct);
    expect(kindOf(ref(1))).toBe(Kind.Pointer);
    expect(kindOf(ref(null))).toBe(Kind.Pointer);
  });

  it("marks values with no encoding", () => {
    expect(kindOf(() => 1)).toBe(Kind.Func);
    expect(kindOf(Symbol("s"))).toBe(Kind.Symbol);
    expect(kindOf(new Set())).toBe(Kind.Unsupported);
    expect(kindOf(new WeakMap())).toBe(Kind.Unsupported);
    expect(kindOf(Promise.resolve())).toBe(Kind.Unsupported);
    expect(kindOf(new ArrayBuffer(4))).toBe(Kind.Unsupported);
    expect(kindOf(new DataView(new ArrayBuffer(4)))).toBe(Kind.Unsupported);
  });
});

describe("shapeOf", () => {
  it("converts integral numbers to bigint", () => {
    expect(shapeOf(300)).toEqual({ kind: Kind.Int, value: 300n });
  });

  it("views clamped arrays as bytes", () => {
    const clamped = new Uint8ClampedArray([1, 2, 255]);
    const shape = shapeOf(clamped);
    expect(shape.kind).toBe(Kind.Bytes);
    expect(shape.value).toEqual(new Uint8Array([1, 2, 255]));
  });

  it("unboxes scalars", () => {
    expect(shapeOf(uint16(500))).toEqual({ kind: Kind.Uint16, value: 500n });
    expect(shapeOf(float32(0.5))).toEqual({ kind: Kind.Float32, value: 0.5 });
  });
});

describe("scalar boxes", () => {
  it("accepts values at the bounds", () => {
    expect(int8(-128).value).toBe(-128n);
    expect(int8(127).value).toBe(127n);
    expect(uint8(255).value).toBe(255n);
    expect(uint64(MaxUint64).value).toBe(MaxUint64);
  });

  it("rejects values outside the range", () => {
    expect(() => int8(128)).toThrow(RangeError);
    expect(() => int16(-32769)).toThrow(RangeError);
    expect(() => uint8(-1)).toThrow(RangeError);
    expect(() => uint32(2 ** 32)).toThrow(RangeError);
    expect(() => uint64(MaxUint64 + 1n)).toThrow(RangeError);
  });

  it("rejects non-integers", () => {
    expect(() => int32(1.5)).toThrow("Int32 requires an integer, got 1.5");
  });

  it("rounds float32 to single precision", () => {
    expect(float32(0.1).value).toBe(Math.fround(0.1));
  });
});

describe("isEmptyValue", () => {
  it("treats zero values as empty", () => {
    for (const v of [undefined, null, false, 0, 0n, "", [], new Map(), {}, new Int32Array(0), new Uint8Array(0), int8(0), float32(0), ref(null)]) {
      expect(isEmptyValue(v)).toBe(true);
    }
  });

  it("treats populated values as non-empty", () => {
    for (const v of [true, 1, -1n, "a", [0], new Map([[1, 1]]), { a: undefined }, new Uint8Array(1), uint8(1), ref(0)]) {
      expect(isEmptyValue(v)).toBe(false);
    }
  });

  it("never treats structs as empty", () => {
    expect(isEmptyValue(new Point())).toBe(false);
    expect(isEmptyValue(new Date(0))).toBe(false);
  });
});

describe("Ref", () => {
  it("reports nil targets", () => {
    expect(new Ref(null).isNil).toBe(true);
    expect(ref(0).isNil).toBe(false);
  });
});

describe("describeValue", () => {
  it("names values for error messages", () => {
    expect(describeValue("a")).toBe('"a"');
    expect(describeValue(5n)).toBe("5n");
    expect(describeValue(function handler() {})).toBe("[function handler]");
    expect(describeValue(new Set())).toBe("[object Set]");
    expect(describeValue(Object.create(null))).toBe("[object]");
    expect(describeValue(null)).toBe("null");
    expect(describeValue(undefined)).toBe("undefined");
    expect(describeValue(1.5)).toBe("1.5");
  });
});
