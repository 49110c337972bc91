import type { EncodeHandle, PrimitiveEncoder } from "./driver";
import { EncodeError, ExtensionError, UnsupportedKindError } from "./errors";
import { resolveField } from "./fields";
import { log } from "./logging";
import type { ExtensionEntry } from "./registry";
import { StreamEncWriter, type SyncSink } from "./stream";
import {
  CharEncoding,
  Kind,
  MaxInt64,
  MaxUint64,
  MinInt64,
  Ref,
  Scalar,
  type TypedArray,
  constructorOf,
  describeValue,
  elementKind,
  isEmptyValue,
  isIntKind,
  isPlainObject,
  shapeOf,
} from "./types";
import { BytesEncWriter, type EncWriter, type OutputSlot } from "./writer";

/**
 * Outcome of one encode call.
 */
export type EncodeResult = { ok: true } | { ok: false; error: EncodeError };

function toEncodeError(err: unknown): EncodeError {
  if (err instanceof EncodeError) {
    return err;
  }
  const reason = err instanceof Error ? err.message : String(err);
  return new EncodeError(`Encode failed: ${reason}`, { cause: err });
}

function isFastScalar(value: unknown): boolean {
  switch (typeof value) {
    case "string":
    case "boolean":
    case "number":
      return true;
    case "bigint":
      return value >= MinInt64 && value <= MaxUint64;
  }
  return value instanceof Scalar;
}

/**
 * Encoder writes values through a wire format into a byte sink.
 *
 * Any value is accepted: primitives, Scalar boxes, Refs, arrays, typed
 * arrays, Maps, plain objects and class instances. Class instances encode
 * as maps of their fields (see StructRegistry); types registered in the
 * handle's extension registry encode through their extension function.
 *
 * An Encoder may be reused for several values in sequence but must not be
 * shared between concurrent callers.
 *
 * @example
 * ```typescript
 * const handle = new MsgpackHandle();
 * const out: OutputSlot = { bytes: new Uint8Array(0) };
 * const result = Encoder.forBytes(out, handle).encode({ id: 1, tags: ["a"] });
 * if (!result.ok) throw result.error;
 * // out.bytes now holds the encoded map
 * ```
 */
export class Encoder {
  private readonly w: EncWriter;
  private readonly e: PrimitiveEncoder;
  private readonly h: EncodeHandle;

  constructor(writer: EncWriter, handle: EncodeHandle) {
    handle.extensions.freeze();
    this.w = writer;
    this.h = handle;
    this.e = handle.newEncoder(writer);
    log.encoder("new encoder over %s", writer.constructor.name);
  }

  /**
   * Returns an Encoder writing to a stream. Sinks without single-byte
   * writes are buffered internally.
   */
  static forStream(sink: SyncSink, handle: EncodeHandle): Encoder {
    return new Encoder(new StreamEncWriter(sink), handle);
  }

  /**
   * Returns an Encoder writing into a buffer. After each encode,
   * `out.bytes` holds everything this encoder has written, reusing the
   * slot's previous storage when it is large enough. Values encoded in
   * sequence follow one another, as they would on a stream.
   */
  static forBytes(out: OutputSlot, handle: EncodeHandle): Encoder {
    return new Encoder(new BytesEncWriter(out), handle);
  }

  /**
   * Encodes a value and flushes the sink.
   *
   * Struct fields are written as a map keyed by their field names, with
   * omit-empty fields left out when they hold false, 0, nil, or a
   * zero-length string, array or map. Map keys and field names go through
   * the format's symbol encoding.
   *
   * Failures never throw: they come back as `{ ok: false, error }`, and
   * the sink is left holding whatever was written before the failure.
   */
  encode(value: unknown): EncodeResult {
    try {
      this.encodeFast(value);
      this.w.flush();
      return { ok: true };
    } catch (err) {
      const error = toEncodeError(err);
      log.encoder("encode failed: %s", error.message);
      return { ok: false, error };
    }
  }

  // Scalars and references to scalars skip shape inspection.
  private encodeFast(v: unknown): void {
    const ee = this.e;
    switch (typeof v) {
      case "undefined":
        ee.encodeNil();
        return;
      case "string":
        ee.encodeString(CharEncoding.Utf8, v);
        return;
      case "boolean":
        ee.encodeBool(v);
        return;
      case "number":
        if (Number.isSafeInteger(v) && !Object.is(v, -0)) {
          ee.encodeInt(BigInt(v));
        } else {
          ee.encodeFloat64(v);
        }
        return;
      case "bigint":
        if (v >= MinInt64 && v <= MaxInt64) {
          ee.encodeInt(v);
          return;
        }
        if (v >= 0n && v <= MaxUint64) {
          ee.encodeUint(v);
          return;
        }
        break;
    }

    if (v === null) {
      ee.encodeNil();
    } else if (v instanceof Scalar) {
      this.encodeScalar(v);
    } else if (v instanceof Ref && isFastScalar(v.target)) {
      this.encodeFast(v.target);
    } else {
      this.encodeValue(v);
    }
  }

  private encodeScalar(v: Scalar): void {
    if (v.kind === Kind.Float32) {
      this.e.encodeFloat32(Number(v.value));
    } else if (isIntKind(v.kind)) {
      this.e.encodeInt(BigInt(v.value));
    } else {
      this.e.encodeUint(BigInt(v.value));
    }
  }

  private encodeValue(v: unknown): void {
    const ee = this.e;
    if (ee.encodeBuiltinType(v)) {
      return;
    }

    // Overrides are by type, so they come before kind dispatch.
    if (typeof v === "object" && v !== null && !isPlainObject(v)) {
      const ext = this.h.extensions.lookup(constructorOf(v));
      if (ext !== undefined) {
        this.encodeExtension(ext, v);
        return;
      }
    }

    const shape = shapeOf(v);
    switch (shape.kind) {
      case Kind.Bool:
        ee.encodeBool(shape.value);
        break;
      case Kind.String:
        ee.encodeString(CharEncoding.Utf8, shape.value);
        break;
      case Kind.Float64:
        ee.encodeFloat64(shape.value);
        break;
      case Kind.Float32:
        ee.encodeFloat32(shape.value);
        break;
      case Kind.Bytes:
        ee.encodeStringBytes(CharEncoding.Raw, shape.value);
        break;
      case Kind.Slice:
        ee.encodeArrayPreamble(shape.value.length);
        for (const elem of shape.value) {
          this.encodeValue(elem);
        }
        break;
      case Kind.Array:
        this.encodeTypedArray(shape.value);
        break;
      case Kind.Map:
        this.encodeMap(shape.value);
        break;
      case Kind.Struct:
        this.encodeStruct(shape.value);
        break;
      case Kind.Pointer:
        if (shape.value.target === null) {
          ee.encodeNil();
        } else {
          this.encodeValue(shape.value.target);
        }
        break;
      case Kind.Interface:
      case Kind.Invalid:
        ee.encodeNil();
        break;
      case Kind.Int:
      case Kind.Int8:
      case Kind.Int16:
      case Kind.Int32:
      case Kind.Int64:
        ee.encodeInt(shape.value);
        break;
      case Kind.Uint:
      case Kind.Uint8:
      case Kind.Uint16:
      case Kind.Uint32:
      case Kind.Uint64:
        ee.encodeUint(shape.value);
        break;
      default:
        throw new UnsupportedKindError(Kind[shape.kind], describeValue(v));
    }
  }

  private encodeExtension(ext: ExtensionEntry, v: object): void {
    let bytes: Uint8Array | null;
    try {
      bytes = ext.encode(v);
    } catch (err) {
      throw new ExtensionError(ext.tag, err);
    }
    if (bytes === null) {
      this.e.encodeNil();
      return;
    }
    if (this.h.writeExt) {
      this.e.encodeExtPreamble(ext.tag, bytes.length);
      this.w.writeBytes(bytes);
    } else {
      this.e.encodeStringBytes(CharEncoding.Raw, bytes);
    }
  }

  private encodeTypedArray(array: TypedArray): void {
    const ee = this.e;
    ee.encodeArrayPreamble(array.length);
    const kind = elementKind(array);
    for (let i = 0; i < array.length; i++) {
      const elem = array[i];
      if (kind === Kind.Float32) {
        ee.encodeFloat32(Number(elem));
      } else if (kind === Kind.Float64) {
        ee.encodeFloat64(Number(elem));
      } else if (isIntKind(kind)) {
        ee.encodeInt(BigInt(elem));
      } else {
        ee.encodeUint(BigInt(elem));
      }
    }
  }

  // Entries go out in the map's own iteration order.
  private encodeMap(m: Map<unknown, unknown> | Record<string, unknown>): void {
    const ee = this.e;
    if (m instanceof Map) {
      ee.encodeMapPreamble(m.size);
      for (const [key, value] of m) {
        if (typeof key === "string") {
          ee.encodeSymbol(key);
        } else {
          this.encodeValue(key);
        }
        this.encodeValue(value);
      }
      return;
    }

    const keys = Object.keys(m);
    ee.encodeMapPreamble(keys.length);
    for (const key of keys) {
      ee.encodeSymbol(key);
      this.encodeValue(m[key]);
    }
  }

  private encodeStruct(v: object): void {
    const fields = this.h.structs.fieldsOf(v);
    const names: string[] = [];
    const values: unknown[] = [];
    for (const field of fields) {
      const fv = resolveField(v, field);
      if (field.omitEmpty && isEmptyValue(fv)) {
        continue;
      }
      names.push(field.encName);
      values.push(fv);
    }

    const ee = this.e;
    ee.encodeMapPreamble(names.length);
    for (let j = 0; j < names.length; j++) {
      ee.encodeSymbol(names[j]);
      this.encodeValue(values[j]);
    }
  }
}

/**
 * Encodes a value into a new byte array.
 *
 * @throws EncodeError if the value cannot be encoded
 */
export function marshal(value: unknown, handle: EncodeHandle): Uint8Array {
  const out: OutputSlot = { bytes: new Uint8Array(0) };
  const result = Encoder.forBytes(out, handle).encode(value);
  if (!result.ok) {
    throw result.error;
  }
  return out.bytes;
}

/**
 * Encodes a value into a sink.
 *
 * @throws EncodeError if the value cannot be encoded or the sink fails
 */
export function marshalTo(sink: SyncSink, value: unknown, handle: EncodeHandle): void {
  const result = Encoder.forStream(sink, handle).encode(value);
  if (!result.ok) {
    throw result.error;
  }
}
