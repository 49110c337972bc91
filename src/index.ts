/**
 * shapecodec - format-agnostic value encoding for TypeScript
 *
 * Walks any value (primitives, arrays, maps, class instances) and writes
 * it through a pluggable wire format, with no per-type marshaling code.
 *
 * @example
 * ```typescript
 * import { MsgpackHandle, defineStruct, marshal } from 'shapecodec';
 *
 * class Point {
 *   constructor(public x: number, public y: number, public label = "") {}
 * }
 * defineStruct(Point, ["x", "y", { key: "label", omitEmpty: true }]);
 *
 * const bytes = marshal([new Point(1, 2)], new MsgpackHandle());
 * ```
 */

// Value model
export {
  Kind,
  CharEncoding,
  Scalar,
  Ref,
  ref,
  int,
  int8,
  int16,
  int32,
  int64,
  uint,
  uint8,
  uint16,
  uint32,
  uint64,
  float32,
  kindOf,
  shapeOf,
  isEmptyValue,
  MinInt64,
  MaxInt64,
  MaxUint64,
} from "./types";
export type { Shape, ScalarKind, IntKind, UintKind, TypedArray } from "./types";

// Errors
export {
  CodecError,
  EncodeError,
  UnsupportedKindError,
  ExtensionError,
  ShortWriteError,
  RegistryFrozenError,
  StructDefinitionError,
} from "./errors";

// Byte sinks
export { BytesEncWriter, DEFAULT_BUFFER_SIZE } from "./writer";
export type { EncWriter, OutputSlot } from "./writer";
export { StreamEncWriter, BufferedSink, FileSink, DEFAULT_SINK_BUFFER_SIZE } from "./stream";
export type { SyncSink, ByteSink, BufferedSinkOptions } from "./stream";

// Registries
export { ExtensionRegistry, MAP_ACCESS_THRESHOLD } from "./registry";
export type { ExtensionEntry, ExtensionFn, TypeKey } from "./registry";
export { StructRegistry, defaultStructs, defineStruct, resolveField } from "./fields";
export type { FieldDescriptor, FieldOptions, FieldSpec } from "./fields";

// Time extension
export { Timestamp, encodeTime, registerTimeExtension } from "./time";

// Encoding
export type { PrimitiveEncoder, EncodeHandle } from "./driver";
export { Encoder, marshal, marshalTo } from "./encoder";
export type { EncodeResult } from "./encoder";

// Msgpack format
export { MsgpackHandle, MsgpackEncDriver, MsgpackType } from "./msgpack";
export type { MsgpackHandleOptions } from "./msgpack";

/**
 * Library version.
 */
export const VERSION = "0.3.0";
