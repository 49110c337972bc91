import type { StructRegistry } from "./fields";
import type { ExtensionRegistry } from "./registry";
import type { CharEncoding } from "./types";
import type { EncWriter } from "./writer";

/**
 * PrimitiveEncoder is what a wire format implements: how each leaf value
 * and container header becomes bytes. The generic engine decides what to
 * call; the format decides the layout.
 *
 * Preambles only announce a count. The elements follow as separate calls.
 */
export interface PrimitiveEncoder {
  /**
   * Lets a format take over values it has its own representation for.
   * Returns true if the value was fully written.
   */
  encodeBuiltinType(value: unknown): boolean;
  encodeNil(): void;
  /** Every signed integer width arrives here as an int64. */
  encodeInt(value: bigint): void;
  /** Every unsigned integer width arrives here as a uint64. */
  encodeUint(value: bigint): void;
  encodeBool(value: boolean): void;
  encodeFloat32(value: number): void;
  encodeFloat64(value: number): void;
  encodeExtPreamble(tag: number, length: number): void;
  encodeArrayPreamble(length: number): void;
  encodeMapPreamble(length: number): void;
  encodeString(encoding: CharEncoding, value: string): void;
  /**
   * Writes a string the format may intern. Formats without symbols write
   * a plain string.
   */
  encodeSymbol(value: string): void;
  encodeStringBytes(encoding: CharEncoding, value: Uint8Array): void;
}

/**
 * EncodeHandle is the shared configuration of a wire format: its
 * extension registry, struct layouts and driver factory.
 *
 * Configure it completely before encoding. The first encoder created from
 * a handle freezes its extension registry.
 */
export interface EncodeHandle {
  readonly extensions: ExtensionRegistry;
  readonly structs: StructRegistry;
  /**
   * True to write extension payloads as tagged ext values, false to
   * write them as plain raw strings.
   */
  readonly writeExt: boolean;
  newEncoder(writer: EncWriter): PrimitiveEncoder;
}
