/**
 * Msgpack wire format.
 *
 * With `writeExt` the handle writes the current msgpack spec: bin family
 * for raw bytes, str8, and ext types. Without it, output stays within the
 * old spec, where raw bytes and strings share the raw (str) family and
 * extension payloads go out as raw strings.
 */

import type { EncodeHandle, PrimitiveEncoder } from "./driver";
import { defaultStructs, type StructRegistry } from "./fields";
import { ExtensionRegistry } from "./registry";
import { CharEncoding } from "./types";
import type { EncWriter } from "./writer";

/**
 * Msgpack type bytes.
 */
export enum MsgpackType {
  Nil = 0xc0,
  False = 0xc2,
  True = 0xc3,
  Bin8 = 0xc4,
  Bin16 = 0xc5,
  Bin32 = 0xc6,
  Ext8 = 0xc7,
  Ext16 = 0xc8,
  Ext32 = 0xc9,
  Float32 = 0xca,
  Float64 = 0xcb,
  Uint8 = 0xcc,
  Uint16 = 0xcd,
  Uint32 = 0xce,
  Uint64 = 0xcf,
  Int8 = 0xd0,
  Int16 = 0xd1,
  Int32 = 0xd2,
  Int64 = 0xd3,
  FixExt1 = 0xd4,
  FixExt2 = 0xd5,
  FixExt4 = 0xd6,
  FixExt8 = 0xd7,
  FixExt16 = 0xd8,
  Str8 = 0xd9,
  Str16 = 0xda,
  Str32 = 0xdb,
  Array16 = 0xdc,
  Array32 = 0xdd,
  Map16 = 0xde,
  Map32 = 0xdf,
  FixStrBase = 0xa0,
  FixArrayBase = 0x90,
  FixMapBase = 0x80,
}

const POSITIVE_FIXINT_MAX = 0x7fn;
const NEGATIVE_FIXINT_MIN = -32n;

const textEncoder = new TextEncoder();

// Scratch space for reading float bit patterns.
const floatView = new DataView(new ArrayBuffer(8));

/**
 * Options for MsgpackHandle configuration.
 */
export interface MsgpackHandleOptions {
  /** Write the new spec (bin, str8, ext). Default: false */
  writeExt?: boolean;
  /** Extension registry. Default: a new empty registry */
  extensions?: ExtensionRegistry;
  /** Struct layouts. Default: the global default registry */
  structs?: StructRegistry;
}

/**
 * MsgpackEncDriver writes primitives in msgpack form.
 */
export class MsgpackEncDriver implements PrimitiveEncoder {
  constructor(
    private readonly w: EncWriter,
    private readonly writeExt: boolean
  ) {}

  encodeBuiltinType(_value: unknown): boolean {
    return false;
  }

  encodeNil(): void {
    this.w.writeByte(MsgpackType.Nil);
  }

  encodeInt(i: bigint): void {
    if (i >= 0n) {
      this.encodeUint(i);
    } else if (i >= NEGATIVE_FIXINT_MIN) {
      this.w.writeByte(Number(i) & 0xff);
    } else if (i >= -0x80n) {
      this.w.write2Bytes(MsgpackType.Int8, Number(i) & 0xff);
    } else if (i >= -0x8000n) {
      this.w.writeByte(MsgpackType.Int16);
      this.w.writeUint16(Number(i) & 0xffff);
    } else if (i >= -0x80000000n) {
      this.w.writeByte(MsgpackType.Int32);
      this.w.writeUint32(Number(i) >>> 0);
    } else {
      this.w.writeByte(MsgpackType.Int64);
      this.w.writeUint64(BigInt.asUintN(64, i));
    }
  }

  encodeUint(i: bigint): void {
    if (i <= POSITIVE_FIXINT_MAX) {
      this.w.writeByte(Number(i));
    } else if (i <= 0xffn) {
      this.w.write2Bytes(MsgpackType.Uint8, Number(i));
    } else if (i <= 0xffffn) {
      this.w.writeByte(MsgpackType.Uint16);
      this.w.writeUint16(Number(i));
    } else if (i <= 0xffffffffn) {
      this.w.writeByte(MsgpackType.Uint32);
      this.w.writeUint32(Number(i));
    } else {
      this.w.writeByte(MsgpackType.Uint64);
      this.w.writeUint64(i);
    }
  }

  encodeBool(b: boolean): void {
    this.w.writeByte(b ? MsgpackType.True : MsgpackType.False);
  }

  encodeFloat32(f: number): void {
    floatView.setFloat32(0, f, false);
    this.w.writeByte(MsgpackType.Float32);
    this.w.writeUint32(floatView.getUint32(0, false));
  }

  encodeFloat64(f: number): void {
    floatView.setFloat64(0, f, false);
    this.w.writeByte(MsgpackType.Float64);
    this.w.writeUint64(floatView.getBigUint64(0, false));
  }

  encodeExtPreamble(tag: number, length: number): void {
    switch (length) {
      case 1:
        this.w.write2Bytes(MsgpackType.FixExt1, tag);
        return;
      case 2:
        this.w.write2Bytes(MsgpackType.FixExt2, tag);
        return;
      case 4:
        this.w.write2Bytes(MsgpackType.FixExt4, tag);
        return;
      case 8:
        this.w.write2Bytes(MsgpackType.FixExt8, tag);
        return;
      case 16:
        this.w.write2Bytes(MsgpackType.FixExt16, tag);
        return;
    }
    if (length < 0x100) {
      this.w.write3Bytes(MsgpackType.Ext8, length, tag);
    } else if (length < 0x10000) {
      this.w.writeByte(MsgpackType.Ext16);
      this.w.writeUint16(length);
      this.w.writeByte(tag);
    } else {
      this.w.writeByte(MsgpackType.Ext32);
      this.w.writeUint32(length);
      this.w.writeByte(tag);
    }
  }

  encodeArrayPreamble(length: number): void {
    this.writeContainerLen(MsgpackType.FixArrayBase, 16, null, MsgpackType.Array16, MsgpackType.Array32, length);
  }

  encodeMapPreamble(length: number): void {
    this.writeContainerLen(MsgpackType.FixMapBase, 16, null, MsgpackType.Map16, MsgpackType.Map32, length);
  }

  encodeString(c: CharEncoding, s: string): void {
    this.encodeStringBytes(c, textEncoder.encode(s));
  }

  encodeSymbol(s: string): void {
    this.encodeString(CharEncoding.Utf8, s);
  }

  encodeStringBytes(c: CharEncoding, bs: Uint8Array): void {
    if (c === CharEncoding.Raw && this.writeExt) {
      this.writeContainerLen(null, 0, MsgpackType.Bin8, MsgpackType.Bin16, MsgpackType.Bin32, bs.length);
    } else {
      this.writeContainerLen(
        MsgpackType.FixStrBase,
        32,
        this.writeExt ? MsgpackType.Str8 : null,
        MsgpackType.Str16,
        MsgpackType.Str32,
        bs.length
      );
    }
    if (bs.length > 0) {
      this.w.writeBytes(bs);
    }
  }

  // Writes the smallest header that holds `length`. A null fixBase or
  // b8 means the format (or spec version) has no such header.
  private writeContainerLen(
    fixBase: number | null,
    fixLimit: number,
    b8: number | null,
    b16: number,
    b32: number,
    length: number
  ): void {
    if (fixBase !== null && length < fixLimit) {
      this.w.writeByte(fixBase | length);
    } else if (b8 !== null && length < 0x100) {
      this.w.write2Bytes(b8, length);
    } else if (length < 0x10000) {
      this.w.writeByte(b16);
      this.w.writeUint16(length);
    } else {
      this.w.writeByte(b32);
      this.w.writeUint32(length);
    }
  }
}

/**
 * MsgpackHandle configures msgpack encoding.
 *
 * @example
 * ```typescript
 * const extensions = new ExtensionRegistry();
 * registerTimeExtension(extensions, 1);
 * const handle = new MsgpackHandle({ writeExt: true, extensions });
 * const bytes = marshal({ at: new Date() }, handle);
 * ```
 */
export class MsgpackHandle implements EncodeHandle {
  readonly extensions: ExtensionRegistry;
  readonly structs: StructRegistry;
  readonly writeExt: boolean;

  constructor(options: MsgpackHandleOptions = {}) {
    this.writeExt = options.writeExt ?? false;
    this.extensions = options.extensions ?? new ExtensionRegistry();
    this.structs = options.structs ?? defaultStructs;
  }

  newEncoder(writer: EncWriter): PrimitiveEncoder {
    return new MsgpackEncDriver(writer, this.writeExt);
  }
}
