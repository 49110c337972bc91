import { log } from "./logging";

/** Initial buffer size when the output slot has no storage of its own. */
export const DEFAULT_BUFFER_SIZE = 64;

// Shared across writers.
const textEncoder = new TextEncoder();

/**
 * EncWriter is the byte sink a wire format writes through.
 * All multi-byte integers are big-endian.
 */
export interface EncWriter {
  writeUint16(value: number): void;
  writeUint32(value: number): void;
  writeUint64(value: bigint): void;
  writeBytes(data: Uint8Array): void;
  /** Writes the UTF-8 bytes of a string, with no length prefix. */
  writeString(value: string): void;
  writeByte(value: number): void;
  write2Bytes(b1: number, b2: number): void;
  write3Bytes(b1: number, b2: number, b3: number): void;
  write4Bytes(b1: number, b2: number, b3: number, b4: number): void;
  flush(): void;
}

/**
 * Caller-owned output target for a BytesEncWriter.
 *
 * On flush `bytes` is replaced by a view of exactly the encoded bytes.
 * Passing the same slot to the next encoder reuses its backing buffer, up
 * to the end of its ArrayBuffer, so a plain Uint8Array view must own the
 * rest of that buffer. A Node Buffer is only reused up to its own length.
 */
export interface OutputSlot {
  bytes: Uint8Array;
}

/**
 * BytesEncWriter writes into a growable buffer and hands the result back
 * through an OutputSlot.
 */
export class BytesEncWriter implements EncWriter {
  private buffer: Uint8Array;
  private view: DataView;
  private cursor: number;
  // Visible window of the buffer; the rest up to capacity is spare.
  private len: number;
  private readonly out: OutputSlot;

  constructor(out: OutputSlot) {
    const prev = out.bytes;
    // Node Buffers may share a pool with unrelated data past their end.
    const capacity = Buffer.isBuffer(prev) ? prev.byteLength : prev.buffer.byteLength - prev.byteOffset;
    if (capacity === 0) {
      this.buffer = new Uint8Array(DEFAULT_BUFFER_SIZE);
      this.len = DEFAULT_BUFFER_SIZE;
    } else {
      this.buffer = new Uint8Array(prev.buffer, prev.byteOffset, capacity);
      this.len = prev.length;
    }
    this.view = new DataView(this.buffer.buffer, this.buffer.byteOffset, this.buffer.byteLength);
    this.cursor = 0;
    this.out = out;
  }

  /**
   * Number of bytes written so far.
   */
  get position(): number {
    return this.cursor;
  }

  /**
   * Length of the visible window.
   */
  get length(): number {
    return this.len;
  }

  /**
   * Physical size of the buffer.
   */
  get capacity(): number {
    return this.buffer.length;
  }

  /**
   * Reserves n bytes and returns the offset to write them at.
   *
   * When the buffer is too small it is reallocated to 2 * capacity + n.
   */
  grow(n: number): number {
    const offset = this.cursor;
    this.cursor = offset + n;
    if (this.cursor > this.buffer.length) {
      const capacity = 2 * this.buffer.length + n;
      log.writer("grow: %d -> %d bytes", this.buffer.length, capacity);
      const next = new Uint8Array(capacity);
      next.set(this.buffer.subarray(0, offset));
      this.buffer = next;
      this.view = new DataView(next.buffer);
      this.len = capacity;
    } else if (this.cursor > this.len) {
      this.len = this.buffer.length;
    }
    return offset;
  }

  writeUint16(value: number): void {
    this.view.setUint16(this.grow(2), value, false);
  }

  writeUint32(value: number): void {
    this.view.setUint32(this.grow(4), value, false);
  }

  writeUint64(value: bigint): void {
    this.view.setBigUint64(this.grow(8), BigInt.asUintN(64, value), false);
  }

  writeBytes(data: Uint8Array): void {
    const offset = this.grow(data.length);
    this.buffer.set(data, offset);
  }

  writeString(value: string): void {
    this.writeBytes(textEncoder.encode(value));
  }

  writeByte(value: number): void {
    const offset = this.grow(1);
    this.buffer[offset] = value & 0xff;
  }

  write2Bytes(b1: number, b2: number): void {
    const offset = this.grow(2);
    this.buffer[offset] = b1;
    this.buffer[offset + 1] = b2;
  }

  write3Bytes(b1: number, b2: number, b3: number): void {
    const offset = this.grow(3);
    this.buffer[offset] = b1;
    this.buffer[offset + 1] = b2;
    this.buffer[offset + 2] = b3;
  }

  write4Bytes(b1: number, b2: number, b3: number, b4: number): void {
    const offset = this.grow(4);
    this.buffer[offset] = b1;
    this.buffer[offset + 1] = b2;
    this.buffer[offset + 2] = b3;
    this.buffer[offset + 3] = b4;
  }

  /**
   * Publishes the encoded bytes to the output slot.
   */
  flush(): void {
    this.out.bytes = this.buffer.subarray(0, this.cursor);
  }
}
