/**
 * Stream-backed byte sinks.
 *
 * Encoding is synchronous, so a stream here is anything that accepts bytes
 * immediately and reports how many it took: a file descriptor, an
 * in-memory collector, or an adapter the caller writes around its own I/O.
 */

import { writeSync } from "fs";
import { ShortWriteError } from "./errors";
import { log } from "./logging";
import type { EncWriter } from "./writer";

/** Default size of the buffering layer put in front of plain sinks. */
export const DEFAULT_SINK_BUFFER_SIZE = 64;

const textEncoder = new TextEncoder();

/**
 * A synchronous destination for bytes.
 */
export interface SyncSink {
  /**
   * Writes the bytes and returns how many were accepted.
   * Throws on I/O failure. The sink may keep `data`: writers never reuse
   * an array after handing it over.
   */
  write(data: Uint8Array): number;
  /** Writes a single byte. Sinks without it get a buffering layer. */
  writeByte?(value: number): void;
  /** Pushes buffered data to its final destination. */
  flush?(): void;
}

/**
 * A sink with efficient single-byte writes.
 */
export interface ByteSink extends SyncSink {
  writeByte(value: number): void;
}

function isByteSink(sink: SyncSink): sink is ByteSink {
  return typeof sink.writeByte === "function";
}

/**
 * Options for BufferedSink configuration.
 */
export interface BufferedSinkOptions {
  /** Buffer size in bytes. Default: 64 */
  size?: number;
}

/**
 * BufferedSink collects small writes and forwards them to the wrapped sink
 * in chunks of at most `size` bytes. Writes larger than the
 * buffer go straight through once it is drained.
 */
export class BufferedSink implements ByteSink {
  private readonly sink: SyncSink;
  private readonly buffer: Uint8Array;
  private pos: number;

  constructor(sink: SyncSink, options: BufferedSinkOptions = {}) {
    const size = options.size ?? DEFAULT_SINK_BUFFER_SIZE;
    if (!Number.isInteger(size) || size <= 0) {
      throw new RangeError(`Buffer size must be a positive integer, got ${size}`);
    }
    this.sink = sink;
    this.buffer = new Uint8Array(size);
    this.pos = 0;
  }

  /**
   * Returns the number of bytes waiting to be forwarded.
   */
  get buffered(): number {
    return this.pos;
  }

  write(data: Uint8Array): number {
    let offset = 0;
    while (data.length - offset > this.buffer.length - this.pos) {
      if (this.pos === 0) {
        // Nothing buffered: hand the large write over directly.
        this.forward(data.subarray(offset));
        return data.length;
      }
      const take = this.buffer.length - this.pos;
      this.buffer.set(data.subarray(offset, offset + take), this.pos);
      this.pos += take;
      offset += take;
      this.drain();
    }
    this.buffer.set(data.subarray(offset), this.pos);
    this.pos += data.length - offset;
    return data.length;
  }

  writeByte(value: number): void {
    if (this.pos === this.buffer.length) {
      this.drain();
    }
    this.buffer[this.pos++] = value & 0xff;
  }

  flush(): void {
    this.drain();
    this.sink.flush?.();
  }

  private drain(): void {
    if (this.pos === 0) {
      return;
    }
    const chunk = this.buffer.slice(0, this.pos);
    this.pos = 0;
    this.forward(chunk);
  }

  private forward(data: Uint8Array): void {
    const written = this.sink.write(data);
    if (written !== data.length) {
      throw new ShortWriteError(data.length, written);
    }
  }
}

/**
 * StreamEncWriter writes through a SyncSink.
 *
 * Any write the sink does not fully accept aborts with ShortWriteError.
 */
export class StreamEncWriter implements EncWriter {
  private readonly sink: ByteSink;
  // Big-endian integers are laid out here, then copied out.
  private readonly scratch = new Uint8Array(8);
  private readonly view = new DataView(this.scratch.buffer);

  constructor(sink: SyncSink) {
    if (isByteSink(sink)) {
      this.sink = sink;
    } else {
      log.writer("sink has no writeByte, buffering %d bytes", DEFAULT_SINK_BUFFER_SIZE);
      this.sink = new BufferedSink(sink);
    }
  }

  writeUint16(value: number): void {
    this.view.setUint16(0, value, false);
    this.writeBytes(this.scratch.slice(0, 2));
  }

  writeUint32(value: number): void {
    this.view.setUint32(0, value, false);
    this.writeBytes(this.scratch.slice(0, 4));
  }

  writeUint64(value: bigint): void {
    this.view.setBigUint64(0, BigInt.asUintN(64, value), false);
    this.writeBytes(this.scratch.slice(0, 8));
  }

  writeBytes(data: Uint8Array): void {
    const written = this.sink.write(data);
    if (written !== data.length) {
      throw new ShortWriteError(data.length, written);
    }
  }

  writeString(value: string): void {
    this.writeBytes(textEncoder.encode(value));
  }

  writeByte(value: number): void {
    this.sink.writeByte(value & 0xff);
  }

  write2Bytes(b1: number, b2: number): void {
    this.writeByte(b1);
    this.writeByte(b2);
  }

  write3Bytes(b1: number, b2: number, b3: number): void {
    this.writeByte(b1);
    this.writeByte(b2);
    this.writeByte(b3);
  }

  write4Bytes(b1: number, b2: number, b3: number, b4: number): void {
    this.writeByte(b1);
    this.writeByte(b2);
    this.writeByte(b3);
    this.writeByte(b4);
  }

  flush(): void {
    this.sink.flush?.();
  }
}

/**
 * FileSink writes to an open file descriptor with `fs.writeSync`.
 *
 * It has no single-byte write, so encoders put a BufferedSink in front.
 *
 * @example
 * ```typescript
 * const fd = openSync("out.bin", "w");
 * marshalTo(new FileSink(fd), value, new MsgpackHandle());
 * closeSync(fd);
 * ```
 */
export class FileSink implements SyncSink {
  constructor(readonly fd: number) {}

  write(data: Uint8Array): number {
    return writeSync(this.fd, data);
  }
}
