import { describe, it, expect, vi } from "vitest";
import { closeSync, mkdtempSync, openSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { BufferedSink, FileSink, StreamEncWriter, type ByteSink, type SyncSink } from "./stream";
import { ShortWriteError } from "./errors";

/** Records every chunk handed to it. */
class ChunkSink implements SyncSink {
  chunks: number[][] = [];

  write(data: Uint8Array): number {
    this.chunks.push(Array.from(data));
    return data.length;
  }

  bytes(): number[] {
    return this.chunks.flat();
  }
}

/** A sink with single-byte writes, collecting into one array. */
class ByteCollector implements ByteSink {
  received: number[] = [];

  write(data: Uint8Array): number {
    this.received.push(...data);
    return data.length;
  }

  writeByte(value: number): void {
    this.received.push(value);
  }
}

describe("BufferedSink", () => {
  it("holds small writes until flush", () => {
    const target = new ChunkSink();
    const sink = new BufferedSink(target);
    sink.writeByte(1);
    sink.write(new Uint8Array([2, 3]));
    expect(target.chunks).toEqual([]);
    expect(sink.buffered).toBe(3);

    sink.flush();
    expect(target.chunks).toEqual([[1, 2, 3]]);
    expect(sink.buffered).toBe(0);
  });

  it("forwards single bytes in chunks of the buffer size", () => {
    const target = new ChunkSink();
    const sink = new BufferedSink(target);
    for (let i = 0; i < 100; i++) {
      sink.writeByte(i);
    }
    sink.flush();
    expect(target.chunks.map((c) => c.length)).toEqual([64, 36]);
    expect(target.bytes()).toEqual(Array.from({ length: 100 }, (_, i) => i));
  });

  it("fills the buffer before draining a write that does not fit", () => {
    const target = new ChunkSink();
    const sink = new BufferedSink(target);
    sink.write(new Uint8Array(10).fill(1));
    sink.write(new Uint8Array(100).fill(2));
    expect(target.chunks.map((c) => c.length)).toEqual([64]);
    expect(sink.buffered).toBe(46);

    sink.flush();
    expect(target.chunks.map((c) => c.length)).toEqual([64, 46]);
  });

  it("passes large writes straight through when empty", () => {
    const target = new ChunkSink();
    const sink = new BufferedSink(target, { size: 16 });
    expect(sink.write(new Uint8Array(200))).toBe(200);
    expect(target.chunks.map((c) => c.length)).toEqual([200]);
    expect(sink.buffered).toBe(0);
  });

  it("hands over chunks the wrapped sink may keep", () => {
    const kept: Uint8Array[] = [];
    const sink = new BufferedSink(
      {
        write(data: Uint8Array): number {
          kept.push(data);
          return data.length;
        },
      },
      { size: 2 },
    );
    for (const b of [1, 2, 3, 4]) {
      sink.writeByte(b);
    }
    sink.flush();
    expect(kept.map((chunk) => Array.from(chunk))).toEqual([
      [1, 2],
      [3, 4],
    ]);
  });

  it("flushes the wrapped sink", () => {
    const flush = vi.fn();
    const sink = new BufferedSink({ write: (data) => data.length, flush });
    sink.flush();
    expect(flush).toHaveBeenCalledTimes(1);
  });

  it("throws ShortWriteError when the wrapped sink takes less", () => {
    const sink = new BufferedSink({ write: (data) => data.length - 1 });
    sink.write(new Uint8Array([1, 2, 3]));
    expect(() => sink.flush()).toThrow(ShortWriteError);
  });

  it("rejects invalid sizes", () => {
    const target = new ChunkSink();
    expect(() => new BufferedSink(target, { size: 0 })).toThrow(RangeError);
    expect(() => new BufferedSink(target, { size: 1.5 })).toThrow(RangeError);
  });
});

describe("StreamEncWriter", () => {
  it("writes big-endian integers", () => {
    const sink = new ByteCollector();
    const writer = new StreamEncWriter(sink);
    writer.writeUint16(0x0102);
    writer.writeUint32(0x03040506);
    writer.writeUint64(0x0708090a0b0c0d0en);
    expect(sink.received).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14]);
  });

  it("writes grouped bytes and strings in order", () => {
    const sink = new ByteCollector();
    const writer = new StreamEncWriter(sink);
    writer.writeByte(0x01);
    writer.write2Bytes(0x02, 0x03);
    writer.write3Bytes(0x04, 0x05, 0x06);
    writer.write4Bytes(0x07, 0x08, 0x09, 0x0a);
    writer.writeString("hi");
    expect(sink.received).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 0x68, 0x69]);
  });

  it("hands the sink integers it may keep", () => {
    const kept: Uint8Array[] = [];
    const sink: ByteSink = {
      write(data: Uint8Array): number {
        kept.push(data);
        return data.length;
      },
      writeByte: () => undefined,
    };
    const writer = new StreamEncWriter(sink);
    writer.writeUint16(1000);
    writer.writeUint32(2000);
    writer.writeUint64(3000n);
    expect(kept.map((chunk) => Array.from(chunk))).toEqual([
      [0x03, 0xe8],
      [0x00, 0x00, 0x07, 0xd0],
      [0, 0, 0, 0, 0, 0, 0x0b, 0xb8],
    ]);
  });

  it("writes to byte sinks immediately", () => {
    const sink = new ByteCollector();
    const writer = new StreamEncWriter(sink);
    writer.writeByte(9);
    expect(sink.received).toEqual([9]);
  });

  it("buffers sinks without writeByte until flush", () => {
    const target = new ChunkSink();
    const writer = new StreamEncWriter(target);
    writer.write3Bytes(1, 2, 3);
    expect(target.chunks).toEqual([]);

    writer.flush();
    expect(target.chunks).toEqual([[1, 2, 3]]);
  });

  it("reports short writes with expected and written counts", () => {
    const sink: ByteSink = {
      write: (data) => Math.max(0, data.length - 2),
      writeByte: () => undefined,
    };
    const writer = new StreamEncWriter(sink);
    let caught: unknown;
    try {
      writer.writeBytes(new Uint8Array(5));
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ShortWriteError);
    if (caught instanceof ShortWriteError) {
      expect(caught.expected).toBe(5);
      expect(caught.written).toBe(3);
      expect(caught.message).toBe("Incorrect num bytes written: expected 5, wrote 3");
    }
  });

  it("flushes the underlying sink", () => {
    const flush = vi.fn();
    const writer = new StreamEncWriter({
      write: (data) => data.length,
      writeByte: () => undefined,
      flush,
    });
    writer.flush();
    expect(flush).toHaveBeenCalledTimes(1);
  });
});

describe("FileSink", () => {
  it("writes through a file descriptor", () => {
    const dir = mkdtempSync(join(tmpdir(), "shapecodec-"));
    const file = join(dir, "out.bin");
    try {
      const fd = openSync(file, "w");
      try {
        const writer = new StreamEncWriter(new FileSink(fd));
        writer.writeByte(0xc0);
        writer.writeUint16(0xabcd);
        writer.flush();
      } finally {
        closeSync(fd);
      }
      expect(Array.from(readFileSync(file))).toEqual([0xc0, 0xab, 0xcd]);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
