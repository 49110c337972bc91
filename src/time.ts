import type { ExtensionRegistry } from "./registry";
import { MaxInt32, MaxInt64, MinInt32, MinInt64 } from "./types";

/** Largest encoded time: 8 bytes seconds, 4 nanoseconds, 2 zone. */
const MAX_TIME_BYTES = 14;

const ZONE_SIGN_BIT = 0x8000;

/**
 * An instant with nanosecond precision and an optional UTC offset.
 */
export class Timestamp {
  /** Seconds since the Unix epoch. */
  readonly seconds: bigint;
  /** Sub-second part, 0 to 999,999,999. */
  readonly nanoseconds: number;
  /** Offset from UTC in minutes, or null for UTC itself. */
  readonly offsetMinutes: number | null;

  constructor(seconds: bigint | number, nanoseconds = 0, offsetMinutes: number | null = null) {
    if (!Number.isInteger(nanoseconds) || nanoseconds < 0 || nanoseconds > 999_999_999) {
      throw new RangeError(`Nanoseconds must be in [0, 999999999], got ${nanoseconds}`);
    }
    if (
      offsetMinutes !== null &&
      (!Number.isInteger(offsetMinutes) || Math.abs(offsetMinutes) >= ZONE_SIGN_BIT)
    ) {
      throw new RangeError(`Zone offset out of range: ${offsetMinutes} minutes`);
    }
    const secs = BigInt(seconds);
    if (secs < MinInt64 || secs > MaxInt64) {
      throw new RangeError(`Seconds out of int64 range: ${secs}`);
    }
    this.seconds = secs;
    this.nanoseconds = nanoseconds;
    this.offsetMinutes = offsetMinutes;
  }

  /**
   * Converts a Date, which has millisecond precision and no zone.
   */
  static fromDate(date: Date, offsetMinutes: number | null = null): Timestamp {
    const ms = date.getTime();
    if (Number.isNaN(ms)) {
      throw new RangeError("Invalid Date");
    }
    const seconds = Math.floor(ms / 1000);
    const nanoseconds = (ms - seconds * 1000) * 1_000_000;
    return new Timestamp(seconds, nanoseconds, offsetMinutes);
  }

  get isUTC(): boolean {
    return this.offsetMinutes === null;
  }
}

/**
 * Encodes an instant into its compact binary form.
 *
 * Layout, all big-endian:
 *   seconds      4 bytes (int32) or 8 bytes (int64) outside the int32 range
 *   nanoseconds  4 bytes, only when non-zero
 *   zone         2 bytes, only when not UTC: sign in the top bit,
 *                minutes east of UTC in the rest
 *   pad          1 zero byte when seconds took 8 bytes and nanoseconds
 *                were left out
 *
 * A Date encodes as UTC.
 */
export function encodeTime(time: Timestamp | Date): Uint8Array {
  const t = time instanceof Date ? Timestamp.fromDate(time) : time;
  const bytes = new Uint8Array(MAX_TIME_BYTES);
  const view = new DataView(bytes.buffer);
  let i = 0;
  let padZero = false;

  if (t.seconds > BigInt(MinInt32) && t.seconds < BigInt(MaxInt32)) {
    view.setInt32(i, Number(t.seconds), false);
    i += 4;
  } else {
    view.setBigInt64(i, t.seconds, false);
    i += 8;
    padZero = t.nanoseconds === 0;
  }

  if (t.nanoseconds !== 0) {
    view.setUint32(i, t.nanoseconds, false);
    i += 4;
  }

  if (t.offsetMinutes !== null) {
    let zone = Math.abs(t.offsetMinutes);
    if (t.offsetMinutes < 0) {
      zone |= ZONE_SIGN_BIT;
    }
    view.setUint16(i, zone, false);
    i += 2;
  }

  if (padZero) {
    i += 1;
  }

  return bytes.slice(0, i);
}

/**
 * Registers `encodeTime` for both Date and Timestamp under one tag.
 */
export function registerTimeExtension(registry: ExtensionRegistry, tag: number): void {
  registry.register(Date, tag, encodeTime);
  registry.register(Timestamp, tag, encodeTime);
}
