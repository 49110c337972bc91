import { RegistryFrozenError } from "./errors";
import { log } from "./logging";

/**
 * Identity of a type: its constructor.
 */
export type TypeKey = abstract new (...args: never[]) => unknown;

/**
 * Extension encoder for a registered type.
 * Returns the payload bytes, or null to encode the value as nil.
 */
export type ExtensionFn<T = unknown> = (value: T) => Uint8Array | null;

/**
 * Registration information for an extension type.
 */
export interface ExtensionEntry {
  readonly type: TypeKey;
  readonly tag: number;
  readonly encode: ExtensionFn<unknown>;
}

/**
 * Registry size at which lookups switch from a linear scan to the map.
 */
export const MAP_ACCESS_THRESHOLD = 4;

const INITIAL_CAPACITY = 8;

function typeName(type: TypeKey): string {
  return type.name || "<anonymous>";
}

/**
 * ExtensionRegistry maps types to the tag and function that encode them.
 *
 * Two views are kept: a list, scanned for small registries, and a map,
 * used once the registry reaches MAP_ACCESS_THRESHOLD entries. Both are
 * rebuilt together on every change.
 */
export class ExtensionRegistry {
  private byType: Map<unknown, ExtensionEntry> = new Map();
  private entries: ExtensionEntry[] = [];
  private cap = 0;
  private frozen = false;

  /**
   * Registers `fn` to encode values of `type` under `tag`.
   * Passing `null` removes any registration for the type.
   *
   * @throws RegistryFrozenError once the registry is frozen
   * @throws RangeError if the tag is not a byte
   */
  register<T>(type: abstract new (...args: never[]) => T, tag: number, fn: ExtensionFn<T> | null): void {
    if (this.frozen) {
      throw new RegistryFrozenError(typeName(type));
    }
    if (!Number.isInteger(tag) || tag < 0 || tag > 0xff) {
      throw new RangeError(`Extension tag must be a byte, got ${tag}`);
    }

    this.byType.delete(type);
    if (fn !== null) {
      const encode = (value: unknown): Uint8Array | null => {
        if (!(value instanceof type)) {
          throw new TypeError(`Expected ${typeName(type)} instance`);
        }
        return fn(value);
      };
      this.byType.set(type, { type, tag, encode });
      log.registry("register %s as tag %d", typeName(type), tag);
    } else {
      log.registry("remove %s", typeName(type));
    }

    this.rebuild();
  }

  /**
   * Returns the registration for a constructor, if any.
   */
  lookup(type: unknown): ExtensionEntry | undefined {
    const n = this.entries.length;
    if (n === 0) {
      return undefined;
    }
    if (n < MAP_ACCESS_THRESHOLD) {
      for (let i = 0; i < n; i++) {
        if (this.entries[i].type === type) {
          return this.entries[i];
        }
      }
      return undefined;
    }
    return this.byType.get(type);
  }

  /**
   * Number of registered types.
   */
  get size(): number {
    return this.entries.length;
  }

  /**
   * Sizing of the linear view: 8 at first registration, then
   * floor(needed * 3 / 2) whenever the entries outgrow it. Reported only;
   * JavaScript arrays size themselves.
   */
  get capacity(): number {
    return this.cap;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Rejects further registrations. Called when an encoder starts using
   * the registry.
   */
  freeze(): void {
    if (!this.frozen) {
      this.frozen = true;
      log.registry("frozen with %d entries", this.entries.length);
    }
  }

  /**
   * Registered entries in registration order.
   */
  list(): readonly ExtensionEntry[] {
    return this.entries;
  }

  private rebuild(): void {
    const needed = this.byType.size;
    if (this.cap === 0) {
      this.cap = INITIAL_CAPACITY;
    }
    if (needed > this.cap) {
      this.cap = Math.floor((needed * 3) / 2);
    }
    this.entries = Array.from(this.byType.values());
  }
}
