import { StructDefinitionError } from "./errors";
import { log } from "./logging";
import type { TypeKey } from "./registry";
import { constructorOf } from "./types";

/**
 * Describes one encodable field of a struct type.
 *
 * A field is read either from a property of the value (`index`) or, for
 * fields embedded in a nested object, by following a property path.
 */
export type FieldDescriptor =
  | {
      readonly encName: string;
      readonly omitEmpty: boolean;
      readonly index: string;
      readonly path?: undefined;
    }
  | {
      readonly encName: string;
      readonly omitEmpty: boolean;
      readonly path: readonly string[];
      readonly index?: undefined;
    };

/**
 * Field declaration accepted by `defineStruct`.
 */
export interface FieldOptions {
  /** Property holding the value. */
  key?: string;
  /** Property path into nested objects, for embedded fields. */
  path?: readonly string[];
  /** Key written to the output. Defaults to the property name. */
  name?: string;
  /** Leave the field out when its value is empty. */
  omitEmpty?: boolean;
}

export type FieldSpec<T> = (keyof T & string) | FieldOptions;

function describeField(typeName: string, spec: string | FieldOptions): FieldDescriptor {
  if (typeof spec === "string") {
    return { encName: spec, omitEmpty: false, index: spec };
  }
  const omitEmpty = spec.omitEmpty ?? false;
  if (spec.key !== undefined && spec.path !== undefined) {
    throw new StructDefinitionError(typeName, "a field takes either key or path, not both");
  }
  if (spec.path !== undefined) {
    if (spec.path.length === 0) {
      throw new StructDefinitionError(typeName, "field path is empty");
    }
    const path = Object.freeze([...spec.path]);
    return { encName: spec.name ?? path[path.length - 1], omitEmpty, path };
  }
  if (spec.key !== undefined) {
    return { encName: spec.name ?? spec.key, omitEmpty, index: spec.key };
  }
  throw new StructDefinitionError(typeName, "field needs a key or a path");
}

/**
 * Reads the value a descriptor points at. A missing link along a path
 * reads as undefined.
 */
export function resolveField(value: object, field: FieldDescriptor): unknown {
  if (field.path === undefined) {
    return Reflect.get(value, field.index);
  }
  let current: unknown = value;
  for (const key of field.path) {
    if (typeof current !== "object" || current === null) {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current;
}

/**
 * StructRegistry holds the field layout of struct types.
 *
 * Layouts are computed once per class and shared by every encode of that
 * class. Instances of classes without a layout expose their own
 * enumerable properties, in property order.
 */
export class StructRegistry {
  private layouts: Map<unknown, readonly FieldDescriptor[]> = new Map();

  /**
   * Declares the encoded fields of a class, in output order.
   *
   * @throws StructDefinitionError on duplicate output keys or malformed fields
   */
  define<T>(
    type: abstract new (...args: never[]) => T,
    fields: readonly FieldSpec<T>[]
  ): readonly FieldDescriptor[] {
    const typeName = type.name || "<anonymous>";
    const seen = new Set<string>();
    const descriptors = fields.map((spec) => {
      const fd = describeField(typeName, spec);
      if (seen.has(fd.encName)) {
        throw new StructDefinitionError(typeName, `duplicate field key "${fd.encName}"`);
      }
      seen.add(fd.encName);
      return Object.freeze(fd);
    });

    const layout = Object.freeze(descriptors);
    this.layouts.set(type, layout);
    log.fields("define %s: %d fields", typeName, layout.length);
    return layout;
  }

  /**
   * Returns the field layout for a struct value.
   */
  fieldsOf(value: object): readonly FieldDescriptor[] {
    const layout = this.layouts.get(constructorOf(value));
    if (layout !== undefined) {
      return layout;
    }
    return Object.keys(value).map((key) => ({ encName: key, omitEmpty: false, index: key }));
  }

  /**
   * Checks if a class has a declared layout.
   */
  isDefined(type: TypeKey): boolean {
    return this.layouts.has(type);
  }

  /**
   * Clears all layouts.
   */
  clear(): void {
    this.layouts.clear();
  }
}

/**
 * Global default struct registry instance.
 */
export const defaultStructs = new StructRegistry();

/**
 * Declares a struct layout in the default registry.
 *
 * @example
 * ```typescript
 * class User {
 *   constructor(public id: number, public nick = "") {}
 * }
 * defineStruct(User, ["id", { key: "nick", name: "n", omitEmpty: true }]);
 * ```
 */
export function defineStruct<T>(
  type: abstract new (...args: never[]) => T,
  fields: readonly FieldSpec<T>[]
): readonly FieldDescriptor[] {
  return defaultStructs.define(type, fields);
}
