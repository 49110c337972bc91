/**
 * Base error class for shapecodec errors.
 */
export class CodecError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CodecError";
  }
}

/**
 * Error thrown when encoding fails.
 */
export class EncodeError extends CodecError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EncodeError";
  }
}

/**
 * Error thrown when a value's kind has no defined encoding.
 */
export class UnsupportedKindError extends EncodeError {
  readonly kind: string;

  constructor(kind: string, value: string) {
    super(`Unsupported kind: ${kind}, for: ${value}`);
    this.name = "UnsupportedKindError";
    this.kind = kind;
  }
}

/**
 * Error thrown when a registered extension function fails.
 * The original error is available as `cause`.
 */
export class ExtensionError extends EncodeError {
  readonly tag: number;

  constructor(tag: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Extension (tag ${tag}) failed: ${reason}`, { cause });
    this.name = "ExtensionError";
    this.tag = tag;
  }
}

/**
 * Error thrown when a sink accepts fewer bytes than it was given.
 */
export class ShortWriteError extends EncodeError {
  readonly expected: number;
  readonly written: number;

  constructor(expected: number, written: number) {
    super(`Incorrect num bytes written: expected ${expected}, wrote ${written}`);
    this.name = "ShortWriteError";
    this.expected = expected;
    this.written = written;
  }
}

/**
 * Error thrown when an extension registry is changed after it was frozen.
 */
export class RegistryFrozenError extends CodecError {
  constructor(typeName: string) {
    super(`Extension registry is frozen: cannot register ${typeName}`);
    this.name = "RegistryFrozenError";
  }
}

/**
 * Error thrown when a struct definition is invalid.
 */
export class StructDefinitionError extends CodecError {
  constructor(typeName: string, message: string) {
    super(`Invalid struct definition for ${typeName}: ${message}`);
    this.name = "StructDefinitionError";
  }
}
