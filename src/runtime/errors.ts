// src/runtime/errors.ts
// Errors raised by generated decode code

function hex(id: number): string {
  return `0x${(id >>> 0).toString(16).padStart(8, "0")}`;
}

/**
 * A constructor id that the expected type does not know. Signals that the
 * peer speaks a newer layer than this build; callers may recover from it.
 * The reader is left positioned on the id.
 */
export class UnknownConstructorError extends Error {
  constructor(
    public readonly constructorId: number,
    public readonly expected: string,
    public readonly offset: number
  ) {
    super(`UnknownConstructorError: ${hex(constructorId)} is not a known constructor of ${expected} (offset ${offset})`);
    this.name = "UnknownConstructorError";
  }
}

/** The buffer ended before a value was complete. */
export class WireUnderflowError extends RangeError {
  constructor(
    public readonly needed: number,
    public readonly offset: number,
    public readonly available: number
  ) {
    super(`Buffer too small: need ${needed} bytes at offset ${offset}, ${available} available`);
    this.name = "WireUnderflowError";
  }
}

/** Bytes that cannot be a valid encoding of the requested value. */
export class WireFormatError extends Error {
  constructor(message: string, public readonly offset: number) {
    super(`WireFormatError: ${message} (offset ${offset})`);
    this.name = "WireFormatError";
  }
}
