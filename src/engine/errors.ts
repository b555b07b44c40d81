export class EngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed or out-of-range address text. */
export class AddressParseError extends EngineError {}

/** Advancing an address ran past the end of its space. */
export class AddressOverflowError extends EngineError {}

/** Unknown or malformed data type text. */
export class TypeParseError extends EngineError {}

export class InvalidNameError extends EngineError {}

/** A new code unit would overlap an existing instruction or data unit. */
export class DataConflictError extends EngineError {}

/** A program snapshot file is unreadable or fails validation. */
export class SnapshotError extends EngineError {}
