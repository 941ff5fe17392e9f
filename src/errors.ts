export const ERR = {
  FORMAT: "FORMAT",
  BOUNDS: "BOUNDS",
  OVERFLOW_GUARD: "OVERFLOW_GUARD",
  WIRE_REFERENCE: "WIRE_REFERENCE",
  SERIALIZATION_SIZE: "SERIALIZATION_SIZE",
  PROTOCOL_SHAPE: "PROTOCOL_SHAPE",
  CONFIGURATION: "CONFIGURATION",
  VERIFICATION: "VERIFICATION",
} as const;

export type ErrorCode = (typeof ERR)[keyof typeof ERR];

export type ErrorDetails = Record<string, string | number | bigint | boolean>;

export class CheckZkpError extends Error {
  readonly code: ErrorCode;
  readonly details?: ErrorDetails;

  constructor(
    code: ErrorCode,
    message: string,
    details?: ErrorDetails,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** Bad magic, unsupported version, broken section table or truncated data */
export class FormatError extends CheckZkpError {
  constructor(message: string, details?: ErrorDetails, options?: { cause?: unknown }) {
    super(ERR.FORMAT, message, details, options);
  }
}

/** Header or witness counts that contradict each other */
export class BoundsError extends CheckZkpError {
  constructor(message: string, details?: ErrorDetails) {
    super(ERR.BOUNDS, message, details);
  }
}

/**
 * A count read from the input exceeds its configured ceiling. This almost
 * always means the reader lost sync with the container layout.
 */
export class OverflowGuardError extends CheckZkpError {
  constructor(message: string, details?: ErrorDetails) {
    super(ERR.OVERFLOW_GUARD, message, details);
  }
}

/** A term references a wire that was never allocated */
export class WireReferenceError extends CheckZkpError {
  constructor(message: string, details?: ErrorDetails) {
    super(ERR.WIRE_REFERENCE, message, details);
  }
}

export class SerializationSizeError extends CheckZkpError {
  constructor(message: string, details?: ErrorDetails) {
    super(ERR.SERIALIZATION_SIZE, message, details);
  }
}

export class ProtocolShapeError extends CheckZkpError {
  constructor(message: string, details?: ErrorDetails) {
    super(ERR.PROTOCOL_SHAPE, message, details);
  }
}

export class ConfigurationError extends CheckZkpError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ERR.CONFIGURATION, message, undefined, options);
  }
}

/** The proving backend rejected the proof it was asked to check */
export class ProofVerificationError extends CheckZkpError {
  constructor(message: string) {
    super(ERR.VERIFICATION, message);
  }
}
