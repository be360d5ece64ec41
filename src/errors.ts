/**
 * Error classes raised while decoding or reading BSA archives.
 */

/**
 * Base class for every archive failure.
 */
export class BsaError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'BsaError';
  }
}

/**
 * The byte source could not be read, or ended before a structure was complete.
 */
export class BsaIoError extends BsaError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'BsaIoError';
  }
}

/**
 * The archive's tables do not correspond to each other.
 */
export class BsaFormatError extends BsaError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'BsaFormatError';
  }
}

export class BsaUnsupportedVersionError extends BsaError {
  constructor(public readonly version: number) {
    super(`Unsupported BSA version ${version}; only version 104 can be decoded.`);
    this.name = 'BsaUnsupportedVersionError';
  }
}

/**
 * Name bytes that must be hashed are not valid UTF-8.
 */
export class BsaEncodingError extends BsaError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'BsaEncodingError';
  }
}
