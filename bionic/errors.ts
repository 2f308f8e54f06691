export enum BionicErrorType {
  INVALID_PACKAGE = "INVALID_PACKAGE",
  INVALID_OPTIONS = "INVALID_OPTIONS",
  UNSUPPORTED_ENCODING = "UNSUPPORTED_ENCODING",
  ABORTED = "ABORTED",
}

export class BionicError extends Error {
  constructor(public type: BionicErrorType, message: string) {
    super(message);
    this.name = "BionicError";
  }
}

export class InvalidPackageError extends BionicError {
  constructor(message: string) {
    super(BionicErrorType.INVALID_PACKAGE, message);
    this.name = "InvalidPackageError";
  }
}

export class InvalidOptionsError extends BionicError {
  constructor(message: string) {
    super(BionicErrorType.INVALID_OPTIONS, message);
    this.name = "InvalidOptionsError";
  }
}

export class UnsupportedEncodingError extends BionicError {
  constructor(public encoding: string, message: string) {
    super(BionicErrorType.UNSUPPORTED_ENCODING, message);
    this.name = "UnsupportedEncodingError";
  }
}

export class ConversionAbortedError extends BionicError {
  constructor(message: string) {
    super(BionicErrorType.ABORTED, message);
    this.name = "ConversionAbortedError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
