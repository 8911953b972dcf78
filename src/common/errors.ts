export const DecodeErrorCode = {
  TruncatedHeader: "TruncatedHeader",
  UnsupportedLongFormTag: "UnsupportedLongFormTag",
  IndefiniteLengthUnsupported: "IndefiniteLengthUnsupported",
  TruncatedLength: "TruncatedLength",
  LengthOverflow: "LengthOverflow",
  TruncatedContent: "TruncatedContent",
  RecursionLimitExceeded: "RecursionLimitExceeded",
  TooManyElements: "TooManyElements",
  MalformedOid: "MalformedOid",
} as const;
export type DecodeErrorCode =
  (typeof DecodeErrorCode)[keyof typeof DecodeErrorCode];

/**
 * Raised when bytes cannot be decoded as a TLV structure.
 * Always local to the element or region being decoded.
 */
export class TLVDecodeError extends Error {
  public readonly code: DecodeErrorCode;
  public readonly offset: number;
  public readonly depth: number;

  constructor(
    code: DecodeErrorCode,
    message: string,
    location: { offset?: number; depth?: number } = {},
  ) {
    super(message);
    this.name = "TLVDecodeError";
    this.code = code;
    this.offset = location.offset ?? 0;
    this.depth = location.depth ?? 0;
  }
}

export const LocatorErrorCode = {
  NoSignatureFound: "NoSignatureFound",
} as const;
export type LocatorErrorCode =
  (typeof LocatorErrorCode)[keyof typeof LocatorErrorCode];

export class LocatorError extends Error {
  public readonly code: LocatorErrorCode;
  public readonly candidates: number;

  constructor(code: LocatorErrorCode, message: string, candidates = 0) {
    super(message);
    this.name = "LocatorError";
    this.code = code;
    this.candidates = candidates;
  }
}

export const IOErrorCode = {
  FileTooSmall: "FileTooSmall",
  ReadFailed: "ReadFailed",
  WriteFailed: "WriteFailed",
} as const;
export type IOErrorCode = (typeof IOErrorCode)[keyof typeof IOErrorCode];

export class IOError extends Error {
  public readonly code: IOErrorCode;
  public readonly path: string;

  constructor(code: IOErrorCode, message: string, path: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "IOError";
    this.code = code;
    this.path = path;
  }
}

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: TLVDecodeError };

/**
 * Runs a throwing decoder and turns a TLVDecodeError into a failed result.
 * Any other error is a bug and propagates.
 */
export function captureDecode<T>(fn: () => T): DecodeResult<T> {
  try {
    return { ok: true, value: fn() };
  } catch (e) {
    if (e instanceof TLVDecodeError) {
      return { ok: false, error: e };
    }
    throw e;
  }
}
