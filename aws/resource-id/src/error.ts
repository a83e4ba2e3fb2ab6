export enum ResourceIdErrorKind {
  INVALID_SUFFIX_CHAR = "InvalidSuffixChar",
  LENGTH_MISMATCH = "LengthMismatch",
  NOT_A_STRING = "NotAString",
  PREFIX_MISMATCH = "PrefixMismatch",
  UNKNOWN_CODE = "UnknownCode",
}

export type ResourceIdErrorDetail =
  | {
      kind: ResourceIdErrorKind.INVALID_SUFFIX_CHAR;
      /** Offending byte of the UTF-8 encoded input */
      byte: number;
      /** Byte offset into the input */
      position: number;
    }
  | {
      kind: ResourceIdErrorKind.LENGTH_MISMATCH;
      length: number;
      validLengths: readonly number[];
    }
  | { kind: ResourceIdErrorKind.NOT_A_STRING; actualType: string }
  | { kind: ResourceIdErrorKind.PREFIX_MISMATCH; prefix: string }
  | { kind: ResourceIdErrorKind.UNKNOWN_CODE };

export function resourceIdErrorDetailMessage(
  detail: ResourceIdErrorDetail,
): string {
  switch (detail.kind) {
    case ResourceIdErrorKind.INVALID_SUFFIX_CHAR: {
      const printable = 0x20 <= detail.byte && detail.byte < 0x7f;
      const what = printable
        ? `character ${JSON.stringify(String.fromCharCode(detail.byte))}`
        : `byte 0x${detail.byte.toString(16).padStart(2, "0")}`;
      return `invalid ${what} at position ${detail.position}, the unique part must be lowercase hexadecimal`;
    }
    case ResourceIdErrorKind.LENGTH_MISMATCH:
      return `expected ${detail.validLengths.join(" or ")} bytes, not ${detail.length}`;
    case ResourceIdErrorKind.NOT_A_STRING:
      return `expected a string, not ${detail.actualType}`;
    case ResourceIdErrorKind.PREFIX_MISMATCH:
      return `incorrect prefix, expected ${JSON.stringify(detail.prefix)}`;
    case ResourceIdErrorKind.UNKNOWN_CODE:
      return "unknown code";
  }
}

/**
 * Failure to initialize an identifier from text.
 */
export class ResourceIdError extends Error {
  constructor(
    readonly targetType: string,
    readonly input: string,
    readonly detail: ResourceIdErrorDetail,
  ) {
    super(
      `failed to initialize ${targetType} from ${JSON.stringify(input)}: ${resourceIdErrorDetailMessage(detail)}`,
    );
    this.name = "ResourceIdError";
  }

  get kind(): ResourceIdErrorKind {
    return this.detail.kind;
  }
}

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ResourceIdError };

export function parseOk<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function parseFailure(
  targetType: string,
  input: string,
  detail: ResourceIdErrorDetail,
): { ok: false; error: ResourceIdError } {
  return { ok: false, error: new ResourceIdError(targetType, input, detail) };
}

/**
 * Value of a successful parse, or throw its error
 */
export function parseResultRead<T>(result: ParseResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
