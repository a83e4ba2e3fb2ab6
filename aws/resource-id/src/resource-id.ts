import { inspect } from "node:util";
import {
  ParseResult,
  ResourceIdError,
  ResourceIdErrorKind,
  parseFailure,
  parseOk,
  parseResultRead,
} from "./error";

/**
 * Storage footprint of every general format ID, whatever its prefix.
 *
 * Byte 0 holds the suffix length (8 or 17), bytes 1 to 17 the suffix,
 * zero padded. The prefix belongs to the type and is not stored.
 */
export const RESOURCE_ID_BYTE_LENGTH = 18;

/**
 * Suffix length of IDs issued before January 2016
 */
export const SHORT_SUFFIX_LENGTH = 8;

/**
 * Suffix length of IDs issued since January 2016
 */
export const LONG_SUFFIX_LENGTH = 17;

const encoder = new TextEncoder();

export function isLowerHexByte(byte: number): boolean {
  return (0x30 <= byte && byte <= 0x39) || (0x61 <= byte && byte <= 0x66);
}

function bytesCompare(a: Uint8Array, b: Uint8Array): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    if (a[i] !== b[i]) {
      return a[i] < b[i] ? -1 : 1;
    }
  }
  return a.length < b.length ? -1 : a.length > b.length ? 1 : 0;
}

function textCompare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function regExpEscape(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export type ResourceIdJsonSchema = {
  description: string;
  pattern: string;
  title: string;
  type: "string";
};

/**
 * Configuration and constructors of one concrete ID type, e.g. `vpc-` IDs.
 */
export interface ResourceIdType<
  N extends string = string,
  P extends string = string,
> {
  readonly description: string;
  readonly jsonSchema: ResourceIdJsonSchema;
  readonly name: N;
  readonly prefix: P;
  /** Total lengths accepted, short then long */
  readonly validLengths: readonly [number, number];
  fromJSON(value: unknown): ResourceId<N, P>;
  is(value: unknown): value is ResourceId<N, P>;
  /**
   * Validate input, checking length, then prefix, then suffix characters.
   * The first failing check decides the error.
   */
  parse(input: string): ParseResult<ResourceId<N, P>>;
  /**
   * Like {@link parse}, throwing the error
   */
  read(input: string): ResourceId<N, P>;
  /**
   * Restore storage returned by {@link ResourceId.toBytes}, checking the
   * suffix length, the suffix characters and the zero padding.
   */
  readBytes(bytes: Uint8Array): ResourceId<N, P>;
  /**
   * Skip validation. `bytes` must be storage previously returned by
   * {@link ResourceId.toBytes} for this type.
   */
  unsafeFromBytes(bytes: Uint8Array): ResourceId<N, P>;
  /**
   * Skip validation. `input` must be a text this type would parse.
   */
  unsafeFromString(input: string): ResourceId<N, P>;
}

const construct: unique symbol = Symbol("ResourceId");

export type ResourceIdOf<T> =
  T extends ResourceIdType<infer N, infer P> ? ResourceId<N, P> : never;

/**
 * Validated AWS resource ID in the general format, `<prefix><suffix>`.
 * Values are created through their {@link ResourceIdType}.
 */
export class ResourceId<
  N extends string = string,
  P extends string = string,
> {
  readonly typeName: N;
  readonly prefix: P;

  constructor(
    private readonly type: ResourceIdType<N, P>,
    private readonly storage: Uint8Array,
    token: typeof construct,
  ) {
    if (token !== construct) {
      throw new TypeError("ResourceId values are created by their type");
    }
    this.typeName = type.name;
    this.prefix = type.prefix;
  }

  get suffixLength(): number {
    return this.storage[0];
  }

  asText(): string {
    return this.prefix + this.suffix();
  }

  compare(other: ResourceId): number {
    if (this.prefix !== other.prefix) {
      return textCompare(this.asText(), other.asText());
    }
    return (
      bytesCompare(this.suffixBytes(), other.suffixBytes()) ||
      textCompare(this.typeName, other.typeName)
    );
  }

  copy(): ResourceId<N, P> {
    return new ResourceId(this.type, this.storage.slice(), construct);
  }

  equals(other: ResourceId): boolean {
    if (this.typeName !== other.typeName || this.prefix !== other.prefix) {
      return false;
    }
    const otherStorage = other.storage;
    return this.storage.every((byte, i) => byte === otherStorage[i]);
  }

  suffix(): string {
    return String.fromCharCode(...this.suffixBytes());
  }

  toBytes(): Uint8Array {
    return this.storage.slice();
  }

  toJSON(): string {
    return this.asText();
  }

  toString(): string {
    return this.asText();
  }

  [inspect.custom](): string {
    return `${this.typeName}(${JSON.stringify(this.asText())})`;
  }

  private suffixBytes(): Uint8Array {
    return this.storage.subarray(1, 1 + this.storage[0]);
  }
}

export function resourceIdCompare(a: ResourceId, b: ResourceId): number {
  return a.compare(b);
}

/**
 * Define a concrete ID type by its required prefix.
 */
export function resourceIdType<N extends string, P extends string>(
  name: N,
  prefix: P,
  description: string,
): ResourceIdType<N, P> {
  const prefixBytes = encoder.encode(prefix);
  const validLengths: [number, number] = [
    prefixBytes.length + SHORT_SUFFIX_LENGTH,
    prefixBytes.length + LONG_SUFFIX_LENGTH,
  ];

  function storageWrite(bytes: Uint8Array): Uint8Array {
    const suffix = bytes.subarray(
      prefixBytes.length,
      prefixBytes.length + LONG_SUFFIX_LENGTH,
    );
    const storage = new Uint8Array(RESOURCE_ID_BYTE_LENGTH);
    storage[0] = suffix.length;
    storage.set(suffix, 1);
    return storage;
  }

  const type: ResourceIdType<N, P> = {
    description,
    jsonSchema: {
      description,
      pattern: `^${regExpEscape(prefix)}(?:[0-9a-f]{${SHORT_SUFFIX_LENGTH}}|[0-9a-f]{${LONG_SUFFIX_LENGTH}})$`,
      title: name,
      type: "string",
    },
    name,
    prefix,
    validLengths,
    fromJSON(value) {
      if (typeof value !== "string") {
        throw new ResourceIdError(name, String(value), {
          kind: ResourceIdErrorKind.NOT_A_STRING,
          actualType: value === null ? "null" : typeof value,
        });
      }
      return type.read(value);
    },
    is(value): value is ResourceId<N, P> {
      return (
        value instanceof ResourceId &&
        value.typeName === name &&
        value.prefix === prefix
      );
    },
    parse(input) {
      const bytes = encoder.encode(input);
      if (!validLengths.includes(bytes.length)) {
        return parseFailure(name, input, {
          kind: ResourceIdErrorKind.LENGTH_MISMATCH,
          length: bytes.length,
          validLengths,
        });
      }
      for (let i = 0; i < prefixBytes.length; i++) {
        if (bytes[i] !== prefixBytes[i]) {
          return parseFailure(name, input, {
            kind: ResourceIdErrorKind.PREFIX_MISMATCH,
            prefix,
          });
        }
      }
      for (let i = prefixBytes.length; i < bytes.length; i++) {
        if (!isLowerHexByte(bytes[i])) {
          return parseFailure(name, input, {
            kind: ResourceIdErrorKind.INVALID_SUFFIX_CHAR,
            byte: bytes[i],
            position: i,
          });
        }
      }
      return parseOk(new ResourceId(type, storageWrite(bytes), construct));
    },
    read(input) {
      return parseResultRead(type.parse(input));
    },
    readBytes(bytes) {
      if (bytes.length !== RESOURCE_ID_BYTE_LENGTH) {
        throw new Error(
          `Expected ${RESOURCE_ID_BYTE_LENGTH} bytes for ${name}, not ${bytes.length}`,
        );
      }
      const suffixLength = bytes[0];
      if (
        suffixLength !== SHORT_SUFFIX_LENGTH &&
        suffixLength !== LONG_SUFFIX_LENGTH
      ) {
        throw new Error(`Invalid suffix length for ${name}: ${suffixLength}`);
      }
      const suffix = bytes.subarray(1, 1 + suffixLength);
      const invalid = suffix.findIndex((byte) => !isLowerHexByte(byte));
      if (invalid !== -1) {
        throw new ResourceIdError(
          name,
          prefix + String.fromCharCode(...suffix),
          {
            kind: ResourceIdErrorKind.INVALID_SUFFIX_CHAR,
            byte: suffix[invalid],
            position: prefixBytes.length + invalid,
          },
        );
      }
      const padding = bytes.findIndex(
        (byte, i) => i > suffixLength && byte !== 0,
      );
      if (padding !== -1) {
        throw new Error(`Invalid padding for ${name} at byte ${padding}`);
      }
      return new ResourceId(type, bytes.slice(), construct);
    },
    unsafeFromBytes(bytes) {
      const storage = new Uint8Array(RESOURCE_ID_BYTE_LENGTH);
      storage.set(bytes.subarray(0, RESOURCE_ID_BYTE_LENGTH));
      return new ResourceId(type, storage, construct);
    },
    unsafeFromString(input) {
      return new ResourceId(
        type,
        storageWrite(encoder.encode(input)),
        construct,
      );
    },
  };
  return Object.freeze(type);
}
