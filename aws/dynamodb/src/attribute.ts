import { AttributeValue } from "@aws-sdk/client-dynamodb";

export interface AttributeCodec<T> {
  read(attribute: AttributeValue): T;
  write(value: T): AttributeValue;
}

export const bufferAttributeCodec: AttributeCodec<Uint8Array> = {
  read(attribute) {
    if (attribute.B === undefined) {
      throw new Error("Expected binary");
    }
    return attribute.B;
  },
  write(value) {
    return { B: value };
  },
};

export const stringAttributeCodec: AttributeCodec<string> = {
  read(attribute: AttributeValue) {
    if (attribute.S === undefined) {
      throw new Error("Expected string");
    }
    return attribute.S;
  },
  write(value: string) {
    return { S: value };
  },
};

export const stringSetAttributeCodec: AttributeCodec<Set<string>> = {
  read(attribute: AttributeValue) {
    if (attribute.NULL) {
      return new Set();
    }
    if (attribute.SS === undefined) {
      throw new Error("Expected string set");
    }
    return new Set(attribute.SS);
  },
  write(value: Set<string>) {
    if (!value.size) {
      return { NULL: true };
    }
    return { SS: [...value] };
  },
};

/**
 * Codec for a value stored through another codec
 */
export function mappedAttributeCodec<T, U>(
  codec: AttributeCodec<T>,
  read: (value: T) => U,
  write: (value: U) => T,
): AttributeCodec<U> {
  return {
    read(attribute) {
      return read(codec.read(attribute));
    },
    write(value) {
      return codec.write(write(value));
    },
  };
}
