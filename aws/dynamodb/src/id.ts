import {
  AwsRegionId,
  ResourceId,
  ResourceIdType,
  regionIdRead,
  regionIdText,
  resourceIdCompare,
} from "@awsid/resource-id";
import {
  AttributeCodec,
  bufferAttributeCodec,
  mappedAttributeCodec,
  stringAttributeCodec,
  stringSetAttributeCodec,
} from "./attribute";

/**
 * ID stored as its text
 */
export function resourceIdAttributeCodec<N extends string, P extends string>(
  type: ResourceIdType<N, P>,
): AttributeCodec<ResourceId<N, P>> {
  return mappedAttributeCodec(
    stringAttributeCodec,
    (value) => type.read(value),
    (id) => id.asText(),
  );
}

/**
 * ID stored as its fixed-size storage, validated on read
 */
export function resourceIdBinaryAttributeCodec<
  N extends string,
  P extends string,
>(type: ResourceIdType<N, P>): AttributeCodec<ResourceId<N, P>> {
  return mappedAttributeCodec(
    bufferAttributeCodec,
    (bytes) => type.readBytes(bytes),
    (id) => id.toBytes(),
  );
}

/**
 * IDs stored as a string set, written in ID order
 */
export function resourceIdSetAttributeCodec<N extends string, P extends string>(
  type: ResourceIdType<N, P>,
): AttributeCodec<ResourceId<N, P>[]> {
  return mappedAttributeCodec(
    stringSetAttributeCodec,
    (values) => Array.from(values, (value) => type.read(value)),
    (ids) => new Set([...ids].sort(resourceIdCompare).map(String)),
  );
}

export const regionIdAttributeCodec: AttributeCodec<AwsRegionId> =
  mappedAttributeCodec(stringAttributeCodec, regionIdRead, regionIdText);
