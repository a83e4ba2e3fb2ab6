import { inspect } from "node:util";
import { ResourceIdError, ResourceIdErrorKind } from "./error";
import {
  RESOURCE_ID_BYTE_LENGTH,
  ResourceId,
  resourceIdCompare,
  resourceIdType,
} from "./resource-id";

const VpcId = resourceIdType("VpcId", "vpc-", "VPC ID");
const VpnId = resourceIdType("VpnId", "vpn-", "VPN ID");
const AttachmentId = resourceIdType(
  "AttachmentId",
  "tgw-attach-",
  "Attachment ID",
);

function vpc(input: string) {
  return VpcId.read(input);
}

function parseError(input: string) {
  const result = VpcId.parse(input);
  if (result.ok) {
    throw new Error(`Expected ${input} to be rejected`);
  }
  return result.error;
}

describe("parse", () => {
  it("should accept an 8 character suffix", () => {
    const result = VpcId.parse("vpc-12345678");
    expect(result.ok).toBe(true);
    expect(result.ok && result.value.asText()).toBe("vpc-12345678");
  });

  it("should accept a 17 character suffix", () => {
    const result = VpcId.parse("vpc-1234567890abcdef1");
    expect(result.ok && result.value.asText()).toBe("vpc-1234567890abcdef1");
  });

  it("should reject a 7 character suffix by length", () => {
    const error = parseError("vpc-1234567");
    expect(error.detail).toEqual({
      kind: ResourceIdErrorKind.LENGTH_MISMATCH,
      length: 11,
      validLengths: [12, 21],
    });
  });

  it("should reject any length other than prefix plus 8 or 17", () => {
    for (const length of [0, 4, 5, 11, 13, 20, 22, 40]) {
      const input = "vpc-".concat("a".repeat(40)).slice(0, length);
      expect(parseError(input).kind).toBe(ResourceIdErrorKind.LENGTH_MISMATCH);
    }
  });

  it("should check length before prefix", () => {
    // sg-12345678 against vpc- has both a wrong prefix and a wrong length
    // (11 bytes, not 12 or 21); the length check runs first, so this is a
    // LengthMismatch rather than a PrefixMismatch
    expect(parseError("sg-12345678").kind).toBe(
      ResourceIdErrorKind.LENGTH_MISMATCH,
    );
  });

  it("should reject a different prefix of the same length", () => {
    expect(parseError("vpn-12345678").detail).toEqual({
      kind: ResourceIdErrorKind.PREFIX_MISMATCH,
      prefix: "vpc-",
    });
    expect(parseError("sg-123456789").kind).toBe(
      ResourceIdErrorKind.PREFIX_MISMATCH,
    );
  });

  it("should compare the prefix case-sensitively", () => {
    expect(parseError("VPC-12345678").kind).toBe(
      ResourceIdErrorKind.PREFIX_MISMATCH,
    );
  });

  it("should check prefix before suffix characters", () => {
    expect(parseError("vpn-1234567G").kind).toBe(
      ResourceIdErrorKind.PREFIX_MISMATCH,
    );
  });

  it("should report the offending suffix character and position", () => {
    expect(parseError("vpc-1234567G").detail).toEqual({
      kind: ResourceIdErrorKind.INVALID_SUFFIX_CHAR,
      byte: 0x47,
      position: 11,
    });
  });

  it("should report the first invalid suffix character", () => {
    expect(parseError("vpc-12g45h78").detail).toEqual({
      kind: ResourceIdErrorKind.INVALID_SUFFIX_CHAR,
      byte: 0x67,
      position: 6,
    });
  });

  it("should reject uppercase hex and non-hex letters", () => {
    expect(parseError("vpc-1234567A").kind).toBe(
      ResourceIdErrorKind.INVALID_SUFFIX_CHAR,
    );
    expect(parseError("vpc-1234567g").kind).toBe(
      ResourceIdErrorKind.INVALID_SUFFIX_CHAR,
    );
    expect(parseError("vpc-1234-678").kind).toBe(
      ResourceIdErrorKind.INVALID_SUFFIX_CHAR,
    );
  });

  it("should measure length in UTF-8 bytes", () => {
    // "é" is 2 bytes, so 7 characters of suffix fill 8 bytes
    expect(parseError("vpc-123456é").detail).toEqual({
      kind: ResourceIdErrorKind.INVALID_SUFFIX_CHAR,
      byte: 0xc3,
      position: 10,
    });
  });

  it("should accept multi-segment prefixes", () => {
    expect(AttachmentId.read("tgw-attach-0123abcd").suffix()).toBe(
      "0123abcd",
    );
    expect(AttachmentId.validLengths).toEqual([19, 28]);
  });
});

describe("read", () => {
  it("should throw the parse error", () => {
    expect(() => vpc("vpc-1234567")).toThrow(ResourceIdError);
    expect(() => vpc("vpc-1234567")).toThrow(
      'failed to initialize VpcId from "vpc-1234567": expected 12 or 21 bytes, not 11',
    );
  });

  it("should describe prefix errors", () => {
    expect(() => vpc("vpn-12345678")).toThrow(
      'failed to initialize VpcId from "vpn-12345678": incorrect prefix, expected "vpc-"',
    );
  });

  it("should describe suffix errors", () => {
    expect(() => vpc("vpc-1234567G")).toThrow(
      'failed to initialize VpcId from "vpc-1234567G": invalid character "G" at position 11, the unique part must be lowercase hexadecimal',
    );
    expect(() => vpc("vpc-123456é")).toThrow(
      'failed to initialize VpcId from "vpc-123456é": invalid byte 0xc3 at position 10, the unique part must be lowercase hexadecimal',
    );
  });
});

describe("ResourceId", () => {
  it("should round-trip text", () => {
    for (const input of ["vpc-0123abcd", "vpc-0123456789abcdef0"]) {
      const id = vpc(input);
      expect(id.asText()).toBe(input);
      expect(id.toString()).toBe(input);
      expect(`${id}`).toBe(input);
      expect(vpc(id.asText()).equals(id)).toBe(true);
    }
  });

  it("should expose prefix and suffix", () => {
    const id = vpc("vpc-0123456789abcdef0");
    expect(id.prefix).toBe("vpc-");
    expect(id.typeName).toBe("VpcId");
    expect(id.suffix()).toBe("0123456789abcdef0");
    expect(id.suffixLength).toBe(17);
  });

  it("should compare equal by bytes", () => {
    expect(vpc("vpc-12345678").equals(vpc("vpc-12345678"))).toBe(true);
    expect(vpc("vpc-12345678").equals(vpc("vpc-12345679"))).toBe(false);
    expect(vpc("vpc-12345678").equals(VpnId.read("vpn-12345678"))).toBe(false);
  });

  it("should order like its text", () => {
    const inputs = [
      "vpc-ffffffff",
      "vpc-00000000000000000",
      "vpc-12345678",
      "vpc-1234567800000000a",
      "vpc-0000000f",
      "vpc-9abcdef0",
    ];
    const sorted = inputs.map(vpc).sort(resourceIdCompare);
    expect(sorted.map(String)).toEqual([...inputs].sort());
    expect(sorted.map(String)).toEqual([
      "vpc-00000000000000000",
      "vpc-0000000f",
      "vpc-12345678",
      "vpc-1234567800000000a",
      "vpc-9abcdef0",
      "vpc-ffffffff",
    ]);
  });

  it("should be a strict order", () => {
    const a = vpc("vpc-12345678");
    const b = vpc("vpc-1234567800000000a");
    expect(a.compare(b)).toBe(-1);
    expect(b.compare(a)).toBe(1);
    expect(a.compare(a.copy())).toBe(0);
  });

  it("should order different types by text", () => {
    expect(vpc("vpc-12345678").compare(VpnId.read("vpn-00000000"))).toBe(-1);
  });

  it("should order types sharing a prefix by type name", () => {
    const OtherVpcId = resourceIdType("OtherVpcId", "vpc-", "Other VPC ID");
    const id = vpc("vpc-12345678");
    const other = OtherVpcId.read("vpc-12345678");
    expect(id.equals(other)).toBe(false);
    expect(other.compare(id)).toBe(-1);
    expect(id.compare(other)).toBe(1);
  });

  it("should occupy 18 bytes for any prefix", () => {
    expect(vpc("vpc-12345678").toBytes()).toHaveLength(RESOURCE_ID_BYTE_LENGTH);
    expect(
      AttachmentId.read("tgw-attach-0123456789abcdef0").toBytes(),
    ).toHaveLength(RESOURCE_ID_BYTE_LENGTH);
  });

  it("should lay out length then suffix", () => {
    expect(Array.from(vpc("vpc-0123abcd").toBytes())).toEqual([
      8, 0x30, 0x31, 0x32, 0x33, 0x61, 0x62, 0x63, 0x64, 0, 0, 0, 0, 0, 0, 0,
      0, 0,
    ]);
  });

  it("should not share storage between copies", () => {
    const id = vpc("vpc-12345678");
    const bytes = id.toBytes();
    bytes[1] = 0x66;
    expect(id.asText()).toBe("vpc-12345678");
    const copy = id.copy();
    expect(copy).not.toBe(id);
    expect(copy.equals(id)).toBe(true);
  });

  it("should serialize to a JSON string", () => {
    expect(JSON.stringify({ vpc: vpc("vpc-12345678") })).toBe(
      '{"vpc":"vpc-12345678"}',
    );
  });

  it("should inspect with its type name", () => {
    expect(inspect(vpc("vpc-12345678"))).toBe('VpcId("vpc-12345678")');
  });
});

describe("ResourceIdType", () => {
  it("should construct values only through the type", () => {
    expect(() =>
      Reflect.construct(ResourceId, [VpcId, new Uint8Array(18)]),
    ).toThrow("ResourceId values are created by their type");
  });

  it("should copy the bytes it restores", () => {
    const bytes = vpc("vpc-0123abcd").toBytes();
    const id = VpcId.unsafeFromBytes(bytes);
    const checked = VpcId.readBytes(bytes);
    bytes[1] = 0x66;
    expect(id.asText()).toBe("vpc-0123abcd");
    expect(checked.asText()).toBe("vpc-0123abcd");
  });

  it("should validate bytes it reads", () => {
    const id = vpc("vpc-0123456789abcdef0");
    expect(VpcId.readBytes(id.toBytes()).equals(id)).toBe(true);
    expect(() => VpcId.readBytes(new Uint8Array(18))).toThrow(
      "Invalid suffix length for VpcId: 0",
    );
    const upper = id.toBytes();
    upper[17] = 0x41;
    expect(() => VpcId.readBytes(upper)).toThrow(
      'failed to initialize VpcId from "vpc-0123456789abcdefA": invalid character "A" at position 20, the unique part must be lowercase hexadecimal',
    );
  });

  it("should deserialize JSON values", () => {
    const { vpc: id } = JSON.parse('{"vpc":"vpc-12345678"}');
    expect(VpcId.fromJSON(id).asText()).toBe("vpc-12345678");
  });

  it("should reject non-string JSON values", () => {
    expect(() => VpcId.fromJSON(12345678)).toThrow(
      'failed to initialize VpcId from "12345678": expected a string, not number',
    );
    expect(() => VpcId.fromJSON(null)).toThrow("expected a string, not null");
  });

  it("should recognize its own instances", () => {
    expect(VpcId.is(vpc("vpc-12345678"))).toBe(true);
    expect(VpcId.is(VpnId.read("vpn-12345678"))).toBe(false);
    expect(VpcId.is("vpc-12345678")).toBe(false);
  });

  it("should skip validation for trusted text", () => {
    const id = VpcId.unsafeFromString("vpc-0123456789abcdef0");
    expect(id).toBeInstanceOf(ResourceId);
    expect(id.equals(vpc("vpc-0123456789abcdef0"))).toBe(true);
  });

  it("should restore trusted bytes", () => {
    const id = vpc("vpc-0123456789abcdef0");
    const restored = VpcId.unsafeFromBytes(id.toBytes());
    expect(restored.equals(id)).toBe(true);
    expect(restored.asText()).toBe("vpc-0123456789abcdef0");
  });

  it("should describe itself as JSON schema", () => {
    expect(VpcId.jsonSchema).toEqual({
      description: "VPC ID",
      pattern: "^vpc-(?:[0-9a-f]{8}|[0-9a-f]{17})$",
      title: "VpcId",
      type: "string",
    });
  });
});
