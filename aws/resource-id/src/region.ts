import {
  ParseResult,
  ResourceIdError,
  ResourceIdErrorKind,
  parseFailure,
  parseOk,
  parseResultRead,
} from "./error";

/**
 * AWS region, valued by its code so it serializes as the code.
 *
 * Members are declared in code order; a region's tag is its position.
 */
export enum AwsRegionId {
  AF_SOUTH_1 = "af-south-1",
  AP_EAST_1 = "ap-east-1",
  AP_NORTHEAST_1 = "ap-northeast-1",
  AP_NORTHEAST_2 = "ap-northeast-2",
  AP_NORTHEAST_3 = "ap-northeast-3",
  AP_SOUTH_1 = "ap-south-1",
  AP_SOUTH_2 = "ap-south-2",
  AP_SOUTHEAST_1 = "ap-southeast-1",
  AP_SOUTHEAST_2 = "ap-southeast-2",
  AP_SOUTHEAST_3 = "ap-southeast-3",
  AP_SOUTHEAST_4 = "ap-southeast-4",
  CA_CENTRAL_1 = "ca-central-1",
  CA_WEST_1 = "ca-west-1",
  EU_CENTRAL_1 = "eu-central-1",
  EU_CENTRAL_2 = "eu-central-2",
  EU_NORTH_1 = "eu-north-1",
  EU_SOUTH_1 = "eu-south-1",
  EU_SOUTH_2 = "eu-south-2",
  EU_WEST_1 = "eu-west-1",
  EU_WEST_2 = "eu-west-2",
  EU_WEST_3 = "eu-west-3",
  IL_CENTRAL_1 = "il-central-1",
  ME_CENTRAL_1 = "me-central-1",
  ME_SOUTH_1 = "me-south-1",
  SA_EAST_1 = "sa-east-1",
  US_EAST_1 = "us-east-1",
  US_EAST_2 = "us-east-2",
  US_WEST_1 = "us-west-1",
  US_WEST_2 = "us-west-2",
}

const regionNames: { readonly [R in AwsRegionId]: string } = {
  [AwsRegionId.AF_SOUTH_1]: "Africa (Cape Town)",
  [AwsRegionId.AP_EAST_1]: "Asia Pacific (Hong Kong)",
  [AwsRegionId.AP_NORTHEAST_1]: "Asia Pacific (Tokyo)",
  [AwsRegionId.AP_NORTHEAST_2]: "Asia Pacific (Seoul)",
  [AwsRegionId.AP_NORTHEAST_3]: "Asia Pacific (Osaka)",
  [AwsRegionId.AP_SOUTH_1]: "Asia Pacific (Mumbai)",
  [AwsRegionId.AP_SOUTH_2]: "Asia Pacific (Hyderabad)",
  [AwsRegionId.AP_SOUTHEAST_1]: "Asia Pacific (Singapore)",
  [AwsRegionId.AP_SOUTHEAST_2]: "Asia Pacific (Sydney)",
  [AwsRegionId.AP_SOUTHEAST_3]: "Asia Pacific (Jakarta)",
  [AwsRegionId.AP_SOUTHEAST_4]: "Asia Pacific (Melbourne)",
  [AwsRegionId.CA_CENTRAL_1]: "Canada (Central)",
  [AwsRegionId.CA_WEST_1]: "Canada West (Calgary)",
  [AwsRegionId.EU_CENTRAL_1]: "Europe (Frankfurt)",
  [AwsRegionId.EU_CENTRAL_2]: "Europe (Zurich)",
  [AwsRegionId.EU_NORTH_1]: "Europe (Stockholm)",
  [AwsRegionId.EU_SOUTH_1]: "Europe (Milan)",
  [AwsRegionId.EU_SOUTH_2]: "Europe (Spain)",
  [AwsRegionId.EU_WEST_1]: "Europe (Ireland)",
  [AwsRegionId.EU_WEST_2]: "Europe (London)",
  [AwsRegionId.EU_WEST_3]: "Europe (Paris)",
  [AwsRegionId.IL_CENTRAL_1]: "Israel (Tel Aviv)",
  [AwsRegionId.ME_CENTRAL_1]: "Middle East (UAE)",
  [AwsRegionId.ME_SOUTH_1]: "Middle East (Bahrain)",
  [AwsRegionId.SA_EAST_1]: "South America (São Paulo)",
  [AwsRegionId.US_EAST_1]: "US East (N. Virginia)",
  [AwsRegionId.US_EAST_2]: "US East (Ohio)",
  [AwsRegionId.US_WEST_1]: "US West (N. California)",
  [AwsRegionId.US_WEST_2]: "US West (Oregon)",
};

/**
 * Every region, in tag order
 */
export const awsRegionIds: readonly AwsRegionId[] = Object.values(AwsRegionId);

const regionTags = new Map<AwsRegionId, number>(
  awsRegionIds.map((region, tag) => [region, tag]),
);

const regionsByCode = new Map<string, AwsRegionId>(
  awsRegionIds.map((region) => [region, region]),
);

export function regionIdCompare(a: AwsRegionId, b: AwsRegionId): number {
  return regionIdTag(a) - regionIdTag(b);
}

export function regionIdFromJSON(value: unknown): AwsRegionId {
  if (typeof value !== "string") {
    throw new ResourceIdError("AwsRegionId", String(value), {
      kind: ResourceIdErrorKind.NOT_A_STRING,
      actualType: value === null ? "null" : typeof value,
    });
  }
  return regionIdRead(value);
}

/**
 * Location name, e.g. "Europe (Frankfurt)"
 */
export function regionIdName(region: AwsRegionId): string {
  return regionNames[region];
}

export function regionIdParse(input: string): ParseResult<AwsRegionId> {
  const region = regionsByCode.get(input);
  if (region === undefined) {
    return parseFailure("AwsRegionId", input, {
      kind: ResourceIdErrorKind.UNKNOWN_CODE,
    });
  }
  return parseOk(region);
}

export function regionIdRead(input: string): AwsRegionId {
  return parseResultRead(regionIdParse(input));
}

/**
 * Small integer for the region, its position in {@link awsRegionIds}
 */
export function regionIdTag(region: AwsRegionId): number {
  const tag = regionTags.get(region);
  if (tag === undefined) {
    throw new RangeError(`Invalid region id: ${region}`);
  }
  return tag;
}

export function regionIdText(region: AwsRegionId): string {
  return region;
}

export const regionIdJsonSchema = {
  description: "AWS Region ID",
  enum: awsRegionIds,
  title: "AwsRegionId",
  type: "string",
} as const;
