import { ARN, parse } from "@aws-sdk/util-arn-parser";
import {
  AwsRegionId,
  ResourceId,
  ResourceIdType,
  regionIdParse,
} from "@awsid/resource-id";

export function envArnRead(name: string): ARN {
  const value = envStringRead(name);
  try {
    return parse(value);
  } catch (e) {
    throw new Error(`Invalid ARN for ${name}`, { cause: e });
  }
}

/**
 * Region from the environment, by default where Lambda and the SDKs put it
 */
export function envRegionRead(name = "AWS_REGION"): AwsRegionId {
  const result = regionIdParse(envStringRead(name));
  if (!result.ok) {
    throw new Error(`Invalid AwsRegionId for ${name}`, { cause: result.error });
  }
  return result.value;
}

export function envRegionReadOpt(
  name = "AWS_REGION",
): AwsRegionId | undefined {
  return envStringReadOpt(name) ? envRegionRead(name) : undefined;
}

export function envResourceIdRead<N extends string, P extends string>(
  name: string,
  type: ResourceIdType<N, P>,
): ResourceId<N, P> {
  const result = type.parse(envStringRead(name));
  if (!result.ok) {
    throw new Error(`Invalid ${type.name} for ${name}`, {
      cause: result.error,
    });
  }
  return result.value;
}

export function envResourceIdReadOpt<N extends string, P extends string>(
  name: string,
  type: ResourceIdType<N, P>,
): ResourceId<N, P> | undefined {
  return envStringReadOpt(name) ? envResourceIdRead(name, type) : undefined;
}

export function envStringRead(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`Missing env var ${name}`);
  }
  return value;
}

export function envStringReadOpt(name: string): string | undefined {
  return process.env[name];
}
