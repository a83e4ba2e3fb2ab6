import { regionIdParse, resourceIdDetect } from "@awsid/resource-id";

export interface CheckResult {
  input: string;
  /** Type name, undefined if not a known ID */
  type: string | undefined;
}

export function idCheck(input: string): CheckResult {
  const id = resourceIdDetect(input);
  if (id) {
    return { input, type: id.typeName };
  }
  if (regionIdParse(input).ok) {
    return { input, type: "AwsRegionId" };
  }
  return { input, type: undefined };
}

export function checkResultFormat({ input, type }: CheckResult): string {
  return `${input}\t${type ?? "invalid"}`;
}
