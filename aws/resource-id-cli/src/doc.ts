import {
  awsRegionIds,
  generalResourceIdTypes,
  regionIdName,
  regionIdText,
} from "@awsid/resource-id";
import { stringify } from "yaml";

export enum DocFormat {
  MARKDOWN = "markdown",
  YAML = "yaml",
}

export function registryMarkdown(title: string): string[] {
  const lines = [`# ${title}`, ""];

  lines.push("## General format", "");
  lines.push("| Type | Prefix | Lengths | Description |");
  lines.push("| -- | -- | -- | -- |");
  for (const type of generalResourceIdTypes) {
    lines.push(
      `| ${type.name} | \`${type.prefix}\` | ${type.validLengths.join(", ")} | ${type.description} |`,
    );
  }
  lines.push("");

  lines.push("## Regions", "");
  lines.push("| Code | Name |");
  lines.push("| -- | -- |");
  for (const region of awsRegionIds) {
    lines.push(`| \`${regionIdText(region)}\` | ${regionIdName(region)} |`);
  }
  lines.push("");

  return lines;
}

export function registryYaml(): string {
  return stringify({
    general: generalResourceIdTypes.map((type) => ({
      name: type.name,
      prefix: type.prefix,
      lengths: [...type.validLengths],
      description: type.description,
    })),
    regions: awsRegionIds.map((region) => ({
      code: regionIdText(region),
      name: regionIdName(region),
    })),
  });
}
