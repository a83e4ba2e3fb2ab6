import { ArgumentParser } from "argparse";
import { DocFormat, registryMarkdown, registryYaml } from "./doc";

interface Args {
  format: DocFormat;
  title: string;
}

const parser = new ArgumentParser({
  prog: "awsid-doc",
  description: "Print the registered AWS resource ID types",
});
parser.add_argument("--format", {
  choices: Object.values(DocFormat),
  default: DocFormat.MARKDOWN,
});
parser.add_argument("--title", { default: "AWS resource IDs" });

const args: Args = parser.parse_args();

(async () => {
  switch (args.format) {
    case DocFormat.MARKDOWN:
      for (const line of registryMarkdown(args.title)) {
        console.log(line);
      }
      break;
    case DocFormat.YAML:
      process.stdout.write(registryYaml());
      break;
  }
})().catch((e) => {
  console.error(String(e?.stack ?? e));
  process.exit(1);
});
