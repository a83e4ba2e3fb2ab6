import { ArgumentParser } from "argparse";
import { checkResultFormat, idCheck } from "./check";

interface Args {
  ids: string[];
}

const parser = new ArgumentParser({
  prog: "awsid-check",
  description: "Identify the type of AWS resource IDs",
});
parser.add_argument("ids", { nargs: "+", metavar: "ID" });

const args: Args = parser.parse_args();

(async () => {
  const results = args.ids.map(idCheck);
  for (const result of results) {
    console.log(checkResultFormat(result));
  }
  if (results.some((result) => result.type === undefined)) {
    process.exitCode = 1;
  }
})().catch((e) => {
  console.error(String(e?.stack ?? e));
  process.exit(1);
});
