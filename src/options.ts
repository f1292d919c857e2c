/**
 * Command-line options for `sfmanifest`.
 */

import { parseArgs } from "node:util";
import { z } from "zod";

export const DEFAULT_COMPARE_BRANCH = "qa";

const automationSchema = z
  .string()
  .transform((v) => v.toLowerCase())
  .pipe(z.enum(["bitbucket", "b", "git", "g"]))
  .transform((v): Automation => (v === "git" || v === "g" ? "git" : "bitbucket"));

export type Automation = "bitbucket" | "git";

export interface CliOptions {
  feature?: string;
  branch: string;
  stringOnly: boolean;
  bitbucketUser?: string;
  listSupported: boolean;
  automation: Automation;
  configSet?: string;
  configGetAll: boolean;
  outputDir?: string;
  help: boolean;
}

export const USAGE = `Usage: sfmanifest [options]

Generate package.xml and destructiveChanges.xml from the diff between a
feature branch and the branch it merges into.

Options:
  -f, --feature <branch>        Feature branch (default: current git branch)
  -b, --branch <branch>         Comparison branch (default: ${DEFAULT_COMPARE_BRANCH})
  -s, --string-only             Print the manifests instead of writing files
  -u, --bitbucket-user <name>   Bitbucket username for this run
  -p, --supported               List supported metadata types and exit
  -a, --automation <mode>       bitbucket | b | git | g (default: bitbucket)
  -e, --config-set <key=value>  Set a configuration variable and exit
  -x, --config-get-all          Print all configuration variables and exit
  -o, --output-dir <dir>        Directory for the manifest files
  -h, --help                    Show this help`;

/**
 * Parse argv (without the node and script entries).
 *
 * @throws Error for unknown flags or an invalid automation mode
 */
export function parseOptions(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      feature: { type: "string", short: "f" },
      branch: { type: "string", short: "b", default: DEFAULT_COMPARE_BRANCH },
      "string-only": { type: "boolean", short: "s", default: false },
      "bitbucket-user": { type: "string", short: "u" },
      supported: { type: "boolean", short: "p", default: false },
      automation: { type: "string", short: "a", default: "bitbucket" },
      "config-set": { type: "string", short: "e" },
      "config-get-all": { type: "boolean", short: "x", default: false },
      "output-dir": { type: "string", short: "o" },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  const mode = values.automation ?? "bitbucket";
  const automation = automationSchema.safeParse(mode);
  if (!automation.success) {
    throw new Error(`Invalid automation mode: ${mode}`);
  }

  return {
    feature: values.feature,
    branch: values.branch ?? DEFAULT_COMPARE_BRANCH,
    stringOnly: values["string-only"] ?? false,
    bitbucketUser: values["bitbucket-user"],
    listSupported: values.supported ?? false,
    automation: automation.data,
    configSet: values["config-set"],
    configGetAll: values["config-get-all"] ?? false,
    outputDir: values["output-dir"],
    help: values.help ?? false,
  };
}
