/**
 * Manifest generation run.
 *
 * Resolves the branches to compare, pulls the diff from git or Bitbucket,
 * builds both manifests and writes (or prints) them.
 */

import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { BitbucketClient } from "./bitbucket.js";
import { PLACEHOLDER, bitbucketSettings, type BitbucketSettings, type ConfigValues } from "./config.js";
import { currentBranch, getNameStatusDiff } from "./git.js";
import type { Logger } from "./logger.js";
import {
  DESTRUCTIVE_CHANGES_XML,
  PACKAGE_XML,
  buildManifestsFromLines,
} from "./manifest.js";
import type { ManifestResult } from "./models.js";
import type { CliOptions } from "./options.js";

export interface GenerateDeps {
  logger: Logger;
  config: ConfigValues;
  cwd: string;
  gitDiff?: (compare: string, feature: string, cwd: string) => string[];
  currentBranch?: (cwd: string) => string | undefined;
  bitbucketDiff?: (
    settings: BitbucketSettings,
    feature: string,
    compare: string,
  ) => Promise<string[]>;
  /** Receives manifest text in string-only mode. */
  print?: (text: string) => void;
}

export interface GenerateResult extends ManifestResult {
  featureBranch: string;
  compareBranch: string;
  /** Paths written; empty in string-only mode. */
  written: string[];
}

type GenerateOptions = Pick<
  CliOptions,
  "feature" | "branch" | "automation" | "stringOnly" | "bitbucketUser" | "outputDir"
>;

function defaultBitbucketDiff(
  settings: BitbucketSettings,
  feature: string,
  compare: string,
): Promise<string[]> {
  const client = new BitbucketClient({
    username: settings.bitbucket_username,
    appPassword: settings.bitbucket_app_password,
    workspace: settings.bitbucket_workspace,
    repository: settings.bitbucket_repository,
  });
  return client.getDiff(feature, compare);
}

/** Configured working path, or cwd when unset. */
export function workingPath(config: ConfigValues, cwd: string): string {
  const configured = config.get("working_path")?.trim();
  if (configured === undefined || configured.length === 0 || configured === PLACEHOLDER) {
    return cwd;
  }
  return configured;
}

export async function generateManifest(
  options: GenerateOptions,
  deps: GenerateDeps,
): Promise<GenerateResult> {
  const { logger, config } = deps;
  const repoPath = workingPath(config, deps.cwd);

  const featureBranch = options.feature ?? (deps.currentBranch ?? currentBranch)(repoPath);
  if (featureBranch === undefined) {
    throw new Error("Could not determine the feature branch. Pass --feature <branch>.");
  }
  const compareBranch = options.branch;
  logger.info(`feature branch: ${featureBranch}`);
  logger.info(`compare branch: ${compareBranch}`);

  let lines: string[];
  if (options.automation === "git") {
    logger.info("Using Git orchestration methodology...");
    const gitDiff = deps.gitDiff ?? getNameStatusDiff;
    lines = logger.time("manifest::git diff", () => gitDiff(compareBranch, featureBranch, repoPath));
  } else {
    logger.info("Using Bitbucket REST API...");
    const values = new Map(config);
    if (options.bitbucketUser !== undefined) values.set("bitbucket_username", options.bitbucketUser);
    const settings = bitbucketSettings(values);
    const bitbucketDiff = deps.bitbucketDiff ?? defaultBitbucketDiff;
    lines = await logger.timeAsync("manifest::bitbucket diff", () =>
      bitbucketDiff(settings, featureBranch, compareBranch),
    );
  }

  const result = logger.time("manifest::parsing", () => buildManifestsFromLines(lines));
  for (const diagnostic of result.diagnostics) logger.diagnostic(diagnostic);

  const written: string[] = [];
  if (options.stringOnly) {
    const print = deps.print ?? ((text: string) => process.stdout.write(text));
    print(`xml:\n${result.manifest}\n`);
    print(`xml:\n${result.destructiveManifest}\n`);
  } else {
    const outputDir = options.outputDir ?? repoPath;
    logger.time("manifest::xml file write", () => {
      for (const [name, content] of [
        [PACKAGE_XML, result.manifest],
        [DESTRUCTIVE_CHANGES_XML, result.destructiveManifest],
      ] as const) {
        const target = join(outputDir, name);
        writeFileSync(target, content, "utf8");
        written.push(target);
      }
    });
  }

  return { ...result, featureBranch, compareBranch, written };
}
