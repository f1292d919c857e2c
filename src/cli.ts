/**
 * `sfmanifest` command implementation.
 *
 * Kept separate from bin.ts so tests can drive a full run in-process.
 */

import { createInterface } from "node:readline/promises";
import { join } from "node:path";
import { listSupportedTypes } from "./categories.js";
import {
  configFilePath,
  formatConfig,
  loadConfig,
  promptForMissing,
  setVariable,
} from "./config.js";
import { generateManifest, workingPath, type GenerateDeps } from "./generate.js";
import { Logger } from "./logger.js";
import { USAGE, parseOptions, type CliOptions } from "./options.js";

export interface CliIo {
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** stdout writer for user-facing output. */
  out: (text: string) => void;
  logger: Logger;
  /** Interactive prompt; omitted when stdin is not a terminal. */
  ask?: (question: string) => Promise<string>;
  /** Adapter overrides, mainly for tests. */
  adapters?: Pick<GenerateDeps, "gitDiff" | "currentBranch" | "bitbucketDiff">;
  /** Write log.txt into the working path after a run. */
  publishLog?: boolean;
}

export function defaultIo(): CliIo {
  const io: CliIo = {
    cwd: process.cwd(),
    env: process.env,
    out: (text) => {
      process.stdout.write(text);
    },
    logger: new Logger(),
    publishLog: true,
  };
  if (process.stdin.isTTY) {
    io.ask = async (question) => {
      const rl = createInterface({ input: process.stdin, output: process.stdout });
      try {
        return await rl.question(question);
      } finally {
        rl.close();
      }
    };
  }
  return io;
}

/** Run the command and return the process exit code. */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  const { logger } = io;
  const start = performance.now();

  let options: CliOptions;
  try {
    options = parseOptions(argv);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(message);
    io.out(`${USAGE}\n`);
    return 1;
  }

  if (options.help) {
    io.out(`${USAGE}\n`);
    return 0;
  }

  if (options.listSupported) {
    io.out(`\n==SUPPORTED METADATA TYPES==\n${listSupportedTypes().join("\n")}\n\n`);
    return 0;
  }

  const configPath = configFilePath(io.env);
  try {
    if (options.configSet !== undefined) {
      setVariable(configPath, options.configSet);
      io.out(`config_path: ${configPath}\n`);
      return 0;
    }

    let config = loadConfig(configPath);

    if (options.configGetAll) {
      const lines = formatConfig(config);
      io.out(`keys: ${lines.length}\n${lines.map((l) => `${l}\n`).join("")}`);
      return 0;
    }

    if (options.automation === "bitbucket" && io.ask) {
      const supplied = options.bitbucketUser !== undefined ? (["bitbucket_username"] as const) : [];
      config = await promptForMissing(configPath, config, io.ask, supplied);
    }

    await generateManifest(options, {
      logger,
      config,
      cwd: io.cwd,
      print: io.out,
      ...io.adapters,
    });

    logger.snapshots.push(`Program completed in ${(performance.now() - start).toFixed(3)}ms`);
    logger.printSnapshots();
    if (io.publishLog) logger.publish(join(workingPath(config, io.cwd), "log.txt"));
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(message);
    return 1;
  }
}
