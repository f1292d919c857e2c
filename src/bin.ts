#!/usr/bin/env node
/**
 * sfmanifest CLI entry point.
 *
 * Builds package.xml and destructiveChanges.xml from the diff between a
 * feature branch and its comparison branch. See `sfmanifest --help`.
 */

import { defaultIo, runCli } from "./cli.js";

runCli(process.argv.slice(2), defaultIo())
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error("Fatal error in main():", error);
    process.exit(1);
  });
