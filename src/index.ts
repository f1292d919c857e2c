#!/usr/bin/env node
/**
 * sfmanifest MCP Server
 *
 * Exposes the Salesforce manifest builder over the Model Context Protocol so
 * agents can turn a branch diff into package.xml and destructiveChanges.xml
 * without shelling out to the CLI.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createServer } from "./server.js";

async function main() {
  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("sfmanifest MCP server running on stdio");
}

main().catch((error) => {
  console.error("Fatal error in main():", error);
  process.exit(1);
});
