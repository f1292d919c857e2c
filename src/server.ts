/**
 * sfmanifest MCP server factory.
 *
 * Creates and configures the McpServer with all tool registrations.
 * Kept apart from index.ts so tests can connect to it in-process.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { METADATA_CATEGORIES } from "./categories.js";
import { getNameStatusDiff, currentBranch } from "./git.js";
import { buildManifestsFromLines } from "./manifest.js";
import type { ManifestResult } from "./models.js";

// ---------------------------------------------------------------------------
// Shared schemas
// ---------------------------------------------------------------------------

const diagnosticSchema = z.object({
  level: z.enum(["error", "warning"]),
  code: z.enum(["unsupported_category", "diff_too_large", "not_in_bundle"]),
  message: z.string(),
  path: z.string().optional(),
});

const manifestOutputSchema = z.object({
  manifest: z.string(),
  destructive_manifest: z.string(),
  diagnostics: z.array(diagnosticSchema),
});

function manifestOutput(result: ManifestResult) {
  return {
    manifest: result.manifest,
    destructive_manifest: result.destructiveManifest,
    diagnostics: result.diagnostics.map((d) => ({ ...d })),
  };
}

function errorResult(error: unknown) {
  const message = error instanceof Error ? error.message : String(error);
  return {
    content: [{ type: "text" as const, text: message }],
    isError: true,
  };
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create a fully-configured sfmanifest MCP server.
 *
 * The returned server has all 3 tools registered and is ready to be
 * connected to any MCP transport (stdio, in-memory, etc.).
 */
export function createServer(): McpServer {
  const server = new McpServer({
    name: "sfmanifest",
    version: "0.1.0",
  });

  // -------------------------------------------------------------------------
  // Tool: list_supported_metadata
  // -------------------------------------------------------------------------

  server.registerTool(
    "list_supported_metadata",
    {
      description:
        "List the metadata categories the manifest builder recognises: source folder, package.xml type name, and whether the category deploys as a bundle folder.",
      inputSchema: z.object({}),
      outputSchema: z.object({
        categories: z.array(
          z.object({
            folder: z.string(),
            type_name: z.string(),
            bundle: z.boolean(),
          })
        ),
      }),
    },
    async (_args, _extra) => {
      const result = {
        categories: METADATA_CATEGORIES.map((c) => ({
          folder: c.folder,
          type_name: c.typeName,
          bundle: c.bundle,
        })),
      };
      return {
        content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
        structuredContent: result,
      };
    }
  );

  // -------------------------------------------------------------------------
  // Tool: build_manifest
  // -------------------------------------------------------------------------

  server.registerTool(
    "build_manifest",
    {
      description:
        "Build package.xml and destructiveChanges.xml from `git diff --name-status` style lines (e.g. \"M\\tforce-app/main/default/classes/Foo.cls\").",
      inputSchema: z.object({
        lines: z
          .array(z.string())
          .describe("Name-status lines: a status code, whitespace, then the file path"),
      }),
      outputSchema: manifestOutputSchema,
    },
    async ({ lines }, _extra) => {
      try {
        const result = manifestOutput(buildManifestsFromLines(lines));
        return {
          content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
          structuredContent: result,
        };
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  // -------------------------------------------------------------------------
  // Tool: diff_manifest
  // -------------------------------------------------------------------------

  server.registerTool(
    "diff_manifest",
    {
      description:
        "Diff two refs of the repository in the server's working directory and build both manifests from the result.",
      inputSchema: z.object({
        compare: z
          .string()
          .describe("Ref the feature branch merges into, e.g. qa"),
        feature: z
          .string()
          .optional()
          .describe("Feature ref (default: the checked-out branch)"),
      }),
      outputSchema: manifestOutputSchema.extend({
        compare: z.string(),
        feature: z.string(),
      }),
    },
    async ({ compare, feature }, _extra) => {
      try {
        const cwd = process.cwd();
        const featureRef = feature ?? currentBranch(cwd);
        if (featureRef === undefined) {
          return errorResult("HEAD is detached; pass an explicit feature ref");
        }
        const lines = getNameStatusDiff(compare, featureRef, cwd);
        const result = {
          compare,
          feature: featureRef,
          ...manifestOutput(buildManifestsFromLines(lines)),
        };
        return {
          content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
          structuredContent: result,
        };
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  return server;
}
