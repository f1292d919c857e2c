/**
 * Change classification.
 *
 * Folds a list of ChangeRecords into one additive/destructive bucket per
 * metadata category. Pure and synchronous: every call builds its own bucket
 * collection and reports problems as Diagnostics instead of throwing.
 */

import { METADATA_CATEGORIES, findCategory } from "./categories.js";
import { resolverFor } from "./resolvers.js";
import type {
  ChangeRecord,
  ClassificationBucket,
  Diagnostic,
} from "./models.js";

/** Unpackaged source root. Paths outside it are not part of the manifest. */
export const PROJECT_ROOT = "force-app/main/default/";

export const MAXIMUM_DIFF_SIZE = 5000;

export interface Classification {
  /** One bucket per category, in table order. */
  buckets: ClassificationBucket[];
  diagnostics: Diagnostic[];
}

export function createBuckets(): ClassificationBucket[] {
  return METADATA_CATEGORIES.map((category) => ({
    category,
    additive: new Set<string>(),
    destructive: new Set<string>(),
  }));
}

/**
 * Classify change records into per-category buckets.
 *
 * A diff of MAXIMUM_DIFF_SIZE records or more is rejected as a whole: the
 * buckets come back empty with a single `diff_too_large` error.
 */
export function classifyChanges(records: readonly ChangeRecord[]): Classification {
  const buckets = createBuckets();
  const diagnostics: Diagnostic[] = [];

  if (records.length >= MAXIMUM_DIFF_SIZE) {
    diagnostics.push({
      level: "error",
      code: "diff_too_large",
      message: `Number of files in diff exceeds the maximum file size of ${MAXIMUM_DIFF_SIZE}.`,
    });
    return { buckets, diagnostics };
  }

  const byFolder = new Map(buckets.map((b) => [b.category.folder, b]));

  for (const record of records) {
    const path = record.path.replace(/\\/g, "/");
    if (!path.startsWith(PROJECT_ROOT)) continue;

    const relativePath = path.slice(PROJECT_ROOT.length);
    const folder = relativePath.split("/", 1)[0];
    const category = findCategory(folder);

    if (!category) {
      diagnostics.push({
        level: "error",
        code: "unsupported_category",
        message: `Metadata category, ${folder}, is not supported and has not been included in the manifest.`,
        path: record.path,
      });
      continue;
    }

    const resolution = resolverFor(category)(record.status, relativePath);
    if (resolution.kind === "dropped") {
      if (resolution.diagnostic) diagnostics.push(resolution.diagnostic);
      continue;
    }

    const bucket = byFolder.get(resolution.folder);
    if (!bucket) continue;

    if (resolution.destructive) {
      bucket.destructive.add(resolution.member);
    } else {
      bucket.additive.add(resolution.member);
    }
  }

  return { buckets, diagnostics };
}
