/**
 * Manifest rendering.
 *
 * Serializes classified buckets into package.xml and destructiveChanges.xml,
 * and exposes buildManifests() as the single entry point from change records
 * to both documents.
 */

import { classifyChanges } from "./classifier.js";
import { parseChangeLines } from "./change-record.js";
import type {
  ChangeRecord,
  ClassificationBucket,
  ManifestBundle,
  ManifestResult,
} from "./models.js";

export const API_VERSION = "64.0";
export const PACKAGE_XML = "package.xml";
export const DESTRUCTIVE_CHANGES_XML = "destructiveChanges.xml";

const PROLOG =
  '<?xml version="1.0" encoding="UTF-8"?>\n' +
  '<Package xmlns="http://soap.sforce.com/2006/04/metadata">\n';

const EPILOG = `\t<version>${API_VERSION}</version>\n</Package>`;

const CUSTOM_LABELS = "CustomLabels";

function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

function renderTypes(typeName: string, members: Iterable<string>): string {
  // Default sort compares UTF-16 code units: case-sensitive and locale-independent
  const sorted = [...members].sort();
  let block = "\t<types>\n";
  for (const member of sorted) {
    block += `\t\t<members>${escapeXml(member)}</members>\n`;
  }
  block += `\t\t<name>${typeName}</name>\n\t</types>\n`;
  return block;
}

/**
 * Labels deploy as one aggregate file, so a lone `CustomLabels` member is
 * written as the `*` wildcard.
 */
function additiveMembers(bucket: ClassificationBucket): Iterable<string> {
  if (
    bucket.category.typeName === CUSTOM_LABELS &&
    bucket.additive.size === 1 &&
    bucket.additive.has(CUSTOM_LABELS)
  ) {
    return ["*"];
  }
  return bucket.additive;
}

/** Render both manifests from classified buckets, in bucket order. */
export function renderManifests(buckets: readonly ClassificationBucket[]): ManifestBundle {
  let manifest = PROLOG;
  let destructiveManifest = PROLOG;

  for (const bucket of buckets) {
    if (bucket.additive.size > 0) {
      manifest += renderTypes(bucket.category.typeName, additiveMembers(bucket));
    }
    if (bucket.destructive.size > 0) {
      destructiveManifest += renderTypes(bucket.category.typeName, bucket.destructive);
    }
  }

  return {
    manifest: manifest + EPILOG,
    destructiveManifest: destructiveManifest + EPILOG,
  };
}

/** Classify change records and render both manifests. */
export function buildManifests(records: readonly ChangeRecord[]): ManifestResult {
  const { buckets, diagnostics } = classifyChanges(records);
  return { ...renderManifests(buckets), diagnostics };
}

/** Parse raw `--name-status` style lines, then build both manifests. */
export function buildManifestsFromLines(lines: readonly string[]): ManifestResult {
  return buildManifests(parseChangeLines(lines));
}
