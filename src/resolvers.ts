/**
 * Member-name resolvers.
 *
 * Each resolver takes a change status and a path relative to the project
 * root (e.g. `classes/Foo.cls`) and decides which bucket the change lands in
 * and under what member name. Paths are split into segments on `/` or `\`
 * and matched by shape.
 */

import { findCategory } from "./categories.js";
import { isDestructive } from "./change-record.js";
import type { ChangeStatus, Diagnostic, MetadataCategory } from "./models.js";

export const QUICK_ACTION_SUFFIX = ".quickAction-meta.xml";
export const CUSTOM_METADATA_SUFFIX = ".md-meta.xml";

export type Resolution =
  | { kind: "member"; folder: string; member: string; destructive: boolean }
  | { kind: "dropped"; diagnostic?: Diagnostic };

export type Resolver = (status: ChangeStatus, relativePath: string) => Resolution;

/** Split a root-relative path on either separator. */
export function splitSegments(relativePath: string): string[] {
  return relativePath.split(/[\\/]/);
}

/** File name up to its first `.`. */
function stem(fileName: string): string {
  const dot = fileName.indexOf(".");
  return dot < 0 ? fileName : fileName.slice(0, dot);
}

function place(folder: string, member: string, destructive: boolean): Resolution {
  if (member.length === 0) return { kind: "dropped" };
  return { kind: "member", folder, member, destructive };
}

// ---------------------------------------------------------------------------
// Resolvers
// ---------------------------------------------------------------------------

/**
 * Flat files: everything after the category folder, up to the first `.`.
 *
 * `classes/Foo.cls` and `classes/Foo.cls-meta.xml` both resolve to `Foo`.
 */
export const resolveBasicMember: Resolver = (status, relativePath) => {
  const [folder, ...rest] = splitSegments(relativePath);
  return place(folder, stem(rest.join("/")), isDestructive(status));
};

/**
 * Bundles deploy as a whole folder, so any file inside `lwc/myCard/` resolves
 * to `myCard`. Always additive: removing one file from a bundle redeploys it.
 */
export const resolveBundleMember: Resolver = (_status, relativePath) => {
  const segments = splitSegments(relativePath);
  if (segments.length < 3) {
    return {
      kind: "dropped",
      diagnostic: {
        level: "warning",
        code: "not_in_bundle",
        message: `File is not inside a ${segments[0]} bundle folder and has not been included in the manifest.`,
        path: relativePath,
      },
    };
  }
  return place(segments[0], segments[1], false);
};

/**
 * Custom objects and their child metadata.
 *
 *   objects/Account.object-meta.xml                 -> objects: Account
 *   objects/Account/Account.object-meta.xml         -> objects: Account
 *   objects/Account/fields/Foo__c.field-meta.xml    -> fields:  Account.Foo__c
 *
 * Child folders that are not supported categories are dropped without a
 * diagnostic.
 */
export const resolveObjectMember: Resolver = (status, relativePath) => {
  const segments = splitSegments(relativePath);
  const destructive = isDestructive(status);
  const objectFolder = segments[0];

  if (segments.length === 2) {
    return place(objectFolder, stem(segments[1]), destructive);
  }
  if (segments.length === 3) {
    return place(objectFolder, segments[1], destructive);
  }

  const child = findCategory(segments[2]);
  if (!child) return { kind: "dropped" };

  const item = stem(segments[3]);
  if (item.length === 0) return { kind: "dropped" };
  return place(child.folder, `${segments[1]}.${item}`, destructive);
};

/**
 * Quick action names carry a dot (`Account.LogCall`), so the member is
 * everything between the folder and the fixed file suffix.
 */
export const resolveQuickActionMember: Resolver = (status, relativePath) =>
  resolveSuffixed(status, relativePath, QUICK_ACTION_SUFFIX);

/** Custom metadata records: `customMetadata/Type.Record.md-meta.xml` -> `Type.Record`. */
export const resolveCustomMetadataMember: Resolver = (status, relativePath) =>
  resolveSuffixed(status, relativePath, CUSTOM_METADATA_SUFFIX);

function resolveSuffixed(
  status: ChangeStatus,
  relativePath: string,
  suffix: string,
): Resolution {
  const [folder, ...rest] = splitSegments(relativePath);
  const tail = rest.join("/");
  if (!tail.endsWith(suffix)) return resolveBasicMember(status, relativePath);
  return place(folder, tail.slice(0, tail.length - suffix.length), isDestructive(status));
}

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

const BESPOKE_RESOLVERS: ReadonlyMap<string, Resolver> = new Map([
  ["objects", resolveObjectMember],
  ["quickActions", resolveQuickActionMember],
  ["customMetadata", resolveCustomMetadataMember],
]);

/** Pick the resolver for a category: bespoke by folder, else bundle or basic. */
export function resolverFor(category: MetadataCategory): Resolver {
  const bespoke = BESPOKE_RESOLVERS.get(category.folder);
  if (bespoke) return bespoke;
  return category.bundle ? resolveBundleMember : resolveBasicMember;
}
