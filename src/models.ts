/**
 * sfmanifest canonical data models.
 *
 * ChangeRecord is the input primitive produced by the git and Bitbucket
 * adapters. MetadataCategory and ClassificationBucket belong to the
 * classifier, and ManifestBundle is the serialized output.
 */

export type ChangeStatus =
  | "Added"
  | "Deleted"
  | "Modified"
  | "Renamed"
  | "MergeConflict"
  | "RemoteDeleted"
  | "Unknown";

export interface ChangeRecord {
  readonly status: ChangeStatus;
  /** Raw status token as read, e.g. `M` or `R072`. */
  readonly code: string;
  readonly path: string;
  /** Rename target. Parsed but not classified. */
  readonly renamedPath?: string;
}

export interface MetadataCategory {
  /** Folder name under the project root, e.g. `classes`. */
  readonly folder: string;
  /** Type name written to `<name>` in the manifest. */
  readonly typeName: string;
  /** Deployable unit is the enclosing folder rather than the file. */
  readonly bundle: boolean;
}

export interface ClassificationBucket {
  readonly category: MetadataCategory;
  readonly additive: Set<string>;
  readonly destructive: Set<string>;
}

export interface ManifestBundle {
  manifest: string;
  destructiveManifest: string;
}

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

export type DiagnosticCode =
  | "unsupported_category"
  | "diff_too_large"
  | "not_in_bundle";

export interface Diagnostic {
  level: "error" | "warning";
  code: DiagnosticCode;
  message: string;
  path?: string;
}

export interface ManifestResult extends ManifestBundle {
  diagnostics: Diagnostic[];
}
