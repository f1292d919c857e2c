/**
 * Supported metadata categories.
 *
 * Each entry maps a folder under force-app/main/default/ to the type name
 * used in package.xml. The table order is the order of `<types>` blocks in
 * the generated manifests.
 */

import type { MetadataCategory } from "./models.js";

function category(folder: string, typeName: string, bundle = false): MetadataCategory {
  return Object.freeze({ folder, typeName, bundle });
}

export const METADATA_CATEGORIES: readonly MetadataCategory[] = Object.freeze([
  category("approvalProcesses", "ApprovalProcess"),
  category("aura", "AuraDefinitionBundle", true),
  category("businessProcesses", "BusinessProcess"),
  category("classes", "ApexClass"),
  category("compactLayouts", "CompactLayout"),
  category("customMetadata", "CustomMetadata"),
  category("customPermissions", "CustomPermission"),
  category("customSettings", "CustomSetting"),
  category("externalCredentials", "ExternalCredential"),
  category("fieldSets", "FieldSet"),
  category("fields", "CustomField"),
  category("flexipages", "FlexiPage"),
  category("flows", "Flow"),
  category("globalValueSets", "GlobalValueSet"),
  category("groups", "Group"),
  category("labels", "CustomLabels"),
  category("layouts", "Layout"),
  category("listViews", "ListView"),
  category("lwc", "LightningComponentBundle", true),
  category("namedCredentials", "NamedCredential"),
  category("objects", "CustomObject"),
  category("pages", "ApexPage"),
  category("permissionsetgroups", "PermissionSetGroup"),
  category("permissionsets", "PermissionSet"),
  category("profiles", "Profile"),
  category("quickActions", "QuickAction"),
  category("recordTypes", "RecordType"),
  category("remoteSiteSettings", "RemoteSiteSetting"),
  category("searchLayouts", "SearchLayouts"),
  category("standardValueSets", "StandardValueSet"),
  category("tabs", "CustomTab"),
  category("triggers", "ApexTrigger"),
  category("validationRules", "ValidationRule"),
  category("webLinks", "WebLink"),
]);

const BY_FOLDER: ReadonlyMap<string, MetadataCategory> = new Map(
  METADATA_CATEGORIES.map((c) => [c.folder, c]),
);

/** Look up a category by its folder key. */
export function findCategory(folder: string): MetadataCategory | undefined {
  return BY_FOLDER.get(folder);
}

export function listSupportedTypes(): string[] {
  return METADATA_CATEGORIES.map((c) => c.typeName);
}
