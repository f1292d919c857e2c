/**
 * Persistent configuration.
 *
 * A `config.txt` file of `key=value` lines holds Bitbucket credentials and an
 * optional working path. It lives in SFMANIFEST_CONFIG_DIR, or in
 * ~/.sfmanifest/ when that is unset.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { homedir } from "node:os";
import { dirname, join } from "node:path";
import { z } from "zod";

export const CONFIG_FILE_NAME = "config.txt";
export const PLACEHOLDER = "[enter value]";

export const CONFIG_KEYS = [
  "bitbucket_username",
  "bitbucket_app_password",
  "bitbucket_workspace",
  "bitbucket_repository",
  "working_path",
] as const;

export type ConfigKey = (typeof CONFIG_KEYS)[number];

const BITBUCKET_KEYS = [
  "bitbucket_username",
  "bitbucket_app_password",
  "bitbucket_workspace",
  "bitbucket_repository",
] as const satisfies readonly ConfigKey[];

const SECRET_KEYS: ReadonlySet<string> = new Set(["bitbucket_app_password"]);

export type ConfigValues = Map<string, string>;

const settingSchema = z
  .string()
  .trim()
  .min(1)
  .refine((v) => v !== PLACEHOLDER, { message: "not configured" });

const bitbucketSchema = z.object({
  bitbucket_username: settingSchema,
  bitbucket_app_password: settingSchema,
  bitbucket_workspace: settingSchema,
  bitbucket_repository: settingSchema,
});

export type BitbucketSettings = z.infer<typeof bitbucketSchema>;

/** Directory holding config.txt. */
export function configDir(env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env.SFMANIFEST_CONFIG_DIR;
  if (fromEnv !== undefined && fromEnv.trim().length > 0) return fromEnv;
  return join(homedir(), ".sfmanifest");
}

export function configFilePath(env: NodeJS.ProcessEnv = process.env): string {
  return join(configDir(env), CONFIG_FILE_NAME);
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse `key=value` lines. Only the first `=` splits, so values may contain
 * `=`. A line without `=` is a key with an empty value.
 */
export function parseConfig(text: string): ConfigValues {
  const values: ConfigValues = new Map();
  for (const raw of text.split("\n")) {
    const line = raw.replace(/\r$/, "");
    if (line.length <= 1) continue;
    const [key, value] = splitAssignment(line);
    values.set(key, value);
  }
  return values;
}

export function serializeConfig(values: ConfigValues): string {
  let text = "";
  for (const [key, value] of values) {
    text += `${key}=${value}\n`;
  }
  return text;
}

export function splitAssignment(assignment: string): [string, string] {
  const eq = assignment.indexOf("=");
  if (eq < 0) return [assignment, ""];
  return [assignment.slice(0, eq), assignment.slice(eq + 1)];
}

/** Render values for display with secrets masked. */
export function formatConfig(values: ConfigValues): string[] {
  return [...values].map(([key, value]) =>
    SECRET_KEYS.has(key) ? `${key}=*******` : `${key}=${value}`,
  );
}

// ---------------------------------------------------------------------------
// File access
// ---------------------------------------------------------------------------

function defaultContent(): string {
  return BITBUCKET_KEYS.map((key) => `${key}=${PLACEHOLDER}`).join("\n");
}

/** Read the config file, creating it with placeholder values first if missing. */
export function loadConfig(filePath: string): ConfigValues {
  if (!existsSync(filePath)) {
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, defaultContent(), "utf8");
  }
  return parseConfig(readFileSync(filePath, "utf8"));
}

export function saveConfig(filePath: string, values: ConfigValues): void {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, serializeConfig(values), "utf8");
}

/** Apply a `key=value` assignment and persist the file. */
export function setVariable(filePath: string, assignment: string): ConfigValues {
  const values = loadConfig(filePath);
  const [key, value] = splitAssignment(assignment);
  if (key.trim().length === 0) {
    throw new Error(`Invalid configuration assignment: ${assignment}`);
  }
  values.set(key.trim(), value);
  saveConfig(filePath, values);
  return values;
}

// ---------------------------------------------------------------------------
// Bitbucket settings
// ---------------------------------------------------------------------------

/** Bitbucket keys that are absent, blank or still the placeholder. */
export function missingBitbucketKeys(values: ConfigValues): ConfigKey[] {
  return BITBUCKET_KEYS.filter((key) => !settingSchema.safeParse(values.get(key) ?? "").success);
}

/**
 * Validated Bitbucket settings.
 *
 * @throws Error naming every missing key
 */
export function bitbucketSettings(values: ConfigValues): BitbucketSettings {
  const parsed = bitbucketSchema.safeParse(Object.fromEntries(values));
  if (!parsed.success) {
    const missing = missingBitbucketKeys(values);
    throw new Error(`Missing Bitbucket configuration: ${missing.join(", ")}`);
  }
  return parsed.data;
}

/**
 * Ask for each missing Bitbucket setting, store the answers and persist the
 * file when anything changed. Keys in `supplied` come from elsewhere for
 * this run and are neither asked for nor stored.
 */
export async function promptForMissing(
  filePath: string,
  values: ConfigValues,
  ask: (question: string) => Promise<string>,
  supplied: readonly ConfigKey[] = [],
): Promise<ConfigValues> {
  const missing = missingBitbucketKeys(values).filter((key) => !supplied.includes(key));
  if (missing.length === 0) return values;

  for (const key of missing) {
    const label = key.replace(/^bitbucket_/, "").replace(/_/g, " ");
    const answer = await ask(`Please enter your Bitbucket ${label}: `);
    values.set(key, answer.trim());
  }
  saveConfig(filePath, values);
  return values;
}
