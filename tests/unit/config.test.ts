import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync, existsSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  PLACEHOLDER,
  bitbucketSettings,
  configDir,
  configFilePath,
  formatConfig,
  loadConfig,
  missingBitbucketKeys,
  parseConfig,
  promptForMissing,
  serializeConfig,
  setVariable,
} from "../../src/config.js";

describe("parseConfig", () => {
  it("splits on the first equals sign only", () => {
    const values = parseConfig("bitbucket_username=builder\ntoken=a=b=c\n");
    expect([...values]).toEqual([
      ["bitbucket_username", "builder"],
      ["token", "a=b=c"],
    ]);
  });

  it("skips blank and one-character lines and treats a bare key as empty", () => {
    const values = parseConfig("\nx\r\nworking_path\r\n");
    expect([...values]).toEqual([["working_path", ""]]);
  });

  it("round-trips through serializeConfig", () => {
    const text = "a=1\nb=two\n";
    expect(serializeConfig(parseConfig(text))).toBe(text);
  });
});

describe("formatConfig", () => {
  it("masks the app password", () => {
    const values = parseConfig("bitbucket_username=builder\nbitbucket_app_password=test-secret\n");
    expect(formatConfig(values)).toEqual([
      "bitbucket_username=builder",
      "bitbucket_app_password=*******",
    ]);
  });
});

describe("configDir", () => {
  it("prefers SFMANIFEST_CONFIG_DIR", () => {
    expect(configDir({ SFMANIFEST_CONFIG_DIR: "/tmp/sfm" })).toBe("/tmp/sfm");
    expect(configFilePath({ SFMANIFEST_CONFIG_DIR: "/tmp/sfm" })).toBe(join("/tmp/sfm", "config.txt"));
  });

  it("falls back to a folder in the home directory", () => {
    expect(configDir({})).toMatch(/\.sfmanifest$/);
  });
});

describe("config file", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "sfmanifest-config-"));
    file = join(dir, "nested", "config.txt");
  });

  afterEach(() => rmSync(dir, { recursive: true, force: true }));

  it("creates the file with placeholders when missing", () => {
    const values = loadConfig(file);
    expect(existsSync(file)).toBe(true);
    expect(values.get("bitbucket_workspace")).toBe(PLACEHOLDER);
    expect(missingBitbucketKeys(values)).toEqual([
      "bitbucket_username",
      "bitbucket_app_password",
      "bitbucket_workspace",
      "bitbucket_repository",
    ]);
  });

  it("persists a variable set with key=value", () => {
    setVariable(file, "working_path=/work/org");
    expect(loadConfig(file).get("working_path")).toBe("/work/org");
    expect(readFileSync(file, "utf8")).toContain("working_path=/work/org\n");
  });

  it("rejects an assignment without a key", () => {
    expect(() => setVariable(file, "=value")).toThrow("Invalid configuration assignment: =value");
  });

  it("prompts for missing Bitbucket settings and saves the answers", async () => {
    const values = loadConfig(file);
    values.set("bitbucket_username", "builder");
    const asked: string[] = [];
    const answers = ["test-secret\n", "acme", "salesforce"];

    await promptForMissing(file, values, async (question) => {
      asked.push(question);
      return answers[asked.length - 1];
    });

    expect(asked).toEqual([
      "Please enter your Bitbucket app password: ",
      "Please enter your Bitbucket workspace: ",
      "Please enter your Bitbucket repository: ",
    ]);
    expect(bitbucketSettings(loadConfig(file))).toEqual({
      bitbucket_username: "builder",
      bitbucket_app_password: "test-secret",
      bitbucket_workspace: "acme",
      bitbucket_repository: "salesforce",
    });
  });
});

describe("bitbucketSettings", () => {
  it("names every missing key", () => {
    const values = parseConfig(
      `bitbucket_username=builder\nbitbucket_app_password=${PLACEHOLDER}\nbitbucket_workspace=acme\n`,
    );
    expect(() => bitbucketSettings(values)).toThrow(
      "Missing Bitbucket configuration: bitbucket_app_password, bitbucket_repository",
    );
  });
});
