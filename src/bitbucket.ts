/**
 * Bitbucket Cloud diff adapter.
 *
 * Fetches the diff-stat between the latest commits of two branches and
 * converts it to the same `<status>\t<path>` lines that
 * `git diff --name-status` produces.
 */

import { z } from "zod";

export const API_URL = "https://api.bitbucket.org/2.0/repositories";

export class BitbucketError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = "BitbucketError";
  }
}

export interface BitbucketOptions {
  username: string;
  appPassword: string;
  workspace: string;
  repository: string;
  /** Injected for tests; defaults to the global fetch. */
  fetch?: typeof fetch;
}

// ---------------------------------------------------------------------------
// Response schemas
// ---------------------------------------------------------------------------

const commitsSchema = z.object({
  values: z.array(z.object({ hash: z.string() })),
});

const fileRefSchema = z.object({ path: z.string() }).nullish();

const diffStatSchema = z.object({
  values: z.array(
    z.object({
      status: z.string(),
      old: fileRefSchema,
      new: fileRefSchema,
    }),
  ),
  next: z.string().optional(),
});

export type DiffStatEntry = z.infer<typeof diffStatSchema>["values"][number];

const STATUS_CODES: Readonly<Record<string, string>> = {
  added: "A",
  removed: "D",
  modified: "M",
  renamed: "R",
  "merge conflict": "M",
  "remote deleted": "D",
};

/** Map a diff-stat status to its single-letter code; unknown statuses become `?`. */
export function statusCode(status: string): string {
  return STATUS_CODES[status] ?? "?";
}

/**
 * Convert diff-stat entries to name-status lines.
 *
 * Renames carry both paths; other entries use the new path when there is
 * one and fall back to the old path for deletions.
 */
export function diffStatToLines(entries: readonly DiffStatEntry[]): string[] {
  const lines: string[] = [];
  for (const entry of entries) {
    const code = statusCode(entry.status);
    const oldPath = entry.old?.path;
    const newPath = entry.new?.path;

    if (code === "R" && oldPath !== undefined && newPath !== undefined) {
      lines.push(`${code}\t${oldPath}\t${newPath}`);
    } else if (newPath !== undefined) {
      lines.push(`${code}\t${newPath}`);
    } else if (oldPath !== undefined) {
      lines.push(`${code}\t${oldPath}`);
    }
  }
  return lines;
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class BitbucketClient {
  private readonly fetchImpl: typeof fetch;
  private readonly authorization: string;

  constructor(private readonly options: BitbucketOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    const credentials = `${options.username}:${options.appPassword}`;
    this.authorization = `Basic ${Buffer.from(credentials, "utf8").toString("base64")}`;
  }

  private repositoryUrl(): string {
    const { workspace, repository } = this.options;
    return `${API_URL}/${encodeURIComponent(workspace)}/${encodeURIComponent(repository)}`;
  }

  /** GET a URL and return the parsed JSON body. */
  async request(url: string): Promise<unknown> {
    const response = await this.fetchImpl(url, {
      method: "GET",
      headers: {
        Authorization: this.authorization,
        Accept: "application/json",
        "User-Agent": "sfmanifest",
      },
    });

    if (!response.ok) {
      throw new BitbucketError(
        `Request failed with status code: ${response.status}`,
        response.status,
      );
    }

    return response.json();
  }

  /** Hash of the most recent commit on `branch`. */
  async getLatestCommitId(branch: string): Promise<string> {
    const url = `${this.repositoryUrl()}/commits/${encodeURIComponent(branch)}`;
    const parsed = commitsSchema.safeParse(await this.request(url));
    const hash = parsed.success ? parsed.data.values[0]?.hash : undefined;
    if (hash === undefined) {
      throw new BitbucketError(`Commit ID not found for branch ${branch}`);
    }
    return hash;
  }

  /**
   * Diff-stat between the latest commits of two branches, as name-status
   * lines. Follows pagination until the last page.
   */
  async getDiff(featureBranch: string, compareBranch: string): Promise<string[]> {
    const [featureCommit, compareCommit] = await Promise.all([
      this.getLatestCommitId(featureBranch),
      this.getLatestCommitId(compareBranch),
    ]);

    let url: string | undefined =
      `${this.repositoryUrl()}/diffstat/${featureCommit}..${compareCommit}`;
    const entries: DiffStatEntry[] = [];

    while (url !== undefined) {
      const parsed = diffStatSchema.safeParse(await this.request(url));
      if (!parsed.success) {
        throw new BitbucketError(`Unexpected diffstat response: ${parsed.error.message}`);
      }
      entries.push(...parsed.data.values);
      url = parsed.data.next;
    }

    return diffStatToLines(entries);
  }
}
