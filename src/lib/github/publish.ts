/**
 * GitHub publication - push the updated codes document through the Contents API
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import { errorMessage, PublishError } from "../errors.js";

export type PublishTarget = {
  user?: string;
  repo?: string;
  token?: string;
  branch?: string;
  apiUrl?: string;
};

export type PublishResult = {
  status: "published" | "skipped" | "failed";
  message: string;
};

const DEFAULT_API_URL = "https://api.github.com";

const AUTH_HINT =
  "GitHub upload failed: auth/permission error.\n" +
  "- If using a fine-grained PAT: grant 'Contents: Read and write' and include this repository.\n" +
  "- If using a classic PAT: ensure the 'repo' scope is enabled.\n" +
  "- For org repos: make sure SSO/approval is completed for the token.";

type GitHubClient = {
  /** GET that answers null on 404; any other failure throws. */
  find: <T>(pathname: string) => Promise<T | null>;
  /** Write call; every non-ok status, 404 included, throws. */
  send: <T>(method: string, pathname: string, body: unknown) => Promise<T>;
};

type ShaResponse = { sha?: string };

function createClient(apiUrl: string, token: string): GitHubClient {
  async function call(method: string, pathname: string, body?: unknown): Promise<Response> {
    return fetch(`${apiUrl}${pathname}`, {
      method,
      headers: {
        Accept: "application/vnd.github+json",
        Authorization: `Bearer ${token}`,
        "X-GitHub-Api-Version": "2022-11-28",
        ...(body === undefined ? {} : { "Content-Type": "application/json" }),
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  async function fail(response: Response): Promise<never> {
    const errorData = await response.json().catch(() => ({ message: response.statusText }));
    const message =
      typeof errorData === "object" && errorData !== null && "message" in errorData
        ? String(errorData.message)
        : `GitHub request failed: ${response.status}`;
    throw new PublishError(message, response.status);
  }

  return {
    async find<T>(pathname: string): Promise<T | null> {
      const response = await call("GET", pathname);
      if (response.status === 404) return null;
      if (!response.ok) return fail(response);
      return (await response.json()) as T;
    },
    async send<T>(method: string, pathname: string, body: unknown): Promise<T> {
      const response = await call(method, pathname, body);
      if (!response.ok) return fail(response);
      return (await response.json()) as T;
    },
  };
}

function requireSha(data: ShaResponse, what: string): string {
  if (!data.sha) throw new PublishError(`GitHub returned no sha for the new ${what}`);
  return data.sha;
}

/**
 * First commit into a repository with no branches: blob, tree, root commit,
 * then the branch ref pointing at it.
 */
async function bootstrapWithGitData(
  client: GitHubClient,
  repoPath: string,
  destName: string,
  content: string,
  commitMessage: string,
  branch: string
): Promise<void> {
  const blob = await client.send<ShaResponse>("POST", `${repoPath}/git/blobs`, {
    content,
    encoding: "utf-8",
  });
  const tree = await client.send<ShaResponse>("POST", `${repoPath}/git/trees`, {
    tree: [{ path: destName, mode: "100644", type: "blob", sha: requireSha(blob, "blob") }],
  });
  const commit = await client.send<ShaResponse>("POST", `${repoPath}/git/commits`, {
    message: commitMessage,
    tree: requireSha(tree, "tree"),
    parents: [],
  });
  await client.send("POST", `${repoPath}/git/refs`, {
    ref: `refs/heads/${branch}`,
    sha: requireSha(commit, "commit"),
  });
}

export function hasPublishTarget(target: PublishTarget): boolean {
  return Boolean(target.user && target.repo && target.token);
}

/**
 * Create or update `<basename of filePath>` at the repository root. Never
 * throws: failures come back as `status: "failed"` so a local save is not
 * undone by a remote problem.
 */
export async function publishCodesFile(
  filePath: string,
  commitMessage: string,
  target: PublishTarget
): Promise<PublishResult> {
  const { user, repo, token } = target;
  if (!user || !repo || !token) {
    console.log("[Publish] GitHub credentials incomplete; skipping upload.");
    return { status: "skipped", message: "GitHub credentials incomplete; skipping upload." };
  }

  const destName = path.basename(filePath);
  const repoPath = `/repos/${encodeURIComponent(user)}/${encodeURIComponent(repo)}`;
  const contentPath = `${repoPath}/contents/${encodeURIComponent(destName)}`;
  const client = createClient(target.apiUrl ?? DEFAULT_API_URL, token);

  try {
    const content = await readFile(filePath, "utf-8");
    const encoded = Buffer.from(content, "utf-8").toString("base64");

    let branch = target.branch;
    if (!branch) {
      const info = await client.find<{ default_branch?: string }>(repoPath);
      if (!info) throw new PublishError(`Repository ${user}/${repo} not found`, 404);
      branch = info.default_branch || "main";
    }

    // Some repositories answer 404 here until their first commit.
    const branches = await client.find<unknown[]>(`${repoPath}/branches?per_page=1`);
    if (!branches || branches.length === 0) {
      let message: string;
      try {
        await client.send("PUT", contentPath, { message: commitMessage, content: encoded, branch });
        message = `Bootstrapped ${user}/${repo}@${branch} with ${destName}.`;
      } catch (createErr) {
        console.warn("[Publish] Contents API create failed on empty repository", {
          error: errorMessage(createErr),
        });
        try {
          await bootstrapWithGitData(client, repoPath, destName, content, commitMessage, branch);
        } catch (err) {
          const failure = `GitHub upload failed during empty-repo bootstrap: ${errorMessage(err)}`;
          console.error("[Publish]", failure);
          return { status: "failed", message: failure };
        }
        message = `Bootstrapped empty repo and added ${destName} to ${user}/${repo}@${branch}.`;
      }
      console.log("[Publish]", message);
      return { status: "published", message };
    }

    const existing = await client.find<ShaResponse>(
      `${contentPath}?ref=${encodeURIComponent(branch)}`
    );

    await client.send("PUT", contentPath, {
      message: commitMessage,
      content: encoded,
      branch,
      ...(existing?.sha ? { sha: existing.sha } : {}),
    });

    const verb = existing?.sha ? "Updated" : "Created";
    const message = `${verb} ${destName} in ${user}/${repo}@${branch}.`;
    console.log("[Publish]", message);
    return { status: "published", message };
  } catch (err) {
    const message =
      err instanceof PublishError && (err.status === 401 || err.status === 403)
        ? AUTH_HINT
        : `GitHub upload failed: ${errorMessage(err)}`;
    console.error("[Publish]", message);
    return { status: "failed", message };
  }
}
