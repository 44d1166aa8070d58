import { setTimeout as delay } from "node:timers/promises";
import {
  GH_API,
  MAX_RETRIES,
  REPOS_PER_PAGE,
  RETRY_BASE_MS,
  USER_AGENT,
} from "./config.js";
import { encodeBase64 } from "./io.js";
import type {
  BlobResponse,
  CommitResponse,
  ContentListing,
  DeleteFileParams,
  GitHubApi,
  PutFileParams,
  RepoResponse,
  UserResponse,
} from "./types.js";

type HttpMethod = "GET" | "PUT" | "DELETE";

type RequestOptions = {
  method?: HttpMethod;
  body?: Record<string, unknown>;
};

export class GitHubApiError extends Error {
  constructor(readonly status: number, message: string) {
    super(message);
    this.name = "GitHubApiError";
  }
}

export function isNotFound(error: unknown): boolean {
  return error instanceof GitHubApiError && error.status === 404;
}

function buildHeaders(token: string): Record<string, string> {
  return {
    Accept: "application/vnd.github+json",
    "User-Agent": USER_AGENT,
    Authorization: `Bearer ${token}`,
  };
}

function extractApiMessage(text: string): string {
  try {
    const parsed: unknown = JSON.parse(text);
    if (
      typeof parsed === "object" &&
      parsed !== null &&
      "message" in parsed &&
      typeof parsed.message === "string"
    ) {
      return parsed.message;
    }
  } catch {
    // Not JSON; fall through to the raw body.
  }
  return text.trim() || "no response body";
}

export function encodeContentPath(path: string): string {
  return path
    .split("/")
    .filter((segment) => segment.length > 0)
    .map(encodeURIComponent)
    .join("/");
}

function contentsEndpoint(owner: string, repo: string, path: string): string {
  const encoded = encodeContentPath(path);
  const base = `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/contents`;
  return encoded ? `${base}/${encoded}` : base;
}

export class GitHubClient implements GitHubApi {
  private readonly headers: Record<string, string>;

  constructor(token: string, private readonly apiUrl: string = GH_API) {
    this.headers = buildHeaders(token);
  }

  private async request<T>(
    path: string,
    options: RequestOptions = {},
    attempt = 1
  ): Promise<T> {
    const method = options.method ?? "GET";
    // PUT and DELETE are sent once.
    const retryable = method === "GET";
    const headers = options.body
      ? { ...this.headers, "Content-Type": "application/json" }
      : this.headers;

    let response: Response;
    try {
      response = await fetch(`${this.apiUrl}${path}`, {
        method,
        headers,
        body: options.body ? JSON.stringify(options.body) : undefined,
      });
    } catch (error) {
      if (retryable && attempt <= MAX_RETRIES) {
        await delay(RETRY_BASE_MS * attempt);
        return this.request<T>(path, options, attempt + 1);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(
        `Network error contacting GitHub after ${attempt} attempt${attempt > 1 ? "s" : ""}: ${message}`
      );
    }

    const remainingHeader = response.headers.get("x-ratelimit-remaining");
    const remaining = remainingHeader === null ? Number.NaN : Number(remainingHeader);
    if (response.status === 403 && !Number.isNaN(remaining) && remaining <= 0) {
      const resetRaw = response.headers.get("x-ratelimit-reset");
      const resetTime = resetRaw ? new Date(Number(resetRaw) * 1000).toISOString() : "unknown reset";
      throw new GitHubApiError(
        403,
        `GitHub API rate limit exceeded. Please retry after ${resetTime}.`
      );
    }

    const shouldRetry = response.status === 429 || response.status >= 500;
    if (retryable && shouldRetry && attempt <= MAX_RETRIES) {
      await delay(RETRY_BASE_MS * attempt);
      return this.request<T>(path, options, attempt + 1);
    }

    if (!response.ok) {
      const text = await response.text();
      throw new GitHubApiError(
        response.status,
        `GitHub API error ${response.status}: ${extractApiMessage(text)}`
      );
    }

    return (await response.json()) as T;
  }

  async getAuthenticatedUser(): Promise<UserResponse> {
    return this.request<UserResponse>("/user");
  }

  async getRepository(owner: string, repo: string): Promise<RepoResponse> {
    return this.request<RepoResponse>(
      `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}`
    );
  }

  async listRepositories(): Promise<RepoResponse[]> {
    const repositories: RepoResponse[] = [];
    for (let page = 1; ; page += 1) {
      const batch = await this.request<RepoResponse[]>(
        `/user/repos?per_page=${REPOS_PER_PAGE}&page=${page}`
      );
      repositories.push(...batch);
      if (batch.length < REPOS_PER_PAGE) {
        return repositories;
      }
    }
  }

  async getContents(
    owner: string,
    repo: string,
    path: string,
    ref?: string
  ): Promise<ContentListing> {
    const query = ref ? `?ref=${encodeURIComponent(ref)}` : "";
    return this.request<ContentListing>(
      `${contentsEndpoint(owner, repo, path)}${query}`
    );
  }

  async getBlob(owner: string, repo: string, sha: string): Promise<BlobResponse> {
    return this.request<BlobResponse>(
      `/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/git/blobs/${sha}`
    );
  }

  async putFile(
    owner: string,
    repo: string,
    path: string,
    params: PutFileParams
  ): Promise<CommitResponse> {
    const body: Record<string, unknown> = {
      message: params.message,
      content: encodeBase64(params.content),
    };
    if (params.sha) body.sha = params.sha;
    if (params.branch) body.branch = params.branch;

    return this.request<CommitResponse>(contentsEndpoint(owner, repo, path), {
      method: "PUT",
      body,
    });
  }

  async deleteFile(
    owner: string,
    repo: string,
    path: string,
    params: DeleteFileParams
  ): Promise<CommitResponse> {
    const body: Record<string, unknown> = {
      message: params.message,
      sha: params.sha,
    };
    if (params.branch) body.branch = params.branch;

    return this.request<CommitResponse>(contentsEndpoint(owner, repo, path), {
      method: "DELETE",
      body,
    });
  }
}
