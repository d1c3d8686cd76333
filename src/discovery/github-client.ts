import { Octokit } from "@octokit/rest";

import { HoardError, discoveryError } from "../core/errors.js";
import type { RepositoryDescriptor } from "../core/types.js";
import { isRecord, toErrorMessage } from "../core/utils.js";

const LINK_PART_PATTERN = /<([^>]+)>\s*;\s*rel="([^"]+)"/g;

export interface ListingPage {
  repositories: RepositoryDescriptor[];
  /** Last page number advertised by the server, when it sent one. */
  lastPage?: number;
}

export interface RepositoryListingClient {
  listPage(owner: string, page: number, perPage: number): Promise<ListingPage>;
}

export interface RateLimitState {
  remaining?: number;
  resetAt?: Date;
}

export interface GitHubListingClientOptions {
  /** Switches to the search endpoint, which also lists private repositories. */
  token?: string;
  octokit?: Octokit;
}

interface ListedRepository {
  name: string;
  full_name: string;
  clone_url?: string;
  ssh_url?: string;
  private: boolean;
}

/**
 * Lists an owner's repositories one page at a time through the GitHub REST
 * API. Rate-limit exhaustion is checked on every response before its body is
 * read and surfaces as `RATE_LIMITED`; it is never retried here.
 */
export class GitHubListingClient implements RepositoryListingClient {
  private readonly octokit: Octokit;
  private readonly authenticated: boolean;

  public constructor(options: GitHubListingClientOptions = {}) {
    this.authenticated = options.token !== undefined;
    this.octokit = options.octokit ?? new Octokit({ auth: options.token });
  }

  public async listPage(owner: string, page: number, perPage: number): Promise<ListingPage> {
    let headers: Record<string, unknown>;
    let items: ListedRepository[];

    try {
      if (this.authenticated) {
        const response = await this.octokit.rest.search.repos({
          q: `user:${owner}`,
          per_page: perPage,
          page,
        });
        headers = response.headers;
        ensureQuota(owner, headers);
        items = response.data.items;
      } else {
        const response = await this.octokit.rest.repos.listForUser({
          username: owner,
          type: "owner",
          per_page: perPage,
          page,
        });
        headers = response.headers;
        ensureQuota(owner, headers);
        items = response.data;
      }
    } catch (error) {
      throw toListingError(owner, page, error);
    }

    return {
      repositories: items.map((item) => toDescriptor(owner, item)),
      lastPage: parseLastPage(readHeader(headers, "link")),
    };
  }
}

export function readRateLimit(headers: Record<string, unknown>): RateLimitState {
  const remaining = parseHeaderNumber(readHeader(headers, "x-ratelimit-remaining"));
  const reset = parseHeaderNumber(readHeader(headers, "x-ratelimit-reset"));

  return {
    remaining,
    resetAt: reset === undefined ? undefined : new Date(reset * 1000),
  };
}

/**
 * Extracts the page number of the `rel="last"` entry of a `Link` header.
 */
export function parseLastPage(link: string | undefined): number | undefined {
  if (!link) {
    return undefined;
  }

  for (const match of link.matchAll(LINK_PART_PATTERN)) {
    if (match[2] !== "last") continue;

    try {
      const page = Number.parseInt(new URL(match[1]).searchParams.get("page") ?? "", 10);
      return Number.isFinite(page) && page > 0 ? page : undefined;
    } catch {
      return undefined;
    }
  }

  return undefined;
}

function ensureQuota(owner: string, headers: Record<string, unknown>): void {
  const exhausted = rateLimitError(owner, headers);
  if (exhausted) {
    throw exhausted;
  }
}

function rateLimitError(owner: string, headers: Record<string, unknown>): HoardError | undefined {
  const { remaining, resetAt } = readRateLimit(headers);
  if (remaining !== 0) {
    return undefined;
  }

  const resetText = resetAt ? resetAt.toISOString() : "an unknown time";
  return discoveryError(
    "RATE_LIMITED",
    `GitHub API rate limit exhausted while listing ${owner}; it resets at ${resetText}.`,
    { context: { owner, resetAt: resetAt?.toISOString() } },
  );
}

function toListingError(owner: string, page: number, error: unknown): HoardError {
  if (error instanceof HoardError) {
    return error;
  }

  // Octokit rejects 403/429 responses, so their quota headers are read here.
  const headers = readErrorHeaders(error);
  const exhausted = headers ? rateLimitError(owner, headers) : undefined;
  if (exhausted) {
    return exhausted;
  }

  const status = isRecord(error) && typeof error.status === "number" ? error.status : undefined;
  return discoveryError(
    "LISTING_FAILED",
    `Failed to list repositories for ${owner} (page ${page}): ${toErrorMessage(error)}`,
    { context: { owner, page, status }, cause: error },
  );
}

function toDescriptor(owner: string, item: ListedRepository): RepositoryDescriptor {
  return {
    cloneUrl: item.clone_url ?? `https://github.com/${item.full_name}.git`,
    sshUrl: item.ssh_url ?? `git@github.com:${item.full_name}.git`,
    fullName: item.full_name,
    name: item.name,
    owner,
    isPrivate: item.private,
  };
}

function readErrorHeaders(error: unknown): Record<string, unknown> | undefined {
  if (!isRecord(error) || !isRecord(error.response) || !isRecord(error.response.headers)) {
    return undefined;
  }

  return error.response.headers;
}

function readHeader(headers: Record<string, unknown>, name: string): string | undefined {
  const value = headers[name];
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

function parseHeaderNumber(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}
