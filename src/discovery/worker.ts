import { setTimeout as delay } from "node:timers/promises";

import type { RepositoryDescriptor } from "../core/types.js";
import type { RepositoryListingClient } from "./github-client.js";

export interface DiscoverOwnerOptions {
  client: RepositoryListingClient;
  pageSize: number;
  /** Pause between successive page requests. */
  pageDelayMs: number;
  signal?: AbortSignal;
  /** Awaited for every repository, so a slow consumer holds back pagination. */
  onRepository: (repo: RepositoryDescriptor) => Promise<void>;
}

/**
 * Pages through one owner's repository listing until an empty page comes
 * back or the advertised last page has been consumed. Errors from the
 * client, rate limiting included, end the owner's discovery and propagate.
 *
 * @returns the number of repositories handed to `onRepository`
 */
export async function discoverOwner(owner: string, options: DiscoverOwnerOptions): Promise<number> {
  const { client, pageSize, pageDelayMs, signal, onRepository } = options;
  let lastPage: number | undefined;
  let found = 0;

  for (let page = 1; ; page += 1) {
    signal?.throwIfAborted();

    const result = await client.listPage(owner, page, pageSize);
    lastPage = result.lastPage ?? lastPage;

    if (result.repositories.length === 0) {
      break;
    }

    for (const repo of result.repositories) {
      found += 1;
      await onRepository(repo);
    }

    if (lastPage !== undefined && page >= lastPage) {
      break;
    }

    if (pageDelayMs > 0) {
      await delay(pageDelayMs, undefined, { signal });
    }
  }

  return found;
}
