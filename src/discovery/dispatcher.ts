import { mkdir } from "node:fs/promises";
import { join } from "node:path";

import PQueue from "p-queue";

import { toHoardError } from "../core/errors.js";
import type { HoardEventBus } from "../core/event-bus.js";
import type { DiscoverySource, DiscoveryTask, RepositoryDescriptor } from "../core/types.js";
import type { DescriptorSink } from "../download/coordinator.js";
import type { CompletionTracker } from "../run/tracker.js";
import type { RepositoryListingClient } from "./github-client.js";
import { parseNameReference } from "./names.js";
import { discoverOwner } from "./worker.js";

export interface TaskDispatcherOptions {
  client: RepositoryListingClient;
  sink: DescriptorSink;
  tracker: CompletionTracker;
  eventBus: HoardEventBus;
  workDir: string;
  pageSize: number;
  /** Minimum spacing between task launches; also used between page requests. */
  launchDelayMs: number;
  concurrency: number;
  /** Marks directly named repositories private so their SSH URL is used. */
  authenticated: boolean;
  signal?: AbortSignal;
}

/**
 * Turns input tokens into discovery tasks. Owner tokens page through the
 * owner's listing; `owner/repo` tokens skip the listing and enqueue a
 * single descriptor.
 */
export class TaskDispatcher {
  private readonly queue: PQueue;
  /** Lower-cased full names already handed to the sink. */
  private readonly accepted = new Set<string>();

  public constructor(private readonly options: TaskDispatcherOptions) {
    this.queue = new PQueue({
      concurrency: Math.max(1, options.concurrency),
      interval: options.launchDelayMs,
      intervalCap: 1,
    });
  }

  /**
   * Seeds the tracker with one unit per token before anything starts, then
   * schedules the tasks. Resolves once every task has finished.
   */
  public dispatch(tokens: readonly string[]): Promise<void> {
    this.options.tracker.seed(tokens.length);

    return Promise.all(tokens.map((token) => this.queue.add(() => this.runTask(token)))).then(
      () => undefined,
    );
  }

  private async runTask(token: string): Promise<void> {
    const { tracker, eventBus, signal } = this.options;

    try {
      if (signal?.aborted) {
        return;
      }

      const task: DiscoveryTask = parseNameReference(token);
      await mkdir(join(this.options.workDir, task.owner), { recursive: true, mode: 0o700 });

      if (task.kind === "repo") {
        await this.accept(synthesizeDescriptor(task, this.options.authenticated), "direct");
        return;
      }

      const count = await discoverOwner(task.owner, {
        client: this.options.client,
        pageSize: this.options.pageSize,
        pageDelayMs: this.options.launchDelayMs,
        signal,
        onRepository: (repo) => this.accept(repo, "listing"),
      });
      eventBus.emit("owner:discovered", { owner: task.owner, count });
    } catch (error) {
      if (!signal?.aborted) {
        eventBus.emit("task:failed", {
          token,
          error: toHoardError(error, "LISTING_FAILED", `Discovery failed for ${token}.`),
        });
      }
    } finally {
      tracker.release();
    }
  }

  /**
   * Forwards each repository once. A repository reached twice, through a
   * repeated token or an owner listing plus its own `owner/repo` pair, would
   * otherwise be cloned into the same directory a second time.
   */
  private async accept(repo: RepositoryDescriptor, source: DiscoverySource): Promise<void> {
    const key = repo.fullName.toLowerCase();
    if (this.accepted.has(key)) {
      this.options.eventBus.emit("repo:skipped", { repo, reason: "duplicate" });
      return;
    }
    this.accepted.add(key);

    this.options.tracker.track();
    this.options.eventBus.emit("repo:discovered", { repo, source });
    await this.options.sink.submit(repo);
  }
}

/**
 * Builds a descriptor for a directly named repository without asking the
 * API. Visibility is unknown, so it follows the authentication mode.
 */
export function synthesizeDescriptor(
  task: { owner: string; repo: string },
  authenticated: boolean,
): RepositoryDescriptor {
  const fullName = `${task.owner}/${task.repo}`;

  return {
    cloneUrl: `https://github.com/${fullName}.git`,
    sshUrl: `git@github.com:${fullName}.git`,
    fullName,
    name: task.repo,
    owner: task.owner,
    isPrivate: authenticated,
  };
}
