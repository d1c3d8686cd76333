import { rm } from "node:fs/promises";
import { join } from "node:path";

import PQueue from "p-queue";

import { type HoardError, downloadError, toHoardError } from "../core/errors.js";
import type { HoardEventBus } from "../core/event-bus.js";
import type { RepositoryDescriptor } from "../core/types.js";
import { toErrorMessage } from "../core/utils.js";
import type { CompletionTracker } from "../run/tracker.js";
import type { RepositoryCloner } from "./cloner.js";

export interface DescriptorSink {
  /** Resolves once the descriptor is accepted; may wait while the queue is full. */
  submit(repo: RepositoryDescriptor): Promise<void>;
}

export interface DownloadCoordinatorOptions {
  cloner: RepositoryCloner;
  tracker: CompletionTracker;
  eventBus: HoardEventBus;
  workDir: string;
  exclude: ReadonlySet<string>;
  /** Per-clone deadline; `0` disables it. */
  cloneTimeoutMs: number;
  recurseSubmodules: boolean;
  /** Clone private repositories through their SSH URL. */
  authenticated: boolean;
  concurrency: number;
  launchDelayMs: number;
  /** Clones allowed to wait in the queue before `submit` blocks. */
  capacity: number;
  signal?: AbortSignal;
}

export class DownloadCoordinator implements DescriptorSink {
  private readonly queue: PQueue;

  public constructor(private readonly options: DownloadCoordinatorOptions) {
    this.queue = new PQueue({
      concurrency: Math.max(1, options.concurrency),
      interval: options.launchDelayMs,
      intervalCap: 1,
    });
  }

  public async submit(repo: RepositoryDescriptor): Promise<void> {
    const { tracker, eventBus } = this.options;

    if (this.options.exclude.has(repo.fullName)) {
      eventBus.emit("repo:skipped", { repo, reason: "excluded" });
      tracker.release();
      return;
    }

    await this.queue.onSizeLessThan(Math.max(1, this.options.capacity));
    // download() settles every outcome itself, including the tracker release.
    void this.queue.add(() => this.download(repo));
  }

  public onIdle(): Promise<void> {
    return this.queue.onIdle();
  }

  private async download(repo: RepositoryDescriptor): Promise<void> {
    const { tracker, eventBus, signal } = this.options;

    try {
      if (signal?.aborted) {
        eventBus.emit("repo:skipped", { repo, reason: "aborted" });
        return;
      }

      await this.cloneWithDeadline(repo);
      tracker.recordSuccess();
      eventBus.emit("repo:cloned", { repo });
    } catch (error) {
      eventBus.emit("repo:failed", {
        repo,
        error: toHoardError(error, "CLONE_FAILED", `${repo.fullName}: ${toErrorMessage(error)}`),
      });
    } finally {
      tracker.release();
    }
  }

  private async cloneWithDeadline(repo: RepositoryDescriptor): Promise<void> {
    const { cloneTimeoutMs, signal } = this.options;
    const deadline = cloneTimeoutMs > 0 ? AbortSignal.timeout(cloneTimeoutMs) : undefined;
    const signals = [signal, deadline].filter(
      (candidate): candidate is AbortSignal => candidate !== undefined,
    );
    const parentDir = join(this.options.workDir, repo.owner);

    try {
      await this.options.cloner.clone({
        url: this.options.authenticated && repo.isPrivate ? repo.sshUrl : repo.cloneUrl,
        parentDir,
        directory: repo.name,
        recurseSubmodules: this.options.recurseSubmodules,
        signal: signals.length > 0 ? AbortSignal.any(signals) : undefined,
      });
    } catch (error) {
      await this.removePartialClone(join(parentDir, repo.name));
      throw this.classify(repo, error, deadline?.aborted === true);
    }
  }

  private async removePartialClone(path: string): Promise<void> {
    try {
      await rm(path, { recursive: true, force: true });
    } catch (cleanupError) {
      this.options.eventBus.emit("warning", {
        message: `Could not remove partial clone at ${path}: ${toErrorMessage(cleanupError)}`,
      });
    }
  }

  private classify(repo: RepositoryDescriptor, cause: unknown, timedOut: boolean): HoardError {
    const context = { repo: repo.fullName };

    if (timedOut) {
      return downloadError(
        "CLONE_TIMEOUT",
        `${repo.fullName}: clone timed out after ${this.options.cloneTimeoutMs}ms`,
        { context, cause },
      );
    }

    if (this.options.signal?.aborted) {
      return downloadError("CLONE_ABORTED", `${repo.fullName}: clone aborted`, { context, cause });
    }

    return downloadError("CLONE_FAILED", `${repo.fullName}: ${toErrorMessage(cause)}`, {
      context,
      cause,
    });
  }
}
