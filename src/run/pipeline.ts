import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";

import { createArchive } from "../archive/archiver.js";
import type { RunConfig } from "../core/config.js";
import { runError } from "../core/errors.js";
import { type HoardEventBus, createEventBus } from "../core/event-bus.js";
import type { RunSummary } from "../core/types.js";
import { toErrorMessage } from "../core/utils.js";
import { TaskDispatcher } from "../discovery/dispatcher.js";
import { GitHubListingClient, type RepositoryListingClient } from "../discovery/github-client.js";
import { GitCloner, type RepositoryCloner } from "../download/cloner.js";
import { DownloadCoordinator } from "../download/coordinator.js";
import { CompletionTracker } from "./tracker.js";

const WORK_DIR_PREFIX = "gh-hoard-";

export interface PipelineDependencies {
  client?: RepositoryListingClient;
  cloner?: RepositoryCloner;
  eventBus?: HoardEventBus;
  signal?: AbortSignal;
  now?: () => Date;
  cwd?: string;
}

export function defaultArchiveName(now: Date): string {
  return `gh-hoard-${Math.floor(now.getTime() / 1000)}.tar.gz`;
}

/**
 * Discovers, clones and archives everything `config.names` refers to.
 *
 * The working directory is always removed before returning. A cleanup
 * failure after an earlier error is reported as a warning; on an otherwise
 * successful run it becomes the run's error.
 */
export async function runPipeline(
  config: RunConfig,
  dependencies: PipelineDependencies = {},
): Promise<RunSummary> {
  const eventBus = dependencies.eventBus ?? createEventBus();
  const workDir = await mkdtemp(join(config.workRoot ?? tmpdir(), WORK_DIR_PREFIX));

  let summary: RunSummary;
  try {
    summary = await executeRun(config, dependencies, eventBus, workDir);
  } catch (error) {
    try {
      await rm(workDir, { recursive: true, force: true });
    } catch (cleanupError) {
      eventBus.emit("warning", {
        message: `Could not remove working directory ${workDir}: ${toErrorMessage(cleanupError)}`,
      });
    }
    throw error;
  }

  try {
    await rm(workDir, { recursive: true, force: true });
  } catch (cleanupError) {
    throw runError("WORKDIR_CLEANUP_FAILED", `Could not remove working directory ${workDir}`, {
      context: { workDir },
      cause: cleanupError,
    });
  }

  eventBus.emit("run:completed", { summary });
  return summary;
}

async function executeRun(
  config: RunConfig,
  dependencies: PipelineDependencies,
  eventBus: HoardEventBus,
  workDir: string,
): Promise<RunSummary> {
  const { signal } = dependencies;
  const tracker = new CompletionTracker();

  const coordinator = new DownloadCoordinator({
    cloner: dependencies.cloner ?? new GitCloner(),
    tracker,
    eventBus,
    workDir,
    exclude: new Set(config.exclude),
    cloneTimeoutMs: config.cloneTimeoutMs,
    recurseSubmodules: config.recurseSubmodules,
    authenticated: config.authenticated,
    concurrency: config.cloneConcurrency,
    launchDelayMs: config.launchDelayMs,
    capacity: config.queueCapacity,
    signal,
  });

  const dispatcher = new TaskDispatcher({
    client:
      dependencies.client ??
      new GitHubListingClient({ token: config.authenticated ? config.token : undefined }),
    sink: coordinator,
    tracker,
    eventBus,
    workDir,
    pageSize: config.pageSize,
    launchDelayMs: config.launchDelayMs,
    concurrency: config.discoveryConcurrency,
    authenticated: config.authenticated,
    signal,
  });

  eventBus.emit("run:started", { workDir, names: config.names });

  const discovery = dispatcher.dispatch(config.names);
  await tracker.wait();
  await discovery;
  await coordinator.onIdle();

  if (signal?.aborted) {
    throw runError("RUN_ABORTED", "Run aborted before archiving", { context: { workDir } });
  }

  const { discovered, succeeded } = tracker.totals;
  if (succeeded === 0) {
    throw runError("NO_REPOSITORIES_DOWNLOADED", "No repositories were downloaded", {
      context: { discovered },
    });
  }

  const output = resolve(
    dependencies.cwd ?? process.cwd(),
    config.output ?? defaultArchiveName(dependencies.now?.() ?? new Date()),
  );
  eventBus.emit("archive:started", { output, succeeded });

  const archive = await createArchive({
    root: workDir,
    output,
    compressionLevel: config.compressionLevel,
    onWarning: (message) => eventBus.emit("warning", { message }),
  });
  eventBus.emit("archive:completed", archive);

  return { output: archive.output, owners: archive.owners, discovered, succeeded };
}
