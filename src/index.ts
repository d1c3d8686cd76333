export { createArchive, isValidCompressionLevel } from "./archive/archiver.js";
export type { ArchiveOptions, ArchiveResult } from "./archive/archiver.js";
export { RunConfigSchema, loadConfig } from "./core/config.js";
export type { RunConfig, RunConfigInput } from "./core/config.js";
export * from "./core/errors.js";
export { createEventBus } from "./core/event-bus.js";
export type { HoardEventBus, HoardEvents } from "./core/event-bus.js";
export type * from "./core/types.js";
export { TaskDispatcher, synthesizeDescriptor } from "./discovery/dispatcher.js";
export { GitHubListingClient, parseLastPage, readRateLimit } from "./discovery/github-client.js";
export type { ListingPage, RepositoryListingClient } from "./discovery/github-client.js";
export { parseNameReference } from "./discovery/names.js";
export { discoverOwner } from "./discovery/worker.js";
export { GitCloner } from "./download/cloner.js";
export type { CloneRequest, RepositoryCloner } from "./download/cloner.js";
export { DownloadCoordinator } from "./download/coordinator.js";
export type { DescriptorSink } from "./download/coordinator.js";
export { defaultArchiveName, runPipeline } from "./run/pipeline.js";
export { CompletionTracker } from "./run/tracker.js";
export type { PipelineDependencies } from "./run/pipeline.js";
