import { EventEmitter } from "eventemitter3";

import type { HoardError } from "./errors.js";
import type { DiscoverySource, RepositoryDescriptor, RunSummary, SkipReason } from "./types.js";

export interface HoardEvents {
  "run:started": { workDir: string; names: readonly string[] };
  "task:failed": { token: string; error: HoardError };
  "owner:discovered": { owner: string; count: number };
  "repo:discovered": { repo: RepositoryDescriptor; source: DiscoverySource };
  "repo:skipped": { repo: RepositoryDescriptor; reason: SkipReason };
  "repo:cloned": { repo: RepositoryDescriptor };
  "repo:failed": { repo: RepositoryDescriptor; error: HoardError };
  "archive:started": { output: string; succeeded: number };
  "archive:completed": { output: string; owners: string[] };
  "run:completed": { summary: RunSummary };
  warning: { message: string };
}

type HoardEventArgs = {
  [K in keyof HoardEvents]: [payload: HoardEvents[K]];
};

export type HoardEventBus = EventEmitter<HoardEventArgs>;

export function createEventBus(): HoardEventBus {
  return new EventEmitter<HoardEventArgs>();
}
