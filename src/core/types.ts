import type { HoardError } from "./errors.js";

export type NameReference =
  | { kind: "owner"; owner: string }
  | { kind: "repo"; owner: string; repo: string };

/** One unit of dispatcher work, built from a single input token. */
export type DiscoveryTask = Readonly<NameReference>;

export interface RepositoryDescriptor {
  /** Anonymous HTTPS clone URL. */
  readonly cloneUrl: string;
  /** SSH clone URL, used for private repositories in authenticated mode. */
  readonly sshUrl: string;
  readonly fullName: string;
  /** Directory name inside the owner's working directory. */
  readonly name: string;
  /** The owner as given on input; names the working directory. */
  readonly owner: string;
  readonly isPrivate: boolean;
}

export type DiscoverySource = "listing" | "direct";

export type SkipReason = "excluded" | "duplicate" | "aborted";

export type RunMessage =
  | { kind: "info"; text: string; terse: boolean }
  | { kind: "warning"; text: string }
  | { kind: "error"; error: HoardError };

export interface RunTotals {
  discovered: number;
  succeeded: number;
}

export interface RunSummary extends RunTotals {
  output: string;
  owners: string[];
}
