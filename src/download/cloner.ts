import { type SimpleGit, simpleGit } from "simple-git";

const SUBMODULE_JOBS = "16";

export interface CloneRequest {
  url: string;
  /** Directory `git` runs in; the owner's working directory. */
  parentDir: string;
  /** Name of the new clone inside `parentDir`. */
  directory: string;
  recurseSubmodules: boolean;
  signal?: AbortSignal;
}

export interface RepositoryCloner {
  clone(request: CloneRequest): Promise<void>;
}

export function buildCloneArgs(recurseSubmodules: boolean): string[] {
  const args = ["--quiet", "--no-hardlinks"];
  if (recurseSubmodules) {
    args.push("--recurse-submodules", "--jobs", SUBMODULE_JOBS);
  }
  return args;
}

/**
 * Clones through the `git` binary. The exit status is the only success
 * signal; aborting `signal` kills the child process.
 */
export class GitCloner implements RepositoryCloner {
  public async clone(request: CloneRequest): Promise<void> {
    const git = createGit(request.parentDir, request.signal);
    await git.clone(request.url, request.directory, buildCloneArgs(request.recurseSubmodules));
  }
}

/**
 * Create a `SimpleGit` instance with `GIT_TERMINAL_PROMPT=0` so a missing
 * credential fails the clone instead of waiting on a prompt.
 *
 * NOTE: `simple-git`'s `.env(...)` **replaces** the entire process
 * environment.  We must spread `process.env` so the child git process still
 * has `HOME`, `PATH`, `SSH_AUTH_SOCK`, etc.
 */
function createGit(baseDir: string, signal?: AbortSignal): SimpleGit {
  return simpleGit({
    baseDir,
    ...(signal ? { abort: signal } : {}),
  }).env({ ...process.env, GIT_TERMINAL_PROMPT: "0" });
}
