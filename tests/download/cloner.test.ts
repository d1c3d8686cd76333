import { beforeEach, describe, expect, it, vi } from "vitest";

const gitMockState = vi.hoisted(() => {
  const git = {
    clone: vi.fn(async () => ""),
    env: vi.fn(),
  };
  git.env.mockReturnValue(git);
  return { simpleGit: vi.fn(), git };
});

vi.mock("simple-git", () => ({
  simpleGit: vi.fn((options?: Record<string, unknown>) => {
    gitMockState.simpleGit(options);
    return gitMockState.git;
  }),
}));

import { GitCloner, buildCloneArgs } from "../../src/download/cloner.js";

describe("buildCloneArgs", () => {
  it("keeps clones quiet and independent of the source object store", () => {
    expect(buildCloneArgs(false)).toEqual(["--quiet", "--no-hardlinks"]);
  });

  it("adds parallel submodule recursion when requested", () => {
    expect(buildCloneArgs(true)).toEqual([
      "--quiet",
      "--no-hardlinks",
      "--recurse-submodules",
      "--jobs",
      "16",
    ]);
  });
});

describe("GitCloner", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    gitMockState.git.env.mockReturnValue(gitMockState.git);
  });

  it("clones into the named directory from the owner directory", async () => {
    await new GitCloner().clone({
      url: "https://github.com/alice/repo-a.git",
      parentDir: "/work/alice",
      directory: "repo-a",
      recurseSubmodules: false,
    });

    expect(gitMockState.simpleGit).toHaveBeenCalledWith({ baseDir: "/work/alice" });
    expect(gitMockState.git.clone).toHaveBeenCalledWith(
      "https://github.com/alice/repo-a.git",
      "repo-a",
      ["--quiet", "--no-hardlinks"],
    );
  });

  it("disables interactive credential prompts", async () => {
    await new GitCloner().clone({
      url: "git@github.com:alice/secret.git",
      parentDir: "/work/alice",
      directory: "secret",
      recurseSubmodules: false,
    });

    expect(gitMockState.git.env).toHaveBeenCalledWith(
      expect.objectContaining({ GIT_TERMINAL_PROMPT: "0" }),
    );
  });

  it("passes the abort signal to the git process", async () => {
    const controller = new AbortController();

    await new GitCloner().clone({
      url: "https://github.com/alice/repo-a.git",
      parentDir: "/work/alice",
      directory: "repo-a",
      recurseSubmodules: true,
      signal: controller.signal,
    });

    expect(gitMockState.simpleGit).toHaveBeenCalledWith({
      baseDir: "/work/alice",
      abort: controller.signal,
    });
    expect(gitMockState.git.clone).toHaveBeenCalledWith(
      "https://github.com/alice/repo-a.git",
      "repo-a",
      buildCloneArgs(true),
    );
  });

  it("propagates git failures", async () => {
    gitMockState.git.clone.mockRejectedValueOnce(new Error("fatal: repository not found"));

    await expect(
      new GitCloner().clone({
        url: "https://github.com/alice/missing.git",
        parentDir: "/work/alice",
        directory: "missing",
        recurseSubmodules: false,
      }),
    ).rejects.toThrow("fatal: repository not found");
  });
});
