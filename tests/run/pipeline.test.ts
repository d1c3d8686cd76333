import { access, mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { list } from "tar";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { loadConfig } from "../../src/core/config.js";
import { createEventBus } from "../../src/core/event-bus.js";
import type { RepositoryDescriptor } from "../../src/core/types.js";
import type { ListingPage } from "../../src/discovery/github-client.js";
import type { CloneRequest } from "../../src/download/cloner.js";
import { defaultArchiveName, runPipeline } from "../../src/run/pipeline.js";

const NOW = new Date(1_700_000_000_000);

function makeRepo(owner: string, name: string): RepositoryDescriptor {
  return {
    cloneUrl: `https://github.com/${owner}/${name}.git`,
    sshUrl: `git@github.com:${owner}/${name}.git`,
    fullName: `${owner}/${name}`,
    name,
    owner,
    isPrivate: false,
  };
}

const aliceListing: ListingPage = {
  repositories: [makeRepo("alice", "repo-a"), makeRepo("alice", "repo-b")],
  lastPage: 1,
};

const client = {
  listPage: vi.fn(async (owner: string): Promise<ListingPage> => {
    return owner === "alice" ? aliceListing : { repositories: [] };
  }),
};

async function writeCheckout(request: CloneRequest): Promise<void> {
  const target = join(request.parentDir, request.directory);
  await mkdir(target, { recursive: true });
  await writeFile(join(target, "README.md"), `# ${request.directory}\n`);
}

/** Fails like `git clone` when the target directory already has content. */
async function gitLikeClone(request: CloneRequest): Promise<void> {
  const target = join(request.parentDir, request.directory);
  if ((await exists(target)) && (await readdir(target)).length > 0) {
    throw new Error(
      `destination path '${request.directory}' already exists and is not an empty directory`,
    );
  }
  await writeCheckout(request);
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function listFiles(file: string): Promise<string[]> {
  const paths: string[] = [];
  await list({
    file,
    onReadEntry: (entry) => {
      if (entry.type === "File") {
        paths.push(entry.path);
      }
    },
  });
  return paths.sort();
}

let sandbox: string;

beforeEach(async () => {
  sandbox = await mkdtemp(join(tmpdir(), "pipeline-test-"));
  vi.clearAllMocks();
});

afterEach(async () => {
  await rm(sandbox, { recursive: true, force: true });
});

function makeConfig(overrides: Record<string, unknown> = {}) {
  return loadConfig({
    names: ["alice", "bob/repo1"],
    workRoot: sandbox,
    launchDelayMs: 0,
    ...overrides,
  });
}

describe("runPipeline", () => {
  it("archives listed and directly named repositories", async () => {
    const clone = vi.fn(writeCheckout);
    const eventBus = createEventBus();
    let workDir = "";
    eventBus.on("run:started", (event) => {
      workDir = event.workDir;
    });

    const summary = await runPipeline(makeConfig(), {
      client,
      cloner: { clone },
      eventBus,
      cwd: sandbox,
      now: () => NOW,
    });

    expect(summary).toEqual({
      output: join(sandbox, "gh-hoard-1700000000.tar.gz"),
      owners: ["alice", "bob"],
      discovered: 3,
      succeeded: 3,
    });
    expect(clone).toHaveBeenCalledTimes(3);
    expect(await listFiles(summary.output)).toEqual([
      "alice/repo-a/README.md",
      "alice/repo-b/README.md",
      "bob/repo1/README.md",
    ]);
    expect(workDir.startsWith(join(sandbox, "gh-hoard-"))).toBe(true);
    expect(await exists(workDir)).toBe(false);
  });

  it("leaves excluded and failed repositories out of the archive", async () => {
    const clone = vi.fn(async (request: CloneRequest) => {
      if (request.directory === "repo1") {
        throw new Error("repository not found");
      }
      await writeCheckout(request);
    });

    const summary = await runPipeline(
      makeConfig({ exclude: ["alice/repo-b"], output: "backup.tar.gz" }),
      { client, cloner: { clone }, cwd: sandbox, now: () => NOW },
    );

    expect(summary.output).toBe(join(sandbox, "backup.tar.gz"));
    expect(summary.owners).toEqual(["alice"]);
    expect(summary.discovered).toBe(3);
    expect(summary.succeeded).toBe(1);
    expect(await listFiles(summary.output)).toEqual(["alice/repo-a/README.md"]);
  });

  it("fails without an archive when nothing was downloaded", async () => {
    const clone = vi.fn(async () => {
      throw new Error("exit status 128");
    });

    await expect(
      runPipeline(makeConfig(), { client, cloner: { clone }, cwd: sandbox, now: () => NOW }),
    ).rejects.toMatchObject({
      code: "NO_REPOSITORIES_DOWNLOADED",
      context: { discovered: 3 },
    });
    expect(await readdir(sandbox)).toEqual([]);
  });

  it("stops before archiving when the run is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const clone = vi.fn(writeCheckout);

    await expect(
      runPipeline(makeConfig(), {
        client,
        cloner: { clone },
        cwd: sandbox,
        signal: controller.signal,
      }),
    ).rejects.toMatchObject({ code: "RUN_ABORTED" });
    expect(clone).not.toHaveBeenCalled();
    expect(await readdir(sandbox)).toEqual([]);
  });

  it("clones a repeated repository token once", async () => {
    const clone = vi.fn(gitLikeClone);
    const eventBus = createEventBus();
    const skipped: string[] = [];
    const failed: string[] = [];
    eventBus.on("repo:skipped", ({ repo, reason }) => skipped.push(`${repo.fullName} ${reason}`));
    eventBus.on("repo:failed", ({ repo }) => failed.push(repo.fullName));

    const summary = await runPipeline(makeConfig({ names: ["alice/x", "alice/x"] }), {
      client,
      cloner: { clone },
      eventBus,
      cwd: sandbox,
      now: () => NOW,
    });

    expect(clone).toHaveBeenCalledTimes(1);
    expect(skipped).toEqual(["alice/x duplicate"]);
    expect(failed).toEqual([]);
    expect(summary).toMatchObject({ owners: ["alice"], discovered: 1, succeeded: 1 });
    expect(await listFiles(summary.output)).toEqual(["alice/x/README.md"]);
  });

  it("clones a listed repository once when it is also named directly", async () => {
    const clone = vi.fn(gitLikeClone);
    const eventBus = createEventBus();
    const skipped: string[] = [];
    eventBus.on("repo:skipped", ({ repo, reason }) => skipped.push(`${repo.fullName} ${reason}`));

    const summary = await runPipeline(makeConfig({ names: ["alice", "alice/repo-a"] }), {
      client,
      cloner: { clone },
      eventBus,
      cwd: sandbox,
      now: () => NOW,
    });

    expect(clone).toHaveBeenCalledTimes(2);
    expect(skipped).toEqual(["alice/repo-a duplicate"]);
    expect(summary).toMatchObject({ discovered: 2, succeeded: 2 });
    expect(await listFiles(summary.output)).toEqual([
      "alice/repo-a/README.md",
      "alice/repo-b/README.md",
    ]);
  });

  it("reports an empty name token without stopping the run", async () => {
    const eventBus = createEventBus();
    const failedTokens: string[] = [];
    eventBus.on("task:failed", ({ token }) => failedTokens.push(token));

    const summary = await runPipeline(makeConfig({ names: ["bob/repo1", ""] }), {
      client,
      cloner: { clone: writeCheckout },
      eventBus,
      cwd: sandbox,
      now: () => NOW,
    });

    expect(failedTokens).toEqual([""]);
    expect(summary.succeeded).toBe(1);
  });

  it("reports invalid names without stopping the run", async () => {
    const eventBus = createEventBus();
    const failedTokens: string[] = [];
    eventBus.on("task:failed", ({ token }) => failedTokens.push(token));

    const summary = await runPipeline(makeConfig({ names: ["a/b/c", "bob/repo1"] }), {
      client,
      cloner: { clone: writeCheckout },
      eventBus,
      cwd: sandbox,
      now: () => NOW,
    });

    expect(failedTokens).toEqual(["a/b/c"]);
    expect(summary.succeeded).toBe(1);
    expect(summary.owners).toEqual(["bob"]);
  });
});

describe("defaultArchiveName", () => {
  it("stamps the name with whole seconds", () => {
    expect(defaultArchiveName(new Date(1_700_000_000_999))).toBe("gh-hoard-1700000000.tar.gz");
  });
});
