import { readFileSync } from "node:fs";

import { Command, Option } from "commander";

import { type RunConfig, loadConfig } from "../core/config.js";
import { createEventBus } from "../core/event-bus.js";
import type { RunSummary } from "../core/types.js";
import { isRecord } from "../core/utils.js";
import { runPipeline } from "../run/pipeline.js";
import { resolveGitHubToken } from "./github-auth.js";
import { createUi, parseDuration, parseExcludeList, parseInteger } from "./helpers.js";
import { type Verbosity, attachReporter } from "./reporter.js";

export interface CliOptions {
  level: number;
  quiet?: boolean;
  verbose?: boolean;
  submodules?: boolean;
  timeout: number;
  auth?: boolean;
  exclude: string[];
  output?: string;
  delay?: number;
  concurrency?: number;
  color: boolean;
}

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(
      readFileSync(new URL("../../package.json", import.meta.url), "utf8"),
    );
    return isRecord(pkg) && typeof pkg.version === "string" ? pkg.version : "0.0.0";
  } catch {
    return "0.0.0";
  }
}

export function resolveVerbosity(options: Pick<CliOptions, "quiet" | "verbose">): Verbosity {
  if (options.quiet) return "quiet";
  if (options.verbose) return "verbose";
  return "normal";
}

export function toRunConfig(names: string[], options: CliOptions, token?: string): RunConfig {
  return loadConfig({
    names,
    output: options.output,
    compressionLevel: options.level,
    cloneTimeoutMs: options.timeout,
    recurseSubmodules: options.submodules === true,
    authenticated: options.auth === true,
    token,
    exclude: options.exclude,
    ...(options.delay !== undefined ? { launchDelayMs: options.delay } : {}),
    ...(options.concurrency !== undefined ? { cloneConcurrency: options.concurrency } : {}),
  });
}

export async function runArchiveCommand(names: string[], options: CliOptions): Promise<RunSummary> {
  const ui = createUi(options.color);
  const token = options.auth
    ? await resolveGitHubToken({ interactive: process.stdin.isTTY === true })
    : undefined;
  const config = toRunConfig(names, options, token);

  const eventBus = createEventBus();
  const stopReporter = attachReporter(eventBus, {
    verbosity: resolveVerbosity(options),
    ui,
    interactive: process.stdout.isTTY === true,
  });

  const controller = new AbortController();
  const onInterrupt = (): void => {
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    return await runPipeline(config, { eventBus, signal: controller.signal });
  } finally {
    process.off("SIGINT", onInterrupt);
    stopReporter();
  }
}

export async function createCliProgram(): Promise<Command> {
  const program = new Command();

  program
    .name("gh-hoard")
    .description("Clone every repository of the given GitHub accounts into one tar.gz archive")
    .version(readVersion())
    .argument("<names...>", "owners (user or organization) or owner/repo pairs")
    .option("-l, --level <level>", "gzip compression level, -1 (default) to 9", parseInteger, -1)
    .addOption(new Option("-q, --quiet", "only print errors").conflicts("verbose"))
    .addOption(new Option("-v, --verbose", "print every repository event").conflicts("quiet"))
    .option("-s, --submodules", "recursively clone submodules")
    .option("-t, --timeout <duration>", 'git clone timeout, "0" for none', parseDuration, 600_000)
    .option("-a, --auth", "use a GitHub token; includes private repositories")
    .option("-x, --exclude <names>", "comma-separated owner/repo names to skip", parseExcludeList, [])
    .option("-o, --output <file>", "archive path (default: gh-hoard-<unix time>.tar.gz)")
    .option("--delay <ms>", "pause between task and clone launches", parseInteger)
    .option("--concurrency <n>", "maximum simultaneous clones", parseInteger)
    .option("--no-color", "Disable ANSI colors")
    .action(async (names: string[], options: CliOptions) => {
      const summary = await runArchiveCommand(names, options);
      if (!options.quiet) {
        console.log(
          `${summary.succeeded} of ${summary.discovered} repositories archived to ${summary.output}`,
        );
      }
    });

  program.addHelpText(
    "after",
    `\nExamples:
  $ gh-hoard octocat                      Archive every repository of octocat
  $ gh-hoard -a my-org other/tool         Include private repos, plus one named repo
  $ gh-hoard -x my-org/huge -t 30m my-org  Skip a repository, allow 30 minute clones`,
  );

  return program;
}

export async function runCli(argv: readonly string[] = process.argv): Promise<void> {
  const program = await createCliProgram();
  await program.parseAsync([...argv]);
}
