import { execFileSync } from "node:child_process";

import { password } from "@inquirer/prompts";

export interface ResolveTokenOptions {
  env?: Record<string, string | undefined>;
  /** Ask on the terminal, input hidden, when no other source has a token. */
  interactive?: boolean;
}

/**
 * Finds a GitHub token for authenticated mode.
 * Tries: GITHUB_TOKEN → GH_TOKEN → `gh auth token` → a masked prompt.
 */
export async function resolveGitHubToken(
  options: ResolveTokenOptions = {},
): Promise<string | undefined> {
  const env = options.env ?? process.env;

  const githubToken = env.GITHUB_TOKEN?.trim();
  if (githubToken) {
    return githubToken;
  }

  const ghToken = env.GH_TOKEN?.trim();
  if (ghToken) {
    return ghToken;
  }

  const cliToken = readGhCliToken();
  if (cliToken) {
    return cliToken;
  }

  if (!options.interactive) {
    return undefined;
  }

  const entered = await password({ message: "GitHub token:", mask: true });
  const trimmed = entered.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function readGhCliToken(): string | undefined {
  try {
    const token = execFileSync("gh", ["auth", "token"], {
      timeout: 5_000,
      encoding: "utf-8",
      stdio: ["ignore", "pipe", "ignore"],
    }).trim();

    return token.length > 0 ? token : undefined;
  } catch {
    // gh not installed or not authenticated
    return undefined;
  }
}
