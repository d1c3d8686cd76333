import chalk, { Chalk, type ChalkInstance } from "chalk";
import { InvalidArgumentError } from "commander";
import ora, { type Ora } from "ora";

import { splitList } from "../core/utils.js";

const DURATION_PATTERN = /^(\d+)(ms|s|m|h)?$/;
const DURATION_UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

// ── UI helpers ──────────────────────────────────────────────

export function createUi(color: boolean): ChalkInstance {
  const noColorEnv = Object.prototype.hasOwnProperty.call(process.env, "NO_COLOR");
  const colorEnabled = color && !noColorEnv;

  return new Chalk({ level: colorEnabled ? chalk.level : 0 });
}

/**
 * Creates a spinner when output is interactive.
 * Pass `true` to suppress the spinner (e.g. in quiet mode).
 */
export function createSpinner(suppress: boolean, text: string): Ora | null {
  if (suppress) {
    return null;
  }

  return ora({ text, color: "blue" }).start();
}

// ── Parsing helpers ─────────────────────────────────────────

export function parseInteger(value: string): number {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`Expected an integer but received "${value}".`);
  }

  return Number.parseInt(trimmed, 10);
}

/**
 * Parses `"0"`, `"1500ms"`, `"30s"`, `"10m"` or `"2h"` into milliseconds.
 * A bare number is taken as seconds.
 */
export function parseDuration(value: string): number {
  const match = value.trim().match(DURATION_PATTERN);
  if (!match) {
    throw new InvalidArgumentError(
      `Expected a duration such as "30s", "10m" or "0" but received "${value}".`,
    );
  }

  const amount = Number.parseInt(match[1], 10);
  const unit = match[2] ?? "s";
  return amount * DURATION_UNIT_MS[unit];
}

export function parseExcludeList(value: string, previous: string[] = []): string[] {
  return [...previous, ...splitList(value)];
}

// ── Formatting helpers ──────────────────────────────────────

export function formatInteger(value: number): string {
  return new Intl.NumberFormat("en-US").format(value);
}
