import type { ChalkInstance } from "chalk";
import type { Ora } from "ora";

import type { HoardEventBus } from "../core/event-bus.js";
import type { RunMessage } from "../core/types.js";
import { createSpinner, formatInteger } from "./helpers.js";

export type Verbosity = "quiet" | "normal" | "verbose";

export interface ReporterOptions {
  verbosity: Verbosity;
  ui: ChalkInstance;
  /** Show a spinner while archiving. */
  interactive: boolean;
  write?: (line: string) => void;
  writeError?: (line: string) => void;
}

export function shouldPrint(message: RunMessage, verbosity: Verbosity): boolean {
  switch (message.kind) {
    case "error":
      return true;
    case "warning":
      return verbosity !== "quiet";
    case "info":
      if (verbosity === "quiet") return false;
      return message.terse || verbosity === "verbose";
  }
}

export function formatMessage(message: RunMessage, ui: ChalkInstance): string {
  switch (message.kind) {
    case "info":
      return message.text;
    case "warning":
      return ui.yellow(`warning: ${message.text}`);
    case "error":
      return ui.red(`fail: ${message.error.message}`);
  }
}

/**
 * The single sink for run output. Translates bus events into
 * `RunMessage`s and prints the ones the verbosity allows.
 *
 * @returns a function that stops any spinner still running
 */
export function attachReporter(eventBus: HoardEventBus, options: ReporterOptions): () => void {
  const write = options.write ?? ((line: string) => console.log(line));
  const writeError = options.writeError ?? ((line: string) => console.error(line));
  let spinner: Ora | null = null;

  const emit = (message: RunMessage): void => {
    if (!shouldPrint(message, options.verbosity)) {
      return;
    }

    const line = formatMessage(message, options.ui);
    if (message.kind === "info") {
      write(line);
    } else {
      writeError(line);
    }
  };

  eventBus.on("run:started", ({ workDir }) => {
    emit({ kind: "info", text: `using the working directory ${workDir}`, terse: false });
  });
  eventBus.on("task:failed", ({ error }) => {
    emit({ kind: "error", error });
  });
  eventBus.on("owner:discovered", ({ owner, count }) => {
    emit({ kind: "info", text: `found ${formatInteger(count)} repos for ${owner}`, terse: true });
  });
  eventBus.on("repo:discovered", ({ repo, source }) => {
    if (source === "direct") {
      emit({ kind: "info", text: `added individual repo ${repo.fullName}`, terse: false });
    }
  });
  eventBus.on("repo:skipped", ({ repo, reason }) => {
    emit({ kind: "info", text: `skipped ${repo.fullName} (${reason})`, terse: false });
  });
  eventBus.on("repo:cloned", ({ repo }) => {
    emit({ kind: "info", text: `downloaded repo ${repo.fullName}`, terse: false });
  });
  eventBus.on("repo:failed", ({ error }) => {
    emit({ kind: "error", error });
  });
  eventBus.on("warning", ({ message }) => {
    emit({ kind: "warning", text: message });
  });
  eventBus.on("archive:started", ({ succeeded }) => {
    const text = `downloaded ${formatInteger(succeeded)} repositories, archiving...`;
    spinner = createSpinner(!options.interactive || options.verbosity === "quiet", text);
    if (!spinner) {
      emit({ kind: "info", text, terse: true });
    }
  });
  eventBus.on("archive:completed", ({ output }) => {
    const text = `archive created: ${output}`;
    if (spinner) {
      spinner.succeed(text);
      spinner = null;
      return;
    }
    emit({ kind: "info", text, terse: true });
  });

  return () => {
    spinner?.stop();
    spinner = null;
  };
}
