import { readdir, rm } from "node:fs/promises";
import { join } from "node:path";

import { create } from "tar";

import { DEFAULT_COMPRESSION_LEVEL } from "../core/config.js";
import { archiveError } from "../core/errors.js";
import { toErrorMessage } from "../core/utils.js";

export const MIN_COMPRESSION_LEVEL = -1;
export const MAX_COMPRESSION_LEVEL = 9;

export interface ArchiveOptions {
  /** Working root holding one directory per owner. */
  root: string;
  /** Path of the `.tar.gz` file to write. */
  output: string;
  compressionLevel: number;
  onWarning?: (message: string) => void;
}

export interface ArchiveResult {
  output: string;
  /** Owner directories written to the archive, sorted. */
  owners: string[];
}

export function isValidCompressionLevel(level: number): boolean {
  return Number.isInteger(level) && level >= MIN_COMPRESSION_LEVEL && level <= MAX_COMPRESSION_LEVEL;
}

/**
 * Writes every non-empty owner directory under `root` into one gzip tarball.
 * Entry names are relative to `root` and always use `/`. The output file is
 * removed again if anything fails.
 */
export async function createArchive(options: ArchiveOptions): Promise<ArchiveResult> {
  const { root, output } = options;
  let level = options.compressionLevel;

  if (!isValidCompressionLevel(level)) {
    options.onWarning?.(
      `Compression level ${level} is outside ${MIN_COMPRESSION_LEVEL}..${MAX_COMPRESSION_LEVEL}, using the default.`,
    );
    level = DEFAULT_COMPRESSION_LEVEL;
  }

  try {
    const owners = await listPopulatedOwners(root);
    await create({ file: output, cwd: root, gzip: { level }, portable: true }, owners);
    return { output, owners };
  } catch (error) {
    await rm(output, { force: true });
    throw archiveError("ARCHIVE_WRITE_FAILED", `Failed to write archive ${output}: ${toErrorMessage(error)}`, {
      context: { output, root },
      cause: error,
    });
  }
}

async function listPopulatedOwners(root: string): Promise<string[]> {
  const entries = await readdir(root, { withFileTypes: true });
  const owners: string[] = [];

  for (const entry of entries) {
    if (!entry.isDirectory()) continue;

    const cloned = await readdir(join(root, entry.name));
    if (cloned.length > 0) {
      owners.push(entry.name);
    }
  }

  return owners.sort();
}
