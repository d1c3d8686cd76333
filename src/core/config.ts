import { z } from "zod";

import { configError } from "./errors.js";

/** zlib's "use the library default" level. */
export const DEFAULT_COMPRESSION_LEVEL = -1;
export const DEFAULT_CLONE_TIMEOUT_MS = 600_000;
export const DEFAULT_LAUNCH_DELAY_MS = 250;
export const MAX_PAGE_SIZE = 100;

export const RunConfigSchema = z
  .object({
    // Malformed tokens, empty ones included, fail their own task only.
    names: z.array(z.string()).min(1),
    output: z.string().min(1).optional(),
    /** Parent of the temporary working directory; defaults to the OS temp dir. */
    workRoot: z.string().min(1).optional(),
    // Range is checked by the archiver, which falls back instead of failing.
    compressionLevel: z.number().int().default(DEFAULT_COMPRESSION_LEVEL),
    /** `0` disables the per-clone deadline. */
    cloneTimeoutMs: z.number().int().min(0).default(DEFAULT_CLONE_TIMEOUT_MS),
    recurseSubmodules: z.boolean().default(false),
    authenticated: z.boolean().default(false),
    token: z.string().min(1).optional(),
    exclude: z.array(z.string().min(1)).default([]),
    launchDelayMs: z.number().int().min(0).default(DEFAULT_LAUNCH_DELAY_MS),
    pageSize: z.number().int().min(1).max(MAX_PAGE_SIZE).default(MAX_PAGE_SIZE),
    discoveryConcurrency: z.number().int().positive().default(4),
    cloneConcurrency: z.number().int().positive().default(8),
    queueCapacity: z.number().int().positive().default(64),
  })
  .strict();

export type RunConfig = z.output<typeof RunConfigSchema>;
export type RunConfigInput = z.input<typeof RunConfigSchema>;

export function loadConfig(config: unknown): RunConfig {
  const parsed = RunConfigSchema.safeParse(config);

  if (!parsed.success) {
    throw configError("CONFIG_INVALID", "Invalid run configuration", {
      context: {
        issues: parsed.error.issues.map((issue) => ({
          code: issue.code,
          message: issue.message,
          path: issue.path.join("."),
        })),
      },
    });
  }

  if (parsed.data.authenticated && !parsed.data.token) {
    throw configError(
      "CONFIG_SECRET_MISSING",
      "Authenticated mode is enabled but no GitHub token was provided",
    );
  }

  return parsed.data;
}
