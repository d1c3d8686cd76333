import { discoveryError } from "../core/errors.js";
import type { NameReference } from "../core/types.js";

const NAME_SEGMENT_PATTERN = /^[A-Za-z0-9_.-]+$/;

/**
 * Classifies a raw input token: `owner` or `owner/repo`. Anything else is
 * rejected with `INVALID_NAME`.
 */
export function parseNameReference(token: string): NameReference {
  const segments = token.trim().split("/");

  if (segments.length > 2 || !segments.every(isValidSegment)) {
    throw discoveryError("INVALID_NAME", `Invalid name "${token}": expected owner or owner/repo.`, {
      context: { token },
    });
  }

  const [owner, repo] = segments;
  if (segments.length === 1) {
    return { kind: "owner", owner };
  }

  return { kind: "repo", owner, repo };
}

function isValidSegment(segment: string): boolean {
  return NAME_SEGMENT_PATTERN.test(segment) && segment !== "." && segment !== "..";
}
