import { MalformedVersionError } from "../types/errors";
import type { BumpKind, VersionState } from "../types/pipeline";
import type { RepositoryPort } from "../repository/port";

// no leading zeros, so the tag name always matches the stored text
const VERSION_PATTERN = /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)$/;

/**
 * Parses the version file contents. One trailing line break is accepted;
 * anything else that is not three canonical non-negative integers throws.
 */
export function parseVersion(raw: string): VersionState {
  const line = raw.replace(/\r?\n$/, "");
  const match = VERSION_PATTERN.exec(line);
  if (!match) {
    throw new MalformedVersionError(raw);
  }
  const [major, minor, patch] = match.slice(1).map(Number);
  if (![major, minor, patch].every(Number.isSafeInteger)) {
    throw new MalformedVersionError(raw);
  }
  return { major, minor, patch };
}

export function formatVersion(v: VersionState): string {
  return `${v.major}.${v.minor}.${v.patch}`;
}

export function nextVersion(v: VersionState, kind: BumpKind): VersionState {
  if (kind === "minor") {
    return { major: v.major, minor: v.minor + 1, patch: 0 };
  }
  return { major: v.major, minor: v.minor, patch: v.patch + 1 };
}

export function tagNameFor(v: VersionState): string {
  return `v${formatVersion(v)}`;
}

export class VersionLedger {
  constructor(private readonly repository: RepositoryPort) {}

  /** Reads the persisted version as of `ref`. */
  async current(ref: string): Promise<VersionState> {
    return parseVersion(await this.repository.readVersion(ref));
  }

  next(state: VersionState, kind: BumpKind): VersionState {
    return nextVersion(state, kind);
  }
}
