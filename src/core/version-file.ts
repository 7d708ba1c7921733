import * as fs from "node:fs";
import { ConfigError, describeError } from "../types/errors";
import type { BumpKind, VersionState } from "../types/pipeline";
import { formatVersion, nextVersion, parseVersion } from "./version";

export interface BumpResult {
  from: VersionState;
  to: VersionState;
}

/** Bumps a version file in the local working tree. */
export function bumpVersionFile(file: string, kind: BumpKind): BumpResult {
  let raw: string;
  try {
    raw = fs.readFileSync(file, "utf8");
  } catch (err) {
    throw new ConfigError(
      `Cannot read version file ${file}: ${describeError(err)}`,
    );
  }
  const from = parseVersion(raw);
  const to = nextVersion(from, kind);
  fs.writeFileSync(file, `${formatVersion(to)}\n`);
  return { from, to };
}
