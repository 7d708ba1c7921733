import { describeError } from "../types/errors";
import type {
  BumpKind,
  OpenedPullRequest,
  PublishedRelease,
  TriggerEvent,
  VersionState,
} from "../types/pipeline";
import { logger } from "../observability/logger";
import type { TagReleasePublisher } from "./publish";
import type { BranchPRAutomator } from "./version-update";
import { formatVersion, tagNameFor, type VersionLedger } from "./version";

export interface ReleaseOutcome {
  released: VersionState;
  next: VersionState;
  release: PublishedRelease;
  pullRequest: OpenedPullRequest;
}

export interface ReleaseCollaborators {
  ledger: VersionLedger;
  publisher: TagReleasePublisher;
  automator: BranchPRAutomator;
}

/**
 * Publishes the commit at its current (pre-bump) version, then proposes the
 * bumped version for review. Both versions are settled before anything is
 * written, so a malformed version file stops the run with no tag created.
 */
export async function performRelease(
  event: TriggerEvent,
  bumpKind: BumpKind,
  { ledger, publisher, automator }: ReleaseCollaborators,
): Promise<ReleaseOutcome> {
  const released = await ledger.current(event.commitSha);
  const next = ledger.next(released, bumpKind);
  logger.info(
    "release",
    `Releasing ${formatVersion(released)}, next ${formatVersion(next)}`,
    { bumpKind },
  );

  const release = await publisher.publish(
    released,
    event.commitSha,
    event.commitMessage,
  );
  try {
    const pullRequest = await automator.proposeVersionUpdate(
      next,
      event.commitSha,
    );
    return { released, next, release, pullRequest };
  } catch (err) {
    // tag and release stay published; no compensation
    logger.error("release", "Version update failed after publishing", {
      tagName: tagNameFor(released),
      releaseUrl: release.url,
      error: describeError(err),
    });
    throw err;
  }
}
