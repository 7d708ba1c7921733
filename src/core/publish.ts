import { ReleasePublicationError } from "../types/errors";
import type {
  Identity,
  PublishedRelease,
  VersionState,
} from "../types/pipeline";
import type { RepositoryPort } from "../repository/port";
import { logger } from "../observability/logger";
import { tagNameFor } from "./version";

export class TagReleasePublisher {
  constructor(
    private readonly repository: RepositoryPort,
    private readonly tagger: Identity,
  ) {}

  /**
   * Tags `commitSha` as v<version> and publishes a release for the tag.
   * Tags are never overwritten. A release failure leaves the tag behind.
   */
  async publish(
    version: VersionState,
    commitSha: string,
    notes: string,
  ): Promise<PublishedRelease> {
    const tagName = tagNameFor(version);
    await this.repository.createTag({
      name: tagName,
      commitSha,
      message: `Release ${tagName}`,
      tagger: this.tagger,
    });
    logger.info("publish", `Created tag ${tagName}`, { commitSha });

    try {
      const release = await this.repository.createRelease({ tagName, notes });
      logger.info("publish", `Published release ${tagName}`, {
        url: release.url,
      });
      return release;
    } catch (err) {
      const error = new ReleasePublicationError(tagName, err);
      logger.error("publish", error.message, { tagName });
      throw error;
    }
  }
}
