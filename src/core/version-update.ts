import type { OpenedPullRequest, VersionState } from "../types/pipeline";
import type { RepositoryPort } from "../repository/port";
import { logger } from "../observability/logger";
import { formatVersion } from "./version";

export const VERSION_UPDATE_COMMIT_MESSAGE = "release: version update";

export interface VersionUpdateOptions {
  mainline: string;
  title: string;
  body: string;
}

export function versionUpdateBranch(version: VersionState): string {
  return `version-update-${formatVersion(version)}`;
}

export class BranchPRAutomator {
  constructor(
    private readonly repository: RepositoryPort,
    private readonly opts: VersionUpdateOptions,
  ) {}

  /**
   * Commits `newVersion` to a fresh version-update branch cut from `fromSha`
   * and opens a pull request for it against the mainline.
   */
  async proposeVersionUpdate(
    newVersion: VersionState,
    fromSha: string,
  ): Promise<OpenedPullRequest> {
    const branch = versionUpdateBranch(newVersion);
    await this.repository.createBranch(branch, fromSha);
    const commitSha = await this.repository.writeVersion(
      branch,
      `${formatVersion(newVersion)}\n`,
      VERSION_UPDATE_COMMIT_MESSAGE,
    );
    logger.info(
      "version_update",
      `Committed ${formatVersion(newVersion)} to ${branch}`,
      { commitSha },
    );

    const pr = await this.repository.openPullRequest({
      headBranch: branch,
      baseBranch: this.opts.mainline,
      title: this.opts.title,
      body: this.opts.body,
    });
    logger.info("version_update", `Opened pull request #${pr.number}`, {
      url: pr.url,
    });
    return pr;
  }
}
