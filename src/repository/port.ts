import type {
  OpenedPullRequest,
  PublishedRelease,
  PullRequestRequest,
  Release,
  Tag,
} from "../types/pipeline";

/**
 * Everything the pipeline mutates in the source repository: the version
 * file, tags, releases, branches and pull requests. Implementations own the
 * storage; the orchestration logic only talks to this port.
 */
export interface RepositoryPort {
  /** Raw contents of the version file at `ref` (branch name or commit SHA). */
  readVersion(ref: string): Promise<string>;
  /** Commits `content` as the version file on `branch`; returns its SHA. */
  writeVersion(
    branch: string,
    content: string,
    message: string,
  ): Promise<string>;
  /** Throws TagAlreadyExistsError when `tag.name` is taken. */
  createTag(tag: Tag): Promise<void>;
  createRelease(release: Release): Promise<PublishedRelease>;
  /** Throws BranchAlreadyExistsError when `name` is taken. */
  createBranch(name: string, fromSha: string): Promise<void>;
  openPullRequest(request: PullRequestRequest): Promise<OpenedPullRequest>;
}
