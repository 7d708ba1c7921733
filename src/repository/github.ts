import { Octokit } from "@octokit/rest";
import {
  BranchAlreadyExistsError,
  TagAlreadyExistsError,
  UnexpectedError,
} from "../types/errors";
import type {
  Identity,
  OpenedPullRequest,
  PublishedRelease,
  PullRequestRequest,
  Release,
  Tag,
} from "../types/pipeline";
import type { GitHubAccess } from "../core/config";
import { logger } from "../observability/logger";
import type { RepositoryPort } from "./port";

export interface GitHubRepositoryOptions {
  owner: string;
  repo: string;
  versionFile: string;
  committer: Identity;
}

export function createGitHubClient(
  access: Pick<GitHubAccess, "token">,
  fetchImpl?: typeof fetch,
): Octokit {
  return new Octokit({
    auth: access.token,
    userAgent: "stagegate",
    request: fetchImpl ? { fetch: fetchImpl } : undefined,
    // ref lookups answer 404 on the happy path; keep that out of the log
    log: {
      debug: () => undefined,
      info: () => undefined,
      warn: (message: string) => logger.warn("github", message),
      error: (message: string) => logger.error("github", message),
    },
  });
}

/** RepositoryPort backed by the GitHub REST API. */
export class GitHubRepository implements RepositoryPort {
  constructor(
    private readonly octokit: Octokit,
    private readonly opts: GitHubRepositoryOptions,
  ) {}

  private get coords(): { owner: string; repo: string } {
    return { owner: this.opts.owner, repo: this.opts.repo };
  }

  async readVersion(ref: string): Promise<string> {
    const file = await this.getVersionFile(ref);
    if (!file) {
      throw new UnexpectedError(`${this.opts.versionFile} not found at ${ref}`);
    }
    return Buffer.from(file.content, "base64").toString("utf8");
  }

  async writeVersion(
    branch: string,
    content: string,
    message: string,
  ): Promise<string> {
    const existing = await this.getVersionFile(branch);
    const { data } = await this.octokit.repos.createOrUpdateFileContents({
      ...this.coords,
      path: this.opts.versionFile,
      branch,
      message,
      content: Buffer.from(content, "utf8").toString("base64"),
      sha: existing?.sha,
      committer: this.opts.committer,
      author: this.opts.committer,
    });
    if (!data.commit.sha) {
      throw new UnexpectedError(
        `No commit returned for ${this.opts.versionFile} on ${branch}`,
      );
    }
    return data.commit.sha;
  }

  async createTag(tag: Tag): Promise<void> {
    if (await this.refExists(`tags/${tag.name}`)) {
      throw new TagAlreadyExistsError(tag.name);
    }
    const { data } = await this.octokit.git.createTag({
      ...this.coords,
      tag: tag.name,
      message: tag.message,
      object: tag.commitSha,
      type: "commit",
      tagger: tag.tagger,
    });
    await this.createRef(
      `refs/tags/${tag.name}`,
      data.sha,
      () => new TagAlreadyExistsError(tag.name),
    );
  }

  async createRelease(release: Release): Promise<PublishedRelease> {
    const { data } = await this.octokit.repos.createRelease({
      ...this.coords,
      tag_name: release.tagName,
      name: release.tagName,
      body: release.notes,
    });
    return { ...release, id: data.id, url: data.html_url };
  }

  async createBranch(name: string, fromSha: string): Promise<void> {
    if (await this.refExists(`heads/${name}`)) {
      throw new BranchAlreadyExistsError(name);
    }
    await this.createRef(
      `refs/heads/${name}`,
      fromSha,
      () => new BranchAlreadyExistsError(name),
    );
  }

  async openPullRequest(
    request: PullRequestRequest,
  ): Promise<OpenedPullRequest> {
    const { data } = await this.octokit.pulls.create({
      ...this.coords,
      title: request.title,
      body: request.body,
      head: request.headBranch,
      base: request.baseBranch,
    });
    return { ...request, number: data.number, url: data.html_url };
  }

  private async getVersionFile(
    ref: string,
  ): Promise<{ content: string; sha: string } | undefined> {
    try {
      const { data } = await this.octokit.repos.getContent({
        ...this.coords,
        path: this.opts.versionFile,
        ref,
      });
      if (Array.isArray(data) || data.type !== "file") {
        throw new UnexpectedError(
          `${this.opts.versionFile} is not a file at ${ref}`,
        );
      }
      return { content: data.content, sha: data.sha };
    } catch (err) {
      if (httpStatus(err) === 404) return undefined;
      throw err;
    }
  }

  private async refExists(ref: string): Promise<boolean> {
    try {
      await this.octokit.git.getRef({ ...this.coords, ref });
      return true;
    } catch (err) {
      if (httpStatus(err) === 404) return false;
      throw err;
    }
  }

  // 422 here means another writer created the ref since refExists looked
  private async createRef(
    ref: string,
    sha: string,
    conflict: () => Error,
  ): Promise<void> {
    try {
      await this.octokit.git.createRef({ ...this.coords, ref, sha });
    } catch (err) {
      if (httpStatus(err) === 422) throw conflict();
      throw err;
    }
  }
}

function httpStatus(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err) {
    return typeof err.status === "number" ? err.status : undefined;
  }
  return undefined;
}
