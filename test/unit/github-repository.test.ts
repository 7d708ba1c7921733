import { expect } from "chai";
import { TagReleasePublisher } from "../../src/core/publish";
import {
  createGitHubClient,
  GitHubRepository,
} from "../../src/repository/github";
import {
  BranchAlreadyExistsError,
  TagAlreadyExistsError,
  UnexpectedError,
} from "../../src/types/errors";
import { fakeGitHub, type FakeRoute } from "../helpers/fake-github";
import { rejectionOf } from "../helpers/async";
import { captureLogs } from "../helpers/logs";

const base = "/repos/acme/service";
const committer = {
  name: "Release Automation",
  email: "release@example.test",
};

function repository(routes: FakeRoute[]) {
  const api = fakeGitHub(routes);
  const client = createGitHubClient({ token: "test-token" }, api.fetch);
  const repo = new GitHubRepository(client, {
    owner: "acme",
    repo: "service",
    versionFile: "VERSION",
    committer,
  });
  return { repo, requests: api.requests };
}

function base64(text: string): string {
  return Buffer.from(text, "utf8").toString("base64");
}

function versionFile(text: string): FakeRoute {
  return {
    method: "GET",
    path: `${base}/contents/VERSION`,
    status: 200,
    body: {
      type: "file",
      encoding: "base64",
      content: base64(text),
      sha: "blob1",
    },
  };
}

const tagObjectCreated: FakeRoute = {
  method: "POST",
  path: `${base}/git/tags`,
  status: 201,
  body: { sha: "tagobj1" },
};

const refConflict: FakeRoute = {
  method: "POST",
  path: `${base}/git/refs`,
  status: 422,
  body: { message: "Reference already exists" },
};

const releaseTag = {
  name: "v1.4.2",
  commitSha: "sha123",
  message: "Release v1.4.2",
  tagger: committer,
};

describe("GitHubRepository", () => {
  captureLogs();

  it("reads the version file at a ref", async () => {
    const { repo, requests } = repository([versionFile("1.4.2\n")]);
    expect(await repo.readVersion("sha123")).to.equal("1.4.2\n");
    expect(requests[0].query.get("ref")).to.equal("sha123");
  });

  it("treats a missing version file as unexpected", async () => {
    const { repo } = repository([]);
    const err = await rejectionOf(repo.readVersion("sha123"));
    expect(err).to.be.instanceOf(UnexpectedError);
    expect(err).to.have.property("message", "VERSION not found at sha123");
  });

  it("creates an annotated tag and its ref", async () => {
    const { repo, requests } = repository([
      tagObjectCreated,
      {
        method: "POST",
        path: `${base}/git/refs`,
        status: 201,
        body: { ref: "refs/tags/v1.4.2" },
      },
    ]);
    await repo.createTag(releaseTag);
    expect(requests.map((r) => `${r.method} ${r.path}`)).to.deep.equal([
      `GET ${base}/git/ref/tags/v1.4.2`,
      `POST ${base}/git/tags`,
      `POST ${base}/git/refs`,
    ]);
    expect(requests[1].body).to.deep.equal({
      tag: "v1.4.2",
      message: "Release v1.4.2",
      object: "sha123",
      type: "commit",
      tagger: committer,
    });
    expect(requests[2].body).to.deep.equal({
      ref: "refs/tags/v1.4.2",
      sha: "tagobj1",
    });
  });

  it("never recreates an existing tag", async () => {
    const { repo, requests } = repository([
      {
        method: "GET",
        path: `${base}/git/ref/tags/v1.4.2`,
        status: 200,
        body: { ref: "refs/tags/v1.4.2" },
      },
    ]);
    const err = await rejectionOf(repo.createTag(releaseTag));
    expect(err).to.be.instanceOf(TagAlreadyExistsError);
    expect(requests).to.have.length(1);
  });

  it("maps a tag ref conflict to TagAlreadyExistsError", async () => {
    const { repo, requests } = repository([tagObjectCreated, refConflict]);
    const err = await rejectionOf(repo.createTag(releaseTag));
    expect(err).to.be.instanceOf(TagAlreadyExistsError);
    expect(err).to.have.property("tagName", "v1.4.2");
    expect(requests.map((r) => `${r.method} ${r.path}`)).to.deep.equal([
      `GET ${base}/git/ref/tags/v1.4.2`,
      `POST ${base}/git/tags`,
      `POST ${base}/git/refs`,
    ]);
  });

  it("publishes no release when the tag ref is taken", async () => {
    const { repo, requests } = repository([
      tagObjectCreated,
      refConflict,
      {
        method: "POST",
        path: `${base}/releases`,
        status: 201,
        body: { id: 11, html_url: "https://github.example/releases/v1.4.2" },
      },
    ]);
    const publisher = new TagReleasePublisher(repo, committer);
    const err = await rejectionOf(
      publisher.publish({ major: 1, minor: 4, patch: 2 }, "sha123", "fix: x"),
    );
    expect(err).to.be.instanceOf(TagAlreadyExistsError);
    expect(requests.map((r) => r.path)).not.to.include(`${base}/releases`);
  });

  it("maps a branch ref conflict to BranchAlreadyExistsError", async () => {
    const { repo } = repository([refConflict]);
    const err = await rejectionOf(
      repo.createBranch("version-update-1.5.0", "sha123"),
    );
    expect(err).to.be.instanceOf(BranchAlreadyExistsError);
    expect(err).to.have.property("branch", "version-update-1.5.0");
  });

  it("commits the version file over the existing blob", async () => {
    const { repo, requests } = repository([
      versionFile("1.4.2\n"),
      {
        method: "PUT",
        path: `${base}/contents/VERSION`,
        status: 200,
        body: { content: {}, commit: { sha: "commit9" } },
      },
    ]);
    const sha = await repo.writeVersion(
      "version-update-1.5.0",
      "1.5.0\n",
      "release: version update",
    );
    expect(sha).to.equal("commit9");
    expect(requests[0].query.get("ref")).to.equal("version-update-1.5.0");
    expect(requests[1].body).to.deep.equal({
      branch: "version-update-1.5.0",
      message: "release: version update",
      content: base64("1.5.0\n"),
      sha: "blob1",
      committer,
      author: committer,
    });
  });

  it("publishes a release and opens a pull request", async () => {
    const { repo, requests } = repository([
      {
        method: "POST",
        path: `${base}/releases`,
        status: 201,
        body: {
          id: 11,
          html_url: "https://github.example/acme/service/releases/tag/v1.4.2",
        },
      },
      {
        method: "POST",
        path: `${base}/pulls`,
        status: 201,
        body: {
          number: 7,
          html_url: "https://github.example/acme/service/pull/7",
        },
      },
    ]);
    const release = await repo.createRelease({
      tagName: "v1.4.2",
      notes: "feat: add cache",
    });
    expect(release).to.deep.equal({
      tagName: "v1.4.2",
      notes: "feat: add cache",
      id: 11,
      url: "https://github.example/acme/service/releases/tag/v1.4.2",
    });
    expect(requests[0].body).to.deep.equal({
      tag_name: "v1.4.2",
      name: "v1.4.2",
      body: "feat: add cache",
    });

    const pr = await repo.openPullRequest({
      headBranch: "version-update-1.5.0",
      baseBranch: "main",
      title: "Version update",
      body: "Version update after release",
    });
    expect(pr.number).to.equal(7);
    expect(requests[1].body).to.deep.equal({
      title: "Version update",
      body: "Version update after release",
      head: "version-update-1.5.0",
      base: "main",
    });
  });
});
