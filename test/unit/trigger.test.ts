import { expect } from "chai";
import { evaluateTrigger } from "../../src/core/trigger";
import type { EventType, TriggerEvent } from "../../src/types/pipeline";

function push(
  commitMessage: string,
  eventType: EventType = "push",
): TriggerEvent {
  return { eventType, branch: "main", commitMessage, commitSha: "sha123" };
}

describe("evaluateTrigger", () => {
  it("feat: messages bump minor, everything else bumps patch", () => {
    const bump = (message: string) => evaluateTrigger(push(message)).bumpKind;
    expect(bump("feat: add cache")).to.equal("minor");
    expect(bump("fix: handle empty title")).to.equal("patch");
    expect(bump("Feat: uppercase")).to.equal("patch");
    expect(bump(" feat: leading space")).to.equal("patch");
    expect(bump("")).to.equal("patch");
  });

  it("release: messages skip both deploy and release", () => {
    expect(evaluateTrigger(push("release: version update"))).to.deep.equal({
      runDeploy: false,
      runRelease: false,
      bumpKind: "patch",
    });
  });

  it("doc: and format: messages deploy without releasing", () => {
    for (const message of ["doc: fix typo", "format: reflow imports"]) {
      const d = evaluateTrigger(push(message));
      expect(d.runDeploy, message).to.equal(true);
      expect(d.runRelease, message).to.equal(false);
    }
  });

  it("other pushes deploy and release", () => {
    const decisions = evaluateTrigger(push("fix: release: mentioned later"));
    expect(decisions).to.deep.equal({
      runDeploy: true,
      runRelease: true,
      bumpKind: "patch",
    });
  });

  it("pull requests never deploy or release but still get a bump kind", () => {
    const decisions = evaluateTrigger(push("feat: preview", "pull_request"));
    expect(decisions).to.deep.equal({
      runDeploy: false,
      runRelease: false,
      bumpKind: "minor",
    });
  });

  it("gives the same decisions for the same event", () => {
    const event = push("feat: add cache");
    expect(evaluateTrigger(event)).to.deep.equal(evaluateTrigger(event));
  });
});
