import * as fs from "node:fs";
import { ConfigError, describeError } from "../types/errors";
import type { EventType, TriggerEvent } from "../types/pipeline";
import * as git from "./git";

export interface EventOverrides {
  eventType?: string;
  branch?: string;
  commitMessage?: string;
  commitSha?: string;
}

export interface CommitLookup {
  headSha(): string;
  commitMessage(sha: string): string;
}

const localCheckout: CommitLookup = {
  headSha: () => git.headSha(),
  commitMessage: (sha) => git.commitMessage(sha),
};

type Env = Record<string, string | undefined>;

export function isEventType(value: string | undefined): value is EventType {
  return value === "push" || value === "pull_request";
}

/**
 * Builds the trigger event from a GitHub Actions environment. Explicit
 * overrides win; a commit SHA or message the environment does not carry is
 * looked up in the local checkout.
 */
export function readTriggerEvent(
  env: Env = process.env,
  overrides: EventOverrides = {},
  commits: CommitLookup = localCheckout,
): TriggerEvent {
  const eventType = overrides.eventType ?? env["GITHUB_EVENT_NAME"];
  if (!isEventType(eventType)) {
    throw new ConfigError(
      `Unsupported event type ${JSON.stringify(eventType ?? "")}; ` +
        "expected push or pull_request",
    );
  }
  const payload = readPayload(env["GITHUB_EVENT_PATH"]);

  // pull_request runs are keyed by the branch they target
  const branch =
    overrides.branch ??
    (eventType === "pull_request"
      ? env["GITHUB_BASE_REF"]
      : env["GITHUB_REF_NAME"]);
  if (!branch) {
    throw new ConfigError(
      `Cannot determine the branch of the ${eventType} event`,
    );
  }

  const commitSha =
    overrides.commitSha ??
    env["GITHUB_SHA"] ??
    stringAt(payload, ["after"]) ??
    commits.headSha();
  const commitMessage =
    overrides.commitMessage ??
    stringAt(payload, ["head_commit", "message"]) ??
    commits.commitMessage(commitSha);

  return { eventType, branch, commitMessage, commitSha };
}

function readPayload(file: string | undefined): unknown {
  if (!file) return undefined;
  try {
    return JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (err) {
    throw new ConfigError(
      `Cannot read event payload ${file}: ${describeError(err)}`,
    );
  }
}

function stringAt(obj: unknown, keys: string[]): string | undefined {
  let cur: unknown = obj;
  for (const key of keys) {
    if (!isRecord(cur)) return undefined;
    cur = cur[key];
  }
  return typeof cur === "string" ? cur : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
