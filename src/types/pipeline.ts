export type EventType = "push" | "pull_request";

export interface TriggerEvent {
  readonly eventType: EventType;
  readonly branch: string;
  readonly commitMessage: string;
  readonly commitSha: string;
}

export type BumpKind = "minor" | "patch";

export interface GateDecisions {
  runDeploy: boolean;
  runRelease: boolean;
  bumpKind: BumpKind;
}

export interface VersionState {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
}

export type StageOutcome = "skipped" | "succeeded" | "failed";

// gate: the stage's own gate was false (not a failure).
// upstream-failure: an earlier stage failed and the run was cut short.
export type SkipReason = "gate" | "upstream-failure";

export interface StageDefinition {
  name: string;
  dependsOn: ReadonlySet<string>;
  gate: (event: TriggerEvent) => boolean;
  execute: (event: TriggerEvent) => Promise<void>;
}

export interface StageRun {
  readonly stage: string;
  readonly outcome: StageOutcome;
  readonly skipReason?: SkipReason;
  readonly error?: Error;
  readonly durationMs: number;
}

export interface Identity {
  name: string;
  email: string;
}

export interface Tag {
  name: string;
  commitSha: string;
  message: string;
  tagger: Identity;
}

export interface Release {
  tagName: string;
  notes: string;
}

export interface PublishedRelease extends Release {
  id: number;
  url: string;
}

export interface PullRequestRequest {
  headBranch: string;
  baseBranch: string;
  title: string;
  body: string;
}

export interface OpenedPullRequest extends PullRequestRequest {
  number: number;
  url: string;
}
