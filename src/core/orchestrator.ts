import type {
  GateDecisions,
  StageRun,
  TriggerEvent,
} from "../types/pipeline";
import type { RepositoryPort } from "../repository/port";
import { generateRunId, logger } from "../observability/logger";
import { createShellRunner, type StepRunner } from "./command-runner";
import type { PipelineSettings } from "./config";
import { TagReleasePublisher } from "./publish";
import { performRelease, type ReleaseOutcome } from "./release-flow";
import { runStages } from "./stage-graph";
import { createPipelineStages } from "./stages";
import { evaluateTrigger } from "./trigger";
import { VersionLedger } from "./version";
import { BranchPRAutomator } from "./version-update";

export interface PipelineDependencies {
  settings: PipelineSettings;
  repository: RepositoryPort;
  runStep?: StepRunner;
  /** Source of ${VAR} values in step settings; defaults to process.env. */
  env?: Record<string, string | undefined>;
  runId?: string;
}

export interface PipelineReport {
  runId: string;
  event: TriggerEvent;
  decisions: GateDecisions;
  /** True when the event's branch is not watched and nothing ran. */
  ignored: boolean;
  stages: StageRun[];
  release?: ReleaseOutcome;
  ok: boolean;
}

export async function runPipeline(
  event: TriggerEvent,
  deps: PipelineDependencies,
): Promise<PipelineReport> {
  const { settings, repository } = deps;
  const runId = deps.runId ?? generateRunId();
  logger.setContext({
    runId,
    commitSha: event.commitSha,
    branch: event.branch,
  });

  try {
    const decisions = evaluateTrigger(event);
    logger.info("trigger", "Gate decisions evaluated", {
      eventType: event.eventType,
      runDeploy: decisions.runDeploy,
      runRelease: decisions.runRelease,
      bumpKind: decisions.bumpKind,
    });

    if (!settings.watchedBranches.includes(event.branch)) {
      logger.info(
        "trigger",
        `Branch ${event.branch} is not watched, nothing to run`,
      );
      return { runId, event, decisions, ignored: true, stages: [], ok: true };
    }

    const collaborators = {
      ledger: new VersionLedger(repository),
      publisher: new TagReleasePublisher(repository, settings.committer),
      automator: new BranchPRAutomator(repository, {
        mainline: settings.mainline,
        title: settings.pullRequest.title,
        body: settings.pullRequest.body,
      }),
    };
    const outcome: { release?: ReleaseOutcome } = {};

    const stages = createPipelineStages({
      settings,
      runStep: deps.runStep ?? createShellRunner(),
      env: deps.env,
      release: async (e) => {
        outcome.release = await performRelease(
          e,
          decisions.bumpKind,
          collaborators,
        );
      },
    });
    const runs = await runStages(stages, event);
    const ok = runs.every((r) => r.outcome !== "failed");

    const summary = Object.fromEntries(runs.map((r) => [r.stage, r.outcome]));
    if (ok) logger.info("pipeline", "Pipeline finished", summary);
    else logger.error("pipeline", "Pipeline failed", summary);

    return {
      runId,
      event,
      decisions,
      ignored: false,
      stages: runs,
      release: outcome.release,
      ok,
    };
  } finally {
    logger.clearContext();
  }
}
