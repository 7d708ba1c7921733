import type { StageDefinition, TriggerEvent } from "../types/pipeline";
import { resolveEnvironment, type PipelineSettings } from "./config";
import type { StepRunner, StepSpec } from "./command-runner";
import { evaluateTrigger } from "./trigger";

export const STAGE_BUILD = "build";
export const STAGE_DEPLOY = "deploy";
export const STAGE_RELEASE = "release";

export interface PipelineStageOptions {
  settings: PipelineSettings;
  runStep: StepRunner;
  release: (event: TriggerEvent) => Promise<void>;
  env?: Record<string, string | undefined>;
}

/** The build → deploy → release chain. */
export function createPipelineStages(
  opts: PipelineStageOptions,
): StageDefinition[] {
  const { settings, runStep } = opts;
  const env = opts.env ?? process.env;

  const runSteps = async (
    stage: string,
    steps: StepSpec[],
    extraEnv: () => Record<string, string>,
  ): Promise<void> => {
    const shared = extraEnv();
    for (const step of steps) {
      const stepEnv = step.env ? resolveEnvironment(step.env, env) : {};
      await runStep({ stage, step, env: { ...shared, ...stepEnv } });
    }
  };

  return [
    {
      name: STAGE_BUILD,
      dependsOn: new Set<string>(),
      gate: () => true,
      execute: () => runSteps(STAGE_BUILD, settings.build, () => ({})),
    },
    {
      name: STAGE_DEPLOY,
      dependsOn: new Set([STAGE_BUILD]),
      gate: (event) => evaluateTrigger(event).runDeploy,
      execute: () =>
        runSteps(STAGE_DEPLOY, settings.deploy, () =>
          resolveEnvironment(settings.environment, env),
        ),
    },
    {
      name: STAGE_RELEASE,
      dependsOn: new Set([STAGE_DEPLOY]),
      gate: (event) => evaluateTrigger(event).runRelease,
      execute: opts.release,
    },
  ];
}
