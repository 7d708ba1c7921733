import { execSync } from "node:child_process";
import * as path from "node:path";
import { StageExecutionError } from "../types/errors";
import { logger } from "../observability/logger";

export interface StepSpec {
  name: string;
  workingDirectory?: string;
  run: string[];
  env?: Record<string, string>;
}

export interface StepInvocation {
  stage: string;
  step: StepSpec;
  /** Resolved environment for the step, layered over process.env. */
  env: Record<string, string>;
}

export type StepRunner = (invocation: StepInvocation) => Promise<void>;

/** Runs step commands through the shell, relative to `rootDir`. */
export function createShellRunner(
  rootDir: string = process.cwd(),
): StepRunner {
  return async ({ stage, step, env }) => {
    const cwd = path.resolve(rootDir, step.workingDirectory ?? ".");
    for (const command of step.run) {
      logger.info("step", `${stage}/${step.name}: ${command}`, { cwd });
      try {
        execSync(command, {
          cwd,
          env: { ...process.env, ...env },
          stdio: "inherit",
        });
      } catch (err) {
        throw new StageExecutionError(
          stage,
          step.name,
          command,
          exitStatus(err),
        );
      }
    }
  };
}

function exitStatus(err: unknown): number | null {
  if (typeof err === "object" && err !== null && "status" in err) {
    return typeof err.status === "number" ? err.status : null;
  }
  return null;
}
