import { ConfigError, GateEvaluationError } from "../types/errors";
import type {
  SkipReason,
  StageDefinition,
  StageRun,
  TriggerEvent,
} from "../types/pipeline";
import { logger } from "../observability/logger";

/**
 * Orders stages so every stage comes after its dependencies. Among stages
 * that are ready at the same time the declaration order wins, so a linear
 * chain comes back as declared.
 */
export function orderStages(
  stages: readonly StageDefinition[],
): StageDefinition[] {
  const byName = new Map<string, StageDefinition>();
  for (const s of stages) {
    if (byName.has(s.name)) {
      throw new ConfigError(`Duplicate stage name: ${s.name}`);
    }
    byName.set(s.name, s);
  }
  for (const s of stages) {
    for (const dep of s.dependsOn) {
      if (!byName.has(dep)) {
        throw new ConfigError(
          `Stage "${s.name}" depends on unknown stage "${dep}"`,
        );
      }
    }
  }

  const ordered: StageDefinition[] = [];
  const placed = new Set<string>();
  while (ordered.length < stages.length) {
    const ready = stages.find(
      (s) =>
        !placed.has(s.name) && [...s.dependsOn].every((d) => placed.has(d)),
    );
    if (!ready) {
      const pending = stages
        .filter((s) => !placed.has(s.name))
        .map((s) => s.name);
      throw new ConfigError(
        `Stage dependency cycle among: ${pending.join(", ")}`,
      );
    }
    ordered.push(ready);
    placed.add(ready.name);
  }
  return ordered;
}

function skipped(stage: string, skipReason: SkipReason): StageRun {
  return { stage, outcome: "skipped", skipReason, durationMs: 0 };
}

/**
 * Runs the stages one after another, fail-fast. A false gate skips the stage
 * without failing the run; a failure skips every stage after it.
 */
export async function runStages(
  stages: readonly StageDefinition[],
  event: TriggerEvent,
): Promise<StageRun[]> {
  const runs: StageRun[] = [];
  let failed = false;

  for (const stage of orderStages(stages)) {
    // every dependency sits earlier in the order, so after a failure the
    // rest of the chain is downstream of it
    if (failed) {
      logger.info("stage", `Skipping ${stage.name}: upstream failure`);
      runs.push(skipped(stage.name, "upstream-failure"));
      continue;
    }

    let open: boolean;
    try {
      open = stage.gate(event);
    } catch (err) {
      const error = new GateEvaluationError(stage.name, err);
      logger.error("stage", error.message);
      runs.push({ stage: stage.name, outcome: "failed", error, durationMs: 0 });
      failed = true;
      continue;
    }
    if (!open) {
      logger.info("stage", `Skipping ${stage.name}: gate closed`);
      runs.push(skipped(stage.name, "gate"));
      continue;
    }

    const started = Date.now();
    logger.info("stage", `Running ${stage.name}`);
    try {
      await stage.execute(event);
      const durationMs = Date.now() - started;
      logger.info("stage", `${stage.name} succeeded`, { durationMs });
      runs.push({ stage: stage.name, outcome: "succeeded", durationMs });
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      const durationMs = Date.now() - started;
      logger.error("stage", `${stage.name} failed`, {
        error: error.message,
        errorName: error.name,
        durationMs,
      });
      runs.push({ stage: stage.name, outcome: "failed", error, durationMs });
      failed = true;
    }
  }
  return runs;
}
