import type { GateDecisions, TriggerEvent } from "../types/pipeline";

/**
 * Commit-message prefixes that steer the pipeline. Case-sensitive, matched
 * at the start of the message only.
 */
export const GATE_PREFIXES = {
  feature: "feat:",
  doc: "doc:",
  format: "format:",
  release: "release:",
} as const;

const RELEASE_SKIP_PREFIXES: readonly string[] = [
  GATE_PREFIXES.doc,
  GATE_PREFIXES.format,
  GATE_PREFIXES.release,
];

function startsWithAny(message: string, prefixes: readonly string[]): boolean {
  return prefixes.some((p) => message.startsWith(p));
}

/**
 * Turns a trigger event into the gate decisions of one run.
 * Pure: the same event always gives the same decisions.
 */
export function evaluateTrigger(event: TriggerEvent): GateDecisions {
  const message = event.commitMessage ?? "";
  const runDeploy =
    event.eventType === "push" && !message.startsWith(GATE_PREFIXES.release);
  const runRelease =
    runDeploy && !startsWithAny(message, RELEASE_SKIP_PREFIXES);
  return {
    runDeploy,
    runRelease,
    bumpKind: message.startsWith(GATE_PREFIXES.feature) ? "minor" : "patch",
  };
}
