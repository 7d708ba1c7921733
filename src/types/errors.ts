export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
export class UnexpectedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnexpectedError";
  }
}
export class GateEvaluationError extends Error {
  constructor(
    public readonly stage: string,
    cause: unknown,
  ) {
    super(`Gate of stage "${stage}" threw: ${describeError(cause)}`);
    this.name = "GateEvaluationError";
  }
}
export class StageExecutionError extends Error {
  constructor(
    public readonly stage: string,
    public readonly step: string,
    public readonly command: string,
    public readonly exitCode: number | null,
  ) {
    super(
      `Stage "${stage}" step "${step}" failed ` +
        `(exit ${exitCode ?? "signal"}): ${command}`,
    );
    this.name = "StageExecutionError";
  }
}
export class MalformedVersionError extends Error {
  constructor(public readonly raw: string) {
    super(`Version value is not "major.minor.patch": ${JSON.stringify(raw)}`);
    this.name = "MalformedVersionError";
  }
}
export class TagAlreadyExistsError extends Error {
  constructor(public readonly tagName: string) {
    super(`Tag ${tagName} already exists`);
    this.name = "TagAlreadyExistsError";
  }
}
export class BranchAlreadyExistsError extends Error {
  constructor(public readonly branch: string) {
    super(`Branch ${branch} already exists`);
    this.name = "BranchAlreadyExistsError";
  }
}
// The tag is left in place; operators reconcile by hand.
export class ReleasePublicationError extends Error {
  constructor(
    public readonly tagName: string,
    cause: unknown,
  ) {
    super(
      `Tag ${tagName} was created but its release could not be published: ` +
        describeError(cause),
    );
    this.name = "ReleasePublicationError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
