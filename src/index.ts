export * from "./core/trigger";
export * from "./core/event-source";
export * from "./core/version";
export * from "./core/version-file";
export * from "./core/stage-graph";
export * from "./core/stages";
export * from "./core/command-runner";
export * from "./core/publish";
export * from "./core/version-update";
export * from "./core/release-flow";
export * from "./core/orchestrator";
export * from "./core/config";
export * from "./repository/port";
export * from "./repository/github";
export * from "./observability/logger";
export * from "./types/pipeline";
export * from "./types/errors";
