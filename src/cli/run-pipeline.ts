#!/usr/bin/env node
import { Command } from "commander";
import * as dotenv from "dotenv";
import {
  DEFAULT_CONFIG_FILE,
  loadSettings,
  resolveGitHubAccess,
} from "../core/config";
import { isEventType, readTriggerEvent } from "../core/event-source";
import { runPipeline, type PipelineReport } from "../core/orchestrator";
import { evaluateTrigger } from "../core/trigger";
import { formatVersion } from "../core/version";
import { bumpVersionFile } from "../core/version-file";
import { createGitHubClient, GitHubRepository } from "../repository/github";
import { ConfigError } from "../types/errors";
import type { StageRun } from "../types/pipeline";

dotenv.config();

interface RunOptions {
  config?: string;
  eventType?: string;
  branch?: string;
  message?: string;
  sha?: string;
}

interface EvaluateOptions {
  message: string;
  eventType: string;
}

interface BumpOptions {
  file: string;
}

const program = new Command();

program
  .name("stagegate")
  .description("Gate build, deploy and release stages on the triggering event")
  .version("0.1.0");

program
  .command("run")
  .description("Run the pipeline for the current event")
  .option("-c, --config <file>", "pipeline config file", DEFAULT_CONFIG_FILE)
  .option(
    "--event-type <type>",
    "push or pull_request (default: GITHUB_EVENT_NAME)",
  )
  .option("--branch <name>", "branch of the event")
  .option("--message <text>", "head commit message")
  .option("--sha <sha>", "head commit SHA")
  .action(async (opts: RunOptions) => {
    const settings = loadSettings({ configFile: opts.config });
    const event = readTriggerEvent(process.env, {
      eventType: opts.eventType,
      branch: opts.branch,
      commitMessage: opts.message,
      commitSha: opts.sha,
    });
    const access = resolveGitHubAccess();
    const repository = new GitHubRepository(createGitHubClient(access), {
      owner: access.owner,
      repo: access.repo,
      versionFile: settings.versionFile,
      committer: settings.committer,
    });
    const report = await runPipeline(event, { settings, repository });
    printReport(report);
    if (!report.ok) process.exitCode = 1;
  });

program
  .command("evaluate")
  .description("Print the gate decisions for a commit message")
  .requiredOption("-m, --message <text>", "commit message")
  .option("--event-type <type>", "push or pull_request", "push")
  .action((opts: EvaluateOptions) => {
    if (!isEventType(opts.eventType)) {
      throw new ConfigError(`Unsupported event type ${opts.eventType}`);
    }
    const decisions = evaluateTrigger({
      eventType: opts.eventType,
      branch: "",
      commitMessage: opts.message,
      commitSha: "",
    });
    console.log(JSON.stringify(decisions, null, 2));
  });

program
  .command("bump <kind>")
  .description("Bump the local version file (minor or patch)")
  .option("-f, --file <file>", "version file", "VERSION")
  .action((kind: string, opts: BumpOptions) => {
    if (kind !== "minor" && kind !== "patch") {
      throw new ConfigError(`Bump kind must be minor or patch, got ${kind}`);
    }
    const { from, to } = bumpVersionFile(opts.file, kind);
    const change = `${formatVersion(from)} -> ${formatVersion(to)}`;
    console.log(`[stagegate] ${opts.file}: ${change}`);
  });

function printReport(report: PipelineReport): void {
  if (report.ignored) {
    console.log(
      `[stagegate] branch ${report.event.branch} is not watched, nothing ran`,
    );
    return;
  }
  for (const run of report.stages) {
    console.log(`[stagegate] ${run.stage}: ${run.outcome}${stageDetail(run)}`);
  }
  if (report.release) {
    const { released, next, release, pullRequest } = report.release;
    console.log(`[stagegate] released ${release.tagName}: ${release.url}`);
    console.log(
      `[stagegate] proposed ${formatVersion(next)} ` +
        `(was ${formatVersion(released)}): ${pullRequest.url}`,
    );
  }
}

function stageDetail(run: StageRun): string {
  if (run.error) return ` (${run.error.message})`;
  if (run.skipReason) return ` (${run.skipReason})`;
  return "";
}

program.parseAsync(process.argv).catch((err) => {
  console.error("[stagegate] failed:", err);
  process.exit(1);
});
