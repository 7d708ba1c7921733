import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "js-yaml";
import { z } from "zod";
import { ConfigError, describeError } from "../types/errors";
import type { Identity } from "../types/pipeline";
import type { StepSpec } from "./command-runner";

const stepSchema = z.object({
  name: z.string().min(1),
  workingDirectory: z.string().min(1).optional(),
  run: z.array(z.string().min(1)).min(1),
  env: z.record(z.coerce.string()).optional(),
});

const settingsSchema = z.object({
  mainline: z.string().min(1).default("main"),
  versionFile: z.string().min(1).default("VERSION"),
  watchedBranches: z.array(z.string().min(1)).optional(),
  committer: z
    .object({
      name: z.string().min(1).optional(),
      email: z.string().email().optional(),
    })
    .default({}),
  pullRequest: z
    .object({
      title: z.string().min(1).default("Version update"),
      body: z.string().default("Version update after release"),
    })
    .default({}),
  // account ids are often written unquoted
  environment: z.record(z.coerce.string()).default({}),
  build: z.array(stepSchema).default([]),
  deploy: z.array(stepSchema).default([]),
});

export interface PipelineSettings {
  mainline: string;
  versionFile: string;
  watchedBranches: string[];
  committer: Identity;
  pullRequest: { title: string; body: string };
  /** Deployment environment; values may hold ${VAR} placeholders. */
  environment: Record<string, string>;
  build: StepSpec[];
  deploy: StepSpec[];
}

export interface GitHubAccess {
  owner: string;
  repo: string;
  token: string;
}

type Env = Record<string, string | undefined>;

export const DEFAULT_CONFIG_FILE = "pipeline.yml";

export function parseSettings(
  source: string,
  env: Env = process.env,
): PipelineSettings {
  let doc: unknown;
  try {
    doc = yaml.load(source);
  } catch (err) {
    throw new ConfigError(
      `Pipeline config is not valid YAML: ${describeError(err)}`,
    );
  }
  const parsed = settingsSchema.safeParse(doc ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid pipeline config: ${issues}`);
  }
  const cfg = parsed.data;

  const name = env["PIPELINE_COMMITTER_NAME"] || cfg.committer.name;
  const email = env["PIPELINE_COMMITTER_EMAIL"] || cfg.committer.email;
  if (!name || !email) {
    throw new ConfigError(
      "Commit identity missing: set committer.name and committer.email " +
        "or PIPELINE_COMMITTER_NAME / PIPELINE_COMMITTER_EMAIL",
    );
  }

  return {
    mainline: cfg.mainline,
    versionFile: cfg.versionFile,
    watchedBranches: cfg.watchedBranches ?? [cfg.mainline],
    committer: { name, email },
    pullRequest: cfg.pullRequest,
    environment: cfg.environment,
    build: cfg.build,
    deploy: cfg.deploy,
  };
}

export interface LoadSettingsOptions {
  configFile?: string;
  cwd?: string;
  env?: Env;
}

export function loadSettings(
  opts: LoadSettingsOptions = {},
): PipelineSettings {
  const file = path.resolve(
    opts.cwd || process.cwd(),
    opts.configFile || DEFAULT_CONFIG_FILE,
  );
  let source: string;
  try {
    source = fs.readFileSync(file, "utf8");
  } catch (err) {
    throw new ConfigError(
      `Cannot read pipeline config ${file}: ${describeError(err)}`,
    );
  }
  return parseSettings(source, opts.env ?? process.env);
}

const PLACEHOLDER = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Substitutes ${VAR} placeholders from `env`. Deployment secrets are only
 * needed once deploy runs, so this is called at deploy time, not at load.
 */
export function resolveEnvironment(
  template: Record<string, string>,
  env: Env = process.env,
): Record<string, string> {
  const resolved: Record<string, string> = {};
  for (const [key, value] of Object.entries(template)) {
    resolved[key] = value.replace(PLACEHOLDER, (_match, name: string) => {
      const v = env[name];
      if (!v) {
        throw new ConfigError(
          `Environment variable ${name} (referenced by ${key}) is not set`,
        );
      }
      return v;
    });
  }
  return resolved;
}

export function resolveGitHubAccess(env: Env = process.env): GitHubAccess {
  const token = env["GITHUB_TOKEN"];
  if (!token) {
    throw new ConfigError("GITHUB_TOKEN is not set");
  }
  const [owner, repo, ...rest] = (env["GITHUB_REPOSITORY"] || "").split("/");
  if (!owner || !repo || rest.length) {
    throw new ConfigError("GITHUB_REPOSITORY must be set to owner/repo");
  }
  return { owner, repo, token };
}
