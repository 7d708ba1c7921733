import { execSync } from "node:child_process";

export function headSha(cwd: string = process.cwd()): string {
  return git(cwd, "rev-parse HEAD").trim();
}

export function commitMessage(
  sha: string,
  cwd: string = process.cwd(),
): string {
  return git(cwd, `log -1 --format=%B ${sha}`).trimEnd();
}

function git(cwd: string, command: string): string {
  return execSync(`git ${command}`, {
    cwd,
    stdio: ["ignore", "pipe", "pipe"],
  }).toString();
}
