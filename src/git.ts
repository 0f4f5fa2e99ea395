import {
  probeVersion,
  type CommandResult,
  type CommandRunner,
  type VersionProbe,
} from "./process.js";

const VERSION_TIMEOUT_MS = 5_000;
const LS_REMOTE_TIMEOUT_MS = 15_000;

export function getGitVersion(runner: CommandRunner): Promise<VersionProbe> {
  return probeVersion(runner, "git", VERSION_TIMEOUT_MS);
}

export function cloneRepo(
  runner: CommandRunner,
  url: string,
  dest: string
): Promise<CommandResult> {
  return runner.run("git", ["clone", url, dest], { stream: true });
}

export function lsRemote(runner: CommandRunner, url: string): Promise<CommandResult> {
  return runner.run("git", ["ls-remote", "--heads", url], { timeoutMs: LS_REMOTE_TIMEOUT_MS });
}
