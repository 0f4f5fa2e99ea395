import {
  probeVersion,
  succeeded,
  type CommandResult,
  type CommandRunner,
  type VersionProbe,
} from "./process.js";

const VERSION_TIMEOUT_MS = 5_000;
const LIST_TIMEOUT_MS = 30_000;

export interface PackageRef {
  name: string;
  cask: boolean;
}

export function getBrewVersion(runner: CommandRunner): Promise<VersionProbe> {
  return probeVersion(runner, "brew", VERSION_TIMEOUT_MS);
}

function listArgs(pkg: PackageRef): string[] {
  return pkg.cask ? ["list", "--cask", pkg.name] : ["list", pkg.name];
}

export function installArgs(pkg: PackageRef): string[] {
  return pkg.cask ? ["install", "--cask", pkg.name] : ["install", pkg.name];
}

/** `brew list` exits 0 only for installed packages; any other outcome counts as not installed. */
export async function isInstalled(runner: CommandRunner, pkg: PackageRef): Promise<boolean> {
  const result = await runner.run("brew", listArgs(pkg), { timeoutMs: LIST_TIMEOUT_MS });
  return succeeded(result);
}

export function installPackage(runner: CommandRunner, pkg: PackageRef): Promise<CommandResult> {
  return runner.run("brew", installArgs(pkg), { stream: true });
}

export function updateIndex(runner: CommandRunner): Promise<CommandResult> {
  return runner.run("brew", ["update"], { stream: true });
}
