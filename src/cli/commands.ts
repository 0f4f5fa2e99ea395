import fs from "fs/promises";
import path from "path";
import { fileURLToPath } from "url";
import { loadSettings, type Settings } from "../config.js";
import { SetupError, formatErrorMessage } from "../errors.js";
import {
  printDoctorReport,
  printNextSteps,
  reportError,
  runDoctor,
  runPipeline,
} from "../installer.js";
import { createLogger, type Logger, type LoggerOptions } from "../logger.js";
import { NodeCommandRunner, type CommandRunner } from "../process.js";
import { getStep, pipeline } from "../steps/index.js";
import type { StepContext } from "../steps/types.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export interface CliDeps {
  env: Record<string, string | undefined>;
  home?: string;
  platform: NodeJS.Platform;
  runner: CommandRunner;
  logOptions?: LoggerOptions;
}

export function defaultDeps(): CliDeps {
  return {
    env: process.env,
    platform: process.platform,
    runner: new NodeCommandRunner(),
  };
}

function printUsage(logger: Logger): void {
  const steps = pipeline
    .map((s) => `  ${s.meta.id.padEnd(14)}${s.meta.description}`)
    .join("\n");
  logger.plain(`nvim-setup: install a LazyVim configuration on macOS

Commands:
  install (default)           Check prerequisites, install tools, clone the config
  doctor [step]               Report what install would find, without changing anything
  help                        This message
  --version                   Print the version

Any other argument is rejected with exit status 1.

Steps:
${steps}

Environment:
  NVIM_SETUP_REPO_URL         Configuration repository to clone
  NVIM_SETUP_CONFIG_DIR       Destination directory (default ~/.config/nvim)
  NVIM_SETUP_PACKAGES         Comma-separated Homebrew formulae
  NVIM_SETUP_FONT_CASK        Nerd Font cask
  NVIM_SETUP_DEBUG=1          Log every command that is run`);
}

async function readVersion(): Promise<string> {
  const pkgPath = path.resolve(__dirname, "../../package.json");
  const raw = await fs.readFile(pkgPath, "utf-8");
  const pkg: unknown = JSON.parse(raw);
  if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "unknown";
}

function buildContext(deps: CliDeps, settings: Settings, logger: Logger): StepContext {
  return { platform: deps.platform, settings, runner: deps.runner, logger };
}

// ─────────────────────────────────────────────────
// install
// ─────────────────────────────────────────────────

async function handleInstall(deps: CliDeps, settings: Settings, logger: Logger): Promise<number> {
  logger.banner("LazyVim Configuration Installer for macOS", "blue");
  logger.plain();

  const report = await runPipeline(buildContext(deps, settings, logger));
  if (!report.ok) {
    logger.debug(`Stopped at step: ${report.failedStep}`);
    reportError(logger, report.error);
    return 1;
  }

  printNextSteps(logger);
  return 0;
}

// ─────────────────────────────────────────────────
// doctor
// ─────────────────────────────────────────────────

async function handleDoctor(
  deps: CliDeps,
  settings: Settings,
  logger: Logger,
  stepId?: string
): Promise<number> {
  let steps = pipeline;
  if (stepId) {
    const step = getStep(stepId);
    if (!step) {
      logger.error(`Unknown step: ${stepId}`);
      return 1;
    }
    steps = [step];
  }

  logger.plain("nvim-setup doctor");
  logger.plain(`  Config: ${settings.configDir}`);
  logger.plain(`  Repo:   ${settings.repoUrl}`);
  logger.plain();

  const report = await runDoctor(buildContext(deps, settings, logger), steps);
  printDoctorReport(logger, report);
  return report.healthy ? 0 : 1;
}

// ─────────────────────────────────────────────────
// main
// ─────────────────────────────────────────────────

export async function runCli(args: string[], deps: CliDeps = defaultDeps()): Promise<number> {
  const [command, subcommand] = args;
  const bootLogger = createLogger(deps.logOptions);

  if (command === "help" || command === "--help" || command === "-h") {
    printUsage(bootLogger);
    return 0;
  }
  if (command === "--version" || command === "-v") {
    bootLogger.plain(`nvim-setup ${await readVersion()}`);
    return 0;
  }
  if (command !== undefined && command !== "install" && command !== "doctor") {
    bootLogger.error(`Unknown command: ${command}`);
    printUsage(bootLogger);
    return 1;
  }

  let settings: Settings;
  try {
    settings = loadSettings(deps.env, deps.home);
  } catch (err) {
    if (err instanceof SetupError) {
      reportError(bootLogger, err);
      return 1;
    }
    throw err;
  }

  const logger = createLogger({ ...deps.logOptions, debug: settings.debug });

  try {
    if (command === "doctor") {
      return await handleDoctor(deps, settings, logger, subcommand);
    }
    return await handleInstall(deps, settings, logger);
  } catch (err) {
    logger.error(`Fatal error: ${formatErrorMessage(err)}`);
    return 1;
  }
}
