// Pipeline
export { runPipeline, runDoctor, type RunReport, type DoctorReport, type DoctorEntry } from "./installer.js";
export { runCli, type CliDeps } from "./cli/commands.js";

// Steps
export {
  pipeline,
  getStep,
  platformStep,
  gitStep,
  homebrewStep,
  dependenciesStep,
  configGuardStep,
  cloneStep,
} from "./steps/index.js";
export type { Step, StepMeta, StepContext, StepResult, CheckResult } from "./steps/index.js";

// Configuration
export { loadSettings, DEFAULT_PACKAGES, DEFAULT_FONT_CASK, DEFAULT_REPO_URL, type Settings } from "./config.js";

// Errors and logging
export { SetupError, SetupErrorCodes, type SetupErrorCode } from "./errors.js";
export { createLogger, type Logger, type LoggerOptions, type LogSink } from "./logger.js";

// Processes
export { NodeCommandRunner, type CommandRunner, type CommandResult, type RunOptions } from "./process.js";
