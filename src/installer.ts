import { toSetupError, type SetupError } from "./errors.js";
import type { Logger } from "./logger.js";
import { pipeline } from "./steps/index.js";
import type { CheckResult, Step, StepContext, StepResult } from "./steps/types.js";

export type RunReport =
  | { ok: true; completed: string[] }
  | { ok: false; completed: string[]; failedStep: string; error: SetupError };

/**
 * Runs steps in order and stops at the first failure. Nothing after a failed
 * step is executed.
 */
export async function runPipeline(
  ctx: StepContext,
  steps: readonly Step[] = pipeline
): Promise<RunReport> {
  const completed: string[] = [];

  for (const step of steps) {
    let result: StepResult;
    try {
      result = await step.run(ctx);
    } catch (err) {
      result = { ok: false, error: toSetupError(err, step.meta.failureCode) };
    }

    if (!result.ok) {
      return { ok: false, completed, failedStep: step.meta.id, error: result.error };
    }
    completed.push(step.meta.id);
  }

  return { ok: true, completed };
}

export interface DoctorEntry {
  step: string;
  name: string;
  result: CheckResult;
}

export interface DoctorReport {
  healthy: boolean;
  entries: DoctorEntry[];
}

/** Runs every step's read-only check; unlike the pipeline it does not stop early. */
export async function runDoctor(
  ctx: StepContext,
  steps: readonly Step[] = pipeline
): Promise<DoctorReport> {
  const entries: DoctorEntry[] = [];

  for (const step of steps) {
    let result: CheckResult;
    try {
      result = await step.check(ctx);
    } catch (err) {
      result = { healthy: false, issues: [toSetupError(err, step.meta.failureCode).message] };
    }
    entries.push({ step: step.meta.id, name: step.meta.name, result });
  }

  return { healthy: entries.every((e) => e.result.healthy), entries };
}

export function reportError(logger: Logger, error: SetupError): void {
  logger.error(error.message, error.context);
  for (const hint of error.hints) {
    logger.error(hint);
  }
}

export function printDoctorReport(logger: Logger, report: DoctorReport): void {
  for (const { name, result } of report.entries) {
    const version = result.version ? ` (${result.version})` : "";
    if (result.healthy) {
      logger.plain(`  ✓ ${name}${version}`);
    } else {
      logger.plain(`  ✗ ${name}`);
    }
    for (const issue of result.issues ?? []) {
      logger.plain(`      ${issue}`);
    }
    for (const note of result.notes ?? []) {
      logger.plain(`      · ${note}`);
    }
  }
}

export function printNextSteps(logger: Logger): void {
  logger.plain();
  logger.banner("Installation Complete!", "green");
  logger.plain();
  logger.success("LazyVim configuration has been installed successfully!");
  logger.info("Next steps:");
  logger.plain("  1. Change your terminal font to 'Hack Nerd Font' for proper icon display");
  logger.plain("  2. Restart your terminal or run: source ~/.zprofile");
  logger.plain("  3. Launch Neovim: nvim");
  logger.plain("  4. LazyVim will automatically install plugins on first launch");
  logger.plain();
  logger.warn(
    "Note: The first launch may take a few minutes as plugins are downloaded and installed."
  );
  logger.warn(
    "IMPORTANT: You must change your terminal font to 'Hack Nerd Font' or icons won't display correctly!"
  );
}
