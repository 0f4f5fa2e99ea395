import type { Settings } from "../config.js";
import type { SetupError, SetupErrorCode } from "../errors.js";
import type { Logger } from "../logger.js";
import type { CommandRunner } from "../process.js";

export interface StepMeta {
  id: string;
  name: string;
  description: string;
  /** Code used when the step throws instead of returning a failed result. */
  failureCode: SetupErrorCode;
}

export interface StepContext {
  platform: NodeJS.Platform;
  settings: Settings;
  runner: CommandRunner;
  logger: Logger;
}

export type StepResult =
  | { ok: true; detail?: string }
  | { ok: false; error: SetupError };

export interface CheckResult {
  healthy: boolean;
  version?: string;
  issues?: string[];
  notes?: string[];
}

export interface Step {
  meta: StepMeta;
  /** Read-only inspection used by `doctor`; must not install, update or clone anything. */
  check(ctx: StepContext): Promise<CheckResult>;
  run(ctx: StepContext): Promise<StepResult>;
}

export const ok = (detail?: string): StepResult => ({ ok: true, detail });

export const fail = (error: SetupError): StepResult => ({ ok: false, error });
