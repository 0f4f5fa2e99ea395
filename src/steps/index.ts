import type { Step } from "./types.js";
import { platformStep } from "./platform/index.js";
import { gitStep } from "./git/index.js";
import { homebrewStep } from "./homebrew/index.js";
import { dependenciesStep } from "./dependencies/index.js";
import { configGuardStep } from "./config-guard/index.js";
import { cloneStep } from "./clone/index.js";

/** Execution order of the install pipeline. */
export const pipeline: readonly Step[] = [
  platformStep,
  gitStep,
  homebrewStep,
  dependenciesStep,
  configGuardStep,
  cloneStep,
];

export function getStep(id: string): Step | undefined {
  return pipeline.find((s) => s.meta.id === id);
}

export { platformStep, gitStep, homebrewStep, dependenciesStep, configGuardStep, cloneStep };
export type { Step, StepMeta, StepContext, StepResult, CheckResult } from "./types.js";
