import { SetupErrorCodes, createError } from "../../errors.js";
import { getGitVersion } from "../../git.js";
import { fail, ok, type Step } from "../types.js";

const DOWNLOAD_URL = "https://git-scm.com/downloads";

export const gitStep: Step = {
  meta: {
    id: "git",
    name: "Git",
    description: "Confirms git is available on PATH",
    failureCode: SetupErrorCodes.MISSING_PREREQUISITE,
  },

  async check(ctx) {
    const probe = await getGitVersion(ctx.runner);
    if (probe.found) {
      return { healthy: true, version: probe.version };
    }
    if (probe.notFound) {
      return { healthy: false, issues: [`git not found in PATH (install from ${DOWNLOAD_URL})`] };
    }
    return { healthy: false, issues: [`git --version failed: ${probe.output}`] };
  },

  async run(ctx) {
    ctx.logger.info("Checking for git...");
    const probe = await getGitVersion(ctx.runner);
    if (!probe.found) {
      return fail(
        createError(
          SetupErrorCodes.MISSING_PREREQUISITE,
          "Git is not installed. Please install git first and run this script again.",
          [`You can install git from: ${DOWNLOAD_URL}`],
          probe.notFound ? undefined : probe.output
        )
      );
    }
    ctx.logger.success(`Git is installed: ${probe.version}`);
    return ok(probe.version);
  },
};
