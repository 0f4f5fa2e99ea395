import { SetupErrorCodes, createError } from "../../errors.js";
import { getBrewVersion } from "../../homebrew.js";
import { fail, ok, type Step } from "../types.js";

const DOWNLOAD_URL = "https://brew.sh";

export const homebrewStep: Step = {
  meta: {
    id: "homebrew",
    name: "Homebrew",
    description: "Confirms Homebrew is available on PATH",
    failureCode: SetupErrorCodes.MISSING_PREREQUISITE,
  },

  async check(ctx) {
    const probe = await getBrewVersion(ctx.runner);
    if (probe.found) {
      return { healthy: true, version: probe.version };
    }
    if (probe.notFound) {
      return { healthy: false, issues: [`brew not found in PATH (install from ${DOWNLOAD_URL})`] };
    }
    return { healthy: false, issues: [`brew --version failed: ${probe.output}`] };
  },

  async run(ctx) {
    ctx.logger.info("Checking for Homebrew...");
    const probe = await getBrewVersion(ctx.runner);
    if (!probe.found) {
      return fail(
        createError(
          SetupErrorCodes.MISSING_PREREQUISITE,
          "Homebrew is not installed. Please install Homebrew first and run this script again.",
          [`You can install Homebrew from: ${DOWNLOAD_URL}`],
          probe.notFound ? undefined : probe.output
        )
      );
    }
    ctx.logger.success(`Homebrew is already installed: ${probe.version}`);
    return ok(probe.version);
  },
};
