import { SetupErrorCodes, createError } from "../../errors.js";
import { fail, ok, type Step } from "../types.js";

const SUPPORTED_PLATFORM: NodeJS.Platform = "darwin";

export const platformStep: Step = {
  meta: {
    id: "platform",
    name: "Operating system",
    description: "Confirms the host is macOS",
    failureCode: SetupErrorCodes.UNSUPPORTED_PLATFORM,
  },

  async check(ctx) {
    if (ctx.platform === SUPPORTED_PLATFORM) {
      return { healthy: true, version: "macOS" };
    }
    return { healthy: false, issues: [`Unsupported platform: ${ctx.platform}`] };
  },

  async run(ctx) {
    ctx.logger.info("Checking operating system...");
    if (ctx.platform !== SUPPORTED_PLATFORM) {
      return fail(
        createError(
          SetupErrorCodes.UNSUPPORTED_PLATFORM,
          "This script only supports macOS. Other operating systems are not supported yet."
        )
      );
    }
    ctx.logger.success("macOS detected");
    return ok();
  },
};
