import fs from "fs/promises";
import path from "path";
import { SetupErrorCodes, createError, formatErrorMessage } from "../../errors.js";
import { cloneRepo, lsRemote } from "../../git.js";
import { describeFailure, succeeded } from "../../process.js";
import { fail, ok, type Step } from "../types.js";

export const cloneStep: Step = {
  meta: {
    id: "clone",
    name: "Configuration repository",
    description: "Clones the Neovim configuration into place",
    failureCode: SetupErrorCodes.CLONE_FAILED,
  },

  async check(ctx) {
    const result = await lsRemote(ctx.runner, ctx.settings.repoUrl);
    if (succeeded(result)) {
      return { healthy: true, notes: [`${ctx.settings.repoUrl} is reachable`] };
    }
    return {
      healthy: false,
      issues: [`Cannot reach ${ctx.settings.repoUrl} (${describeFailure(result)})`],
    };
  },

  async run(ctx) {
    ctx.logger.info("Cloning Neovim configuration from GitHub...");
    const { repoUrl, configDir } = ctx.settings;

    try {
      await fs.mkdir(path.dirname(configDir), { recursive: true });
    } catch (err) {
      return fail(
        createError(
          SetupErrorCodes.CLONE_FAILED,
          `Could not create ${path.dirname(configDir)}: ${formatErrorMessage(err)}`
        )
      );
    }

    ctx.logger.debug(`Running: git clone ${repoUrl} ${configDir}`);
    const result = await cloneRepo(ctx.runner, repoUrl, configDir);
    if (!succeeded(result)) {
      return fail(
        createError(
          SetupErrorCodes.CLONE_FAILED,
          `Failed to clone ${repoUrl} (${describeFailure(result)})`,
          ["Check your network connection and access to the repository, then run this script again."]
        )
      );
    }

    ctx.logger.success("Neovim configuration cloned successfully");
    return ok(configDir);
  },
};
