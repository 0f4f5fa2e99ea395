import { SetupErrorCodes, createError } from "../../errors.js";
import {
  installArgs,
  installPackage,
  isInstalled,
  updateIndex,
  type PackageRef,
} from "../../homebrew.js";
import { describeFailure, formatCommand, succeeded } from "../../process.js";
import type { Settings } from "../../config.js";
import { fail, ok, type Step, type StepContext, type StepResult } from "../types.js";

/** The font cask goes first, then formulae in configured order. */
export function plannedPackages(settings: Settings): PackageRef[] {
  return [
    { name: settings.fontCask, cask: true },
    ...settings.packages.map((name) => ({ name, cask: false })),
  ];
}

async function ensurePackage(ctx: StepContext, pkg: PackageRef): Promise<StepResult> {
  ctx.logger.info(pkg.cask ? `Installing ${pkg.name} (cask)...` : `Installing ${pkg.name}...`);

  if (await isInstalled(ctx.runner, pkg)) {
    ctx.logger.warn(`${pkg.name} is already installed`);
    return ok("skipped");
  }

  ctx.logger.debug(`Running: ${formatCommand("brew", installArgs(pkg))}`);
  const result = await installPackage(ctx.runner, pkg);
  if (!succeeded(result)) {
    return fail(
      createError(
        SetupErrorCodes.PACKAGE_INSTALL_FAILED,
        `Failed to install ${pkg.name} (${describeFailure(result)})`,
        [`Try installing it manually: ${formatCommand("brew", installArgs(pkg))}`]
      )
    );
  }

  ctx.logger.success(`${pkg.name} installed successfully`);
  return ok("installed");
}

export const dependenciesStep: Step = {
  meta: {
    id: "dependencies",
    name: "Dependencies",
    description: "Updates Homebrew and installs the tool list and Nerd Font",
    failureCode: SetupErrorCodes.PACKAGE_INSTALL_FAILED,
  },

  async check(ctx) {
    const missing: string[] = [];
    for (const pkg of plannedPackages(ctx.settings)) {
      if (!(await isInstalled(ctx.runner, pkg))) {
        missing.push(pkg.name);
      }
    }
    if (missing.length === 0) {
      return { healthy: true };
    }
    // Missing packages are reported, not counted as failures.
    return {
      healthy: true,
      notes: missing.map((name) => `${name} not installed yet`),
    };
  },

  async run(ctx) {
    ctx.logger.info("Installing required dependencies with Homebrew...");

    ctx.logger.info("Updating Homebrew...");
    const update = await updateIndex(ctx.runner);
    if (!succeeded(update)) {
      return fail(
        createError(
          SetupErrorCodes.PACKAGE_INSTALL_FAILED,
          `brew update failed (${describeFailure(update)})`,
          ["Run `brew update` manually to see the full error, then run this script again."]
        )
      );
    }

    let installed = 0;
    for (const pkg of plannedPackages(ctx.settings)) {
      const result = await ensurePackage(ctx, pkg);
      if (!result.ok) return result;
      if (result.detail === "installed") installed++;
    }

    ctx.logger.success("All dependencies installed");
    return ok(`${installed} installed`);
  },
};
