import fs from "fs/promises";
import path from "path";
import { SetupErrorCodes, createError } from "../../errors.js";
import { fail, ok, type Step } from "../types.js";

export type TargetState = "absent" | "empty" | "populated" | "not-directory";

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export async function inspectTarget(dir: string): Promise<TargetState> {
  const stat = await fs.stat(dir).catch((err: unknown) => {
    if (isMissing(err)) return null;
    throw err;
  });
  if (!stat) return "absent";
  if (!stat.isDirectory()) return "not-directory";
  const entries = await fs.readdir(dir);
  return entries.length > 0 ? "populated" : "empty";
}

function describeConflict(state: TargetState, shown: string): string | null {
  if (state === "populated") return `${shown} already exists and is not empty`;
  if (state === "not-directory") return `${shown} exists and is not a directory`;
  return null;
}

/** Renders `dir` relative to home as `~/...` for user-facing hints. */
export function displayPath(dir: string, home: string): string {
  const rel = path.relative(home, dir);
  if (rel && !rel.startsWith("..") && !path.isAbsolute(rel)) {
    return `~/${rel}`;
  }
  return dir;
}

export const configGuardStep: Step = {
  meta: {
    id: "config-guard",
    name: "Existing configuration",
    description: "Refuses to continue if the Neovim config directory is not empty",
    failureCode: SetupErrorCodes.DESTINATION_CONFLICT,
  },

  async check(ctx) {
    const state = await inspectTarget(ctx.settings.configDir);
    const shown = displayPath(ctx.settings.configDir, ctx.settings.homeDir);
    const conflict = describeConflict(state, shown);
    if (conflict) {
      return { healthy: false, issues: [conflict] };
    }
    return { healthy: true, notes: [`${shown} is ${state}`] };
  },

  async run(ctx) {
    ctx.logger.info("Checking for existing Neovim configuration...");
    const dir = ctx.settings.configDir;
    const state = await inspectTarget(dir);

    const shown = displayPath(dir, ctx.settings.homeDir);
    const conflict = describeConflict(state, shown);
    if (conflict) {
      return fail(
        createError(
          SetupErrorCodes.DESTINATION_CONFLICT,
          `Neovim configuration directory ${conflict}.`,
          [
            "Please backup or remove the existing configuration before running this script.",
            `You can backup with: mv ${shown} ${shown}.backup`,
          ]
        )
      );
    }

    ctx.logger.success("No existing Neovim configuration found");
    return ok(state);
  },
};
