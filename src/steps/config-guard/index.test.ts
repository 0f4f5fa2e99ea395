import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { createTestContext } from "../../test-utils.js";
import { configGuardStep, displayPath, inspectTarget } from "./index.js";

let home: string;
let configDir: string;

beforeEach(async () => {
  home = await fs.mkdtemp(path.join(os.tmpdir(), "nvim-setup-guard-"));
  configDir = path.join(home, ".config", "nvim");
});

afterEach(async () => {
  await fs.rm(home, { recursive: true, force: true });
});

function context() {
  return createTestContext({ settings: { configDir, homeDir: home } });
}

describe("inspectTarget", () => {
  it("classifies the destination", async () => {
    expect(await inspectTarget(configDir)).toBe("absent");

    await fs.mkdir(configDir, { recursive: true });
    expect(await inspectTarget(configDir)).toBe("empty");

    await fs.writeFile(path.join(configDir, "init.lua"), "-- config\n");
    expect(await inspectTarget(configDir)).toBe("populated");
  });

  it("reports a file in place of the directory", async () => {
    await fs.mkdir(path.dirname(configDir), { recursive: true });
    await fs.writeFile(configDir, "");

    expect(await inspectTarget(configDir)).toBe("not-directory");
  });
});

describe("displayPath", () => {
  it("abbreviates paths under home", () => {
    expect(displayPath("/Users/me/.config/nvim", "/Users/me")).toBe("~/.config/nvim");
  });

  it("leaves paths outside home untouched", () => {
    expect(displayPath("/opt/nvim", "/Users/me")).toBe("/opt/nvim");
  });
});

describe("configGuardStep", () => {
  it("passes when the destination does not exist", async () => {
    const ctx = context();

    const result = await configGuardStep.run(ctx);

    expect(result).toEqual({ ok: true, detail: "absent" });
    expect(ctx.out.lines()).toEqual([
      "[INFO] Checking for existing Neovim configuration...",
      "[SUCCESS] No existing Neovim configuration found",
    ]);
  });

  it("passes when the destination is an empty directory", async () => {
    await fs.mkdir(configDir, { recursive: true });

    const result = await configGuardStep.run(context());

    expect(result).toEqual({ ok: true, detail: "empty" });
  });

  it("refuses a non-empty destination and suggests a backup", async () => {
    await fs.mkdir(configDir, { recursive: true });
    await fs.writeFile(path.join(configDir, "init.lua"), "-- config\n");

    const result = await configGuardStep.run(context());

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("DESTINATION_CONFLICT");
      expect(result.error.message).toBe(
        "Neovim configuration directory ~/.config/nvim already exists and is not empty."
      );
      expect(result.error.hints).toEqual([
        "Please backup or remove the existing configuration before running this script.",
        "You can backup with: mv ~/.config/nvim ~/.config/nvim.backup",
      ]);
    }
  });

  it("leaves the existing configuration in place", async () => {
    await fs.mkdir(configDir, { recursive: true });
    await fs.writeFile(path.join(configDir, "init.lua"), "-- mine\n");

    await configGuardStep.run(context());

    expect(await fs.readFile(path.join(configDir, "init.lua"), "utf-8")).toBe("-- mine\n");
  });

  it("refuses a file sitting at the destination path", async () => {
    await fs.mkdir(path.dirname(configDir), { recursive: true });
    await fs.writeFile(configDir, "not a directory");

    const result = await configGuardStep.run(context());

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("DESTINATION_CONFLICT");
      expect(result.error.message).toBe(
        "Neovim configuration directory ~/.config/nvim exists and is not a directory."
      );
    }
  });

  it("names a file at the destination in doctor output", async () => {
    await fs.mkdir(path.dirname(configDir), { recursive: true });
    await fs.writeFile(configDir, "not a directory");

    const check = await configGuardStep.check(context());

    expect(check).toEqual({
      healthy: false,
      issues: ["~/.config/nvim exists and is not a directory"],
    });
  });

  it("describes the destination state in doctor output", async () => {
    const check = await configGuardStep.check(context());

    expect(check).toEqual({ healthy: true, notes: ["~/.config/nvim is absent"] });
  });
});
