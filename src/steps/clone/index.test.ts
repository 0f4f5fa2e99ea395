import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { FakeRunner, createTestContext, exitWith, type RecordedCall } from "../../test-utils.js";
import { cloneStep } from "./index.js";

const REPO = "https://example.com/nvim-config.git";

let home: string;
let configDir: string;

beforeEach(async () => {
  home = await fs.mkdtemp(path.join(os.tmpdir(), "nvim-setup-clone-"));
  configDir = path.join(home, ".config", "nvim");
});

afterEach(async () => {
  await fs.rm(home, { recursive: true, force: true });
});

async function fakeClone(call: RecordedCall) {
  const dest = call.args[2] ?? "";
  await fs.mkdir(dest);
  await fs.writeFile(path.join(dest, "init.lua"), "require('config.lazy')\n");
  return {};
}

describe("cloneStep", () => {
  it("creates the parent directory and clones into the destination", async () => {
    const runner = new FakeRunner().on(`git clone ${REPO} ${configDir}`, fakeClone);
    const ctx = createTestContext({ runner, settings: { configDir, homeDir: home, repoUrl: REPO } });

    const result = await cloneStep.run(ctx);

    expect(result).toEqual({ ok: true, detail: configDir });
    expect(runner.calls[0]?.options.stream).toBe(true);
    expect(await fs.readdir(configDir)).toEqual(["init.lua"]);
    expect(ctx.out.lines().at(-1)).toBe("[SUCCESS] Neovim configuration cloned successfully");
  });

  it("reuses an existing parent directory", async () => {
    await fs.mkdir(path.join(home, ".config", "other"), { recursive: true });
    const runner = new FakeRunner().on(`git clone ${REPO} ${configDir}`, fakeClone);

    const result = await cloneStep.run(
      createTestContext({ runner, settings: { configDir, homeDir: home, repoUrl: REPO } })
    );

    expect(result.ok).toBe(true);
    expect((await fs.readdir(path.join(home, ".config"))).sort()).toEqual(["nvim", "other"]);
  });

  it("fails when git clone exits non-zero", async () => {
    const runner = new FakeRunner().on(`git clone ${REPO} ${configDir}`, exitWith(128));

    const result = await cloneStep.run(
      createTestContext({ runner, settings: { configDir, homeDir: home, repoUrl: REPO } })
    );

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe("CLONE_FAILED");
      expect(result.error.message).toBe(`Failed to clone ${REPO} (exit code 128)`);
    }
    expect(runner.lines()).toEqual([`git clone ${REPO} ${configDir}`]);
  });

  it("checks remote reachability with ls-remote", async () => {
    const runner = new FakeRunner().on(`git ls-remote --heads ${REPO}`, exitWith(128));

    const check = await cloneStep.check(
      createTestContext({ runner, settings: { configDir, homeDir: home, repoUrl: REPO } })
    );

    expect(check).toEqual({
      healthy: false,
      issues: [`Cannot reach ${REPO} (exit code 128)`],
    });
  });
});
