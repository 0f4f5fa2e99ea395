import { describe, it, expect } from "vitest";
import { DEFAULT_PACKAGES, DEFAULT_REPO_URL, isGitRemote, loadSettings } from "./config.js";
import { SetupError } from "./errors.js";

const HOME = "/Users/tester";

describe("loadSettings", () => {
  it("uses the built-in defaults when nothing is overridden", () => {
    const settings = loadSettings({}, HOME);

    expect(settings.packages).toEqual([...DEFAULT_PACKAGES]);
    expect(settings.fontCask).toBe("font-hack-nerd-font");
    expect(settings.repoUrl).toBe(DEFAULT_REPO_URL);
    expect(settings.configDir).toBe("/Users/tester/.config/nvim");
    expect(settings.homeDir).toBe(HOME);
    expect(settings.debug).toBe(false);
  });

  it("keeps the package list in declared order", () => {
    const settings = loadSettings({}, HOME);

    expect(settings.packages[0]).toBe("neovim");
    expect(settings.packages[5]).toBe("jesseduffield/lazydocker/lazydocker");
    expect(settings.packages[6]).toBe("lazygit");
  });

  it("parses a comma separated package override", () => {
    const settings = loadSettings({ NVIM_SETUP_PACKAGES: " neovim, fzf ,,lazygit " }, HOME);

    expect(settings.packages).toEqual(["neovim", "fzf", "lazygit"]);
  });

  it("expands ~ in the config directory override", () => {
    const settings = loadSettings({ NVIM_SETUP_CONFIG_DIR: "~/dotfiles/nvim" }, HOME);

    expect(settings.configDir).toBe("/Users/tester/dotfiles/nvim");
  });

  it("enables debug output with NVIM_SETUP_DEBUG=1", () => {
    expect(loadSettings({ NVIM_SETUP_DEBUG: "1" }, HOME).debug).toBe(true);
    expect(loadSettings({ NVIM_SETUP_DEBUG: "yes" }, HOME).debug).toBe(false);
  });

  it("returns frozen settings", () => {
    const settings = loadSettings({}, HOME);

    expect(Object.isFrozen(settings)).toBe(true);
    expect(Object.isFrozen(settings.packages)).toBe(true);
  });

  it("rejects a repository URL that is not a URL", () => {
    let thrown: unknown;
    try {
      loadSettings({ NVIM_SETUP_REPO_URL: "not a url" }, HOME);
    } catch (err) {
      thrown = err;
    }

    expect(thrown).toBeInstanceOf(SetupError);
    if (thrown instanceof SetupError) {
      expect(thrown.code).toBe("INVALID_CONFIG");
      expect(thrown.hints).toEqual([
        "repoUrl: Repository URL must be a valid URL or user@host:path remote",
      ]);
    }
  });

  it("accepts an scp-style SSH remote", () => {
    const settings = loadSettings({ NVIM_SETUP_REPO_URL: "git@github.com:me/nvim.git" }, HOME);

    expect(settings.repoUrl).toBe("git@github.com:me/nvim.git");
  });

  it("accepts an ssh:// remote", () => {
    const settings = loadSettings({ NVIM_SETUP_REPO_URL: "ssh://git@github.com/me/nvim.git" }, HOME);

    expect(settings.repoUrl).toBe("ssh://git@github.com/me/nvim.git");
  });

  it("rejects an empty package override", () => {
    expect(() => loadSettings({ NVIM_SETUP_PACKAGES: " , " }, HOME)).toThrow(
      "Invalid configuration override"
    );
  });

  it("rejects a relative config directory", () => {
    try {
      loadSettings({ NVIM_SETUP_CONFIG_DIR: "nvim" }, HOME);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SetupError);
      if (err instanceof SetupError) {
        expect(err.hints).toEqual([
          "configDir: Configuration directory must be an absolute path",
        ]);
      }
    }
  });
});

describe("isGitRemote", () => {
  it("accepts URLs and user@host:path remotes", () => {
    expect(isGitRemote("https://github.com/me/nvim.git")).toBe(true);
    expect(isGitRemote("git@gitlab.example.com:team/nvim.git")).toBe(true);
  });

  it("rejects plain words and bare paths", () => {
    expect(isGitRemote("not a url")).toBe(false);
    expect(isGitRemote("me/nvim.git")).toBe(false);
  });
});
