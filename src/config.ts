import { homedir } from "os";
import path from "path";
import { z } from "zod";
import { SetupErrorCodes, createError } from "./errors.js";

export const DEFAULT_PACKAGES = [
  "neovim",
  "ripgrep",
  "fd",
  "fzf",
  "lazysql",
  "jesseduffield/lazydocker/lazydocker",
  "lazygit",
] as const;

export const DEFAULT_FONT_CASK = "font-hack-nerd-font";
export const DEFAULT_REPO_URL = "https://github.com/RomanPodkovyrin/neovim.git";

const SCP_REMOTE = /^[\w.-]+@[\w.-]+:.+$/;

/** Accepts anything `git clone` takes as a remote: a URL or the scp form `user@host:path`. */
export function isGitRemote(value: string): boolean {
  if (SCP_REMOTE.test(value)) return true;
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

const SettingsSchema = z.object({
  packages: z
    .array(z.string().trim().min(1, "Package names must not be empty"))
    .min(1, "At least one package is required"),
  fontCask: z.string().trim().min(1, "Font cask must not be empty"),
  repoUrl: z.string().refine(isGitRemote, {
    message: "Repository URL must be a valid URL or user@host:path remote",
  }),
  configDir: z.string().refine((value) => path.isAbsolute(value), {
    message: "Configuration directory must be an absolute path",
  }),
  homeDir: z.string().min(1),
  debug: z.boolean(),
});

export interface Settings {
  readonly packages: readonly string[];
  readonly fontCask: string;
  readonly repoUrl: string;
  readonly configDir: string;
  readonly homeDir: string;
  readonly debug: boolean;
}

type Env = Record<string, string | undefined>;

function optional(env: Env, name: string, fallback: string): string {
  return env[name] || fallback;
}

function expandHome(value: string, home: string): string {
  if (value === "~") return home;
  if (value.startsWith("~/")) return path.join(home, value.slice(2));
  return value;
}

/**
 * Resolve settings from defaults and NVIM_SETUP_* overrides.
 * Throws SetupError(INVALID_CONFIG) when an override does not validate.
 */
export function loadSettings(env: Env = process.env, home: string = homedir()): Settings {
  const packagesRaw = env.NVIM_SETUP_PACKAGES;
  const candidate = {
    packages: packagesRaw
      ? packagesRaw.split(",").map((name) => name.trim()).filter(Boolean)
      : [...DEFAULT_PACKAGES],
    fontCask: optional(env, "NVIM_SETUP_FONT_CASK", DEFAULT_FONT_CASK),
    repoUrl: optional(env, "NVIM_SETUP_REPO_URL", DEFAULT_REPO_URL),
    configDir: expandHome(
      optional(env, "NVIM_SETUP_CONFIG_DIR", path.join(home, ".config", "nvim")),
      home
    ),
    homeDir: home,
    debug: env.NVIM_SETUP_DEBUG === "1",
  };

  const parsed = SettingsSchema.safeParse(candidate);
  if (!parsed.success) {
    throw createError(
      SetupErrorCodes.INVALID_CONFIG,
      "Invalid configuration override",
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  return Object.freeze({
    ...parsed.data,
    packages: Object.freeze([...parsed.data.packages]),
  });
}
