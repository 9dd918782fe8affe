import { type EnvSnapshot, type TermclipConfig } from "./config.js";

export type OsFamily = "macos" | "windows" | "linux-x11" | "linux-wayland" | "unknown";

export type Multiplexer = "none" | "tmux" | "screen";

export interface EnvironmentContext {
  readonly os: OsFamily;
  readonly multiplexer: Multiplexer;
  /** An X server is reachable, possibly alongside Wayland (XWayland). */
  readonly hasX11Display: boolean;
  /** Running under Windows Subsystem for Linux, where the host's clip.exe is reachable. */
  readonly wsl: boolean;
  readonly config: TermclipConfig;
}

const UNIX_LIKE_PLATFORMS: ReadonlyArray<NodeJS.Platform> = [
  "linux",
  "freebsd",
  "openbsd",
  "netbsd",
  "sunos",
];

function isSet(value: string | undefined): value is string {
  return value !== undefined && value.length > 0;
}

export function detectMultiplexer(env: EnvSnapshot): Multiplexer {
  if (isSet(env.TMUX)) {
    return "tmux";
  }
  if (isSet(env.STY)) {
    return "screen";
  }
  return "none";
}

export function detectOsFamily(platform: NodeJS.Platform, env: EnvSnapshot): OsFamily {
  if (platform === "darwin") {
    return "macos";
  }
  if (platform === "win32") {
    return "windows";
  }
  if (UNIX_LIKE_PLATFORMS.includes(platform)) {
    if (isSet(env.WAYLAND_DISPLAY)) {
      return "linux-wayland";
    }
    if (isSet(env.DISPLAY)) {
      return "linux-x11";
    }
  }
  return "unknown";
}

/**
 * Builds the context a run resolves its transports against. Does not touch the process: the
 * platform and environment are passed in.
 */
export function probeEnvironment(
  platform: NodeJS.Platform,
  env: EnvSnapshot,
  config: TermclipConfig,
): EnvironmentContext {
  return Object.freeze({
    os: detectOsFamily(platform, env),
    multiplexer: detectMultiplexer(env),
    hasX11Display: UNIX_LIKE_PLATFORMS.includes(platform) && isSet(env.DISPLAY),
    wsl: platform === "linux" && (isSet(env.WSL_DISTRO_NAME) || isSet(env.WSL_INTEROP)),
    config,
  });
}
