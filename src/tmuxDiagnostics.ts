import { type SimpleLogger, text } from "@lmstudio/lms-common";
import chalk from "chalk";
import { TransportError } from "./errors.js";
import { type CommandRunner } from "./transports/runCommand.js";

export interface TmuxClipboardSettings {
  setClipboard: boolean;
  allowPassthrough: boolean;
}

/**
 * Reads a global option's value out of `tmux show-options -g <name>` output, e.g. `set-clipboard on`.
 */
export function parseTmuxOption(output: string, name: string): string | undefined {
  for (const line of output.split("\n")) {
    const [key, value] = line.trim().split(/\s+/, 2);
    if (key === name && value !== undefined) {
      return value.replace(/^"|"$/g, "");
    }
  }
  return undefined;
}

async function showGlobalOption(
  runner: CommandRunner,
  timeoutMs: number,
  name: string,
): Promise<string | undefined> {
  const { stdout } = await runner(
    { command: "tmux", args: ["show-options", "-g", name] },
    { captureStdout: true, timeoutMs },
  );
  return parseTmuxOption(stdout.toString("utf8"), name);
}

/**
 * Checks the two tmux options OSC 52 depends on. Returns `null` when tmux cannot be queried.
 */
export async function inspectTmux(
  runner: CommandRunner,
  timeoutMs: number,
  logger: SimpleLogger,
): Promise<TmuxClipboardSettings | null> {
  try {
    const setClipboard = await showGlobalOption(runner, timeoutMs, "set-clipboard");
    const allowPassthrough = await showGlobalOption(runner, timeoutMs, "allow-passthrough");
    logger.debug(
      `tmux set-clipboard: ${setClipboard ?? "(unset)"}, allow-passthrough: ${allowPassthrough ?? "(unset)"}`,
    );
    return {
      setClipboard: setClipboard === "on",
      // "all" (tmux 3.4) also forwards from invisible panes.
      allowPassthrough: allowPassthrough === "on" || allowPassthrough === "all",
    };
  } catch (error) {
    if (error instanceof TransportError) {
      logger.debug("Could not read tmux options:", error.message);
      return null;
    }
    throw error;
  }
}

/**
 * Tells the user which lines of ~/.tmux.conf are missing for OSC 52 to reach the outer terminal.
 */
export function warnAboutTmuxSettings(settings: TmuxClipboardSettings, logger: SimpleLogger) {
  const missing: Array<string> = [];
  if (!settings.setClipboard) {
    missing.push("set -g set-clipboard on");
  }
  if (!settings.allowPassthrough) {
    missing.push("set -g allow-passthrough on");
  }
  if (missing.length === 0) {
    return;
  }
  logger.warn(text`
    The clipboard sequence was sent through tmux, but tmux may not forward it. Add to
    ${chalk.cyan("~/.tmux.conf")}:
  `);
  for (const line of missing) {
    logger.warn(`  ${chalk.yellow(line)}`);
  }
  logger.warn(`Then run: ${chalk.yellow("tmux source-file ~/.tmux.conf")}`);
}
