import { type Writable } from "stream";
import { type EnvironmentContext } from "./environment.js";
import { writeOutput } from "./io.js";
import {
  type CopyOutcome,
  executeCopy,
  executePaste,
  type PasteOutcome,
  resolveTransports,
  type SelectorDeps,
} from "./selector.js";
import { inspectTmux, warnAboutTmuxSettings } from "./tmuxDiagnostics.js";

/**
 * Copies the payload through the first transport that accepts it. An empty payload copies nothing
 * and resolves to `null`.
 *
 * @throws AllTransportsExhaustedError when every transport fails.
 */
export async function copyToClipboard(
  payload: Uint8Array,
  context: EnvironmentContext,
  deps: SelectorDeps,
): Promise<CopyOutcome | null> {
  const { logger } = deps;
  if (payload.length === 0) {
    logger.debug("Standard input was empty, nothing to copy");
    return null;
  }

  const transports = resolveTransports(context, "copy", deps);
  const outcome = await executeCopy(transports, payload, logger);

  if (outcome.transport === "osc52" && context.multiplexer === "tmux") {
    const settings = await inspectTmux(deps.runner, context.config.commandTimeoutMs, logger);
    if (settings !== null) {
      warnAboutTmuxSettings(settings, logger);
    }
  }
  return outcome;
}

/**
 * Writes the clipboard contents to `output`, byte for byte.
 *
 * @throws UnsupportedDirectionError when no native tool here can read the clipboard.
 * @throws AllTransportsExhaustedError when every paste-capable tool fails.
 */
export async function pasteFromClipboard(
  context: EnvironmentContext,
  deps: SelectorDeps,
  output: Writable = process.stdout,
): Promise<PasteOutcome> {
  const transports = resolveTransports(context, "paste", deps);
  const outcome = await executePaste(transports, deps.logger);
  await writeOutput(outcome.data, output);
  return outcome;
}
