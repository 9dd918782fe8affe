import { type SimpleLogger } from "@lmstudio/lms-common";
import { type EnvironmentContext } from "./environment.js";
import {
  AllTransportsExhaustedError,
  type Direction,
  type FailedAttempt,
  UnsupportedDirectionError,
} from "./errors.js";
import { type TerminalSinkOpener } from "./osc52/terminalSink.js";
import { nativeClipboardsFor } from "./transports/native/index.js";
import { Osc52Transport } from "./transports/Osc52Transport.js";
import { type CommandRunner } from "./transports/runCommand.js";
import { canPaste, type PasteCapableTransport, type Transport } from "./transports/Transport.js";

export interface SelectorDeps {
  runner: CommandRunner;
  openSink: TerminalSinkOpener;
  logger: SimpleLogger;
}

export interface CopyOutcome {
  transport: string;
  bytesWritten: number;
  attempts: ReadonlyArray<FailedAttempt>;
}

export interface PasteOutcome {
  transport: string;
  data: Buffer;
  attempts: ReadonlyArray<FailedAttempt>;
}

type Policy = "osc52-only" | "native-only" | "native-then-osc52";

/**
 * FORCE_OSC52 beats FORCE_NATIVE when both are set.
 */
export function selectPolicy(context: EnvironmentContext): Policy {
  if (context.config.forceOsc52) {
    return "osc52-only";
  }
  if (context.config.forceNative) {
    return "native-only";
  }
  return "native-then-osc52";
}

/**
 * The transports to try for a run, in order. Native tools for the platform come first, then
 * OSC 52. Paste never resolves to OSC 52, which is write-only.
 */
export function resolveTransports(
  context: EnvironmentContext,
  direction: Direction,
  { runner, openSink, logger }: SelectorDeps,
): Array<Transport> {
  const policy = selectPolicy(context);
  const transports: Array<Transport> = [];

  if (policy !== "osc52-only") {
    for (const clipboard of nativeClipboardsFor(context)) {
      const native = clipboard.transports({ runner, timeoutMs: context.config.commandTimeoutMs });
      logger.debug(
        `Native ${clipboard.family} clipboard offers`,
        native.map(transport => transport.name).join(", "),
      );
      transports.push(...native);
    }
  }
  if (policy !== "native-only") {
    transports.push(
      new Osc52Transport({
        multiplexer: context.multiplexer,
        maxEncodedSize: context.config.maxEncodedSize,
        openSink,
        logger,
      }),
    );
  }

  const resolved = transports.filter(transport => transport.capabilities.has(direction));
  logger.debug(
    `Resolved ${direction} transports (policy ${policy}):`,
    resolved.length === 0 ? "(none)" : resolved.map(transport => transport.name).join(", "),
  );
  return resolved;
}

/**
 * Tries each transport in turn and stops at the first that takes the whole payload.
 */
export async function executeCopy(
  transports: ReadonlyArray<Transport>,
  payload: Uint8Array,
  logger: SimpleLogger,
): Promise<CopyOutcome> {
  const attempts: Array<FailedAttempt> = [];
  for (const transport of transports) {
    logger.debug(`Trying ${transport.name} for ${payload.length} byte(s)`);
    const result = await transport.copy(payload);
    if (result.ok) {
      logger.debug(`${result.transport} accepted ${result.bytesWritten} byte(s)`);
      return { transport: result.transport, bytesWritten: result.bytesWritten, attempts };
    }
    logger.debug(`${result.transport} failed (${result.error.kind}):`, result.error.message);
    attempts.push({ transport: result.transport, error: result.error });
  }
  throw new AllTransportsExhaustedError("copy", attempts);
}

export async function executePaste(
  transports: ReadonlyArray<Transport>,
  logger: SimpleLogger,
): Promise<PasteOutcome> {
  const pasteCapable: Array<PasteCapableTransport> = transports.filter(canPaste);
  if (pasteCapable.length === 0) {
    throw new UnsupportedDirectionError("paste");
  }
  const attempts: Array<FailedAttempt> = [];
  for (const transport of pasteCapable) {
    logger.debug(`Trying ${transport.name} for paste`);
    const result = await transport.paste();
    if (result.ok) {
      logger.debug(`${result.transport} returned ${result.data.length} byte(s)`);
      return { transport: result.transport, data: result.data, attempts };
    }
    logger.debug(`${result.transport} failed (${result.error.kind}):`, result.error.message);
    attempts.push({ transport: result.transport, error: result.error });
  }
  throw new AllTransportsExhaustedError("paste", attempts);
}
