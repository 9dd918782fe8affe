import { SimpleLogger } from "@lmstudio/lms-common";
import { type TermclipConfig } from "./config.js";
import { type EnvironmentContext } from "./environment.js";
import {
  CommandFailedError,
  CommandTimeoutError,
  NoCommandFoundError,
} from "./errors.js";
import { type TerminalSink, type TerminalSinkOpener } from "./osc52/terminalSink.js";
import { type CommandRunner, type CommandSpec, type RunCommandOptions } from "./transports/runCommand.js";

export const ESC = "\x1b";
export const BEL = "\x07";

export const TEST_CONFIG: TermclipConfig = {
  forceOsc52: false,
  forceNative: false,
  maxEncodedSize: 75_000,
  debug: false,
  commandTimeoutMs: 1_000,
};

export function makeContext(
  overrides: Partial<Omit<EnvironmentContext, "config">> = {},
  config: Partial<TermclipConfig> = {},
): EnvironmentContext {
  return {
    os: "unknown",
    multiplexer: "none",
    hasX11Display: false,
    wsl: false,
    ...overrides,
    config: { ...TEST_CONFIG, ...config },
  };
}

export interface LoggedLine {
  level: "debug" | "info" | "warn" | "error";
  text: string;
}

/**
 * A logger that records what it is given instead of printing it.
 */
export function createTestLogger(): { logger: SimpleLogger; lines: Array<LoggedLine> } {
  const lines: Array<LoggedLine> = [];
  const record =
    (level: LoggedLine["level"]) =>
    (...messages: Array<unknown>) => {
      lines.push({ level, text: messages.map(message => String(message)).join(" ") });
    };
  const logger = new SimpleLogger("", {
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
  });
  return { logger, lines };
}

export class MemoryTerminalSink implements TerminalSink {
  public readonly description = "memory";
  public readonly writes: Array<Buffer> = [];
  public closed = false;

  public async write(data: Uint8Array): Promise<void> {
    this.writes.push(Buffer.from(data));
  }

  public async close(): Promise<void> {
    this.closed = true;
  }

  public text(): string {
    return Buffer.concat(this.writes).toString("latin1");
  }
}

export function openerFor(sink: TerminalSink): TerminalSinkOpener {
  return async () => sink;
}

export type FakeCommandBehavior =
  | { kind: "ok"; stdout?: string | Buffer }
  | { kind: "missing" }
  | { kind: "fail"; exitCode: number; stderr?: string }
  | { kind: "timeout" };

export interface RecordedCall {
  spec: CommandSpec;
  opts: RunCommandOptions;
}

/**
 * Stands in for {@link CommandRunner}. Commands without a behaviour are reported as missing.
 */
export function createFakeRunner(behaviors: Record<string, FakeCommandBehavior>): {
  runner: CommandRunner;
  calls: Array<RecordedCall>;
} {
  const calls: Array<RecordedCall> = [];
  const runner: CommandRunner = async (spec, opts) => {
    calls.push({ spec, opts });
    const behavior = behaviors[spec.command] ?? { kind: "missing" };
    switch (behavior.kind) {
      case "ok":
        return { stdout: Buffer.from(behavior.stdout ?? "") };
      case "missing":
        throw new NoCommandFoundError(spec.command);
      case "fail":
        throw new CommandFailedError(spec.command, behavior.exitCode, null, behavior.stderr ?? "");
      case "timeout":
        throw new CommandTimeoutError(spec.command, opts.timeoutMs);
    }
  };
  return { runner, calls };
}
