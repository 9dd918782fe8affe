import { spawn } from "child_process";
import {
  CommandFailedError,
  CommandTimeoutError,
  NoCommandFoundError,
  type TransportError,
} from "../errors.js";

export interface CommandSpec {
  command: string;
  args: ReadonlyArray<string>;
}

export interface RunCommandOptions {
  /** Bytes written to the command's stdin, which is then closed. */
  input?: Uint8Array;
  /** Collect stdout. When false, stdout is discarded and the run ends as soon as the process exits. */
  captureStdout: boolean;
  timeoutMs: number;
}

export interface CommandOutput {
  stdout: Buffer;
}

/**
 * Runs an external command. Rejects with a {@link TransportError} when the command is missing,
 * times out or exits non-zero.
 */
export type CommandRunner = (spec: CommandSpec, opts: RunCommandOptions) => Promise<CommandOutput>;

export const runCommand: CommandRunner = (spec, { input, captureStdout, timeoutMs }) => {
  return new Promise<CommandOutput>((resolve, reject) => {
    const child = spawn(spec.command, [...spec.args], {
      stdio: [input === undefined ? "ignore" : "pipe", captureStdout ? "pipe" : "ignore", "pipe"],
      windowsHide: true,
    });

    const stdoutChunks: Array<Buffer> = [];
    let stderrText = "";
    let stdinError: Error | undefined;
    let settled = false;

    // Selection owners such as xclip and wl-copy fork a child that inherits our pipes and lives on
    // after the command itself exits. Drop our ends so that child cannot keep this process alive.
    const releaseStreams = () => {
      child.stdin?.destroy();
      child.stdout?.destroy();
      child.stderr?.destroy();
    };

    const settle = (error: TransportError | undefined) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      if (error !== undefined) {
        releaseStreams();
        reject(error);
        return;
      }
      const stdout = Buffer.concat(stdoutChunks);
      releaseStreams();
      resolve({ stdout });
    };

    const timer = setTimeout(() => {
      child.kill("SIGKILL");
      settle(new CommandTimeoutError(spec.command, timeoutMs));
    }, timeoutMs);

    child.stdout?.on("data", (chunk: Buffer) => {
      stdoutChunks.push(chunk);
    });
    child.stderr?.setEncoding("utf8");
    child.stderr?.on("data", (chunk: string) => {
      stderrText += chunk;
    });

    child.on("error", error => {
      if ("code" in error && error.code === "ENOENT") {
        settle(new NoCommandFoundError(spec.command));
      } else {
        settle(new CommandFailedError(spec.command, null, null, error.message));
      }
    });

    const onFinished = (code: number | null, signal: NodeJS.Signals | null) => {
      if (code !== 0) {
        settle(new CommandFailedError(spec.command, code, signal, stderrText.trim()));
      } else if (stdinError !== undefined) {
        settle(
          new CommandFailedError(
            spec.command,
            code,
            signal,
            `stopped reading its input early (${stdinError.message})`,
          ),
        );
      } else {
        settle(undefined);
      }
    };
    // "close" waits for stdout to drain, which a paste needs. A copy only needs the exit status.
    if (captureStdout) {
      child.on("close", onFinished);
    } else {
      child.on("exit", onFinished);
    }

    if (input !== undefined && child.stdin !== null) {
      child.stdin.on("error", error => {
        stdinError = error;
      });
      child.stdin.end(input);
    }
  });
};
