import { type Direction, TransportError } from "../errors.js";
import { type CommandRunner, type CommandSpec } from "./runCommand.js";
import { type PasteResult, type Transport, type TransportResult } from "./Transport.js";

export interface CommandTransportOpts {
  name: string;
  copyCommand: CommandSpec;
  pasteCommand?: CommandSpec;
  runner: CommandRunner;
  timeoutMs: number;
}

/**
 * A clipboard utility driven through its standard streams: the payload goes to the copy command's
 * stdin and the paste command's stdout is the clipboard content. Bytes pass through untouched.
 */
export class CommandTransport implements Transport {
  public readonly name: string;
  public readonly capabilities: ReadonlySet<Direction>;
  private readonly copyCommand: CommandSpec;
  private readonly runner: CommandRunner;
  private readonly timeoutMs: number;

  public constructor({ name, copyCommand, pasteCommand, runner, timeoutMs }: CommandTransportOpts) {
    this.name = name;
    this.copyCommand = copyCommand;
    this.runner = runner;
    this.timeoutMs = timeoutMs;
    this.capabilities = new Set<Direction>(
      pasteCommand === undefined ? ["copy"] : ["copy", "paste"],
    );
    if (pasteCommand !== undefined) {
      this.paste = () => this.runPaste(pasteCommand);
    }
  }

  public paste?: () => Promise<PasteResult>;

  public async copy(payload: Uint8Array): Promise<TransportResult> {
    try {
      await this.runner(this.copyCommand, {
        input: payload,
        captureStdout: false,
        timeoutMs: this.timeoutMs,
      });
      return { ok: true, transport: this.name, bytesWritten: payload.length };
    } catch (error) {
      if (error instanceof TransportError) {
        return { ok: false, transport: this.name, error };
      }
      throw error;
    }
  }

  private async runPaste(pasteCommand: CommandSpec): Promise<PasteResult> {
    try {
      const { stdout } = await this.runner(pasteCommand, {
        captureStdout: true,
        timeoutMs: this.timeoutMs,
      });
      return { ok: true, transport: this.name, data: stdout };
    } catch (error) {
      if (error instanceof TransportError) {
        return { ok: false, transport: this.name, error };
      }
      throw error;
    }
  }
}
