import { open, type FileHandle } from "fs/promises";
import { type Writable } from "stream";
import { TerminalUnavailableError } from "../errors.js";
import { writeOutput } from "../io.js";

/**
 * Where escape sequences are written. Kept apart from stdout so that `termclip` keeps working when
 * its own output is piped or redirected.
 */
export interface TerminalSink {
  readonly description: string;
  write(data: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

export type TerminalSinkOpener = () => Promise<TerminalSink>;

export function controllingTerminalPath(platform: NodeJS.Platform = process.platform): string {
  return platform === "win32" ? "CONOUT$" : "/dev/tty";
}

class FileHandleSink implements TerminalSink {
  public constructor(
    private readonly handle: FileHandle,
    public readonly description: string,
  ) {}

  public async write(data: Uint8Array): Promise<void> {
    // A single write() may stop short of the whole buffer.
    await this.handle.writeFile(data);
  }

  public async close(): Promise<void> {
    await this.handle.close();
  }
}

class StreamSink implements TerminalSink {
  public constructor(
    private readonly stream: Writable,
    public readonly description: string,
  ) {}

  public write(data: Uint8Array): Promise<void> {
    return writeOutput(data, this.stream);
  }

  public async close(): Promise<void> {
    // stdout belongs to the process and stays open.
  }
}

/**
 * Opens the controlling terminal. When there is none (no /dev/tty, e.g. under some CI runners) but
 * stdout is a terminal, stdout is used instead.
 */
export async function openTerminalSink(
  path: string = controllingTerminalPath(),
): Promise<TerminalSink> {
  try {
    const handle = await open(path, "w");
    return new FileHandleSink(handle, path);
  } catch (error) {
    if (process.stdout.isTTY) {
      return new StreamSink(process.stdout, "stdout");
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new TerminalUnavailableError(`cannot open ${path} (${reason}) and stdout is not a terminal`);
  }
}
