import { type SimpleLogger } from "@lmstudio/lms-common";
import { type Multiplexer } from "../environment.js";
import { type Direction, TerminalUnavailableError, TransportError } from "../errors.js";
import { encodeOsc52 } from "../osc52/encode.js";
import { type TerminalSink, type TerminalSinkOpener } from "../osc52/terminalSink.js";
import { type Transport, type TransportResult } from "./Transport.js";

export interface Osc52TransportOpts {
  multiplexer: Multiplexer;
  maxEncodedSize: number;
  openSink: TerminalSinkOpener;
  logger: SimpleLogger;
}

/**
 * Asks the terminal emulator itself to set the clipboard. Works over SSH and inside multiplexers,
 * but cannot read the clipboard back.
 */
export class Osc52Transport implements Transport {
  public readonly name = "osc52";
  public readonly capabilities: ReadonlySet<Direction> = new Set<Direction>(["copy"]);

  public constructor(private readonly opts: Osc52TransportOpts) {}

  public async copy(payload: Uint8Array): Promise<TransportResult> {
    const { multiplexer, maxEncodedSize, openSink, logger } = this.opts;
    try {
      // Encoding comes first so an oversized payload never reaches the terminal.
      const sequence = encodeOsc52(payload, multiplexer, maxEncodedSize);
      const sink = await openSink();
      logger.debug(
        `Writing ${sequence.length} byte OSC 52 sequence (multiplexer: ${multiplexer}) to`,
        sink.description,
      );
      try {
        await sink.write(sequence);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new TerminalUnavailableError(`writing to ${sink.description} failed: ${reason}`);
      } finally {
        await closeSink(sink);
      }
      return { ok: true, transport: this.name, bytesWritten: payload.length };
    } catch (error) {
      if (error instanceof TransportError) {
        return { ok: false, transport: this.name, error };
      }
      throw error;
    }
  }
}

async function closeSink(sink: TerminalSink): Promise<void> {
  try {
    await sink.close();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new TerminalUnavailableError(`closing ${sink.description} failed: ${reason}`);
  }
}
