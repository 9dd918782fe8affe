import { TerminalUnavailableError } from "../errors.js";
import { type TerminalSink } from "../osc52/terminalSink.js";
import { BEL, createTestLogger, ESC, MemoryTerminalSink, openerFor } from "../test-utils.js";
import { Osc52Transport } from "./Osc52Transport.js";

describe("Osc52Transport", () => {
  it("writes the sequence to the terminal sink and closes it", async () => {
    const sink = new MemoryTerminalSink();
    const { logger } = createTestLogger();
    const transport = new Osc52Transport({
      multiplexer: "none",
      maxEncodedSize: 75_000,
      openSink: openerFor(sink),
      logger,
    });

    const result = await transport.copy(Buffer.from("hello world"));

    expect(result).toEqual({ ok: true, transport: "osc52", bytesWritten: 11 });
    expect(sink.text()).toBe(`${ESC}]52;c;aGVsbG8gd29ybGQ=${BEL}`);
    expect(sink.closed).toBe(true);
  });

  it("never opens the terminal for a payload over the limit", async () => {
    let opened = false;
    const { logger } = createTestLogger();
    const transport = new Osc52Transport({
      multiplexer: "none",
      maxEncodedSize: 8,
      openSink: async () => {
        opened = true;
        return new MemoryTerminalSink();
      },
      logger,
    });

    const result = await transport.copy(Buffer.from("hello world"));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("PayloadTooLarge");
    }
    expect(opened).toBe(false);
  });

  it("fails when no terminal can be opened", async () => {
    const { logger } = createTestLogger();
    const transport = new Osc52Transport({
      multiplexer: "none",
      maxEncodedSize: 75_000,
      openSink: async () => {
        throw new TerminalUnavailableError("cannot open /dev/tty");
      },
      logger,
    });

    const result = await transport.copy(Buffer.from("hello world"));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("TerminalUnavailable");
    }
  });

  it("classifies a failed terminal write and still closes the sink", async () => {
    let closed = false;
    const brokenSink: TerminalSink = {
      description: "broken",
      write: async () => {
        throw new Error("EIO: i/o error, write");
      },
      close: async () => {
        closed = true;
      },
    };
    const { logger } = createTestLogger();
    const transport = new Osc52Transport({
      multiplexer: "none",
      maxEncodedSize: 75_000,
      openSink: openerFor(brokenSink),
      logger,
    });

    const result = await transport.copy(Buffer.from("hello world"));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("TerminalUnavailable");
      expect(result.error.message).toBe(
        "no terminal to write the escape sequence to: writing to broken failed: EIO: i/o error, write",
      );
    }
    expect(closed).toBe(true);
  });

  it("classifies a failed close of the terminal", async () => {
    const sink = new MemoryTerminalSink();
    const stubbornSink: TerminalSink = {
      description: "stubborn",
      write: data => sink.write(data),
      close: async () => {
        throw new Error("EBADF: bad file descriptor, close");
      },
    };
    const { logger } = createTestLogger();
    const transport = new Osc52Transport({
      multiplexer: "none",
      maxEncodedSize: 75_000,
      openSink: openerFor(stubbornSink),
      logger,
    });

    const result = await transport.copy(Buffer.from("hello world"));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("TerminalUnavailable");
      expect(result.error.message).toBe(
        "no terminal to write the escape sequence to: closing stubborn failed: " +
          "EBADF: bad file descriptor, close",
      );
    }
  });

  it("is copy only", () => {
    const { logger } = createTestLogger();
    const transport = new Osc52Transport({
      multiplexer: "tmux",
      maxEncodedSize: 75_000,
      openSink: openerFor(new MemoryTerminalSink()),
      logger,
    });
    expect([...transport.capabilities]).toEqual(["copy"]);
  });
});
