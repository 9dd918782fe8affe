import { CommandFailedError, CommandTimeoutError, NoCommandFoundError } from "../errors.js";
import { runCommand } from "./runCommand.js";

// Real subprocesses, using the node binary running the tests as a stand-in clipboard tool.
const node = process.execPath;

describe("runCommand", () => {
  it("passes stdin through to stdout byte for byte", async () => {
    const input = Buffer.from([0x00, 0x01, 0x0d, 0x0a, 0x1b, 0xff]);
    const { stdout } = await runCommand(
      { command: node, args: ["-e", "process.stdin.pipe(process.stdout)"] },
      { input, captureStdout: true, timeoutMs: 10_000 },
    );
    expect(stdout).toEqual(input);
  });

  it("resolves once a copy command exits successfully", async () => {
    const { stdout } = await runCommand(
      { command: node, args: ["-e", "process.stdin.resume(); process.stdin.on('end', () => {})"] },
      { input: Buffer.from("payload"), captureStdout: false, timeoutMs: 10_000 },
    );
    expect(stdout).toEqual(Buffer.alloc(0));
  });

  it("classifies a missing executable", async () => {
    await expect(
      runCommand(
        { command: "termclip-test-no-such-command", args: [] },
        { captureStdout: false, timeoutMs: 10_000 },
      ),
    ).rejects.toBeInstanceOf(NoCommandFoundError);
  });

  it("classifies a non-zero exit and keeps stderr", async () => {
    const run = runCommand(
      { command: node, args: ["-e", "process.stderr.write('no display'); process.exit(3)"] },
      { captureStdout: true, timeoutMs: 10_000 },
    );
    await expect(run).rejects.toBeInstanceOf(CommandFailedError);
    await expect(run).rejects.toMatchObject({ exitCode: 3, stderr: "no display" });
  });

  it("kills a command that outlives the timeout", async () => {
    const run = runCommand(
      { command: node, args: ["-e", "setTimeout(() => {}, 30000)"] },
      { captureStdout: false, timeoutMs: 200 },
    );
    await expect(run).rejects.toBeInstanceOf(CommandTimeoutError);
    await expect(run).rejects.toMatchObject({ timeoutMs: 200 });
  });
});
