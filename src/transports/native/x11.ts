import { CommandTransport } from "../CommandTransport.js";
import { type NativeClipboard, type NativeTransportDeps } from "./NativeClipboard.js";

export class X11Clipboard implements NativeClipboard {
  public readonly family = "x11";

  public transports({ runner, timeoutMs }: NativeTransportDeps): Array<CommandTransport> {
    return [
      new CommandTransport({
        name: "xclip",
        // Without -quiet, xclip forks a selection owner and returns once it has read its input.
        copyCommand: { command: "xclip", args: ["-selection", "clipboard", "-in"] },
        pasteCommand: { command: "xclip", args: ["-selection", "clipboard", "-out"] },
        runner,
        timeoutMs,
      }),
      new CommandTransport({
        name: "xsel",
        copyCommand: { command: "xsel", args: ["--clipboard", "--input"] },
        pasteCommand: { command: "xsel", args: ["--clipboard", "--output"] },
        runner,
        timeoutMs,
      }),
    ];
  }
}
