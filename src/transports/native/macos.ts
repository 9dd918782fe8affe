import { CommandTransport } from "../CommandTransport.js";
import { type NativeClipboard, type NativeTransportDeps } from "./NativeClipboard.js";

export class MacosClipboard implements NativeClipboard {
  public readonly family = "macos";

  public transports({ runner, timeoutMs }: NativeTransportDeps): Array<CommandTransport> {
    return [
      new CommandTransport({
        name: "pbcopy",
        copyCommand: { command: "pbcopy", args: [] },
        pasteCommand: { command: "pbpaste", args: [] },
        runner,
        timeoutMs,
      }),
    ];
  }
}
