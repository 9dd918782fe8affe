import { CommandTransport } from "../CommandTransport.js";
import { type NativeClipboard, type NativeTransportDeps } from "./NativeClipboard.js";
import { powershellCopyCommand, powershellPasteCommand } from "./windows.js";

/**
 * Inside WSL the Windows host clipboard is reachable through the host's executables, which WSL
 * interop puts on PATH with their .exe suffix.
 */
export class WslClipboard implements NativeClipboard {
  public readonly family = "wsl";

  public transports({ runner, timeoutMs }: NativeTransportDeps): Array<CommandTransport> {
    return [
      new CommandTransport({
        name: "clip.exe",
        copyCommand: { command: "clip.exe", args: [] },
        runner,
        timeoutMs,
      }),
      new CommandTransport({
        name: "powershell.exe",
        copyCommand: powershellCopyCommand("powershell.exe"),
        pasteCommand: powershellPasteCommand("powershell.exe"),
        runner,
        timeoutMs,
      }),
    ];
  }
}
