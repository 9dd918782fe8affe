import { type CommandSpec } from "../runCommand.js";
import { CommandTransport } from "../CommandTransport.js";
import { type NativeClipboard, type NativeTransportDeps } from "./NativeClipboard.js";

const POWERSHELL_FLAGS = ["-NoLogo", "-NoProfile", "-NonInteractive", "-Command"];

// Both scripts pin UTF-8 so the bytes are not re-encoded through the console code page.
const SET_CLIPBOARD_SCRIPT =
  "[Console]::InputEncoding = [System.Text.Encoding]::UTF8; " +
  "Set-Clipboard -Value ([Console]::In.ReadToEnd())";
const GET_CLIPBOARD_SCRIPT =
  "[Console]::OutputEncoding = [System.Text.Encoding]::UTF8; " +
  "[Console]::Out.Write((Get-Clipboard -Raw))";

export function powershellCopyCommand(executable: string): CommandSpec {
  return { command: executable, args: [...POWERSHELL_FLAGS, SET_CLIPBOARD_SCRIPT] };
}

export function powershellPasteCommand(executable: string): CommandSpec {
  return { command: executable, args: [...POWERSHELL_FLAGS, GET_CLIPBOARD_SCRIPT] };
}

/**
 * `clip` is write-only, so paste is served by PowerShell alone.
 */
export class WindowsClipboard implements NativeClipboard {
  public readonly family = "windows";

  public transports({ runner, timeoutMs }: NativeTransportDeps): Array<CommandTransport> {
    return [
      new CommandTransport({
        name: "clip",
        copyCommand: { command: "clip", args: [] },
        runner,
        timeoutMs,
      }),
      new CommandTransport({
        name: "powershell",
        copyCommand: powershellCopyCommand("powershell"),
        pasteCommand: powershellPasteCommand("powershell"),
        runner,
        timeoutMs,
      }),
    ];
  }
}
