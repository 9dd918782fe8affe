import { CommandTransport } from "../CommandTransport.js";
import { type NativeClipboard, type NativeTransportDeps } from "./NativeClipboard.js";
import { X11Clipboard } from "./x11.js";

/**
 * wl-clipboard first. When an X server is also reachable (XWayland), the X11 tools follow so a
 * machine without wl-clipboard installed can still reach the clipboard.
 */
export class WaylandClipboard implements NativeClipboard {
  public readonly family = "wayland";

  public constructor(private readonly withX11Fallback: boolean) {}

  public transports(deps: NativeTransportDeps): Array<CommandTransport> {
    const wlCopy = new CommandTransport({
      name: "wl-copy",
      copyCommand: { command: "wl-copy", args: [] },
      pasteCommand: { command: "wl-paste", args: ["--no-newline"] },
      runner: deps.runner,
      timeoutMs: deps.timeoutMs,
    });
    if (!this.withX11Fallback) {
      return [wlCopy];
    }
    return [wlCopy, ...new X11Clipboard().transports(deps)];
  }
}
