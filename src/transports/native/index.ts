import { type EnvironmentContext } from "../../environment.js";
import { MacosClipboard } from "./macos.js";
import { type NativeClipboard } from "./NativeClipboard.js";
import { WaylandClipboard } from "./wayland.js";
import { WindowsClipboard } from "./windows.js";
import { WslClipboard } from "./wsl.js";
import { X11Clipboard } from "./x11.js";

export type { NativeClipboard, NativeTransportDeps } from "./NativeClipboard.js";

/**
 * Clipboards of the platform, in the order their tools are tried. WSL adds the Windows host after
 * any display server.
 */
export function nativeClipboardsFor(context: EnvironmentContext): Array<NativeClipboard> {
  const clipboards: Array<NativeClipboard> = [];
  switch (context.os) {
    case "macos":
      clipboards.push(new MacosClipboard());
      break;
    case "windows":
      clipboards.push(new WindowsClipboard());
      break;
    case "linux-wayland":
      clipboards.push(new WaylandClipboard(context.hasX11Display));
      break;
    case "linux-x11":
      clipboards.push(new X11Clipboard());
      break;
    case "unknown":
      break;
  }
  if (context.wsl) {
    clipboards.push(new WslClipboard());
  }
  return clipboards;
}

