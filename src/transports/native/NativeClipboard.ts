import { type CommandTransport } from "../CommandTransport.js";
import { type CommandRunner } from "../runCommand.js";

export interface NativeTransportDeps {
  runner: CommandRunner;
  timeoutMs: number;
}

/**
 * The clipboard utilities of one platform or display server, in the order they should be tried.
 */
export interface NativeClipboard {
  readonly family: string;
  transports(deps: NativeTransportDeps): Array<CommandTransport>;
}
