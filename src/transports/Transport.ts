import { type Direction, type TransportError } from "../errors.js";

export type TransportResult =
  | { ok: true; transport: string; bytesWritten: number }
  | { ok: false; transport: string; error: TransportError };

export type PasteResult =
  | { ok: true; transport: string; data: Buffer }
  | { ok: false; transport: string; error: TransportError };

/**
 * One way of reaching a clipboard. Every transport can copy; only some can read the clipboard back.
 */
export interface Transport {
  readonly name: string;
  readonly capabilities: ReadonlySet<Direction>;
  copy(payload: Uint8Array): Promise<TransportResult>;
  paste?(): Promise<PasteResult>;
}

export interface PasteCapableTransport extends Transport {
  paste(): Promise<PasteResult>;
}

export function canPaste(transport: Transport): transport is PasteCapableTransport {
  return transport.capabilities.has("paste") && transport.paste !== undefined;
}
