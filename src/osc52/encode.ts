import { type Multiplexer } from "../environment.js";
import { PayloadTooLargeError } from "../errors.js";

const ESC = "\x1b";
const BEL = "\x07";
/** String terminator, `ESC \`. Closes the device control strings used for pass-through. */
const ST = `${ESC}\\`;

/**
 * GNU screen drops device control strings longer than this, framing included.
 */
export const SCREEN_DCS_MAX_LENGTH = 768;

const SCREEN_DCS_OPEN = `${ESC}P`;
const SCREEN_CHUNK_BODY_LENGTH = SCREEN_DCS_MAX_LENGTH - SCREEN_DCS_OPEN.length - ST.length;

/**
 * The bare OSC 52 sequence that sets the `c` (clipboard) selection. It is terminated with BEL, which
 * every terminal that implements OSC 52 accepts.
 */
export function buildOsc52Sequence(base64: string): string {
  return `${ESC}]52;c;${base64}${BEL}`;
}

/**
 * tmux forwards the content of an `ESC P tmux;` device control string to the outer terminal once
 * every ESC inside it is doubled. Needs `allow-passthrough on` in tmux 3.3 and later.
 */
export function wrapForTmux(sequence: string): string {
  return `${ESC}Ptmux;${sequence.replaceAll(ESC, ESC + ESC)}${ST}`;
}

/**
 * screen forwards device control strings verbatim, but only short ones, so the sequence is cut into
 * consecutive `ESC P ... ESC \` chunks that the terminal sees joined back together.
 */
export function wrapForScreen(sequence: string): string {
  const chunks: Array<string> = [];
  for (let start = 0; start < sequence.length; start += SCREEN_CHUNK_BODY_LENGTH) {
    const body = sequence.slice(start, start + SCREEN_CHUNK_BODY_LENGTH);
    chunks.push(`${SCREEN_DCS_OPEN}${body}${ST}`);
  }
  return chunks.join("");
}

/**
 * Frames the payload as an OSC 52 clipboard write, wrapped for the multiplexer the terminal is
 * reached through.
 *
 * @throws PayloadTooLargeError when the base64 form is longer than `maxEncodedSize`. The payload is
 * never truncated.
 */
export function encodeOsc52(
  payload: Uint8Array,
  multiplexer: Multiplexer,
  maxEncodedSize: number,
): Buffer {
  const base64 = Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength).toString(
    "base64",
  );
  if (base64.length > maxEncodedSize) {
    throw new PayloadTooLargeError(base64.length, maxEncodedSize);
  }
  const sequence = buildOsc52Sequence(base64);
  switch (multiplexer) {
    case "tmux":
      return Buffer.from(wrapForTmux(sequence), "latin1");
    case "screen":
      return Buffer.from(wrapForScreen(sequence), "latin1");
    case "none":
      return Buffer.from(sequence, "latin1");
  }
}
