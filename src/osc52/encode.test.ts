import { type Multiplexer } from "../environment.js";
import { PayloadTooLargeError } from "../errors.js";
import { BEL, ESC } from "../test-utils.js";
import { encodeOsc52, SCREEN_DCS_MAX_LENGTH, wrapForScreen } from "./encode.js";

const ST = `${ESC}\\`;

/**
 * Strips multiplexer framing and returns the base64 text of the OSC 52 sequence.
 */
function extractBase64(output: string, multiplexer: Multiplexer): string {
  let sequence = output;
  if (multiplexer === "tmux") {
    expect(sequence.startsWith(`${ESC}Ptmux;`)).toBe(true);
    expect(sequence.endsWith(ST)).toBe(true);
    sequence = sequence.slice(`${ESC}Ptmux;`.length, -ST.length).replaceAll(ESC + ESC, ESC);
  } else if (multiplexer === "screen") {
    sequence = screenChunks(output)
      .map(chunk => chunk.slice(2, -2))
      .join("");
  }
  const prefix = `${ESC}]52;c;`;
  expect(sequence.startsWith(prefix)).toBe(true);
  expect(sequence.endsWith(BEL)).toBe(true);
  return sequence.slice(prefix.length, -BEL.length);
}

function screenChunks(output: string): Array<string> {
  return output
    .split(ST)
    .filter(piece => piece.length > 0)
    .map(piece => `${piece}${ST}`);
}

describe("encodeOsc52", () => {
  it("emits a bare sequence terminated with BEL outside a multiplexer", () => {
    const output = encodeOsc52(Buffer.from("hello world"), "none", 75_000);
    expect(output.toString("latin1")).toBe(`${ESC}]52;c;aGVsbG8gd29ybGQ=${BEL}`);
  });

  it("wraps the sequence in a tmux pass-through envelope with doubled ESC bytes", () => {
    const output = encodeOsc52(Buffer.from("hello world"), "tmux", 75_000);
    expect(output.toString("latin1")).toBe(
      `${ESC}Ptmux;${ESC}${ESC}]52;c;aGVsbG8gd29ybGQ=${BEL}${ESC}\\`,
    );
  });

  it("wraps a short sequence in a single screen device control string", () => {
    const output = encodeOsc52(Buffer.from("hello world"), "screen", 75_000);
    expect(output.toString("latin1")).toBe(`${ESC}P${ESC}]52;c;aGVsbG8gd29ybGQ=${BEL}${ESC}\\`);
  });

  it("accepts a payload whose encoded length equals the limit", () => {
    // 30 bytes encode to exactly 40 base64 characters.
    const payload = Buffer.alloc(30, 0x61);
    expect(() => encodeOsc52(payload, "none", 40)).not.toThrow();
  });

  it("rejects a payload whose encoded length exceeds the limit instead of truncating", () => {
    const payload = Buffer.alloc(30, 0x61);
    let caught: unknown;
    try {
      encodeOsc52(payload, "none", 39);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(PayloadTooLargeError);
    expect(caught).toMatchObject({ kind: "PayloadTooLarge", encodedSize: 40, maxEncodedSize: 39 });
  });

  it.each<Multiplexer>(["none", "tmux", "screen"])(
    "round-trips binary bytes through %s framing",
    multiplexer => {
      const payload = Buffer.from([0x00, 0x1b, 0x07, 0x5c, 0x0a, 0x0d, 0xff, 0xfe, 0x80]);
      const output = encodeOsc52(payload, multiplexer, 75_000).toString("latin1");
      const decoded = Buffer.from(extractBase64(output, multiplexer), "base64");
      expect(decoded.equals(payload)).toBe(true);
    },
  );

  it("encodes a view into a larger buffer without its neighbouring bytes", () => {
    const backing = Buffer.from("xxhello worldxx");
    const view = new Uint8Array(backing.buffer, backing.byteOffset + 2, 11);
    const output = encodeOsc52(view, "none", 75_000);
    expect(output.toString("latin1")).toBe(`${ESC}]52;c;aGVsbG8gd29ybGQ=${BEL}`);
  });
});

describe("screen chunking", () => {
  // 3000 bytes encode to 4000 base64 characters; with the 7 byte prefix and BEL the sequence is
  // 4008 bytes, which splits into five 764 byte bodies and one of 188.
  const payload = Buffer.alloc(3000, 0x61);
  const output = encodeOsc52(payload, "screen", 75_000).toString("latin1");
  const chunks = screenChunks(output);

  it("splits a long sequence into chunks that each fit screen's limit", () => {
    expect(chunks).toHaveLength(6);
    for (const chunk of chunks) {
      expect(chunk.startsWith(`${ESC}P`)).toBe(true);
      expect(chunk.endsWith(ST)).toBe(true);
      expect(chunk.length).toBeLessThanOrEqual(SCREEN_DCS_MAX_LENGTH);
    }
    expect(chunks[0]).toHaveLength(SCREEN_DCS_MAX_LENGTH);
    expect(chunks[5]).toHaveLength(188 + 4);
  });

  it("reassembles the chunk bodies into the full base64 text", () => {
    expect(extractBase64(output, "screen")).toBe(payload.toString("base64"));
    expect(Buffer.from(extractBase64(output, "screen"), "base64").equals(payload)).toBe(true);
  });

  it("leaves a sequence that fits in one chunk whole", () => {
    expect(wrapForScreen("abc")).toBe(`${ESC}Pabc${ESC}\\`);
  });
});
