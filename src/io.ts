import { type Readable, type Writable } from "stream";

/**
 * Reads the whole stream as raw bytes. No limit is applied here.
 */
export async function readPayload(stream: Readable = process.stdin): Promise<Buffer> {
  const chunks: Array<Buffer> = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
  }
  return Buffer.concat(chunks);
}

export function writeOutput(data: Uint8Array, stream: Writable = process.stdout): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(data, error => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}
