import { ClientInputError } from "../errors.js";

/** The relay rejects request bodies over 1mb, so larger input is refused up front. */
export const MAX_PIPED_BYTES = 1_000_000;

export type PipedInput = AsyncIterable<string | Buffer> & { isTTY?: boolean };

/**
 * Returns piped input as text, or an empty string when attached to a terminal.
 * Input past `maxBytes` raises `ClientInputError` without reading the rest.
 * A leading byte order mark is dropped.
 */
export async function readStdinIfPiped(
  input: PipedInput = process.stdin,
  maxBytes = MAX_PIPED_BYTES
): Promise<string> {
  if (input.isTTY) {
    return "";
  }

  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of input) {
    const bytes = typeof chunk === "string" ? Buffer.from(chunk) : chunk;
    size += bytes.length;
    if (size > maxBytes) {
      throw new ClientInputError(`Piped input exceeds ${maxBytes} bytes.`);
    }
    chunks.push(bytes);
  }
  return Buffer.concat(chunks).toString("utf-8").replace(/^\uFEFF/, "");
}
