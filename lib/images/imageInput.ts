/**
 * Normalize caller-supplied photos into Buffers.
 * Accepts raw bytes, base64 data URLs, or local file paths; anything else is rejected (null).
 */

import { readFile } from "node:fs/promises";

export type ImageInput = Buffer | Uint8Array | string;

const DATA_URL_PATTERN = /^data:image\/[a-z0-9.+-]+;base64,/i;

/**
 * Returns true if the string is an inline base64 image (data:image/...;base64,...).
 */
export function isImageDataUrl(value: string): boolean {
  return DATA_URL_PATTERN.test(value.trim());
}

export function decodeImageDataUrl(value: string): Buffer | null {
  const trimmed = value.trim();
  const match = DATA_URL_PATTERN.exec(trimmed);
  if (!match) return null;
  const body = trimmed.slice(match[0].length);
  if (!body) return null;
  const decoded = Buffer.from(body, "base64");
  return decoded.length > 0 ? decoded : null;
}

export async function normalizeImageInput(input: ImageInput): Promise<Buffer | null> {
  if (Buffer.isBuffer(input)) return input.length > 0 ? input : null;
  if (input instanceof Uint8Array) return input.length > 0 ? Buffer.from(input) : null;

  const trimmed = input.trim();
  if (!trimmed) return null;
  if (isImageDataUrl(trimmed)) return decodeImageDataUrl(trimmed);

  try {
    const bytes = await readFile(trimmed);
    return bytes.length > 0 ? bytes : null;
  } catch (error) {
    console.warn("IMAGE_INPUT_READ_FAILED", {
      path: trimmed,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

export async function normalizeImageInputs(inputs: ImageInput[]): Promise<Buffer[]> {
  const buffers = await Promise.all(inputs.map((input) => normalizeImageInput(input)));
  return buffers.filter((buffer): buffer is Buffer => buffer !== null);
}
