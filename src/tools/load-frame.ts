import { readFile } from "fs/promises";
import { extname } from "path";
import type { FrameImage } from "../types";

const MIME_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".webp": "image/webp",
  ".gif": "image/gif",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
};

export function mimeTypeFor(path: string): string {
  return MIME_TYPES[extname(path).toLowerCase()] ?? "image/jpeg";
}

/**
 * Reads a frame image from disk. Throws on I/O errors; the validator turns
 * that into a `load_failed` result for the frame.
 */
export async function loadFrame(path: string): Promise<FrameImage> {
  const data = await readFile(path);
  return { path, data, mimeType: mimeTypeFor(path) };
}
