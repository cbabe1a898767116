import { createWriteStream } from "node:fs";
import { rename, rm } from "node:fs/promises";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";

/** Downloads `url` to `destPath` and returns the number of bytes written. */
export type FileDownloader = (url: string, destPath: string, signal: AbortSignal) => Promise<number>;

/**
 * Streams the response body to `<destPath>.part` and renames it into place
 * once complete, so a partial download is never mistaken for a model file.
 */
export const downloadFile: FileDownloader = async (url, destPath, signal) => {
  const response = await fetch(url, { signal, redirect: "follow" });
  if (!response.ok) {
    throw new Error(`Download of ${url} failed: HTTP ${response.status}`);
  }
  if (!response.body) {
    throw new Error(`Download of ${url} returned an empty body`);
  }

  const partPath = `${destPath}.part`;
  let bytes = 0;
  try {
    const body = Readable.fromWeb(response.body);
    body.on("data", (chunk: Buffer) => {
      bytes += chunk.length;
    });
    await pipeline(body, createWriteStream(partPath), { signal });
    await rename(partPath, destPath);
  } catch (err) {
    await rm(partPath, { force: true });
    throw err;
  }

  if (bytes === 0) {
    await rm(destPath, { force: true });
    throw new Error(`Download of ${url} was empty`);
  }
  return bytes;
};
