import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Request, Response } from "express";
import type { Logger } from "../logging";
import { encodeRfc5987 } from "../utils/urlPath";

export type FileTransfer = Readonly<{
  absolutePath: string;
  displayName: string;
  sizeInBytes: number;
}>;

// Quoted form for clients that ignore filename*.
export function asciiFilename(name: string): string {
  return name.replace(/[^\x20-\x7e]|["\\]/gu, "_");
}

export function contentDisposition(name: string): string {
  return `attachment; filename="${asciiFilename(name)}"; filename*=UTF-8''${encodeRfc5987(name)}`;
}

/**
 * Streams a file as an attachment. `openBody` is only called for GET; whoever
 * owns the underlying file closes it once this settles. Transfer errors are
 * logged only: by then the headers are on the wire.
 */
export async function sendFileDownload(
  req: Request,
  res: Response,
  openBody: () => Readable,
  transfer: FileTransfer,
  logger: Logger,
): Promise<void> {
  res.status(200).set({
    "Content-Disposition": contentDisposition(transfer.displayName),
    "Content-Type": "application/octet-stream",
    "Content-Length": String(transfer.sizeInBytes),
    "X-Content-Type-Options": "nosniff",
  });

  if (req.method === "HEAD") {
    res.end();
    return;
  }

  try {
    await pipeline(openBody(), res);
  } catch (err) {
    logger.error(`File transfer error: ${transfer.absolutePath}`, err);
  }
}
