import { STATUS_CODES } from "node:http";
import type { Response } from "express";

export function sendError(res: Response, status: number): void {
  res
    .status(status)
    .set({
      "Content-Type": "text/plain; charset=utf-8",
      "X-Content-Type-Options": "nosniff",
    })
    .send(`${status} ${STATUS_CODES[status] ?? "Error"}\n`);
}
