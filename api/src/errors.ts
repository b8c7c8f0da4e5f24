// SPDX-License-Identifier: Apache-2.0
// api/src/errors.ts
import type { Response } from "express";

/** Raised at startup when required settings are missing or unreadable. */
export class ConfigurationError extends Error {
  constructor(message: string, readonly keys: string[] = []) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export type ErrorCode =
  | "configuration-error"
  | "method-not-allowed"
  | "origin-unverifiable"
  | "origin-rejected"
  | "upstream-timeout"
  | "upstream-unavailable"
  | "publish-failed"
  | "payload-too-large"
  | "bad-request"
  | "internal";

export function sendError(res: Response, status: number, code: ErrorCode, detail?: string) {
  return res.status(status).json({
    ok: false,
    error: { code, detail },
  });
}
