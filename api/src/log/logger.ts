// SPDX-License-Identifier: Apache-2.0
// api/src/log/logger.ts
import { createHash, randomUUID } from "node:crypto";
import type { IncomingMessage, ServerResponse } from "node:http";
import { pino, type Logger, type LevelWithSilent } from "pino";
import { pinoHttp } from "pino-http";

export function createLogger(level: LevelWithSilent = "info"): Logger {
  return pino({
    level,
    base: { service: "pubsub-webhook-relay" },
    // never emit credentials even if a caller passes a header object by mistake
    redact: ["req.headers.authorization", "req.headers.cookie", "headers.authorization", "headers.cookie"],
  });
}

/**
 * Request logging without payloads or header dumps: id, method and url on the
 * way in, status on the way out.
 */
export function httpLogger(logger: Logger) {
  return pinoHttp({
    logger,
    genReqId: (req: IncomingMessage) => {
      const hdr = req.headers["x-request-id"];
      return typeof hdr === "string" && hdr.length > 0 && hdr.length <= 128 ? hdr : randomUUID();
    },
    serializers: {
      req: (req: { id?: unknown; method?: string; url?: string }) => ({ id: req.id, method: req.method, url: req.url }),
      res: (res: { statusCode?: number }) => ({ statusCode: res.statusCode }),
    },
    customLogLevel: (_req: IncomingMessage, res: ServerResponse, err?: Error) => {
      if (err || res.statusCode >= 500) return "error";
      if (res.statusCode >= 400) return "warn";
      return "info";
    },
  });
}

/** Short fingerprint for correlating a payload in logs without logging it. */
export function payloadDigest(body: Buffer): { bytes: number; sha256: string } {
  return {
    bytes: body.length,
    sha256: createHash("sha256").update(body).digest("hex").slice(0, 16),
  };
}
