// SPDX-License-Identifier: Apache-2.0
// api/src/webhook/handler.ts
import express, { Router, type Request, type Response, type NextFunction } from "express";
import { sendError } from "../errors.js";
import { payloadDigest } from "../log/logger.js";
import { asyncH } from "../mw/async.js";
import { ipAllowlist } from "../mw/ipAllowlist.js";
import { resolveClientIp } from "../net/clientIp.js";
import type { ParsedAllowList } from "../net/cidr.js";
import type { PublisherGateway, PublishOutcome } from "../pubsub/publisher.js";
import { publishDuration, webhookOutcomes } from "../metrics/registry.js";
import type { ChallengeDetector } from "./challenge.js";

/** Everything a healthy process needs to relay; absent in degraded mode. */
export type RelayTarget = {
  publisher: PublisherGateway;
  allowList: ParsedAllowList;
  detectChallenge: ChallengeDetector;
};

export type WebhookRouteOptions = {
  path: string;
  bodyLimit: string;
  relay: RelayTarget | null;
};

type Failure = Extract<PublishOutcome, { ok: false }>;

function failureResponse(f: Failure) {
  switch (f.cause) {
    case "timeout":
      return { status: 502, code: "upstream-timeout", outcome: "timeout" } as const;
    case "broker-unavailable":
      return { status: 502, code: "upstream-unavailable", outcome: "upstream" } as const;
    case "invalid-payload":
    case "unknown":
      return { status: 500, code: "publish-failed", outcome: "failed" } as const;
  }
}

/**
 * Webhook endpoint. Each call walks:
 * startup check -> POST only -> origin filter -> challenge echo -> publish.
 */
export default function webhookRoutes(opts: WebhookRouteOptions) {
  const { relay } = opts;
  const r = Router();

  const startupCheck = (req: Request, res: Response, next: NextFunction) => {
    if (relay) return next();
    req.log.error({ method: req.method, path: req.path, outcome: "configuration-error" }, "webhook not configured");
    webhookOutcomes.inc({ outcome: "config" });
    return sendError(res, 500, "configuration-error");
  };

  const methodCheck = (req: Request, res: Response, next: NextFunction) => {
    if (req.method === "POST") return next();
    req.log.warn({ method: req.method, path: req.path, outcome: "method-not-allowed" }, "invalid method");
    webhookOutcomes.inc({ outcome: "method" });
    res.set("Allow", "POST");
    return sendError(res, 405, "method-not-allowed");
  };

  const originCheck = relay
    ? ipAllowlist(relay.allowList, () => webhookOutcomes.inc({ outcome: "rejected" }))
    : (_req: Request, _res: Response, next: NextFunction) => next();

  // every content type is kept as raw bytes; the payload is opaque.
  // gzip/deflate bodies are decoded first, so consumers get the entity, not the transfer form
  const rawBody = express.raw({ type: () => true, limit: opts.bodyLimit, inflate: true });

  const relayRequest = async (req: Request, res: Response) => {
    if (!relay) return sendError(res, 500, "configuration-error");
    const clientIp = resolveClientIp(req.headers, req.socket.remoteAddress);
    const body: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
    const contentType = req.get("content-type");
    const base = { method: req.method, path: req.path, clientIp, ...payloadDigest(body) };

    const challenge = relay.detectChallenge({ headers: req.headers, query: req.query, body, contentType });
    if (challenge) {
      req.log.info({ ...base, outcome: "challenge", source: challenge.source, field: challenge.field }, "challenge answered");
      webhookOutcomes.inc({ outcome: "challenge" });
      if (challenge.source === "body") return res.json({ [challenge.field]: challenge.value });
      return res.type("text/plain").send(challenge.value);
    }

    const attributes = contentType ? { "content-type": contentType } : undefined;
    const end = publishDuration.startTimer();
    const result = await relay.publisher.publish(body, attributes);
    end({ result: result.ok ? "ok" : result.cause });

    if (result.ok) {
      req.log.info({ ...base, outcome: "published", topic: relay.publisher.topic, messageId: result.messageId }, "published");
      webhookOutcomes.inc({ outcome: "published" });
      return res.json({ ok: true, messageId: result.messageId });
    }

    const mapped = failureResponse(result);
    req.log.error(
      { ...base, outcome: mapped.code, cause: result.cause, detail: result.detail, topic: relay.publisher.topic },
      "publish failed"
    );
    webhookOutcomes.inc({ outcome: mapped.outcome });
    return sendError(res, mapped.status, mapped.code);
  };

  r.all(opts.path, startupCheck, methodCheck, originCheck, rawBody, asyncH(relayRequest));
  return r;
}
