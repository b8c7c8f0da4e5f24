// SPDX-License-Identifier: Apache-2.0
// api/src/app.ts
import express, { type Request, type Response, type NextFunction } from "express";
import helmet from "helmet";
import type { Logger } from "pino";

import type { WebhookConfig } from "./config/env.js";
import { sendError } from "./errors.js";
import { httpLogger } from "./log/logger.js";
import { registry, httpRequestsTotal, httpDuration } from "./metrics/registry.js";
import { asyncH } from "./mw/async.js";
import { metricsGuard } from "./mw/metricsGuard.js";
import { parseAllowList, type ParsedAllowList } from "./net/cidr.js";
import { PublisherGateway, type BrokerClientFactory } from "./pubsub/publisher.js";
import healthRoutes from "./routes/health.js";
import { challengeFromSettings, type ChallengeDetector } from "./webhook/challenge.js";
import webhookRoutes, { type RelayTarget } from "./webhook/handler.js";

export type AppDeps = {
  logger: Logger;
  webhookPath: string;
  bodyLimit: string;
  /** null = degraded mode (required configuration missing) */
  relay: RelayTarget | null;
  metricsAllowList: ParsedAllowList;
};

/**
 * Startup half of the relay: one broker client, allow-list parsed once.
 * Throws ConfigurationError when the gateway cannot be initialized.
 */
export function createRelay(
  cfg: Readonly<WebhookConfig>,
  logger: Logger,
  createClient: BrokerClientFactory,
  detectChallenge: ChallengeDetector = challengeFromSettings(cfg.challenge)
): RelayTarget {
  const allowList = parseAllowList(cfg.allowList, {
    policy: cfg.invalidAllowListPolicy,
    onInvalid: (entry, reason) => logger.error({ entry, reason }, "invalid IP allow-list entry skipped"),
  });
  if (allowList.configured && allowList.ranges.length === 0) {
    logger.error(
      { invalid: allowList.invalid.length, policy: allowList.policy },
      allowList.policy === "allow" ? "no valid allow-list entries: all origins permitted" : "no valid allow-list entries: all origins rejected"
    );
  }

  const publisher = PublisherGateway.initialize(
    {
      projectId: cfg.projectId,
      topicName: cfg.topicName,
      topicProjectId: cfg.topicProjectId,
      timeoutMs: cfg.publishTimeoutMs,
    },
    createClient
  );
  logger.info({ topic: publisher.topic, allowListRanges: allowList.ranges.length, timeoutMs: publisher.timeoutMs }, "relay ready");
  return { publisher, allowList, detectChallenge };
}

const KNOWN_ROUTES = new Set(["/health", "/ready", "/metrics"]);

export function createApp(deps: AppDeps) {
  const app = express();
  app.disable("x-powered-by");

  /* Logging */
  app.use(httpLogger(deps.logger));
  app.use((req, res, next) => {
    res.setHeader("X-Request-Id", String(req.id));
    next();
  });

  /* Security headers */
  app.use(helmet());

  /* Metrics (HTTP) */
  app.use((req, res, next) => {
    const end = httpDuration.startTimer();
    res.on("finish", () => {
      const route = req.path === deps.webhookPath ? "webhook" : KNOWN_ROUTES.has(req.path) ? req.path : "other";
      httpRequestsTotal.inc({ route, method: req.method, code: String(res.statusCode) });
      end({ method: req.method, code: String(res.statusCode) });
    });
    next();
  });
  app.get(
    "/metrics",
    metricsGuard(deps.metricsAllowList),
    asyncH(async (_req, res) => {
      res.set("Content-Type", registry.contentType);
      res.end(await registry.metrics());
    })
  );

  /* Routes */
  app.use(healthRoutes({ configured: deps.relay !== null }));
  app.use(
    webhookRoutes({
      path: deps.webhookPath,
      bodyLimit: deps.bodyLimit,
      relay: deps.relay,
    })
  );

  /* Global error handler: body-parser client errors keep their status, the rest is a bare 500 */
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status = statusOf(err);
    if (status === 413) return sendError(res, 413, "payload-too-large");
    if (status !== undefined && status >= 400 && status < 500) return sendError(res, status, "bad-request");
    req.log.error({ err, method: req.method, path: req.path }, "unhandled error");
    return sendError(res, 500, "internal");
  });

  return app;
}

function statusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  return typeof err.status === "number" ? err.status : undefined;
}
