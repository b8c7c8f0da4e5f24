// SPDX-License-Identifier: Apache-2.0
import { createApp, createRelay } from "./app.js";
import { loadConfig } from "./config/env.js";
import { ConfigurationError } from "./errors.js";
import { createLogger } from "./log/logger.js";
import { parseAllowList } from "./net/cidr.js";
import { createGooglePubSubClient } from "./pubsub/googlePubSub.js";
import type { RelayTarget } from "./webhook/handler.js";

/* -----------------------------
 * Config (validated with Zod)
 * ---------------------------*/
const CFG = loadConfig();
const logger = createLogger(CFG.server.logLevel);

/* -----------------------------
 * Relay: broker client created once for the whole process
 * ---------------------------*/
let relay: RelayTarget | null = null;
if (CFG.ok) {
  try {
    relay = createRelay(CFG.webhook, logger, createGooglePubSubClient);
  } catch (err) {
    if (!(err instanceof ConfigurationError)) throw err;
    logger.fatal({ keys: err.keys }, `${err.message}; serving in degraded mode`);
  }
} else {
  logger.fatal({ problems: CFG.problems }, "configuration invalid; serving in degraded mode");
}

const app = createApp({
  logger,
  webhookPath: CFG.server.webhookPath,
  bodyLimit: CFG.server.bodyLimit,
  relay,
  metricsAllowList: parseAllowList(CFG.server.metricsAllowList, {
    onInvalid: (entry, reason) => logger.error({ entry, reason }, "invalid METRICS_ALLOWLIST entry skipped"),
  }),
});

/* -----------------------------
 * Start server
 * ---------------------------*/
const server = app.listen(CFG.server.port, () =>
  logger.info({ port: CFG.server.port, path: CFG.server.webhookPath, configured: relay !== null }, "[relay] listening")
);

/* -----------------------------
 * Graceful shutdown
 * ---------------------------*/
async function shutdown(signal: string) {
  logger.info({ signal }, "shutting down");
  try {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    await relay?.publisher.close();
  } catch (err) {
    logger.error({ err }, "shutdown error");
    process.exitCode = 1;
  } finally {
    process.exit();
  }
}
process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
