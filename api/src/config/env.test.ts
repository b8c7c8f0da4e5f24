// SPDX-License-Identifier: Apache-2.0
// api/src/config/env.test.ts
import { test } from "node:test";
import assert from "node:assert/strict";
import { loadConfig } from "./env.js";

const base = { GCP_PROJECT: "proj-a", TOPIC_NAME: "events" };

test("defaults for a minimal environment", () => {
  const cfg = loadConfig(base);
  assert.equal(cfg.ok, true);
  if (!cfg.ok) return;
  assert.deepEqual(cfg.webhook, {
    projectId: "proj-a",
    topicName: "events",
    topicProjectId: "proj-a",
    publishTimeoutMs: 5000,
    allowList: [],
    invalidAllowListPolicy: "allow",
    challenge: { bodyField: "challenge", header: undefined, queryParam: undefined },
  });
  assert.deepEqual(cfg.server, {
    port: 8080,
    logLevel: "info",
    webhookPath: "/",
    bodyLimit: "10mb",
    metricsAllowList: [],
  });
  assert.equal(Object.isFrozen(cfg.webhook), true);
});

test("optional settings are read", () => {
  const cfg = loadConfig({
    ...base,
    TOPIC_PROJECT: "proj-b",
    IP_ALLOWLIST: "10.0.0.0/8, 2001:db8::/32",
    ALLOWLIST_INVALID_POLICY: "deny",
    PUBLISH_TIMEOUT_MS: "2500",
    CHALLENGE_BODY_FIELD: "",
    CHALLENGE_HEADER: "X-Hook-Challenge",
    CHALLENGE_QUERY_PARAM: "hub.challenge",
    WEBHOOK_PATH: "/hooks/in",
    PORT: "9090",
  });
  assert.equal(cfg.ok, true);
  if (!cfg.ok) return;
  assert.equal(cfg.webhook.topicProjectId, "proj-b");
  assert.deepEqual(cfg.webhook.allowList, ["10.0.0.0/8", "2001:db8::/32"]);
  assert.equal(cfg.webhook.invalidAllowListPolicy, "deny");
  assert.equal(cfg.webhook.publishTimeoutMs, 2500);
  assert.deepEqual(cfg.webhook.challenge, { bodyField: undefined, header: "x-hook-challenge", queryParam: "hub.challenge" });
  assert.equal(cfg.server.webhookPath, "/hooks/in");
  assert.equal(cfg.server.port, 9090);
});

test("IP_WHITELIST is accepted as an alias", () => {
  const cfg = loadConfig({ ...base, IP_WHITELIST: "1.2.3.4" });
  assert.equal(cfg.ok && cfg.webhook.allowList[0], "1.2.3.4");
});

test("missing required settings put the process in degraded mode", () => {
  const cfg = loadConfig({ TOPIC_NAME: "events" });
  assert.equal(cfg.ok, false);
  if (cfg.ok) return;
  assert.deepEqual(cfg.problems, ["Missing required env: GCP_PROJECT"]);
  assert.equal(cfg.server.port, 8080);

  const blank = loadConfig({ GCP_PROJECT: "  ", TOPIC_NAME: "" });
  assert.equal(blank.ok, false);
  if (blank.ok) return;
  assert.deepEqual(blank.problems, ["Missing required env: GCP_PROJECT", "Missing required env: TOPIC_NAME"]);
});

test("invalid optional values are reported, not thrown", () => {
  const cfg = loadConfig({ ...base, PUBLISH_TIMEOUT_MS: "soon", PORT: "7000" });
  assert.equal(cfg.ok, false);
  if (cfg.ok) return;
  assert.equal(cfg.problems.length, 1);
  assert.match(cfg.problems[0] ?? "", /^PUBLISH_TIMEOUT_MS: /);
  assert.equal(cfg.server.port, 7000);
});
