// SPDX-License-Identifier: Apache-2.0
// api/src/config/env.ts
import { z } from "zod";
import { splitAllowListEnv } from "../net/cidr.js";

const ByteLimit = z
  .string()
  .regex(/^\d+(b|kb|mb)?$/i)
  .or(z.number().int().positive())
  .transform((v) => String(v));

const Optional = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  GCP_PROJECT: Optional,
  TOPIC_NAME: Optional,
  TOPIC_PROJECT: Optional,
  IP_ALLOWLIST: z.string().default(""),
  ALLOWLIST_INVALID_POLICY: z.enum(["allow", "deny"]).default("allow"),
  PUBLISH_TIMEOUT_MS: z.coerce.number().int().positive().max(60_000).default(5_000),
  CHALLENGE_BODY_FIELD: z.string().trim().default("challenge"),
  CHALLENGE_HEADER: Optional,
  CHALLENGE_QUERY_PARAM: Optional,
  WEBHOOK_PATH: z.string().startsWith("/").default("/"),
  BODY_LIMIT: ByteLimit.default("10mb"),
  METRICS_ALLOWLIST: z.string().default(""),
});

export type ServerSettings = {
  port: number;
  logLevel: z.infer<typeof EnvSchema>["LOG_LEVEL"];
  webhookPath: string;
  bodyLimit: string;
  metricsAllowList: string[];
};

export type WebhookConfig = {
  projectId: string;
  topicName: string;
  topicProjectId: string;
  publishTimeoutMs: number;
  allowList: string[];
  invalidAllowListPolicy: "allow" | "deny";
  challenge: {
    bodyField?: string;
    header?: string;
    queryParam?: string;
  };
};

/**
 * ok=false is the degraded mode: the process still listens (health, metrics)
 * but every webhook call is answered with a configuration error.
 */
export type LoadedConfig =
  | { ok: true; server: ServerSettings; webhook: Readonly<WebhookConfig> }
  | { ok: false; server: ServerSettings; problems: string[] };

const SERVER_DEFAULTS: ServerSettings = {
  port: 8080,
  logLevel: "info",
  webhookPath: "/",
  bodyLimit: "10mb",
  metricsAllowList: [],
};

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): LoadedConfig {
  const parsed = EnvSchema.safeParse({
    ...env,
    // IP_WHITELIST is the older spelling, still honoured
    IP_ALLOWLIST: env.IP_ALLOWLIST ?? env.IP_WHITELIST,
  });
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.join(".") || "env"}: ${i.message}`);
    return { ok: false, server: lenientServerSettings(env), problems };
  }

  const e = parsed.data;
  const server: ServerSettings = {
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    webhookPath: e.WEBHOOK_PATH,
    bodyLimit: e.BODY_LIMIT,
    metricsAllowList: splitAllowListEnv(e.METRICS_ALLOWLIST),
  };

  const missing: string[] = [];
  if (!e.GCP_PROJECT) missing.push("GCP_PROJECT");
  if (!e.TOPIC_NAME) missing.push("TOPIC_NAME");
  if (!e.GCP_PROJECT || !e.TOPIC_NAME) {
    return { ok: false, server, problems: missing.map((k) => `Missing required env: ${k}`) };
  }

  const webhook: WebhookConfig = {
    projectId: e.GCP_PROJECT,
    topicName: e.TOPIC_NAME,
    topicProjectId: e.TOPIC_PROJECT ?? e.GCP_PROJECT,
    publishTimeoutMs: e.PUBLISH_TIMEOUT_MS,
    allowList: splitAllowListEnv(e.IP_ALLOWLIST),
    invalidAllowListPolicy: e.ALLOWLIST_INVALID_POLICY,
    challenge: {
      bodyField: e.CHALLENGE_BODY_FIELD || undefined,
      header: e.CHALLENGE_HEADER?.toLowerCase(),
      queryParam: e.CHALLENGE_QUERY_PARAM,
    },
  };
  return { ok: true, server, webhook: Object.freeze(webhook) };
}

// Bad optional values must not stop the process from listening at all.
function lenientServerSettings(env: Env): ServerSettings {
  const port = Number(env.PORT);
  return {
    ...SERVER_DEFAULTS,
    port: Number.isInteger(port) && port > 0 ? port : SERVER_DEFAULTS.port,
  };
}
