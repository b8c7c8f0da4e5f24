// SPDX-License-Identifier: Apache-2.0
// api/src/pubsub/publisher.ts
import { ConfigurationError } from "../errors.js";

/** The only broker surface the relay needs. */
export interface BrokerClient {
  publish(topicPath: string, data: Buffer, attributes?: Record<string, string>): Promise<string>;
  close(): Promise<void>;
}

export type PublishFailureCause = "timeout" | "broker-unavailable" | "invalid-payload" | "unknown";

export type PublishOutcome =
  | { ok: true; messageId: string }
  | { ok: false; cause: PublishFailureCause; detail: string };

export type PublisherOptions = {
  projectId: string;
  topicName: string;
  /** project owning the topic, when it is not the service's own */
  topicProjectId?: string;
  timeoutMs: number;
};

export type BrokerClientFactory = (projectId: string) => BrokerClient;

// gRPC status codes reported by the Pub/Sub client
const GRPC_INVALID_ARGUMENT = 3;
const GRPC_DEADLINE_EXCEEDED = 4;

export function topicPath(project: string, topic: string) {
  return `projects/${project}/topics/${topic}`;
}

export function classifyBrokerError(err: unknown): { cause: PublishFailureCause; detail: string } {
  const detail = err instanceof Error ? err.message : String(err);
  const code = typeof err === "object" && err !== null && "code" in err ? err.code : undefined;
  if (typeof code !== "number") return { cause: "unknown", detail };
  if (code === GRPC_INVALID_ARGUMENT) return { cause: "invalid-payload", detail };
  if (code === GRPC_DEADLINE_EXCEEDED) return { cause: "timeout", detail };
  return { cause: "broker-unavailable", detail: `code=${code} ${detail}` };
}

/**
 * Owns the process' single broker client. Build it once with `initialize` at
 * startup and hand the instance to the webhook handler.
 */
export class PublisherGateway {
  readonly topic: string;
  private closing: Promise<void> | null = null;

  private constructor(private readonly client: BrokerClient, topic: string, readonly timeoutMs: number) {
    this.topic = topic;
  }

  static initialize(opts: PublisherOptions, createClient: BrokerClientFactory): PublisherGateway {
    const missing: string[] = [];
    if (!opts.projectId?.trim()) missing.push("GCP_PROJECT");
    if (!opts.topicName?.trim()) missing.push("TOPIC_NAME");
    if (missing.length) throw new ConfigurationError(`Missing required env: ${missing.join(", ")}`, missing);
    if (!Number.isFinite(opts.timeoutMs) || opts.timeoutMs <= 0) {
      throw new ConfigurationError(`Invalid publish timeout: ${opts.timeoutMs}`, ["PUBLISH_TIMEOUT_MS"]);
    }

    const path = topicPath(opts.topicProjectId?.trim() || opts.projectId, opts.topicName);
    return new PublisherGateway(createClient(opts.projectId), path, opts.timeoutMs);
  }

  /** One attempt, bounded by timeoutMs. Never rejects. */
  async publish(payload: Buffer, attributes?: Record<string, string>): Promise<PublishOutcome> {
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<PublishOutcome>((resolve) => {
      timer = setTimeout(
        () => resolve({ ok: false, cause: "timeout", detail: `publish exceeded ${this.timeoutMs}ms` }),
        this.timeoutMs
      );
    });
    const attempt = this.client.publish(this.topic, payload, attributes).then(
      (messageId): PublishOutcome => ({ ok: true, messageId }),
      (err: unknown): PublishOutcome => ({ ok: false, ...classifyBrokerError(err) })
    );
    try {
      return await Promise.race([attempt, timedOut]);
    } finally {
      clearTimeout(timer);
    }
  }

  close(): Promise<void> {
    if (!this.closing) this.closing = this.client.close();
    return this.closing;
  }
}
