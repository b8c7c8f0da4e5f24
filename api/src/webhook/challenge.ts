// SPDX-License-Identifier: Apache-2.0
// api/src/webhook/challenge.ts
import type { IncomingHttpHeaders } from "node:http";
import { z } from "zod";

export type ChallengeInput = {
  headers: IncomingHttpHeaders;
  query: Record<string, unknown>;
  body: Buffer;
  contentType: string | undefined;
};

export type Challenge = {
  value: string;
  source: "body" | "header" | "query";
  /** field, header or parameter name that carried the token */
  field: string;
};

/** Returns the handshake token to echo back, or null for a real event. */
export type ChallengeDetector = (input: ChallengeInput) => Challenge | null;

export type ChallengeSettings = {
  bodyField?: string;
  header?: string;
  queryParam?: string;
};

const JsonObject = z.record(z.string(), z.unknown());

function isJson(contentType: string | undefined) {
  if (!contentType) return false;
  const mime = contentType.split(";")[0]?.trim().toLowerCase() ?? "";
  return mime === "application/json" || mime.endsWith("+json");
}

function tokenOf(v: unknown): string | null {
  if (typeof v === "string") return v.length > 0 ? v : null;
  if (typeof v === "number" && Number.isFinite(v)) return String(v);
  return null;
}

export function bodyFieldChallenge(field: string): ChallengeDetector {
  return ({ body, contentType }) => {
    if (!isJson(contentType) || body.length === 0) return null;
    let doc: unknown;
    try {
      doc = JSON.parse(body.toString("utf8"));
    } catch {
      return null; // not JSON after all: publish it as-is
    }
    const obj = JsonObject.safeParse(doc);
    if (!obj.success) return null;
    const value = tokenOf(obj.data[field]);
    return value === null ? null : { value, source: "body", field };
  };
}

export function headerChallenge(name: string): ChallengeDetector {
  const key = name.toLowerCase();
  return ({ headers }) => {
    const raw = headers[key];
    const value = tokenOf(Array.isArray(raw) ? raw[0] : raw);
    return value === null ? null : { value, source: "header", field: key };
  };
}

export function queryChallenge(param: string): ChallengeDetector {
  return ({ query }) => {
    const raw = query[param];
    const value = tokenOf(Array.isArray(raw) ? raw[0] : raw);
    return value === null ? null : { value, source: "query", field: param };
  };
}

/** First detector that recognizes a challenge wins. */
export function anyChallenge(...detectors: ChallengeDetector[]): ChallengeDetector {
  return (input) => {
    for (const detect of detectors) {
      const hit = detect(input);
      if (hit) return hit;
    }
    return null;
  };
}

export function challengeFromSettings(s: ChallengeSettings): ChallengeDetector {
  const detectors: ChallengeDetector[] = [];
  if (s.bodyField) detectors.push(bodyFieldChallenge(s.bodyField));
  if (s.header) detectors.push(headerChallenge(s.header));
  if (s.queryParam) detectors.push(queryChallenge(s.queryParam));
  return anyChallenge(...detectors);
}
