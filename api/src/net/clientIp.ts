// SPDX-License-Identifier: Apache-2.0
// api/src/net/clientIp.ts
import type { IncomingHttpHeaders } from "node:http";

/**
 * Originating client IP.
 * - X-Forwarded-For: first (left-most) hop, i.e. the client as seen by the first proxy.
 * - Repeated X-Forwarded-For headers: the first header wins.
 * - Otherwise the socket peer. "" means the IP could not be determined.
 * No syntax check here; the allow-list matcher rejects what it cannot parse.
 */
export function resolveClientIp(headers: IncomingHttpHeaders, socketPeerIp: string | undefined | null): string {
  const xff = headers["x-forwarded-for"];
  const first = Array.isArray(xff) ? xff[0] : xff;
  const hop = (first ?? "").split(",")[0]?.trim() ?? "";
  if (hop) return hop;
  return (socketPeerIp ?? "").trim();
}
