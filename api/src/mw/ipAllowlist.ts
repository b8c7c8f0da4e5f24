// SPDX-License-Identifier: Apache-2.0
// api/src/mw/ipAllowlist.ts
import type { Request, Response, NextFunction } from "express";
import { matchesAllowList, type ParsedAllowList } from "../net/cidr.js";
import { resolveClientIp } from "../net/clientIp.js";
import { sendError } from "../errors.js";

export type AllowlistDecision =
  | { allowed: true; clientIp: string }
  | { allowed: false; clientIp: string; code: "origin-unverifiable" | "origin-rejected" };

export function checkOrigin(req: Request, list: ParsedAllowList): AllowlistDecision {
  const clientIp = resolveClientIp(req.headers, req.socket.remoteAddress);
  if (!list.configured) return { allowed: true, clientIp };
  if (!clientIp) return { allowed: false, clientIp, code: "origin-unverifiable" };
  if (!matchesAllowList(clientIp, list)) return { allowed: false, clientIp, code: "origin-rejected" };
  return { allowed: true, clientIp };
}

/**
 * CIDR allow-list guard. An unconfigured list lets everything through.
 * onReject runs before the 403 goes out (metrics, audit).
 */
export function ipAllowlist(list: ParsedAllowList, onReject?: (decision: AllowlistDecision) => void) {
  return (req: Request, res: Response, next: NextFunction) => {
    const decision = checkOrigin(req, list);
    if (decision.allowed) return next();
    req.log.warn({ method: req.method, path: req.path, clientIp: decision.clientIp, outcome: decision.code }, "origin rejected");
    onReject?.(decision);
    return sendError(res, 403, decision.code);
  };
}
