// SPDX-License-Identifier: Apache-2.0
// api/src/mw/metricsGuard.ts
import type { Request, Response, NextFunction } from "express";
import type { ParsedAllowList } from "../net/cidr.js";
import { checkOrigin } from "./ipAllowlist.js";

/** Scrapers outside METRICS_ALLOWLIST get a bare 403. */
export function metricsGuard(list: ParsedAllowList) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!checkOrigin(req, list).allowed) return res.status(403).end();
    next();
  };
}
