// SPDX-License-Identifier: Apache-2.0
// api/src/mw/async.ts
import type { Request, Response, NextFunction, RequestHandler } from "express";

/**
 * asyncH - lets async route handlers skip their own try/catch;
 * a rejection is forwarded to next() and ends up in the error middleware.
 */
export const asyncH =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler =>
  (req, res, next) => {
    fn(req, res, next).catch(next);
  };
