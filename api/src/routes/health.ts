// SPDX-License-Identifier: Apache-2.0
// api/src/routes/health.ts
import { Router } from "express";

/** configured=false keeps /health green but takes the instance out of rotation. */
export default function healthRoutes(state: { configured: boolean }) {
  const r = Router();

  r.get("/health", (_req, res) => {
    res.json({ ok: true, ts: Date.now() });
  });

  r.get("/ready", (_req, res) => {
    if (state.configured) return res.json({ ok: true });
    return res.status(503).json({ ok: false, error: { code: "configuration-error" } });
  });

  return r;
}
