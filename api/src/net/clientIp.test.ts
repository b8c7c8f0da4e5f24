// SPDX-License-Identifier: Apache-2.0
// api/src/net/clientIp.test.ts
import { test } from "node:test";
import assert from "node:assert/strict";
import { resolveClientIp } from "./clientIp.js";

test("first X-Forwarded-For hop wins", () => {
  assert.equal(resolveClientIp({ "x-forwarded-for": "1.2.3.4, 5.6.7.8" }, "9.9.9.9"), "1.2.3.4");
});

test("single hop is trimmed", () => {
  assert.equal(resolveClientIp({ "x-forwarded-for": "  2001:db8::7  " }, "9.9.9.9"), "2001:db8::7");
});

test("falls back to the socket peer", () => {
  assert.equal(resolveClientIp({}, "9.9.9.9"), "9.9.9.9");
  assert.equal(resolveClientIp({ "x-forwarded-for": "" }, "9.9.9.9"), "9.9.9.9");
  assert.equal(resolveClientIp({ "x-forwarded-for": " , 5.6.7.8" }, "9.9.9.9"), "9.9.9.9");
});

test("repeated headers: the first one is used", () => {
  assert.equal(resolveClientIp({ "x-forwarded-for": ["1.1.1.1, 2.2.2.2", "3.3.3.3"] }, "9.9.9.9"), "1.1.1.1");
});

test("nothing known resolves to an empty string", () => {
  assert.equal(resolveClientIp({}, undefined), "");
  assert.equal(resolveClientIp({}, null), "");
});

test("no syntax validation", () => {
  assert.equal(resolveClientIp({ "x-forwarded-for": "unknown" }, "9.9.9.9"), "unknown");
});
