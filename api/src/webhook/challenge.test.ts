// SPDX-License-Identifier: Apache-2.0
// api/src/webhook/challenge.test.ts
import { test } from "node:test";
import assert from "node:assert/strict";
import {
  anyChallenge,
  bodyFieldChallenge,
  challengeFromSettings,
  headerChallenge,
  queryChallenge,
  type ChallengeInput,
} from "./challenge.js";

const input = (over: Partial<ChallengeInput>): ChallengeInput => ({
  headers: {},
  query: {},
  body: Buffer.alloc(0),
  contentType: undefined,
  ...over,
});

const json = (doc: unknown) => Buffer.from(JSON.stringify(doc));

test("JSON body field carries the token", () => {
  const detect = bodyFieldChallenge("challenge");
  assert.deepEqual(detect(input({ body: json({ challenge: "abc123" }), contentType: "application/json" })), {
    value: "abc123",
    source: "body",
    field: "challenge",
  });
  assert.deepEqual(
    detect(input({ body: json({ challenge: 42 }), contentType: "application/vnd.api+json; charset=utf-8" }))?.value,
    "42"
  );
});

test("body detection needs a JSON content type and a non-empty value", () => {
  const detect = bodyFieldChallenge("challenge");
  assert.equal(detect(input({ body: json({ challenge: "abc123" }), contentType: "text/plain" })), null);
  assert.equal(detect(input({ body: json({ challenge: "" }), contentType: "application/json" })), null);
  assert.equal(detect(input({ body: json({ challenge: { nested: 1 } }), contentType: "application/json" })), null);
  assert.equal(detect(input({ body: json({ event: "x" }), contentType: "application/json" })), null);
  assert.equal(detect(input({ body: json(["challenge"]), contentType: "application/json" })), null);
  assert.equal(detect(input({ body: Buffer.from("{not json"), contentType: "application/json" })), null);
  assert.equal(detect(input({ contentType: "application/json" })), null);
});

test("header and query detectors", () => {
  assert.deepEqual(headerChallenge("X-Hook-Challenge")(input({ headers: { "x-hook-challenge": "tok" } })), {
    value: "tok",
    source: "header",
    field: "x-hook-challenge",
  });
  assert.equal(headerChallenge("x-hook-challenge")(input({})), null);
  assert.deepEqual(queryChallenge("hub.challenge")(input({ query: { "hub.challenge": ["q1", "q2"] } })), {
    value: "q1",
    source: "query",
    field: "hub.challenge",
  });
});

test("first matching detector wins", () => {
  const detect = anyChallenge(headerChallenge("x-a"), queryChallenge("b"));
  assert.equal(detect(input({ headers: { "x-a": "from-header" }, query: { b: "from-query" } }))?.value, "from-header");
  assert.equal(detect(input({ query: { b: "from-query" } }))?.value, "from-query");
  assert.equal(anyChallenge()(input({})), null);
});

test("settings build only the configured detectors", () => {
  const none = challengeFromSettings({});
  assert.equal(none(input({ body: json({ challenge: "abc" }), contentType: "application/json" })), null);

  const body = challengeFromSettings({ bodyField: "challenge" });
  assert.equal(body(input({ body: json({ challenge: "abc" }), contentType: "application/json" }))?.source, "body");
  assert.equal(body(input({ query: { challenge: "abc" } })), null);
});
