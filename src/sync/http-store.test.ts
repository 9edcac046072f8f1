/**
 * HTTP Remote Store Tests
 *
 * Run with: npm test
 *
 * Requests are answered by an undici MockAgent; nothing leaves the process.
 */

import { test, beforeEach, afterEach } from "node:test";
import { strict as assert } from "node:assert";
import { MockAgent } from "undici";
import { Container } from "../container/container.js";
import {
  ImmutableRemoteError,
  NotFoundError,
  NotOwnerError,
  RemoteError,
  SchemaViolationError,
  StaleWriteError,
} from "../container/errors.js";
import { ConfigError } from "../config/index.js";
import { silentLogger } from "../logging/index.js";
import { createSyncEngine } from "./engine.js";
import { HttpRemoteStore } from "./http-store.js";
import type { RemoteState } from "./types.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const SERVER = "https://data.test";
const KEY = "test-secret";
const ID = "aaaaaaaa-aaaa-4aaa-8aaa-aaaaaaaaaaaa";
const NEXT_ID = "bbbbbbbb-bbbb-4bbb-8bbb-bbbbbbbbbbbb";

const AUTH = { authorization: `Token ${KEY}` };
const JSON_HEADERS = { headers: { "content-type": "application/json" } };

const STATE: RemoteState = {
  uuid: ID,
  containerType: "dice-roll",
  created: "2024-05-01T10:00:00Z",
  modified: "2024-05-01T10:00:00Z",
  complete: true,
  static: false,
  owner: "alice",
};

let agent: MockAgent;

beforeEach(() => {
  agent = new MockAgent();
  agent.disableNetConnect();
});

afterEach(async () => {
  await agent.close();
});

function store(): HttpRemoteStore {
  return new HttpRemoteStore({ server: `${SERVER}/`, dispatcher: agent });
}

function archive(): Uint8Array {
  return Container.create(
    {
      "content.json": { uuid: ID, containerType: { name: "dice-roll" } },
      "meta.json": { title: "Rolls", author: "Test Author", email: "author@example.org" },
      "data/rolls.json": [3, 4],
    },
    { clock: () => new Date("2024-05-01T10:00:00Z"), defaults: {}, logger: silentLogger }
  ).toBytes();
}

// ═══════════════════════════════════════════════════════════════════════════
// REQUESTS
// ═══════════════════════════════════════════════════════════════════════════

test("create posts the archive with the token and returns the state", async () => {
  agent
    .get(SERVER)
    .intercept({ path: "/api/datasets/", method: "POST", headers: AUTH })
    .reply(201, STATE, JSON_HEADERS);

  assert.deepEqual(await store().create(archive(), KEY), STATE);
  agent.assertNoPendingInterceptors();
});

test("stat of an unknown identifier is null", async () => {
  agent.get(SERVER).intercept({ path: `/api/datasets/${ID}/`, method: "GET" }).reply(404, "");
  assert.equal(await store().stat(ID, KEY), null);
});

test("malformed state from the server is a remote error", async () => {
  agent
    .get(SERVER)
    .intercept({ path: `/api/datasets/${ID}/`, method: "GET" })
    .reply(200, { uuid: ID }, JSON_HEADERS);

  await assert.rejects(
    store().stat(ID, KEY),
    (err: unknown) => err instanceof RemoteError && err.status === 200
  );
});

test("download returns the archive bytes", async () => {
  const bytes = archive();
  agent
    .get(SERVER)
    .intercept({ path: `/api/datasets/${ID}/download/`, method: "GET", headers: AUTH })
    .reply(200, Buffer.from(bytes), { headers: { "content-type": "application/zip" } });

  const result = await store().get(ID, KEY);
  assert.ok(result.kind === "archive");
  assert.deepEqual(result.bytes, bytes);
});

test("download of a superseded container returns the successor", async () => {
  agent
    .get(SERVER)
    .intercept({ path: `/api/datasets/${ID}/download/`, method: "GET" })
    .reply(302, "", { headers: { location: `/api/datasets/${NEXT_ID}/download/` } });

  assert.deepEqual(await store().get(ID, KEY), { kind: "redirect", uuid: NEXT_ID });
});

test("static lookup sends type name and hash as query parameters", async () => {
  const hash = "0".repeat(64);
  agent
    .get(SERVER)
    .intercept({ path: `/api/datasets/?static=true&name=dice-roll&hash=${hash}`, method: "GET" })
    .reply(404, "");

  assert.equal(await store().findStatic("dice-roll", hash, KEY), null);
});

// ═══════════════════════════════════════════════════════════════════════════
// STATUS MAPPING
// ═══════════════════════════════════════════════════════════════════════════

test("replace maps refusal statuses to errors", async () => {
  const cases: Array<[number, new (...args: never[]) => Error]> = [
    [400, SchemaViolationError],
    [403, NotOwnerError],
    [404, NotFoundError],
    [409, StaleWriteError],
    [423, ImmutableRemoteError],
  ];
  for (const [status, expected] of cases) {
    agent
      .get(SERVER)
      .intercept({ path: `/api/datasets/${ID}/`, method: "PUT" })
      .reply(status, "refused");
    await assert.rejects(store().replace(ID, archive(), KEY), expected, `HTTP ${status}`);
  }
});

test("unexpected status is a remote error carrying the status", async () => {
  agent
    .get(SERVER)
    .intercept({ path: `/api/datasets/${ID}/`, method: "PUT" })
    .reply(500, "boom");

  await assert.rejects(
    store().replace(ID, archive(), KEY),
    (err: unknown) =>
      err instanceof RemoteError &&
      err.status === 500 &&
      err.message === `Failed to replace ${ID}: boom (HTTP 500)`
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// ENGINE OVER HTTP
// ═══════════════════════════════════════════════════════════════════════════

test("engine creates an unknown container over HTTP", async () => {
  const pool = agent.get(SERVER);
  pool.intercept({ path: `/api/datasets/${ID}/`, method: "GET", headers: AUTH }).reply(404, "");
  pool
    .intercept({ path: "/api/datasets/", method: "POST", headers: AUTH })
    .reply(201, STATE, JSON_HEADERS);

  const dc = Container.create(
    {
      "content.json": { uuid: ID, containerType: { name: "dice-roll" } },
      "meta.json": { title: "Rolls", author: "Test Author", email: "author@example.org" },
    },
    { clock: () => new Date("2024-05-01T10:00:00Z"), defaults: {}, logger: silentLogger }
  );
  const engine = createSyncEngine({
    server: SERVER,
    key: KEY,
    dispatcher: agent,
    defaults: {},
    logger: silentLogger,
  });

  const result = await engine.upload(dc);
  assert.equal(result.outcome, "created");
  assert.equal(result.uuid, ID);
  agent.assertNoPendingInterceptors();
});

test("engine without server or key is a configuration error", () => {
  assert.throws(() => createSyncEngine({ key: KEY, defaults: {} }), ConfigError);
  assert.throws(() => createSyncEngine({ server: SERVER, defaults: {} }), ConfigError);
});
