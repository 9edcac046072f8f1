/**
 * Sync Engine Tests
 *
 * Run with: npm test
 *
 * Exercises the engine against the in-process store:
 *   1. Create, replace and deduplicate outcomes
 *   2. Multi-step ordering
 *   3. Ownership and supersession
 *   4. Successor redirects on download
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { Container } from "../container/container.js";
import {
  ImmutableRemoteError,
  NotFoundError,
  NotOwnerError,
  RemoteError,
  StaleWriteError,
} from "../container/errors.js";
import { silentLogger } from "../logging/index.js";
import { SyncEngine } from "./engine.js";
import { MemoryRemoteStore } from "./memory-store.js";
import type { FetchResult, RemoteState, RemoteStore } from "./types.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const ALICE = "alice-test-token";
const BOB = "bob-test-token";

const STEP_ID = "aaaaaaaa-aaaa-4aaa-8aaa-aaaaaaaaaaaa";

function newStore(): MemoryRemoteStore {
  return new MemoryRemoteStore({ tokens: { [ALICE]: "alice", [BOB]: "bob" } });
}

function engine(store: RemoteStore, credential = ALICE): SyncEngine {
  return new SyncEngine({ store, credential, defaults: {}, logger: silentLogger });
}

function build(
  at: string,
  content: Record<string, unknown> = {},
  items: Record<string, unknown> = { "data/rolls.json": [3, 4] }
): Container {
  return Container.create(
    {
      "content.json": { containerType: { name: "dice-roll" }, ...content },
      "meta.json": { title: "Rolls", author: "Test Author", email: "author@example.org" },
      ...items,
    },
    { clock: () => new Date(at), defaults: {}, logger: silentLogger }
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// UPLOAD OUTCOMES
// ═══════════════════════════════════════════════════════════════════════════

test("new container is created remotely and locked locally", async () => {
  const store = newStore();
  const dc = build("2024-05-01T10:00:00Z");

  const result = await engine(store).upload(dc);

  assert.deepEqual(result, {
    outcome: "created",
    uuid: dc.uuid,
    created: "2024-05-01T10:00:00Z",
    modified: "2024-05-01T10:00:00Z",
  });
  assert.equal(dc.state, "immutable");
  assert.equal(store.size, 1);

  const remote = await store.stat(dc.uuid, ALICE);
  assert.equal(remote?.owner, "alice");
  assert.equal(remote?.complete, true);
});

test("complete container cannot be uploaded twice", async () => {
  const store = newStore();
  const dc = build("2024-05-01T10:00:00Z");
  await engine(store).upload(dc);

  await assert.rejects(engine(store).upload(dc), ImmutableRemoteError);
});

test("identical static containers are deduplicated", async () => {
  const store = newStore();
  const first = build("2024-05-01T10:00:00Z").freeze();
  const second = build("2024-06-01T10:00:00Z").freeze();
  assert.notEqual(first.uuid, second.uuid);

  await engine(store).upload(first);
  const result = await engine(store).upload(second);

  assert.equal(result.outcome, "deduplicated");
  assert.equal(result.uuid, first.uuid);
  assert.equal(second.uuid, first.uuid);
  assert.equal(second.content.created, "2024-05-01T10:00:00Z");
  assert.equal(store.size, 1);
});

test("static containers with different data are stored separately", async () => {
  const store = newStore();
  const first = build("2024-05-01T10:00:00Z").freeze();
  const second = build("2024-05-01T10:00:00Z", {}, { "data/rolls.json": [6] }).freeze();

  await engine(store).upload(first);
  const result = await engine(store).upload(second);

  assert.equal(result.outcome, "created");
  assert.equal(store.size, 2);
});

// ═══════════════════════════════════════════════════════════════════════════
// MULTI-STEP
// ═══════════════════════════════════════════════════════════════════════════

test("later step replaces an incomplete container", async () => {
  const store = newStore();
  await engine(store).upload(build("2024-05-01T10:00:00Z", { uuid: STEP_ID, complete: false }));

  const next = build(
    "2024-05-01T10:05:00Z",
    { uuid: STEP_ID, complete: false },
    { "data/rolls.json": [3, 4, 5] }
  );
  const result = await engine(store).upload(next);

  assert.deepEqual(result, {
    outcome: "replaced",
    uuid: STEP_ID,
    created: "2024-05-01T10:00:00Z",
    modified: "2024-05-01T10:05:00Z",
  });
  assert.equal(next.content.created, "2024-05-01T10:00:00Z");

  const downloaded = await engine(store).download(STEP_ID);
  assert.deepEqual(downloaded.get("data/rolls.json"), [3, 4, 5]);
});

test("step with an equal or earlier timestamp is stale", async () => {
  const store = newStore();
  await engine(store).upload(build("2024-05-01T10:00:00Z", { uuid: STEP_ID, complete: false }));

  await assert.rejects(
    engine(store).upload(build("2024-05-01T10:00:00Z", { uuid: STEP_ID, complete: false })),
    StaleWriteError
  );
  await assert.rejects(
    engine(store).upload(build("2024-05-01T09:00:00Z", { uuid: STEP_ID, complete: false })),
    StaleWriteError
  );
});

test("store rejects a stale replacement on its own", async () => {
  const store = newStore();
  const first = build("2024-05-01T10:00:00Z", { uuid: STEP_ID, complete: false });
  await store.create(first.toBytes(), ALICE);

  const same = build("2024-05-01T10:00:00Z", { uuid: STEP_ID, complete: false });
  await assert.rejects(store.replace(STEP_ID, same.toBytes(), ALICE), StaleWriteError);
});

test("final step completes the container", async () => {
  const store = newStore();
  await engine(store).upload(build("2024-05-01T10:00:00Z", { uuid: STEP_ID, complete: false }));
  await engine(store).upload(build("2024-05-01T11:00:00Z", { uuid: STEP_ID, complete: true }));

  await assert.rejects(
    engine(store).upload(build("2024-05-01T12:00:00Z", { uuid: STEP_ID, complete: false })),
    ImmutableRemoteError
  );
});

test("another principal cannot replace a step", async () => {
  const store = newStore();
  await engine(store).upload(build("2024-05-01T10:00:00Z", { uuid: STEP_ID, complete: false }));

  await assert.rejects(
    engine(store, BOB).upload(build("2024-05-01T11:00:00Z", { uuid: STEP_ID, complete: false })),
    NotOwnerError
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// SUPERSESSION
// ═══════════════════════════════════════════════════════════════════════════

test("download follows the replaces chain to the latest container", async () => {
  const store = newStore();
  const v1 = build("2024-05-01T10:00:00Z");
  const v2 = build("2024-05-02T10:00:00Z", { replaces: v1.uuid }, { "data/rolls.json": [2] });
  const v3 = build("2024-05-03T10:00:00Z", { replaces: v2.uuid }, { "data/rolls.json": [1] });
  for (const dc of [v1, v2, v3]) {
    await engine(store).upload(dc);
  }

  const latest = await engine(store).download(v1.uuid);
  assert.equal(latest.uuid, v3.uuid);
  assert.equal(latest.state, "immutable");
  assert.deepEqual(latest.get("data/rolls.json"), [1]);
  assert.equal((await store.stat(v1.uuid, ALICE))?.replacedBy, v2.uuid);
});

test("a container can be superseded only once", async () => {
  const store = newStore();
  const v1 = build("2024-05-01T10:00:00Z");
  await engine(store).upload(v1);
  await engine(store).upload(build("2024-05-02T10:00:00Z", { replaces: v1.uuid }));

  await assert.rejects(
    engine(store).upload(build("2024-05-03T10:00:00Z", { replaces: v1.uuid })),
    StaleWriteError
  );
});

test("only the creator can supersede a container", async () => {
  const store = newStore();
  const v1 = build("2024-05-01T10:00:00Z");
  await engine(store).upload(v1);

  await assert.rejects(
    engine(store, BOB).upload(build("2024-05-02T10:00:00Z", { replaces: v1.uuid })),
    NotOwnerError
  );
});

test("superseding an unknown container is refused", async () => {
  const store = newStore();
  await assert.rejects(
    engine(store).upload(build("2024-05-02T10:00:00Z", { replaces: STEP_ID })),
    NotFoundError
  );
  assert.equal(store.size, 0);
});

// ═══════════════════════════════════════════════════════════════════════════
// ERRORS
// ═══════════════════════════════════════════════════════════════════════════

test("unknown credential is rejected by the store", async () => {
  const store = newStore();
  await assert.rejects(
    engine(store, "wrong-token").upload(build("2024-05-01T10:00:00Z")),
    (err: unknown) => err instanceof RemoteError && err.status === 401
  );
});

test("downloading an unknown identifier reports not found", async () => {
  await assert.rejects(engine(newStore()).download(STEP_ID), NotFoundError);
});

test("a looping successor chain is reported", async () => {
  const other = "bbbbbbbb-bbbb-4bbb-8bbb-bbbbbbbbbbbb";
  const looping: RemoteStore = {
    create: () => Promise.reject(new Error("unused")),
    replace: () => Promise.reject(new Error("unused")),
    findStatic: () => Promise.resolve(null),
    stat: (): Promise<RemoteState | null> => Promise.resolve(null),
    get: (uuid): Promise<FetchResult> =>
      Promise.resolve({ kind: "redirect", uuid: uuid === STEP_ID ? other : STEP_ID }),
  };

  await assert.rejects(
    engine(looping).download(STEP_ID),
    (err: unknown) =>
      err instanceof RemoteError &&
      err.message === `Successor chain of ${STEP_ID} loops at ${STEP_ID}`
  );
});
