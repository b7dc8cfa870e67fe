import test from "node:test";
import assert from "node:assert/strict";
import { HistoryDisabledError } from "@clia/shared";
import { openHistoryStore, type HistoryStore } from "@clia/db";
import { HistoryService } from "../HistoryService.js";

const withStore = async (fn: (store: HistoryStore) => Promise<void>): Promise<void> => {
  const store = await openHistoryStore({ type: "sqlite", connectionString: ":memory:" });
  try {
    await fn(store);
  } finally {
    await store.close();
  }
};

test("concurrent records for one user are all stored in order", async () => {
  await withStore(async (store) => {
    const history = new HistoryService(store, { enabled: true });
    const n = 20;
    await Promise.all(
      Array.from({ length: n }, (_, index) =>
        history.record({ userId: "u1", queryText: `question ${index}`, responseText: "answer" }),
      ),
    );
    const entries = await history.list("u1", { kind: "all" });
    assert.equal(entries.length, n);
    assert.deepEqual(
      entries.map((entry) => entry.queryText),
      Array.from({ length: n }, (_, index) => `question ${index}`),
    );
  });
});

test("clear racing appends for two users never touches the other user", async () => {
  await withStore(async (store) => {
    const history = new HistoryService(store, { enabled: true });
    await history.record({ userId: "user-b", queryText: "b0", responseText: "r" });
    await Promise.all([
      history.record({ userId: "user-a", queryText: "a1", responseText: "r" }),
      history.record({ userId: "user-b", queryText: "b1", responseText: "r" }),
      history.clear("user-a"),
      history.record({ userId: "user-b", queryText: "b2", responseText: "r" }),
    ]);
    assert.equal((await history.list("user-b", { kind: "all" })).length, 3);
    assert.equal((await history.list("user-a", { kind: "all" })).length, 0);
  });
});

test("disabled history records nothing and refuses reads", async () => {
  await withStore(async (store) => {
    const history = new HistoryService(store, { enabled: false });
    assert.equal(await history.record({ userId: "u1", queryText: "q", responseText: "r" }), undefined);
    await assert.rejects(history.list("u1", { kind: "all" }), HistoryDisabledError);
    await assert.rejects(history.clear("u1"), HistoryDisabledError);
    assert.deepEqual(await store.list("u1", { kind: "all" }), []);
  });
});
