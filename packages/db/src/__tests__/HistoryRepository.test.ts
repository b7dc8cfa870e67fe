import { strict as assert } from "node:assert";
import { test, beforeEach, afterEach } from "node:test";
import { SqliteDriver } from "../drivers/SqliteDriver.js";
import { MysqlDriver, type MysqlConnectionLike, type MysqlPoolLike } from "../drivers/MysqlDriver.js";
import type { SqlParam } from "../drivers/SqlDriver.js";
import { HistoryMigrations } from "../migrations/HistoryMigrations.js";
import { HistoryRepository } from "../repositories/HistoryRepository.js";

let driver: SqliteDriver;
let repo: HistoryRepository;

const FIXED = new Date("2026-03-01T12:00:00.000Z");

beforeEach(async () => {
  driver = await SqliteDriver.open(":memory:");
  await HistoryMigrations.run(driver);
  repo = new HistoryRepository(driver, { now: () => FIXED });
});

afterEach(async () => {
  await repo.close();
});

test("append then list(all) returns the entry", async () => {
  const entry = await repo.append({ userId: "u1", queryText: "how do I list files?", responseText: "use ls" });
  assert.equal(entry.sessionId, null);
  assert.equal(entry.createdAt, "2026-03-01T12:00:00.000Z");
  const listed = await repo.list("u1", { kind: "all" });
  assert.deepEqual(listed, [entry]);
});

test("first and last return a single entry, ties broken by id", async () => {
  const a = await repo.append({ userId: "u1", queryText: "first question", responseText: "r1" });
  const b = await repo.append({ userId: "u1", queryText: "second question", responseText: "r2" });
  assert.equal(a.createdAt, b.createdAt);
  assert.deepEqual(await repo.list("u1", { kind: "last" }), [b]);
  assert.deepEqual(await repo.list("u1", { kind: "first" }), [a]);
  assert.deepEqual(
    (await repo.list("u1", { kind: "all" })).map((entry) => entry.queryText),
    ["first question", "second question"],
  );
});

test("first and last on an empty history return nothing", async () => {
  assert.deepEqual(await repo.list("nobody", { kind: "first" }), []);
  assert.deepEqual(await repo.list("nobody", { kind: "last" }), []);
});

test("keyword filter matches query or response text", async () => {
  const selinux = await repo.append({ userId: "u1", queryText: "what is selinux?", responseText: "a MAC system" });
  const disk = await repo.append({ userId: "u1", queryText: "disk space", responseText: "use df -h" });
  const viaResponse = await repo.append({ userId: "u1", queryText: "file usage", responseText: "try DF or du" });

  assert.deepEqual(await repo.list("u1", { kind: "keyword", keyword: "selinux", caseSensitive: false }), [selinux]);
  assert.deepEqual(await repo.list("u1", { kind: "keyword", keyword: "SELinux", caseSensitive: true }), []);
  assert.deepEqual(
    (await repo.list("u1", { kind: "keyword", keyword: "df", caseSensitive: false })).map((entry) => entry.id),
    [disk.id, viaResponse.id],
  );
  assert.deepEqual(await repo.list("u1", { kind: "keyword", keyword: "DF", caseSensitive: true }), [viaResponse]);
});

test("session filter returns only that session's entries", async () => {
  const user = await repo.ensureUser("1000");
  const session = await repo.createSession(user.id, { name: "default" });
  await repo.append({ userId: user.id, queryText: "outside", responseText: "r" });
  const inside = await repo.append({ userId: user.id, sessionId: session.id, queryText: "inside", responseText: "r" });
  assert.deepEqual(await repo.list(user.id, { kind: "session", sessionId: session.id }), [inside]);
});

test("clear only removes the requesting user's entries", async () => {
  await repo.append({ userId: "user-a", queryText: "a1", responseText: "r" });
  await repo.append({ userId: "user-b", queryText: "b1", responseText: "r" });
  await repo.append({ userId: "user-a", queryText: "a2", responseText: "r" });
  await repo.append({ userId: "user-b", queryText: "b2", responseText: "r" });

  assert.equal(await repo.clear("user-a"), 2);
  assert.equal((await repo.list("user-a", { kind: "all" })).length, 0);
  assert.equal((await repo.list("user-b", { kind: "all" })).length, 2);
  assert.equal(await repo.clear("user-a"), 0);
});

test("concurrent appends for one user store exactly N entries", async () => {
  const n = 25;
  const appended = await Promise.all(
    Array.from({ length: n }, (_, index) =>
      repo.append({ userId: "u1", queryText: `question ${index}`, responseText: `answer ${index}` }),
    ),
  );
  const listed = await repo.list("u1", { kind: "all" });
  assert.equal(listed.length, n);
  assert.equal(new Set(listed.map((entry) => entry.id)).size, n);
  assert.deepEqual(
    listed.map((entry) => entry.id),
    appended.map((entry) => entry.id).sort((x, y) => x - y),
  );
});

test("ensureUser is idempotent per OS identity", async () => {
  const [first, second] = await Promise.all([repo.ensureUser("1000"), repo.ensureUser("1000")]);
  assert.equal(first.id, second.id);
  const other = await repo.ensureUser("1001");
  assert.notEqual(other.id, first.id);
  assert.deepEqual(await repo.getUserByOsIdentity("1000"), first);
  assert.equal(await repo.getUserByOsIdentity("4242"), undefined);
});

test("ending a session keeps its history queryable", async () => {
  const user = await repo.ensureUser("1000");
  const session = await repo.createSession(user.id, { name: "default" });
  await repo.append({ userId: user.id, sessionId: session.id, queryText: "q", responseText: "r" });
  const ended = await repo.endSession(session.id);
  assert.equal(ended?.endedAt, "2026-03-01T12:00:00.000Z");
  assert.equal((await repo.list(user.id, { kind: "all" })).length, 1);
  assert.equal(await repo.endSession("missing"), undefined);
});

test("driver failures surface as StorageError", async () => {
  await driver.exec("DROP TABLE history");
  await assert.rejects(
    repo.append({ userId: "u1", queryText: "q", responseText: "r" }),
    (error: unknown) => error instanceof Error && error.name === "StorageError",
  );
});

test("sessions keep their name and description and list newest first", async () => {
  const user = await repo.ensureUser("1000");
  let tick = 0;
  const ticking = new HistoryRepository(driver, { now: () => new Date(FIXED.getTime() + 1000 * tick++) });
  const work = await ticking.createSession(user.id, { name: "work", description: "disk issues" });
  const scratch = await ticking.createSession(user.id, { name: "scratch" });
  assert.deepEqual(work, {
    id: work.id,
    userId: user.id,
    name: "work",
    description: "disk issues",
    createdAt: "2026-03-01T12:00:00.000Z",
  });
  assert.deepEqual(await repo.getSession(scratch.id), scratch);
  assert.deepEqual(await repo.listSessions(user.id), [scratch, work]);
  assert.deepEqual(await repo.latestSession(user.id), scratch);
  assert.deepEqual(await repo.listSessions("nobody"), []);
  assert.equal(await repo.latestSession("nobody"), undefined);
});

test("deleting sessions leaves their history entries in place", async () => {
  const alice = await repo.ensureUser("1000");
  const bob = await repo.ensureUser("1001");
  const work = await repo.createSession(alice.id, { name: "work" });
  const other = await repo.createSession(alice.id, { name: "other" });
  const bobs = await repo.createSession(bob.id, { name: "work" });
  await repo.append({ userId: alice.id, sessionId: work.id, queryText: "q", responseText: "r" });

  assert.deepEqual(await repo.deleteSessions(alice.id, "work"), [work.id]);
  assert.equal(await repo.getSession(work.id), undefined);
  assert.equal((await repo.list(alice.id, { kind: "session", sessionId: work.id })).length, 1);
  assert.deepEqual(await repo.deleteSessions(alice.id, "work"), []);
  assert.deepEqual(await repo.deleteSessions(alice.id), [other.id]);
  assert.deepEqual(await repo.listSessions(bob.id), [bobs]);
});

// A pool whose plain reads keep the transaction's first snapshot, as InnoDB
// does under REPEATABLE READ: the row a concurrent call committed is only
// visible to a locking read.
class SnapshotMysqlPool implements MysqlPoolLike {
  statements: string[] = [];
  private committed = { id: "user-from-other-call", os_identity: "1000", created_at: "2026-03-01T11:59:59.000Z" };

  async query(sql: string, values?: SqlParam[]): Promise<[unknown, unknown]> {
    this.statements.push(sql);
    if (sql.startsWith("INSERT IGNORE")) return [{ affectedRows: 0, insertId: 0 }, undefined];
    if (sql.startsWith("SELECT")) {
      const visible = sql.endsWith("FOR UPDATE") && values?.[0] === "1000";
      return [visible ? [this.committed] : [], undefined];
    }
    return [[], undefined];
  }

  async getConnection(): Promise<MysqlConnectionLike> {
    return {
      query: (sql, values) => this.query(sql, values),
      beginTransaction: async () => undefined,
      commit: async () => undefined,
      rollback: async () => undefined,
      release: () => undefined,
    };
  }

  async end(): Promise<void> {}
}

test("ensureUser finds a user a concurrent first call committed on mysql", async () => {
  const pool = new SnapshotMysqlPool();
  const mysqlRepo = new HistoryRepository(new MysqlDriver(pool), { now: () => FIXED });
  const user = await mysqlRepo.ensureUser("1000");
  assert.deepEqual(user, { id: "user-from-other-call", osIdentity: "1000", createdAt: "2026-03-01T11:59:59.000Z" });
  assert.equal(pool.statements.at(-1), "SELECT id, os_identity, created_at FROM users WHERE os_identity = ? FOR UPDATE");
});
