import test from "node:test";
import assert from "node:assert/strict";
import { KeyedSerialQueue, SerialQueue } from "../concurrency/SerialQueue.js";
import { withTimeout } from "../concurrency/withTimeout.js";

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

test("SerialQueue runs tasks one at a time in order", async () => {
  const queue = new SerialQueue();
  const events: string[] = [];
  const task = (label: string, ms: number) => async () => {
    events.push(`start:${label}`);
    await delay(ms);
    events.push(`end:${label}`);
    return label;
  };
  const results = await Promise.all([queue.run(task("a", 15)), queue.run(task("b", 1)), queue.run(task("c", 5))]);
  assert.deepEqual(results, ["a", "b", "c"]);
  assert.deepEqual(events, ["start:a", "end:a", "start:b", "end:b", "start:c", "end:c"]);
  assert.equal(queue.size, 0);
});

test("SerialQueue keeps going after a failing task", async () => {
  const queue = new SerialQueue();
  const failed = queue.run(async () => {
    throw new Error("boom");
  });
  const next = queue.run(async () => "ok");
  await assert.rejects(failed, /boom/);
  assert.equal(await next, "ok");
});

test("KeyedSerialQueue serializes per key and interleaves across keys", async () => {
  const queue = new KeyedSerialQueue();
  const events: string[] = [];
  const run = (key: string, label: string, ms: number) =>
    queue.run(key, async () => {
      events.push(`start:${label}`);
      await delay(ms);
      events.push(`end:${label}`);
    });
  await Promise.all([run("u1", "a1", 20), run("u1", "a2", 1), run("u2", "b1", 1)]);
  assert.ok(events.indexOf("end:a1") < events.indexOf("start:a2"));
  assert.ok(events.indexOf("start:b1") < events.indexOf("end:a1"));
  assert.equal(queue.activeKeys, 0);
});

test("withTimeout rejects with the provided error once the timer fires", async () => {
  await assert.rejects(
    withTimeout(delay(50).then(() => "late"), 5, () => new Error("too slow")),
    /too slow/,
  );
  assert.equal(await withTimeout(Promise.resolve("fast"), 50, () => new Error("unused")), "fast");
  assert.equal(await withTimeout(Promise.resolve("no limit"), 0, () => new Error("unused")), "no limit");
});
