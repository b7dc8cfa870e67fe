import test from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { ConfigError, PermissionDeniedError } from "@clia/shared";
import { createSilentLogger } from "@clia/core";
import { AccessPolicy, FilePolicySource, evaluatePolicy } from "../policy/AccessPolicy.js";

const alice = { uid: 1000, gids: [1000, 10] };
const bob = { uid: 1001, gids: [1001] };

test("a matching deny wins over a matching allow", () => {
  const policy = AccessPolicy.parse(
    ["default: allow", "rules:", "  - effect: allow", "    uids: [1000]", "  - effect: deny", "    gids: [10]"].join("\n"),
  );
  assert.deepEqual(policy.evaluate(alice, "chat"), { allowed: false, rule: 1 });
  assert.deepEqual(policy.evaluate(bob, "chat"), { allowed: true });
});

test("allow rules admit callers a deny default would refuse", () => {
  const document = {
    default: "deny" as const,
    rules: [{ effect: "allow" as const, uids: [1001], endpoints: ["history" as const] }],
  };
  assert.deepEqual(evaluatePolicy(document, bob, "history"), { allowed: true, rule: 0 });
  assert.deepEqual(evaluatePolicy(document, bob, "chat"), { allowed: false });
  assert.deepEqual(evaluatePolicy(document, alice, "history"), { allowed: false });
});

test("check raises PermissionDeniedError naming the endpoint", () => {
  const policy = AccessPolicy.parse("default: deny\n");
  assert.throws(
    () => policy.check(alice, "user"),
    (error: unknown) => {
      assert.ok(error instanceof PermissionDeniedError);
      assert.equal(error.message, "Access to the user endpoint is denied.");
      assert.deepEqual(error.details, { endpoint: "user", uid: 1000 });
      return true;
    },
  );
});

test("an empty policy admits everyone", () => {
  assert.deepEqual(AccessPolicy.parse("").document, { default: "allow", rules: [] });
});

test("invalid documents are ConfigErrors", () => {
  assert.throws(() => AccessPolicy.parse("default: maybe\n", "policy.yaml"), ConfigError);
  assert.throws(() => AccessPolicy.parse("rules: [\n", "policy.yaml"), /Could not parse access policy policy.yaml/);
  assert.throws(
    () => AccessPolicy.parse("rules:\n  - effect: allow\n    endpoints: [shell]\n", "policy.yaml"),
    /Invalid access policy policy.yaml: rules.0.endpoints.0/,
  );
});

test("FilePolicySource reloads edits and keeps the last good policy", async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "clia-policy-"));
  const file = path.join(dir, "policy.yaml");
  try {
    const source = new FilePolicySource(file, createSilentLogger());
    await assert.rejects(source.current(), ConfigError);

    await fs.writeFile(file, "default: deny\n", "utf8");
    assert.equal((await source.current()).document.default, "deny");

    await fs.writeFile(file, "default: allow\nrules: []\n", "utf8");
    const later = new Date(Date.now() + 5_000);
    await fs.utimes(file, later, later);
    assert.equal((await source.current()).document.default, "allow");

    await fs.writeFile(file, "default: sometimes\n", "utf8");
    const latest = new Date(Date.now() + 10_000);
    await fs.utimes(file, latest, latest);
    assert.equal((await source.current()).document.default, "allow");
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});
