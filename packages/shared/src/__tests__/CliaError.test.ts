import test from "node:test";
import assert from "node:assert/strict";
import {
  BackendTimeoutError,
  CliaError,
  PermissionDeniedError,
  ResponseGeneratedButNotStoredError,
  isCliaErrorKind,
} from "../errors/CliaError.js";
import { INTERNAL_ERROR_NAME, fromWireError, kindFromWireName, toWireError } from "../errors/WireErrors.js";

test("error classes carry their kind as name", () => {
  const error = new BackendTimeoutError(500);
  assert.ok(error instanceof CliaError);
  assert.equal(error.name, "BackendTimeoutError");
  assert.equal(error.kind, "BackendTimeoutError");
  assert.equal(error.message, "The inference backend did not answer within 500ms.");
  assert.deepEqual(error.details, { timeoutMs: 500 });
});

test("wire encoding keeps the specific kind and details", () => {
  const wire = toWireError(new ResponseGeneratedButNotStoredError("the answer"));
  assert.equal(wire.name, "io.clia.Error.ResponseGeneratedButNotStoredError");
  const decoded = fromWireError(wire.name, wire.text);
  assert.ok(decoded instanceof ResponseGeneratedButNotStoredError);
  assert.equal(decoded.response, "the answer");
  assert.equal(decoded.message, "A response was generated but could not be saved to history.");
  assert.deepEqual(decoded.details, { response: "the answer" });
});

test("wire decoding picks the specific class for every kind that carries details", () => {
  const wire = toWireError(new BackendTimeoutError(30000));
  const timeout = fromWireError(wire.name, wire.text);
  assert.ok(timeout instanceof BackendTimeoutError);
  assert.equal(timeout.message, "The inference backend did not answer within 30000ms.");

  const denied = fromWireError("io.clia.Error.PermissionDeniedError", JSON.stringify({ message: "Nope." }));
  assert.ok(denied instanceof PermissionDeniedError);
  assert.equal(denied.message, "Nope.");

  const bare = fromWireError("io.clia.Error.SessionNotFoundError", "plain text body");
  assert.equal(bare.kind, "SessionNotFoundError");
  assert.equal(bare.message, "plain text body");
});

test("non-taxonomy errors are hidden behind an internal error name", () => {
  const wire = toWireError(new Error("secret connection string"));
  assert.equal(wire.name, INTERNAL_ERROR_NAME);
  assert.equal(wire.text.includes("secret"), false);
});

test("bus-level errors map to ServiceUnavailableError", () => {
  const decoded = fromWireError("org.freedesktop.DBus.Error.ServiceUnknown", "The name is not activatable");
  assert.equal(decoded.kind, "ServiceUnavailableError");
  assert.equal(decoded.message, "org.freedesktop.DBus.Error.ServiceUnknown: The name is not activatable");
});

test("kind lookup rejects unknown names", () => {
  assert.equal(kindFromWireName("io.clia.Error.PermissionDeniedError"), "PermissionDeniedError");
  assert.equal(kindFromWireName("io.clia.Error.Nope"), undefined);
  assert.equal(isCliaErrorKind("StorageError"), true);
  assert.equal(isCliaErrorKind("Storage"), false);
  assert.equal(new PermissionDeniedError().message, "Access denied.");
});
