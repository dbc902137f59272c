/**
 * Tests for structured error types (TetherError).
 *
 * Covers: tetherError, asError, isTetherError, isCancelled, withSuppressed, errorLogFields
 */

import { test, describe } from "node:test";
import assert from "node:assert";
import { tetherError, asError, isTetherError, isCancelled, withSuppressed, errorLogFields } from "../src/errors.js";

// ---------------------------------------------------------------------------
// tetherError factory
// ---------------------------------------------------------------------------

describe("tetherError", () => {
  test("creates an Error with kind and retryable fields", () => {
    const e = tetherError("spawn_error", "could not launch");
    assert.ok(e instanceof Error);
    assert.strictEqual(e.kind, "spawn_error");
    assert.strictEqual(e.message, "could not launch");
    assert.strictEqual(e.retryable, false); // default
    assert.ok(e.stack, "should have a stack trace");
  });

  test("retryable can be set to true", () => {
    const e = tetherError("stream_error", "reset", { retryable: true });
    assert.strictEqual(e.retryable, true);
  });

  test("optional fields are set when provided", () => {
    const e = tetherError("stream_error", "fail", {
      cause: new Error("underlying"),
      transcript: [{ role: "user", content: "hi" }],
      partialContent: "",
      exit: { code: 1, signal: null },
    });
    assert.ok(e.cause instanceof Error);
    assert.deepStrictEqual(e.transcript, [{ role: "user", content: "hi" }]);
    assert.strictEqual(e.partialContent, "");
    assert.deepStrictEqual(e.exit, { code: 1, signal: null });
  });

  test("optional fields are omitted when not provided", () => {
    const e = tetherError("config_error", "bad config");
    assert.strictEqual(e.cause, undefined);
    assert.strictEqual(e.transcript, undefined);
    assert.strictEqual(e.partialContent, undefined);
    assert.strictEqual(e.suppressed, undefined);
  });

  test("an empty suppressed list is not attached", () => {
    const e = tetherError("disposal_error", "x", { suppressed: [] });
    assert.strictEqual(e.suppressed, undefined);
  });

  test("all TetherErrorKind values are accepted", () => {
    const kinds = [
      "spawn_error",
      "already_started",
      "invalid_state",
      "stream_error",
      "tool_error",
      "config_error",
      "mcp_error",
      "cancelled",
      "disposal_error",
    ] as const;
    for (const kind of kinds) {
      const e = tetherError(kind, `test ${kind}`);
      assert.strictEqual(e.kind, kind);
    }
  });
});

// ---------------------------------------------------------------------------
// asError
// ---------------------------------------------------------------------------

describe("asError", () => {
  test("returns Error instances unchanged", () => {
    const original = new Error("original");
    assert.strictEqual(asError(original), original);
  });

  test("wraps strings into Error", () => {
    const result = asError("something broke");
    assert.ok(result instanceof Error);
    assert.strictEqual(result.message, "something broke");
  });

  test("handles null and undefined", () => {
    assert.strictEqual(asError(null).message, "Unknown error");
    assert.strictEqual(asError(undefined).message, "Unknown error");
  });

  test("handles numbers", () => {
    assert.strictEqual(asError(42).message, "42");
  });

  test("handles objects via String()", () => {
    assert.strictEqual(asError({ code: 42 }).message, "[object Object]");
  });
});

// ---------------------------------------------------------------------------
// isTetherError / isCancelled
// ---------------------------------------------------------------------------

describe("isTetherError", () => {
  test("returns true for tetherError instances", () => {
    assert.strictEqual(isTetherError(tetherError("tool_error", "t")), true);
  });

  test("returns false for plain Error", () => {
    assert.strictEqual(isTetherError(new Error("nope")), false);
  });

  test("returns false for non-Error objects", () => {
    assert.strictEqual(isTetherError({ kind: "tool_error", retryable: true }), false);
  });

  test("returns false for null, undefined and strings", () => {
    assert.strictEqual(isTetherError(null), false);
    assert.strictEqual(isTetherError(undefined), false);
    assert.strictEqual(isTetherError("error"), false);
  });

  test("isCancelled only matches the cancelled kind", () => {
    assert.strictEqual(isCancelled(tetherError("cancelled", "stop")), true);
    assert.strictEqual(isCancelled(tetherError("stream_error", "stop")), false);
    assert.strictEqual(isCancelled(new Error("stop")), false);
  });
});

// ---------------------------------------------------------------------------
// withSuppressed
// ---------------------------------------------------------------------------

describe("withSuppressed", () => {
  test("keeps the primary error and appends failures", () => {
    const primary = tetherError("spawn_error", "primary", { suppressed: [new Error("first")] });
    const result = withSuppressed(primary, [new Error("second")]);
    assert.strictEqual(result, primary);
    assert.deepStrictEqual(primary.suppressed?.map((e) => e.message), ["first", "second"]);
  });

  test("attaches failures to a plain Error", () => {
    const plain = new Error("plain");
    const result = withSuppressed(plain, [new Error("cleanup")]);
    assert.strictEqual(result, plain);
    assert.strictEqual(result.message, "plain");
    assert.ok("suppressed" in result);
  });

  test("returns the error untouched when there is nothing to add", () => {
    const plain = new Error("plain");
    withSuppressed(plain, []);
    assert.strictEqual("suppressed" in plain, false);
  });

  test("wraps non-Error values", () => {
    const result = withSuppressed("boom", []);
    assert.strictEqual(result.message, "boom");
  });
});

// ---------------------------------------------------------------------------
// errorLogFields
// ---------------------------------------------------------------------------

describe("errorLogFields", () => {
  test("returns basic fields for a minimal error", () => {
    const fields = errorLogFields(tetherError("config_error", "bad"));
    assert.strictEqual(fields.kind, "config_error");
    assert.strictEqual(fields.message, "bad");
    assert.strictEqual(fields.retryable, false);
    assert.ok(fields.stack, "should include stack");
  });

  test("summarizes partial stream state instead of dumping it", () => {
    const e = tetherError("stream_error", "fail", {
      transcript: [
        { role: "system", content: "s" },
        { role: "user", content: "u" },
      ],
      partialContent: "Hello",
    });
    const fields = errorLogFields(e);
    assert.strictEqual(fields.transcript_length, 2);
    assert.strictEqual(fields.partial_length, 5);
  });

  test("lists suppressed messages", () => {
    const e = tetherError("spawn_error", "fail", { suppressed: [new Error("kill failed")] });
    assert.deepStrictEqual(errorLogFields(e).suppressed, ["kill failed"]);
  });

  test("resolves cause into cause_message and cause_stack", () => {
    const e = tetherError("mcp_error", "mcp failed", { cause: new Error("root cause") });
    const fields = errorLogFields(e);
    assert.strictEqual(fields.cause_message, "root cause");
    assert.ok(fields.cause_stack);
  });

  test("resolves non-Error cause via asError", () => {
    const fields = errorLogFields(tetherError("stream_error", "fail", { cause: "string cause" }));
    assert.strictEqual(fields.cause_message, "string cause");
  });

  test("result is JSON-serializable", () => {
    const e = tetherError("stream_error", "test", { cause: new Error("inner"), exit: { code: 0, signal: null } });
    const parsed = JSON.parse(JSON.stringify(errorLogFields(e)));
    assert.strictEqual(parsed.kind, "stream_error");
    assert.deepStrictEqual(parsed.exit, { code: 0, signal: null });
  });
});
