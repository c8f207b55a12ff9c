import assert from "node:assert/strict";
import test from "node:test";
import { ExtractionError, OperationFailure, classifyFsError } from "./errors.js";

function errnoError(code: string): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(`${code}: simulated`);
  err.code = code;
  return err;
}

test("filesystem error codes map to failure kinds", () => {
  assert.equal(classifyFsError(errnoError("EACCES")), "permission-denied");
  assert.equal(classifyFsError(errnoError("EPERM")), "permission-denied");
  assert.equal(classifyFsError(errnoError("EROFS")), "permission-denied");
  assert.equal(classifyFsError(errnoError("ENOSPC")), "disk-full");
  assert.equal(classifyFsError(errnoError("EDQUOT")), "disk-full");
  assert.equal(classifyFsError(errnoError("ENOENT")), "io-error");
  assert.equal(classifyFsError(new Error("plain")), "io-error");
  assert.equal(classifyFsError(new OperationFailure("settings-corrupt", "bad")), "settings-corrupt");
});

test("extraction errors name the file and position", () => {
  const err = new ExtractionError({
    kind: "parse-failure",
    path: "/plugin/agents/broken.md",
    category: "agent",
    detail: "unexpected end of flow sequence",
    position: { line: 3, column: 14 },
  });

  assert.equal(err.message, "Cannot parse agent metadata at /plugin/agents/broken.md:3:14: unexpected end of flow sequence");
  assert.equal(err.code, "EXTRACTION_FAILED");
  assert.ok(err instanceof Error);
});
