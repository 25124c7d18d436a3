/**
 * Error Hierarchy Tests
 */

import { describe, it, expect } from "vitest";
import {
  ConfigurationError,
  ErrorCode,
  FileSystemError,
  InferenceError,
  SemanticSortError,
  errorMessage,
  isSemanticSortError,
  wrapError,
} from "../errors.js";

describe("SemanticSortError", () => {
  it("serializes code and context", () => {
    const error = new InferenceError("Endpoint returned 500", ErrorCode.INFERENCE_HTTP_ERROR, {
      batchId: "batch-001-test",
      status: 500,
    });

    expect(error.batchId).toBe("batch-001-test");
    expect(error.status).toBe(500);
    expect(error.toJSON()).toMatchObject({
      name: "InferenceError",
      message: "Endpoint returned 500",
      code: "E3002",
      context: { batchId: "batch-001-test", status: 500 },
    });
    expect(error.toString()).toBe("[E3002] InferenceError: Endpoint returned 500");
  });

  it("keeps subclasses in the hierarchy", () => {
    const error = new FileSystemError("nope", ErrorCode.FS_NOT_A_DIRECTORY, { filePath: "/data" });

    expect(error).toBeInstanceOf(SemanticSortError);
    expect(isSemanticSortError(error)).toBe(true);
    expect(error.filePath).toBe("/data");
  });

  it("exposes configuration issues", () => {
    const error = new ConfigurationError("bad", ErrorCode.CONFIG_INVALID, { issues: ["batchSize: too small"] });

    expect(error.issues).toEqual(["batchSize: too small"]);
    expect(new ConfigurationError("bad").issues).toEqual([]);
  });
});

describe("wrapError", () => {
  it("returns semantic-sort errors unchanged", () => {
    const error = new SemanticSortError("x");

    expect(wrapError(error)).toBe(error);
  });

  it("wraps plain errors and strings", () => {
    expect(wrapError(new TypeError("boom"))).toMatchObject({ message: "boom", code: ErrorCode.UNKNOWN_ERROR });
    expect(wrapError("text").message).toBe("text");
    expect(wrapError(42, "fallback").message).toBe("fallback");
  });
});

describe("errorMessage", () => {
  it("reads messages from anything thrown", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
  });
});
