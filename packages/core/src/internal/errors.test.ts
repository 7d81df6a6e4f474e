import { describe, it, expect } from "vitest";
import {
  CleanupError,
  PermissionMismatchError,
  StageError,
  VerificationError,
  errorMessage,
  failedStage,
  isVerificationError,
  rootCause,
} from "../internal/errors.js";

describe("VerificationError", () => {
  it("builds each kind from its factory", () => {
    const cause = new Error("ECONNRESET");
    expect(VerificationError.configuration("X", "bad field", "spec.a")).toMatchObject({
      name: "VerificationError",
      kind: "CONFIGURATION",
      code: "X",
      message: "bad field",
      field: "spec.a",
    });
    expect(VerificationError.infrastructure("Y", "down", cause).cause).toBe(cause);
    expect(VerificationError.protocol("Z", undefined, { lines: [] })).toMatchObject({
      kind: "PROTOCOL",
      message: "Z",
      details: { lines: [] },
    });
  });

  it("narrows by kind", () => {
    const err: unknown = VerificationError.protocol("Z");
    expect(isVerificationError(err)).toBe(true);
    expect(isVerificationError(err, "PROTOCOL")).toBe(true);
    expect(isVerificationError(err, "CONFIGURATION")).toBe(false);
    expect(isVerificationError(new Error("plain"))).toBe(false);
  });
});

describe("PermissionMismatchError", () => {
  it("lists the missing permissions", () => {
    const err = PermissionMismatchError.missing("MISSING_PERMISSIONS", ["a", "b"]);
    expect(err).toBeInstanceOf(VerificationError);
    expect(err.kind).toBe("PERMISSION_MISMATCH");
    expect(err.message).toBe("missing permissions: a, b");
    expect(err.changelog).toEqual([]);
  });

  it("carries the changelog", () => {
    const changelog = [{ kind: "delete" as const, path: ["Statement", 0, "Action", 0], from: "s3:GetObject" }];
    const err = PermissionMismatchError.changelog("POLICY_MISMATCH", changelog);
    expect(err.details).toEqual({ changelog, missing: [] });
  });
});

describe("StageError", () => {
  it("finds the innermost stage and the root cause", () => {
    const cause = VerificationError.configuration("NO_GPU_NODES");
    const err = new StageError("CHECKER_POD", new StageError("NODE_GROUPS", cause));

    expect(err.message).toBe("CHECKER_POD: NODE_GROUPS: NO_GPU_NODES");
    expect(failedStage(err)).toBe("NODE_GROUPS");
    expect(rootCause(err)).toBe(cause);
    expect(failedStage(cause)).toBeUndefined();
  });
});

describe("CleanupError", () => {
  it("names every resource it could not remove", () => {
    const err = new CleanupError([
      { resource: "Role crossplane/app-role", error: new Error("forbidden") },
      { resource: "ClusterRole app-clusterrole", error: "timeout" },
    ]);
    expect(err.message).toBe(
      "cleanup failed for 2 resource(s): Role crossplane/app-role (forbidden); ClusterRole app-clusterrole (timeout)",
    );
  });
});

describe("errorMessage", () => {
  it("stringifies non-errors", () => {
    expect(errorMessage(new Error("x"))).toBe("x");
    expect(errorMessage(42)).toBe("42");
  });
});
