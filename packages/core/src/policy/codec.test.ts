import { describe, it, expect } from "vitest";
import {
  decodePolicyDocument,
  decodeUrlEncodedPolicyDocument,
  encodePolicyDocument,
} from "./codec.js";

describe("policy codec", () => {
  it("decodes a bare action string into a list", () => {
    const doc = decodePolicyDocument({
      Version: "2012-10-17",
      Statement: [{ Effect: "Allow", Action: "s3:GetObject", Resource: "*" }],
    });
    expect(doc.Statement[0]?.Action).toEqual(["s3:GetObject"]);
  });

  it("accepts a single statement object", () => {
    const doc = decodePolicyDocument({ Statement: { Effect: "Deny", NotAction: ["iam:*"] } });
    expect(doc.Statement).toHaveLength(1);
    expect(doc.Statement[0]?.NotAction).toEqual(["iam:*"]);
    expect(doc.Version).toBeUndefined();
  });

  it("collapses single-element lists on encode", () => {
    const doc = decodePolicyDocument({
      Version: "2012-10-17",
      Statement: [
        { Effect: "Allow", Action: ["sts:AssumeRoleWithWebIdentity"] },
        { Effect: "Allow", NotAction: ["iam:Create*", "iam:Delete*"], Resource: "*" },
      ],
    });
    expect(encodePolicyDocument(doc)).toEqual({
      Version: "2012-10-17",
      Statement: [
        { Effect: "Allow", Action: "sts:AssumeRoleWithWebIdentity" },
        { Effect: "Allow", NotAction: ["iam:Create*", "iam:Delete*"], Resource: "*" },
      ],
    });
  });

  it("keeps numeric and boolean condition values", () => {
    const doc = decodePolicyDocument({
      Statement: [
        {
          Effect: "Deny",
          Action: "s3:*",
          Condition: {
            Bool: { "aws:SecureTransport": false },
            NumericLessThan: { "aws:MultiFactorAuthAge": 3600 },
            NumericEquals: { "s3:max-keys": [10, 20] },
          },
        },
      ],
    });
    expect(doc.Statement[0]?.Condition).toEqual({
      Bool: { "aws:SecureTransport": false },
      NumericLessThan: { "aws:MultiFactorAuthAge": 3600 },
      NumericEquals: { "s3:max-keys": [10, 20] },
    });
  });

  it("rejects object condition values", () => {
    expect(() =>
      decodePolicyDocument({
        Statement: [{ Effect: "Allow", Action: "a", Condition: { Bool: { k: { nested: true } } } }],
      }),
    ).toThrow(expect.objectContaining({ code: "POLICY_DOCUMENT_MALFORMED" }));
  });

  it("rejects a statement without Action or NotAction", () => {
    expect(() => decodePolicyDocument({ Statement: [{ Effect: "Allow", Resource: "*" }] })).toThrow(
      expect.objectContaining({ kind: "PROTOCOL", code: "POLICY_STATEMENT_NO_ACTION" }),
    );
  });

  it("treats an empty action list as missing", () => {
    expect(() => decodePolicyDocument({ Statement: [{ Effect: "Allow", Action: [] }] })).toThrow(
      /neither Action nor NotAction/,
    );
  });

  it("rejects a statement with both Action and NotAction", () => {
    expect(() =>
      decodePolicyDocument({ Statement: [{ Effect: "Allow", Action: "a", NotAction: "b" }] }),
    ).toThrow(expect.objectContaining({ code: "POLICY_STATEMENT_ACTION_CONFLICT" }));
  });

  it("reports malformed documents as protocol errors", () => {
    expect(() => decodePolicyDocument("{nope")).toThrow(
      expect.objectContaining({ kind: "PROTOCOL", code: "POLICY_DOCUMENT_MALFORMED" }),
    );
    expect(() => decodePolicyDocument({ Statement: [{ Action: "a" }] })).toThrow(
      /Statement\.0\.Effect/,
    );
  });

  it("decodes URL-encoded documents", () => {
    const wire = encodeURIComponent(
      JSON.stringify({ Version: "2012-10-17", Statement: [{ Effect: "Allow", Action: "s3:*" }] }),
    );
    expect(decodeUrlEncodedPolicyDocument(wire)).toEqual({
      Version: "2012-10-17",
      Statement: [{ Effect: "Allow", Action: ["s3:*"] }],
    });
  });
});
