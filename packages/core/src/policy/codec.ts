import { z } from "zod";
import { VerificationError, errorMessage } from "../internal/errors.js";
import type { PermissionDocument, PermissionStatement } from "./types.js";

// Action/NotAction are a bare string or a list on the wire, always a list here.
const ActionList = z
  .union([z.string(), z.array(z.string())])
  .transform((v) => (typeof v === "string" ? [v] : v));

const StringOrList = z.union([z.string(), z.array(z.string())]);

const ConditionScalar = z.union([z.string(), z.number(), z.boolean()]);
const ConditionValue = z.union([ConditionScalar, z.array(ConditionScalar)]);

const PrincipalWire = z.union([z.string(), z.record(StringOrList)]);

const StatementWire = z.object({
  Sid: z.string().optional(),
  Effect: z.enum(["Allow", "Deny"]),
  Action: ActionList.optional(),
  NotAction: ActionList.optional(),
  Resource: StringOrList.optional(),
  NotResource: StringOrList.optional(),
  Principal: PrincipalWire.optional(),
  NotPrincipal: PrincipalWire.optional(),
  Condition: z.record(z.record(ConditionValue)).optional(),
});

const DocumentWire = z.object({
  Version: z.string().optional(),
  Statement: z.preprocess(
    (v) => (v === undefined || Array.isArray(v) ? v : [v]),
    z.array(StatementWire),
  ),
});

type StatementInput = z.infer<typeof StatementWire>;

function toStatement(raw: StatementInput, index: number): PermissionStatement {
  const { Action, NotAction, ...rest } = raw;
  const hasAction = Action !== undefined && Action.length > 0;
  const hasNotAction = NotAction !== undefined && NotAction.length > 0;
  if (hasAction && hasNotAction) {
    throw VerificationError.protocol(
      "POLICY_STATEMENT_ACTION_CONFLICT",
      `statement ${index} sets both Action and NotAction`,
    );
  }
  if (hasAction) return { ...rest, Action };
  if (hasNotAction) return { ...rest, NotAction };
  throw VerificationError.protocol(
    "POLICY_STATEMENT_NO_ACTION",
    `statement ${index} has neither Action nor NotAction`,
  );
}

/**
 * Decodes a permission document from its wire form (a JSON string or an
 * already-parsed value).
 */
export function decodePolicyDocument(input: unknown): PermissionDocument {
  let raw = input;
  if (typeof input === "string") {
    try {
      raw = JSON.parse(input);
    } catch (err) {
      throw VerificationError.protocol(
        "POLICY_DOCUMENT_MALFORMED",
        `policy document is not JSON: ${errorMessage(err)}`,
      );
    }
  }
  const parsed = DocumentWire.safeParse(raw);
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ");
    throw VerificationError.protocol("POLICY_DOCUMENT_MALFORMED", `invalid policy document: ${msg}`);
  }
  const doc: PermissionDocument = {
    Statement: parsed.data.Statement.map((s, i) => toStatement(s, i)),
  };
  if (parsed.data.Version !== undefined) doc.Version = parsed.data.Version;
  return doc;
}

/** AWS returns policy documents URL-encoded. */
export function decodeUrlEncodedPolicyDocument(encoded: string): PermissionDocument {
  let json: string;
  try {
    json = decodeURIComponent(encoded);
  } catch (err) {
    throw VerificationError.protocol(
      "POLICY_DOCUMENT_MALFORMED",
      `policy document is not URL-encoded: ${errorMessage(err)}`,
    );
  }
  return decodePolicyDocument(json);
}

function collapse(list: string[]): string | string[] {
  return list.length === 1 ? list[0] : list;
}

/** Wire form: single-element action lists collapse back to a scalar. */
export function encodePolicyDocument(doc: PermissionDocument): Record<string, unknown> {
  const statements = doc.Statement.map((s) => {
    const { Action, NotAction, ...rest } = s;
    const out: Record<string, unknown> = { ...rest };
    if (Action !== undefined) out.Action = collapse(Action);
    if (NotAction !== undefined) out.NotAction = collapse(NotAction);
    return out;
  });
  return doc.Version === undefined
    ? { Statement: statements }
    : { Version: doc.Version, Statement: statements };
}
