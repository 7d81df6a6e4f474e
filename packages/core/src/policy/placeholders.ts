import type {
  ConditionBlock,
  ConditionScalar,
  ConditionValue,
  PermissionDocument,
  PermissionStatement,
  PlaceholderContext,
  Principal,
} from "./types.js";

export const PLACEHOLDERS = {
  clusterName: "${CLUSTER_NAME}",
  accountId: "${ACCOUNT_ID}",
  issuerId: "${OIDC_ID}",
} as const satisfies Record<keyof PlaceholderContext, string>;

export function substitute(text: string, ctx: PlaceholderContext): string {
  return text
    .replaceAll(PLACEHOLDERS.clusterName, ctx.clusterName)
    .replaceAll(PLACEHOLDERS.accountId, ctx.accountId)
    .replaceAll(PLACEHOLDERS.issuerId, ctx.issuerId);
}

function substituteAll(value: string | string[], ctx: PlaceholderContext): string | string[] {
  return typeof value === "string" ? substitute(value, ctx) : value.map((v) => substitute(v, ctx));
}

function substitutePrincipal(principal: Principal, ctx: PlaceholderContext): Principal {
  if (typeof principal === "string") return substitute(principal, ctx);
  const out: Record<string, string | string[]> = {};
  for (const [type, ids] of Object.entries(principal)) out[type] = substituteAll(ids, ctx);
  return out;
}

function substituteScalar(value: ConditionScalar, ctx: PlaceholderContext): ConditionScalar {
  return typeof value === "string" ? substitute(value, ctx) : value;
}

function substituteConditionValue(value: ConditionValue, ctx: PlaceholderContext): ConditionValue {
  return Array.isArray(value) ? value.map((v) => substituteScalar(v, ctx)) : substituteScalar(value, ctx);
}

function substituteCondition(condition: ConditionBlock, ctx: PlaceholderContext): ConditionBlock {
  const out: ConditionBlock = {};
  for (const [operator, entries] of Object.entries(condition)) {
    const block: Record<string, ConditionValue> = {};
    for (const [key, value] of Object.entries(entries)) {
      block[substitute(key, ctx)] = substituteConditionValue(value, ctx);
    }
    out[operator] = block;
  }
  return out;
}

function materializeStatement(
  statement: PermissionStatement,
  ctx: PlaceholderContext,
): PermissionStatement {
  const out: PermissionStatement = { ...statement };
  if (statement.Principal !== undefined) out.Principal = substitutePrincipal(statement.Principal, ctx);
  if (statement.NotPrincipal !== undefined) {
    out.NotPrincipal = substitutePrincipal(statement.NotPrincipal, ctx);
  }
  if (statement.Resource !== undefined) out.Resource = substituteAll(statement.Resource, ctx);
  if (statement.NotResource !== undefined) {
    out.NotResource = substituteAll(statement.NotResource, ctx);
  }
  if (statement.Condition !== undefined) {
    out.Condition = substituteCondition(statement.Condition, ctx);
  }
  return out;
}

/** Expected document with every placeholder replaced; the template is left untouched. */
export function materialize(doc: PermissionDocument, ctx: PlaceholderContext): PermissionDocument {
  return { ...doc, Statement: doc.Statement.map((s) => materializeStatement(s, ctx)) };
}
