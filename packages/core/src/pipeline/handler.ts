import { ContractError } from "../internal/errors.js";

export const STAGE_IDS = [
  "STORAGE_CLASS",
  "NODE_GROUPS",
  "DATABASE_CONFIG",
  "OIDC_ISSUER",
  "SERVICE_ACCOUNT_TOKENS",
  "JWT_VERIFICATION",
  "ROLE_POLICY",
  "SERVICE_ACCOUNT_BINDING",
  "ROLE_PERMISSIONS",
  "SCAFFOLDING",
  "CHECKER_POD",
] as const;

export type StageId = (typeof STAGE_IDS)[number];

/** Values a stage hands to the next one. */
export type StageValue =
  | { kind: "jwksUri"; uri: string }
  | { kind: "tokens"; tokens: string[] };

export type StageValueKind = StageValue["kind"];

export interface CheckContext {
  signal: AbortSignal;
}

export interface Handler {
  handle(ctx: CheckContext, ...inputs: StageValue[]): Promise<StageValue[]>;
}

/**
 * Returns the first input of the given kind. A missing input means the
 * pipeline was assembled in the wrong order.
 */
export function expectValue<K extends StageValueKind>(
  inputs: readonly StageValue[],
  kind: K,
): Extract<StageValue, { kind: K }> {
  for (const value of inputs) {
    if (isKind(value, kind)) return value;
  }
  const got = inputs.map((v) => v.kind).join(", ") || "nothing";
  throw new ContractError(`expected a ${kind} input, got ${got}`);
}

function isKind<K extends StageValueKind>(
  value: StageValue,
  kind: K,
): value is Extract<StageValue, { kind: K }> {
  return value.kind === kind;
}

export function checkContext(signal: AbortSignal = new AbortController().signal): CheckContext {
  return { signal };
}
