export type Effect = "Allow" | "Deny";

export type ConditionScalar = string | number | boolean;

export type ConditionValue = ConditionScalar | ConditionScalar[];

/** Condition operator → condition key → matched value(s). */
export type ConditionBlock = Record<string, Record<string, ConditionValue>>;

export type Principal = string | Record<string, string | string[]>;

export type ActionClause =
  | { Action: string[]; NotAction?: undefined }
  | { NotAction: string[]; Action?: undefined };

export type PermissionStatement = ActionClause & {
  Sid?: string;
  Effect: Effect;
  Resource?: string | string[];
  NotResource?: string | string[];
  Principal?: Principal;
  NotPrincipal?: Principal;
  Condition?: ConditionBlock;
};

export interface PermissionDocument {
  Version?: string;
  Statement: PermissionStatement[];
}

export interface PlaceholderContext {
  clusterName: string;
  /** AWS account id, Azure subscription id or GCP project id. */
  accountId: string;
  /** OIDC issuer host and path, without scheme or trailing slash. */
  issuerId: string;
}

export type PathSegment = string | number;

export type ChangeRecord =
  | { kind: "create"; path: PathSegment[]; to: unknown }
  | { kind: "update"; path: PathSegment[]; from: unknown; to: unknown }
  | { kind: "delete"; path: PathSegment[]; from: unknown };

export interface EquivalenceResult {
  equivalent: boolean;
  changelog: ChangeRecord[];
}
