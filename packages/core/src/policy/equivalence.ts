import { PermissionMismatchError } from "../internal/errors.js";
import { createPolicyLogger } from "../observability/logger.js";
import { diff, formatChange } from "./diff.js";
import { materialize } from "./placeholders.js";
import type {
  ChangeRecord,
  EquivalenceResult,
  PermissionDocument,
  PlaceholderContext,
} from "./types.js";

// Additions under these statement fields only widen what the observed side grants.
const TOLERATED_ADDITIONS = new Set<unknown>(["Action", "NotAction", "Condition"]);

export function isToleratedAddition(change: ChangeRecord): boolean {
  const [root, index, field] = change.path;
  return (
    change.kind === "create" &&
    root === "Statement" &&
    typeof index === "number" &&
    TOLERATED_ADDITIONS.has(field)
  );
}

/** Action patterns the expected side requires and the observed side lacks. */
export function missingActions(changelog: readonly ChangeRecord[]): string[] {
  const missing: string[] = [];
  for (const change of changelog) {
    if (change.kind !== "delete" || typeof change.from !== "string") continue;
    const [root, , field] = change.path;
    if (root === "Statement" && (field === "Action" || field === "NotAction")) {
      missing.push(change.from);
    }
  }
  return missing;
}

/**
 * Compares an observed document against an expected template. The template's
 * placeholders are filled first; extra actions and condition entries on the
 * observed side are accepted, everything else must match.
 */
export function equivalent(
  observed: PermissionDocument,
  expected: PermissionDocument,
  ctx: PlaceholderContext,
): EquivalenceResult {
  const baseline = materialize(expected, ctx);
  const changelog = diff(baseline, observed).filter((change) => !isToleratedAddition(change));
  return { equivalent: changelog.length === 0, changelog };
}

export class PolicyEquivalenceEngine {
  private readonly log = createPolicyLogger();

  constructor(private readonly placeholders: PlaceholderContext) {}

  compare(observed: PermissionDocument, expected: PermissionDocument): EquivalenceResult {
    return equivalent(observed, expected, this.placeholders);
  }

  /** Throws a PermissionMismatchError carrying the changelog when `subject` falls short. */
  verify(subject: string, observed: PermissionDocument, expected: PermissionDocument): void {
    const { equivalent: ok, changelog } = this.compare(observed, expected);
    if (ok) {
      this.log.debug({ subject }, "policy matches");
      return;
    }
    const summary = changelog.map(formatChange);
    this.log.warn({ subject, changelog: summary }, "policy mismatch");
    throw PermissionMismatchError.changelog(
      "POLICY_MISMATCH",
      changelog,
      `${subject} does not match the expected policy: ${summary.join("; ")}`,
    );
  }
}
