import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { CloudProvider } from "../config/env-config.js";
import { decodePolicyDocument } from "./codec.js";
import type { PermissionDocument } from "./types.js";

export const DEFAULT_POLICY_DATA_DIR = fileURLToPath(new URL("../../data/", import.meta.url));

const PROVIDERS: readonly CloudProvider[] = ["aws", "azure", "gcp"];

const MANAGED_POLICY_PREFIX = "managed-policy:";

// kind -> permission list, or kind -> permission document in wire form
const RegistryFile = z.record(z.union([z.array(z.string()), z.record(z.unknown())]));

type Entry =
  | { type: "document"; document: PermissionDocument }
  | { type: "permissions"; permissions: ReadonlySet<string> };

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

const keyOf = (provider: CloudProvider, kind: string) => `${provider}/${kind}`;

/**
 * Expected policy documents and permission sets keyed by (provider, kind).
 * Loaded once; nothing is mutable after construction.
 */
export class PolicyRegistry {
  private readonly entries: ReadonlyMap<string, Entry>;

  private constructor(entries: Map<string, Entry>) {
    this.entries = entries;
  }

  static load(dataDir: string = DEFAULT_POLICY_DATA_DIR): PolicyRegistry {
    const entries = new Map<string, Entry>();
    for (const provider of PROVIDERS) {
      const file = path.join(dataDir, `${provider}.json`);
      const parsed = RegistryFile.safeParse(JSON.parse(readFileSync(file, "utf8")));
      if (!parsed.success) {
        throw new Error(`Invalid policy data in ${file}: ${parsed.error.issues[0]?.message}`);
      }
      for (const [kind, value] of Object.entries(parsed.data)) {
        const entry: Entry = Array.isArray(value)
          ? { type: "permissions", permissions: new Set(value) }
          : { type: "document", document: deepFreeze(decodePolicyDocument(value)) };
        entries.set(keyOf(provider, kind), entry);
      }
    }
    return new PolicyRegistry(entries);
  }

  document(provider: CloudProvider, kind: string): PermissionDocument {
    const entry = this.entries.get(keyOf(provider, kind));
    if (entry?.type !== "document") {
      throw new Error(`No expected ${provider} policy document of kind ${kind}`);
    }
    return entry.document;
  }

  permissions(provider: CloudProvider, kind: string): ReadonlySet<string> {
    const entry = this.entries.get(keyOf(provider, kind));
    if (entry?.type !== "permissions") {
      throw new Error(`No expected ${provider} permission set of kind ${kind}`);
    }
    return entry.permissions;
  }

  /** Suffixes of the managed policies expected next to the provider role. */
  managedPolicySuffixes(provider: CloudProvider): string[] {
    const prefix = keyOf(provider, MANAGED_POLICY_PREFIX);
    return [...this.entries.keys()]
      .filter((key) => key.startsWith(prefix))
      .map((key) => key.slice(prefix.length));
  }

  managedPolicy(provider: CloudProvider, suffix: string): PermissionDocument {
    return this.document(provider, MANAGED_POLICY_PREFIX + suffix);
  }
}

let defaultRegistry: PolicyRegistry | undefined;

export function defaultPolicyRegistry(): PolicyRegistry {
  defaultRegistry ??= PolicyRegistry.load();
  return defaultRegistry;
}
