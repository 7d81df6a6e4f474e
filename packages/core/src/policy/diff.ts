import type { ChangeRecord, PathSegment } from "./types.js";

type Scalar = string | number | boolean | null;

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function isScalar(v: unknown): v is Scalar {
  return v === null || typeof v === "string" || typeof v === "number" || typeof v === "boolean";
}

/**
 * Structural diff of `target` against `baseline`. Objects compare by key,
 * lists of scalars as unordered multisets, other lists index by index.
 * Keys holding `undefined` count as absent.
 */
export function diff(baseline: unknown, target: unknown, path: PathSegment[] = []): ChangeRecord[] {
  if (isRecord(baseline) && isRecord(target)) return diffObjects(baseline, target, path);
  if (Array.isArray(baseline) && Array.isArray(target)) {
    return baseline.every(isScalar) && target.every(isScalar)
      ? diffScalarLists(baseline, target, path)
      : diffLists(baseline, target, path);
  }
  if (isScalar(baseline) && isScalar(target) && baseline === target) return [];
  return [{ kind: "update", path, from: baseline, to: target }];
}

function diffObjects(
  baseline: Record<string, unknown>,
  target: Record<string, unknown>,
  path: PathSegment[],
): ChangeRecord[] {
  const changes: ChangeRecord[] = [];
  for (const [key, from] of Object.entries(baseline)) {
    if (from === undefined) continue;
    const to = target[key];
    if (to === undefined) changes.push({ kind: "delete", path: [...path, key], from });
    else changes.push(...diff(from, to, [...path, key]));
  }
  for (const [key, to] of Object.entries(target)) {
    if (to === undefined || baseline[key] !== undefined) continue;
    changes.push({ kind: "create", path: [...path, key], to });
  }
  return changes;
}

function diffScalarLists(baseline: Scalar[], target: Scalar[], path: PathSegment[]): ChangeRecord[] {
  const changes: ChangeRecord[] = [];
  const matched = new Set<number>();
  baseline.forEach((from, i) => {
    const j = target.findIndex((to, idx) => !matched.has(idx) && to === from);
    if (j === -1) changes.push({ kind: "delete", path: [...path, i], from });
    else matched.add(j);
  });
  target.forEach((to, j) => {
    if (!matched.has(j)) changes.push({ kind: "create", path: [...path, j], to });
  });
  return changes;
}

function diffLists(baseline: unknown[], target: unknown[], path: PathSegment[]): ChangeRecord[] {
  const changes: ChangeRecord[] = [];
  const length = Math.max(baseline.length, target.length);
  for (let i = 0; i < length; i++) {
    if (i >= target.length) changes.push({ kind: "delete", path: [...path, i], from: baseline[i] });
    else if (i >= baseline.length) changes.push({ kind: "create", path: [...path, i], to: target[i] });
    else changes.push(...diff(baseline[i], target[i], [...path, i]));
  }
  return changes;
}

export function formatPath(path: readonly PathSegment[]): string {
  return path.length === 0 ? "/" : path.join(".");
}

export function formatChange(change: ChangeRecord): string {
  const where = formatPath(change.path);
  switch (change.kind) {
    case "create":
      return `create ${where} = ${JSON.stringify(change.to)}`;
    case "delete":
      return `delete ${where} (was ${JSON.stringify(change.from)})`;
    case "update":
      return `update ${where}: ${JSON.stringify(change.from)} -> ${JSON.stringify(change.to)}`;
  }
}
