import { setTimeout as sleep } from "node:timers/promises";
import { VerificationError } from "../internal/errors.js";
import type { Logger } from "../observability/logger.js";
import { refString, type ClusterClient, type ObjectRef, type PodPhase } from "../cluster/types.js";

export type TerminalPhase = "Succeeded" | "Failed";

export interface PollOptions {
  intervalMs: number;
  timeoutMs: number;
  signal: AbortSignal;
  log?: Logger;
}

const isTerminal = (phase: PodPhase): phase is TerminalPhase =>
  phase === "Succeeded" || phase === "Failed";

/**
 * Polls the pod until it reaches Succeeded or Failed. Pending, Running and
 * Unknown keep polling until the deadline.
 */
export async function waitForTerminalPhase(
  cluster: ClusterClient,
  ref: ObjectRef,
  opts: PollOptions,
): Promise<TerminalPhase> {
  const deadline = Date.now() + opts.timeoutMs;
  let last: PodPhase | undefined;
  for (;;) {
    opts.signal.throwIfAborted();
    const phase = await cluster.getPodPhase(ref);
    if (phase === undefined) {
      throw VerificationError.infrastructure(
        "POD_DISAPPEARED",
        `pod ${refString(ref)} disappeared while waiting for it to finish`,
      );
    }
    if (phase !== last) {
      opts.log?.debug({ pod: refString(ref), from: last, to: phase }, "pod phase changed");
      last = phase;
    }
    if (isTerminal(phase)) return phase;
    if (Date.now() >= deadline) {
      throw VerificationError.infrastructure(
        "POD_TIMEOUT",
        `pod ${refString(ref)} did not finish within ${opts.timeoutMs} ms (last phase ${phase})`,
      );
    }
    await sleep(opts.intervalMs, undefined, { signal: opts.signal });
  }
}

/** Polls until the pod can no longer be read. */
export async function waitForPodDeletion(
  cluster: ClusterClient,
  ref: ObjectRef,
  opts: PollOptions,
): Promise<void> {
  const deadline = Date.now() + opts.timeoutMs;
  for (;;) {
    opts.signal.throwIfAborted();
    if ((await cluster.getPodPhase(ref)) === undefined) return;
    if (Date.now() >= deadline) {
      throw VerificationError.infrastructure(
        "POD_TIMEOUT",
        `pod ${refString(ref)} was not removed within ${opts.timeoutMs} ms`,
      );
    }
    await sleep(opts.intervalMs, undefined, { signal: opts.signal });
  }
}
