import {
  PermissionMismatchError,
  VerificationError,
  errorMessage,
} from "../internal/errors.js";
import { createExecutorLogger } from "../observability/logger.js";
import type { CheckContext } from "../pipeline/handler.js";
import {
  isNotFound,
  refString,
  type ClusterClient,
  type ObjectRef,
  type PodSpec,
} from "../cluster/types.js";
import { waitForPodDeletion, waitForTerminalPhase, type TerminalPhase } from "./pod-wait.js";

export type EphemeralJob = Omit<PodSpec, "imagePullPolicy">;

export interface JobOutcome {
  phase: TerminalPhase;
  /** Trimmed, non-empty log lines. */
  lines: string[];
}

export interface EphemeralExecutorOptions {
  cluster: ClusterClient;
  pollIntervalMs: number;
  timeoutMs: number;
  imagePullPolicy?: PodSpec["imagePullPolicy"];
}

export function splitLogLines(log: string): string[] {
  return log
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Runs single-use pods. A pod left over under the same name is replaced, the
 * pod is polled to a terminal phase, its log is read once and the pod is
 * deleted again before the result is reported.
 */
export class EphemeralExecutor {
  private readonly log = createExecutorLogger();

  constructor(private readonly options: EphemeralExecutorOptions) {}

  /**
   * Runs `job` and hands its outcome to `consume`. The pod is removed whatever
   * `consume` decides; a removal failure fails the run unless `consume` or the
   * pod already failed it. On cancellation the pod is left for explicit cleanup.
   */
  async run<T>(
    ctx: CheckContext,
    job: EphemeralJob,
    consume: (outcome: JobOutcome) => T | Promise<T>,
  ): Promise<T> {
    const { cluster } = this.options;
    const ref: ObjectRef = { namespace: job.namespace, name: job.name };
    await this.replaceLeftover(ctx, ref);

    ctx.signal.throwIfAborted();
    await cluster.createPod({ ...job, imagePullPolicy: this.options.imagePullPolicy });
    this.log.info({ pod: refString(ref) }, `created ${refString(ref)} Pod`);

    let result: T;
    try {
      const phase = await waitForTerminalPhase(cluster, ref, this.pollOptions(ctx));
      const lines = splitLogLines(await cluster.readPodLog(ref));
      this.log.debug({ pod: refString(ref), phase, lines: lines.length }, "pod finished");
      result = await consume({ phase, lines });
    } catch (err) {
      if (!ctx.signal.aborted) {
        await this.remove(ctx, ref).catch((cleanupErr: unknown) => {
          this.log.error(
            { pod: refString(ref), error: errorMessage(cleanupErr) },
            "failed to delete pod after a failed check",
          );
        });
      }
      throw err;
    }
    await this.remove(ctx, ref);
    return result;
  }

  /** Full outcome of a job that may print several lines. */
  runToCompletion(ctx: CheckContext, job: EphemeralJob): Promise<JobOutcome> {
    return this.run(ctx, job, (outcome) => outcome);
  }

  /**
   * Runs a job that prints exactly one line: on success a `;`-separated
   * permission list that must contain every `expected` entry, on failure the
   * error detail.
   */
  async checkPermissions(
    ctx: CheckContext,
    job: EphemeralJob,
    expected: ReadonlySet<string>,
  ): Promise<void> {
    await this.run(ctx, job, ({ phase, lines }) => {
      if (lines.length !== 1) {
        throw VerificationError.protocol(
          "POD_OUTPUT_LINE_COUNT",
          `pod ${job.namespace}/${job.name} printed ${lines.length} lines, expected exactly 1`,
          { lines },
        );
      }
      const [line] = lines;
      if (phase === "Failed") {
        throw new VerificationError({
          kind: "CONFIGURATION",
          code: "CHECK_JOB_FAILED",
          message: `pod ${job.namespace}/${job.name} failed: ${line}`,
        });
      }
      const granted = new Set(line.split(";").map((p) => p.trim()));
      const missing = [...expected].filter((p) => !granted.has(p));
      if (missing.length > 0) {
        throw PermissionMismatchError.missing("MISSING_PERMISSIONS", missing);
      }
    });
  }

  /** Deletes the pod and waits until it is gone. Absent pods count as removed. */
  async remove(ctx: CheckContext, ref: ObjectRef): Promise<void> {
    try {
      await this.options.cluster.deletePod(ref);
      this.log.info({ pod: refString(ref) }, `deleted ${refString(ref)} Pod`);
    } catch (err) {
      if (!isNotFound(err)) {
        throw VerificationError.infrastructure(
          "POD_CLEANUP_FAILED",
          `failed to delete pod ${refString(ref)}: ${errorMessage(err)}`,
          err,
        );
      }
    }
    await waitForPodDeletion(this.options.cluster, ref, this.pollOptions(ctx));
  }

  private async replaceLeftover(ctx: CheckContext, ref: ObjectRef) {
    if ((await this.options.cluster.getPodPhase(ref)) === undefined) return;
    this.log.info({ pod: refString(ref) }, "replacing leftover pod");
    await this.remove(ctx, ref);
  }

  private pollOptions(ctx: CheckContext) {
    return {
      intervalMs: this.options.pollIntervalMs,
      timeoutMs: this.options.timeoutMs,
      signal: ctx.signal,
      log: this.log,
    };
  }
}
