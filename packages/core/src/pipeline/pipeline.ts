import { StageError } from "../internal/errors.js";
import { createPipelineLogger } from "../observability/logger.js";
import type { Logger } from "../observability/logger.js";
import type { CheckContext, Handler, StageId, StageValue } from "./handler.js";

export interface PipelineStage {
  stage: StageId;
  handler: Handler;
  /** Logged once the stage completes. */
  message: string;
}

/**
 * Runs stages strictly in order. The outputs of a stage are the inputs of the
 * next; the first failure stops the run and is labelled with its stage.
 */
export class Pipeline implements Handler {
  private readonly log: Logger;

  constructor(
    readonly name: string,
    private readonly stages: readonly PipelineStage[],
  ) {
    this.log = createPipelineLogger(name);
  }

  get stageIds(): StageId[] {
    return this.stages.map((s) => s.stage);
  }

  async handle(ctx: CheckContext, ...inputs: StageValue[]): Promise<StageValue[]> {
    let values = inputs;
    for (const { stage, handler, message } of this.stages) {
      try {
        ctx.signal.throwIfAborted();
        values = await handler.handle(ctx, ...values);
      } catch (err) {
        this.log.error({ stage, err }, "stage failed");
        throw err instanceof StageError && err.stage === stage ? err : new StageError(stage, err);
      }
      this.log.info({ stage }, message);
    }
    return values;
  }
}
