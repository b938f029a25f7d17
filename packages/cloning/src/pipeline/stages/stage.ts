import type { StageResult } from "../../result";
import type { CloneContext, PipelineState } from "../context";

/**
 * One transition of the clone pipeline.
 */
export interface PipelineStage {
  /** Stage identifier, used in errors and logs */
  name: string;
  /** Progress message shown when the stage starts */
  description: string;
  /** State entered when the stage succeeds */
  completes: PipelineState;
  run(ctx: CloneContext): Promise<StageResult<void>>;
}
