import { ItineraError } from "../errors.js";
import type { PipelineStage } from "./types.js";

const TRANSITIONS: Record<PipelineStage, readonly PipelineStage[]> = {
  decomposing: ["dispatching", "failed"],
  dispatching: ["aggregating"],
  aggregating: ["done"],
  done: [],
  failed: []
};

/**
 * Linear pipeline: decomposing -> dispatching -> aggregating -> done.
 * Only decomposition can fail the run.
 */
export class PipelineStateMachine {
  private current: PipelineStage = "decomposing";
  private readonly history: PipelineStage[] = ["decomposing"];

  get stage(): PipelineStage {
    return this.current;
  }

  /** Every stage entered so far, in order */
  get stages(): PipelineStage[] {
    return [...this.history];
  }

  get isTerminal(): boolean {
    return TRANSITIONS[this.current].length === 0;
  }

  canTransition(to: PipelineStage): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: PipelineStage): void {
    if (!this.canTransition(to)) {
      throw new ItineraError("INVALID_TRANSITION", `Cannot move from ${this.current} to ${to}`, {
        from: this.current,
        to
      });
    }
    this.current = to;
    this.history.push(to);
  }
}
