/**
 * Pipeline stage state machine.
 *
 *   idle -> researching -> writing -> editing -> optimizing
 *        -> illustrating -> publishing -> completed
 *
 * Forward moves may skip stages that have no roster. failed and aborted
 * are reachable from every non-terminal stage. Terminal stages are final.
 */

import { InvalidTransitionError } from "../errors/index.js";
import { systemClock, type Clock } from "../types/clock.js";
import { PipelineStage, TERMINAL_STAGES, WORK_STAGES } from "../types/pipeline.js";

const FORWARD_ORDER: readonly PipelineStage[] = [
  PipelineStage.Idle,
  ...WORK_STAGES,
  PipelineStage.Completed,
];

export interface StageTransition {
  readonly from: PipelineStage;
  readonly to: PipelineStage;
  readonly at: number;
}

export function isTerminal(stage: PipelineStage): boolean {
  return TERMINAL_STAGES.has(stage);
}

export function canTransition(from: PipelineStage, to: PipelineStage): boolean {
  if (isTerminal(from)) {
    return false;
  }
  if (to === PipelineStage.Failed || to === PipelineStage.Aborted) {
    return true;
  }
  const fromIndex = FORWARD_ORDER.indexOf(from);
  const toIndex = FORWARD_ORDER.indexOf(to);
  // Completed needs at least one work stage behind it
  if (to === PipelineStage.Completed && from === PipelineStage.Idle) {
    return false;
  }
  return toIndex > fromIndex;
}

export class StageMachine {
  private state: PipelineStage = PipelineStage.Idle;
  private readonly log: StageTransition[] = [];

  constructor(private readonly clock: Clock = systemClock) {}

  get current(): PipelineStage {
    return this.state;
  }

  get terminal(): boolean {
    return isTerminal(this.state);
  }

  get history(): readonly StageTransition[] {
    return this.log;
  }

  /**
   * @throws InvalidTransitionError when the move is not allowed
   */
  transition(to: PipelineStage): StageTransition {
    if (!canTransition(this.state, to)) {
      throw new InvalidTransitionError(this.state, to);
    }
    const step: StageTransition = { from: this.state, to, at: this.clock.now() };
    this.state = to;
    this.log.push(step);
    return step;
  }
}
