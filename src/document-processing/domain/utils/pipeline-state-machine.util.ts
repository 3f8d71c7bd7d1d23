import { PipelineStage } from '../enums/pipeline-stage.enum';

/**
 * Pipeline State Machine Utility
 *
 * Valid Transitions:
 * - RECEIVED → EXTRACTED → CLASSIFIED → STORED → DONE
 * - RECEIVED → FAILED (validation or extraction failure)
 * - EXTRACTED → FAILED (cancelled before classification)
 * - CLASSIFIED → FAILED (storage failure or cancellation)
 *
 * A degraded classification still moves EXTRACTED → CLASSIFIED.
 * DONE and FAILED are terminal.
 */
export class PipelineStateMachine {
  private static readonly VALID_TRANSITIONS: Map<
    PipelineStage,
    PipelineStage[]
  > = new Map([
    [PipelineStage.RECEIVED, [PipelineStage.EXTRACTED, PipelineStage.FAILED]],
    [PipelineStage.EXTRACTED, [PipelineStage.CLASSIFIED, PipelineStage.FAILED]],
    [PipelineStage.CLASSIFIED, [PipelineStage.STORED, PipelineStage.FAILED]],
    [PipelineStage.STORED, [PipelineStage.DONE]],
  ]);

  static isValidTransition(from: PipelineStage, to: PipelineStage): boolean {
    const validTargets = this.VALID_TRANSITIONS.get(from);
    if (!validTargets) {
      return false;
    }

    return validTargets.includes(to);
  }

  /**
   * @throws Error if the transition is not allowed; this is a programming
   * error in the pipeline, never a client error
   */
  static validateTransition(from: PipelineStage, to: PipelineStage): void {
    if (!this.isValidTransition(from, to)) {
      throw new Error(
        `Invalid pipeline transition: ${from} → ${to}. ` +
          `Valid transitions from ${from}: ${this.getValidTargetStates(from).join(', ') || 'none'}`,
      );
    }
  }

  static getValidTargetStates(from: PipelineStage): PipelineStage[] {
    return this.VALID_TRANSITIONS.get(from) || [];
  }

  static isTerminal(stage: PipelineStage): boolean {
    return stage === PipelineStage.DONE || stage === PipelineStage.FAILED;
  }
}

/**
 * Tracks one document's progress and the time spent reaching each stage.
 */
export class PipelineTracker {
  private current = PipelineStage.RECEIVED;
  private lastMark: number;
  private readonly timings: Partial<Record<PipelineStage, number>> = {};

  constructor(private readonly now: () => number = Date.now) {
    this.lastMark = this.now();
  }

  get stage(): PipelineStage {
    return this.current;
  }

  advance(to: PipelineStage): void {
    PipelineStateMachine.validateTransition(this.current, to);
    const at = this.now();
    this.timings[to] = at - this.lastMark;
    this.lastMark = at;
    this.current = to;
  }

  fail(): void {
    PipelineStateMachine.validateTransition(this.current, PipelineStage.FAILED);
    this.current = PipelineStage.FAILED;
  }

  getTimings(): Partial<Record<PipelineStage, number>> {
    return { ...this.timings };
  }
}
