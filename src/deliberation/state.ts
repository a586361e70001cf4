import type { PipelineState } from '../types/index.js';

const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  INIT: ['TOOLS', 'STAGE1', 'FAILED'],
  TOOLS: ['STAGE1', 'FAILED'],
  STAGE1: ['STAGE2', 'STAGE3', 'STAGE4', 'DONE', 'FAILED'],
  STAGE2: ['STAGE3', 'FAILED'],
  STAGE3: ['STAGE4', 'DONE', 'FAILED'],
  STAGE4: ['DONE', 'FAILED'],
  DONE: [],
  FAILED: [],
};

export class IllegalTransitionError extends Error {
  constructor(from: PipelineState, to: PipelineState) {
    super(`Illegal pipeline transition ${from} → ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

/** Pipeline state holder. Illegal transitions are programming errors and throw. */
export class PipelineStateMachine {
  private current: PipelineState = 'INIT';
  private readonly trail: PipelineState[] = ['INIT'];

  get state(): PipelineState {
    return this.current;
  }

  get path(): PipelineState[] {
    return [...this.trail];
  }

  canTransition(to: PipelineState): boolean {
    return TRANSITIONS[this.current].includes(to);
  }

  transition(to: PipelineState): void {
    if (!this.canTransition(to)) throw new IllegalTransitionError(this.current, to);
    this.current = to;
    this.trail.push(to);
  }

  isTerminal(): boolean {
    return this.current === 'DONE' || this.current === 'FAILED';
  }
}
