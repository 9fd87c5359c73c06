import type {
  AggregateRanking,
  Label,
  Stage1Result,
  Stage2Result,
  Stage3Result,
} from '../council/stage-results.js';
import { PipelineError } from '../../shared/errors.js';
import type { LabelMap } from './anonymize.js';

export type PipelineState =
  | 'idle'
  | 'stage1_running'
  | 'stage1_done'
  | 'stage2_running'
  | 'stage2_done'
  | 'stage3_running'
  | 'stage3_done'
  | 'completed'
  | 'failed'
  | 'cancelled';

const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  idle: ['stage1_running'],
  stage1_running: ['stage1_done', 'failed', 'cancelled'],
  stage1_done: ['stage2_running'],
  stage2_running: ['stage2_done', 'cancelled'],
  stage2_done: ['stage3_running'],
  stage3_running: ['stage3_done', 'cancelled'],
  stage3_done: ['completed'],
  completed: [],
  failed: [],
  cancelled: [],
};

export interface CouncilRunResult {
  stage1: Stage1Result[];
  stage2: Stage2Result[];
  stage3: Stage3Result;
  labelMap: LabelMap;
  aggregateRankings: AggregateRanking[];
  notes: string[];
}

export type PipelineStep =
  | { state: 'stage1_running' | 'stage2_running' | 'stage3_running' }
  | { state: 'stage1_done'; stage1: Stage1Result[] }
  | {
      state: 'stage2_done';
      stage2: Stage2Result[];
      labelToModel: Record<Label, string>;
      aggregateRankings: AggregateRanking[];
    }
  | { state: 'stage3_done'; stage3: Stage3Result }
  | { state: 'completed'; result: CouncilRunResult }
  | { state: 'failed'; error: Error }
  | { state: 'cancelled'; error: Error };

/** One event per state change; `*_done` states carry that stage's output. */
export type PipelineTransition = PipelineStep & { runId: string };

export function canTransition(from: PipelineState, to: PipelineState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminalState(state: PipelineState): boolean {
  return TRANSITIONS[state].length === 0;
}

export class PipelineStateMachine {
  private current: PipelineState = 'idle';
  private readonly history: PipelineState[] = ['idle'];

  constructor(
    private readonly runId: string,
    private readonly emit: (event: PipelineTransition) => void,
  ) {}

  get state(): PipelineState {
    return this.current;
  }

  get visited(): readonly PipelineState[] {
    return this.history;
  }

  transition(step: PipelineStep): void {
    if (!canTransition(this.current, step.state)) {
      throw new PipelineError(`Illegal pipeline transition: ${this.current} -> ${step.state}`);
    }
    this.current = step.state;
    this.history.push(step.state);
    this.emit({ ...step, runId: this.runId });
  }
}
