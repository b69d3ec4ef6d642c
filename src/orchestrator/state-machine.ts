import { logger } from '../observability/logger';
import { turnStageTransitions } from '../observability/metrics';
import { StageTransition, TERMINAL_STAGES, TurnStage } from './types';

const NEXT_STAGE: Partial<Record<TurnStage, TurnStage>> = {
  RECEIVED: 'ADMITTED',
  ADMITTED: 'CLASSIFIED',
  CLASSIFIED: 'CONTEXT_RETRIEVED',
  CONTEXT_RETRIEVED: 'AGENT_EXECUTED',
  AGENT_EXECUTED: 'SCORED',
  SCORED: 'COMMITTED',
};

export function isTerminal(stage: TurnStage): boolean {
  return TERMINAL_STAGES.includes(stage);
}

export function canTransition(from: TurnStage, to: TurnStage): boolean {
  if (isTerminal(from)) return false;
  if (to === 'REJECTED') return from === 'RECEIVED';
  if (to === 'FAILED' || to === 'CANCELLED') return true;
  return NEXT_STAGE[from] === to;
}

export class IllegalStageTransition extends Error {
  constructor(readonly from: TurnStage, readonly to: TurnStage) {
    super(`Illegal turn transition ${from} -> ${to}`);
    this.name = 'IllegalStageTransition';
  }
}

/**
 * Tracks one attempt at a turn. A retry after a version conflict starts a
 * fresh machine at ADMITTED, since admission is not re-evaluated.
 */
export class TurnStateMachine {
  private current: TurnStage;
  private readonly visited: TurnStage[];
  private readonly transitions: StageTransition[] = [];

  constructor(
    private readonly conversationKey: string,
    private readonly requestId: string,
    readonly attempt = 1,
    initial: 'RECEIVED' | 'ADMITTED' = 'RECEIVED',
    private readonly now: () => number = Date.now,
  ) {
    this.current = initial;
    this.visited = [initial];
  }

  get stage(): TurnStage {
    return this.current;
  }

  get stages(): TurnStage[] {
    return [...this.visited];
  }

  get history(): StageTransition[] {
    return [...this.transitions];
  }

  get terminal(): boolean {
    return isTerminal(this.current);
  }

  advance(to: TurnStage): void {
    const from = this.current;
    if (!canTransition(from, to)) {
      logger.error({ conversationKey: this.conversationKey, requestId: this.requestId, from, to }, 'Illegal turn transition');
      throw new IllegalStageTransition(from, to);
    }

    this.current = to;
    this.visited.push(to);
    const event: StageTransition = {
      conversationKey: this.conversationKey,
      requestId: this.requestId,
      attempt: this.attempt,
      from,
      to,
      timestamp: this.now(),
    };
    this.transitions.push(event);
    turnStageTransitions.inc({ from, to });
    logger.debug(event, 'Turn transition');
  }
}
