import { Logger } from '@nestjs/common';
import {
  ContestPhase,
  Epoch,
  GameVariant,
  LeadInPhase,
  Phase,
  RoundContext,
  RoundEvent,
  RoundPhase,
  RoundSnapshot,
} from '../../common/interfaces/game-state.interface';
import { ContestAction } from '../../common/interfaces/player-action.interface';
import { PlayerRoundStatus } from '../../common/interfaces/player.interface';
import { OptionSet, Question } from '../../common/interfaces/question.interface';
import { PolicyStep, RoundPolicy } from './round-policy.interface';

interface ActivePhase {
  phase: RoundPhase;
  enteredAt: number;
  limitMs: number | null;
}

export function isLeadInPhase(phase: RoundPhase): phase is LeadInPhase {
  return phase === Phase.READING || phase === Phase.COUNTDOWN;
}

export function isContestPhase(phase: RoundPhase): phase is ContestPhase {
  return (
    phase === Phase.BUZZER ||
    phase === Phase.BUZZER_PAUSE ||
    phase === Phase.ANSWERING ||
    phase === Phase.QUESTION
  );
}

export function epochOf(phase: RoundPhase): Epoch {
  if (isLeadInPhase(phase)) {
    return Epoch.LEAD_IN;
  }
  return isContestPhase(phase) ? Epoch.CONTEST : Epoch.RESOLUTION;
}

/**
 * Phase skeleton for a single question: lead-in, contest, resolution.
 *
 * Time is never read from a clock; every call carries `now`, a monotonic
 * timestamp in milliseconds. Each phase expires at most once because the
 * phase that replaces it starts its own timer at the moment of the
 * transition.
 */
export class RoundEngine {
  private readonly logger = new Logger(RoundEngine.name);
  private round: RoundContext | null = null;
  private current: ActivePhase | null = null;

  constructor(
    private readonly policy: RoundPolicy,
    private readonly resultMs: number,
  ) {}

  get variant(): GameVariant {
    return this.policy.variant;
  }

  get context(): Readonly<RoundContext> | null {
    return this.round;
  }

  get phase(): RoundPhase | null {
    return this.current?.phase ?? null;
  }

  get isActive(): boolean {
    return this.round !== null;
  }

  start(question: Question, options: OptionSet, now: number): RoundEvent[] {
    this.round = {
      question,
      options,
      players: {
        P1: PlayerRoundStatus.UNATTEMPTED,
        P2: PlayerRoundStatus.UNATTEMPTED,
      },
      buzzerWinner: null,
      roundWinner: null,
      outcome: null,
      phaseEnteredAt: now,
    };
    this.current = null;

    const entry = this.policy.leadIn();
    return [this.enter(this.round, entry.phase, entry.limitMs, now)];
  }

  /**
   * Apply a player action. Outside the contest epoch this is a no-op.
   */
  handle(action: ContestAction, now: number): RoundEvent[] {
    const round = this.round;
    const current = this.current;

    if (!round || !current || !isContestPhase(current.phase)) {
      return [];
    }

    return this.apply(
      round,
      this.policy.onAction(round, current.phase, action),
      now,
    );
  }

  /**
   * Fire the current phase's timer if it has run out.
   */
  tick(now: number): RoundEvent[] {
    const round = this.round;
    const current = this.current;

    if (!round || !current) {
      return [];
    }

    const remaining = this.remainingMs(current, now);
    if (remaining === null || remaining > 0) {
      return [];
    }

    if (current.phase === Phase.RESULT) {
      this.abort();
      return [{ type: 'ROUND_COMPLETE' }];
    }

    return this.apply(round, this.policy.onExpired(round, current.phase), now);
  }

  timeRemaining(now: number): number | null {
    return this.current ? this.remainingMs(this.current, now) : null;
  }

  /** Drop the current round without resolving it. */
  abort(): void {
    this.round = null;
    this.current = null;
  }

  snapshot(now: number): RoundSnapshot | null {
    const round = this.round;
    const current = this.current;

    if (!round || !current) {
      return null;
    }

    const remaining = this.remainingMs(current, now);
    const resolved = current.phase === Phase.RESULT;

    return {
      questionId: round.question.id,
      prompt: round.question.prompt,
      options: round.options,
      phase: current.phase,
      epoch: epochOf(current.phase),
      timeRemainingMs: remaining,
      countdown:
        isLeadInPhase(current.phase) && remaining !== null
          ? this.policy.countdown(current.phase, remaining)
          : null,
      buzzerWinner: round.buzzerWinner,
      roundWinner: round.roundWinner,
      outcome: round.outcome,
      correctAnswer: resolved ? round.question.correctAnswer : null,
    };
  }

  private apply(
    round: RoundContext,
    step: PolicyStep,
    now: number,
  ): RoundEvent[] {
    switch (step.kind) {
      case 'ignore':
        return [];

      case 'player-locked':
        this.logger.debug(`${step.player} locked out of ${round.question.id}`);
        return [{ type: 'PLAYER_LOCKED', player: step.player }];

      case 'buzzer-claimed':
        round.buzzerWinner = step.player;
        this.logger.log(`${step.player} pressed the buzzer first`);
        return [
          { type: 'BUZZER_CLAIMED', player: step.player },
          this.enter(round, step.next.phase, step.next.limitMs, now),
        ];

      case 'advance':
        return [this.enter(round, step.next.phase, step.next.limitMs, now)];

      case 'resolve': {
        round.outcome = step.outcome;
        round.roundWinner = step.winner;
        this.logger.log(
          `Question ${round.question.id} resolved: ${step.outcome}${step.winner ? ` (${step.winner})` : ''}`,
        );
        return [
          this.enter(round, Phase.RESULT, this.resultMs, now),
          {
            type: 'ROUND_RESOLVED',
            resolution: {
              outcome: step.outcome,
              roundWinner: step.winner,
              responder: step.responder,
              correctAnswer: round.question.correctAnswer,
            },
          },
        ];
      }
    }
  }

  private enter(
    round: RoundContext,
    phase: RoundPhase,
    limitMs: number | null,
    now: number,
  ): RoundEvent {
    const previous = this.current?.phase ?? null;
    this.current = { phase, enteredAt: now, limitMs };
    round.phaseEnteredAt = now;
    return { type: 'PHASE_CHANGED', phase, previous };
  }

  private remainingMs(current: ActivePhase, now: number): number | null {
    if (current.limitMs === null) {
      return null;
    }
    return Math.max(0, current.limitMs - (now - current.enteredAt));
  }
}
