import {
  ContestPhase,
  GameVariant,
  LeadInPhase,
  RoundContext,
  RoundOutcome,
} from '../../common/interfaces/game-state.interface';
import { ContestAction } from '../../common/interfaces/player-action.interface';
import { PlayerId } from '../../common/interfaces/player.interface';

/** All durations in milliseconds. A limit of null never expires. */
export interface RoundTimings {
  readingMs: number;
  buzzerWindowMs: number | null;
  buzzerPauseMs: number;
  answerMs: number;
  countdownSteps: number;
  countdownStepMs: number;
  questionMs: number;
  resultMs: number;
}

export interface PhaseEntry<P> {
  phase: P;
  limitMs: number | null;
}

/**
 * What the policy wants the engine to do after an action or a timer.
 */
export type PolicyStep =
  | { kind: 'ignore' }
  | { kind: 'buzzer-claimed'; player: PlayerId; next: PhaseEntry<ContestPhase> }
  | { kind: 'player-locked'; player: PlayerId }
  | { kind: 'advance'; next: PhaseEntry<ContestPhase> }
  | {
      kind: 'resolve';
      outcome: RoundOutcome;
      winner: PlayerId | null;
      responder: PlayerId | null;
    };

/**
 * Contest rules plugged into the shared round skeleton. Policies mutate the
 * per-player round state on the context they are given; the engine owns the
 * phase, the timers and the winner.
 */
export interface RoundPolicy {
  readonly variant: GameVariant;

  leadIn(): PhaseEntry<LeadInPhase>;

  onAction(
    round: RoundContext,
    phase: ContestPhase,
    action: ContestAction,
  ): PolicyStep;

  onExpired(round: RoundContext, phase: LeadInPhase | ContestPhase): PolicyStep;

  /** Digit to display during the lead-in, if the policy counts down. */
  countdown(phase: LeadInPhase, remainingMs: number): number | null;
}
