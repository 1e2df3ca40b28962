import {
  ContestPhase,
  GameVariant,
  LeadInPhase,
  Phase,
  RoundContext,
  RoundOutcome,
} from '../../../common/interfaces/game-state.interface';
import { ContestAction } from '../../../common/interfaces/player-action.interface';
import {
  PLAYER_IDS,
  PlayerRoundStatus,
} from '../../../common/interfaces/player.interface';
import { isCorrectAnswer } from '../../../common/interfaces/question.interface';
import {
  PhaseEntry,
  PolicyStep,
  RoundPolicy,
  RoundTimings,
} from '../round-policy.interface';
import { selectedOption } from './selected-option';

const IGNORE: PolicyStep = { kind: 'ignore' };

/**
 * A 3-2-1 countdown, then both players answer the same question against one
 * timer. A wrong answer locks that player out of the round; the first
 * correct answer takes the point.
 */
export class OpenAnswerPolicy implements RoundPolicy {
  readonly variant = GameVariant.OPEN_ANSWER;

  constructor(private readonly timings: RoundTimings) {}

  leadIn(): PhaseEntry<LeadInPhase> {
    return {
      phase: Phase.COUNTDOWN,
      limitMs: this.timings.countdownSteps * this.timings.countdownStepMs,
    };
  }

  onAction(
    round: RoundContext,
    phase: ContestPhase,
    action: ContestAction,
  ): PolicyStep {
    if (phase !== Phase.QUESTION || action.type !== 'SELECT_OPTION') {
      return IGNORE;
    }

    const { player } = action;
    if (round.players[player] !== PlayerRoundStatus.UNATTEMPTED) {
      return IGNORE;
    }

    const option = selectedOption(round, action.optionIndex);
    if (option === null) {
      return IGNORE;
    }

    if (isCorrectAnswer(round.question, option)) {
      round.players[player] = PlayerRoundStatus.CORRECT;
      return {
        kind: 'resolve',
        outcome: RoundOutcome.CORRECT,
        winner: player,
        responder: player,
      };
    }

    round.players[player] = PlayerRoundStatus.LOCKED;

    const everyoneLocked = PLAYER_IDS.every(
      (id) => round.players[id] === PlayerRoundStatus.LOCKED,
    );
    if (everyoneLocked) {
      return {
        kind: 'resolve',
        outcome: RoundOutcome.ALL_LOCKED,
        winner: null,
        responder: player,
      };
    }

    return { kind: 'player-locked', player };
  }

  onExpired(round: RoundContext, phase: LeadInPhase | ContestPhase): PolicyStep {
    switch (phase) {
      case Phase.COUNTDOWN:
        return {
          kind: 'advance',
          next: { phase: Phase.QUESTION, limitMs: this.timings.questionMs },
        };
      case Phase.QUESTION:
        for (const id of PLAYER_IDS) {
          if (round.players[id] === PlayerRoundStatus.UNATTEMPTED) {
            round.players[id] = PlayerRoundStatus.TIMED_OUT;
          }
        }
        return {
          kind: 'resolve',
          outcome: RoundOutcome.TIMEOUT,
          winner: null,
          responder: null,
        };
      default:
        return IGNORE;
    }
  }

  countdown(phase: LeadInPhase, remainingMs: number): number | null {
    if (phase !== Phase.COUNTDOWN) {
      return null;
    }
    return Math.max(1, Math.ceil(remainingMs / this.timings.countdownStepMs));
  }
}
