import {
  ContestPhase,
  GameVariant,
  LeadInPhase,
  Phase,
  RoundContext,
  RoundOutcome,
} from '../../../common/interfaces/game-state.interface';
import { ContestAction } from '../../../common/interfaces/player-action.interface';
import { PlayerRoundStatus } from '../../../common/interfaces/player.interface';
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
 * Reading, then a buzzer. The first player to press gets the only attempt
 * at the question and may answer or skip before the answer timer runs out.
 */
export class BuzzerRacePolicy implements RoundPolicy {
  readonly variant = GameVariant.BUZZER_RACE;

  constructor(private readonly timings: RoundTimings) {}

  leadIn(): PhaseEntry<LeadInPhase> {
    return { phase: Phase.READING, limitMs: this.timings.readingMs };
  }

  onAction(
    round: RoundContext,
    phase: ContestPhase,
    action: ContestAction,
  ): PolicyStep {
    if (action.type === 'CLAIM_BUZZER') {
      if (phase !== Phase.BUZZER || round.buzzerWinner !== null) {
        return IGNORE;
      }
      return {
        kind: 'buzzer-claimed',
        player: action.player,
        next: { phase: Phase.BUZZER_PAUSE, limitMs: this.timings.buzzerPauseMs },
      };
    }

    // Answering belongs to the buzzer winner alone
    if (phase !== Phase.ANSWERING || action.player !== round.buzzerWinner) {
      return IGNORE;
    }

    if (action.type === 'SKIP') {
      round.players[action.player] = PlayerRoundStatus.SKIPPED;
      return {
        kind: 'resolve',
        outcome: RoundOutcome.SKIPPED,
        winner: null,
        responder: action.player,
      };
    }

    const option = selectedOption(round, action.optionIndex);
    if (option === null) {
      return IGNORE;
    }

    if (isCorrectAnswer(round.question, option)) {
      round.players[action.player] = PlayerRoundStatus.CORRECT;
      return {
        kind: 'resolve',
        outcome: RoundOutcome.CORRECT,
        winner: action.player,
        responder: action.player,
      };
    }

    round.players[action.player] = PlayerRoundStatus.INCORRECT;
    return {
      kind: 'resolve',
      outcome: RoundOutcome.INCORRECT,
      winner: null,
      responder: action.player,
    };
  }

  onExpired(round: RoundContext, phase: LeadInPhase | ContestPhase): PolicyStep {
    switch (phase) {
      case Phase.READING:
        return {
          kind: 'advance',
          next: { phase: Phase.BUZZER, limitMs: this.timings.buzzerWindowMs },
        };
      case Phase.BUZZER:
        // Only reachable when the buzzer window is limited
        return {
          kind: 'resolve',
          outcome: RoundOutcome.TIMEOUT,
          winner: null,
          responder: null,
        };
      case Phase.BUZZER_PAUSE:
        return {
          kind: 'advance',
          next: { phase: Phase.ANSWERING, limitMs: this.timings.answerMs },
        };
      case Phase.ANSWERING:
        if (round.buzzerWinner !== null) {
          round.players[round.buzzerWinner] = PlayerRoundStatus.TIMED_OUT;
        }
        return {
          kind: 'resolve',
          outcome: RoundOutcome.TIMEOUT,
          winner: null,
          responder: round.buzzerWinner,
        };
      default:
        return IGNORE;
    }
  }

  countdown(): number | null {
    return null;
  }
}
