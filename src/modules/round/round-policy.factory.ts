import { GameVariant } from '../../common/interfaces/game-state.interface';
import { BuzzerRacePolicy } from './policies/buzzer-race.policy';
import { OpenAnswerPolicy } from './policies/open-answer.policy';
import { RoundPolicy, RoundTimings } from './round-policy.interface';

export function createRoundPolicy(
  variant: GameVariant,
  timings: RoundTimings,
): RoundPolicy {
  switch (variant) {
    case GameVariant.BUZZER_RACE:
      return new BuzzerRacePolicy(timings);
    case GameVariant.OPEN_ANSWER:
      return new OpenAnswerPolicy(timings);
  }
}
