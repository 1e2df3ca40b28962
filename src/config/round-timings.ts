import { ConfigService } from '@nestjs/config';
import { GAME_CONFIG } from '../common/constants/game.constants';
import { RoundTimings } from '../modules/round/round-policy.interface';

export function roundTimingsFromConfig(
  configService: ConfigService,
): RoundTimings {
  const buzzerWindowMs = configService.get<number>(
    'BUZZER_WINDOW_MS',
    GAME_CONFIG.BUZZER_WINDOW,
  );

  return {
    readingMs: configService.get<number>(
      'READING_TIME_MS',
      GAME_CONFIG.READING_TIME_LIMIT,
    ),
    buzzerWindowMs: buzzerWindowMs > 0 ? buzzerWindowMs : null,
    buzzerPauseMs: configService.get<number>(
      'BUZZER_PAUSE_MS',
      GAME_CONFIG.BUZZER_PAUSE_DURATION,
    ),
    answerMs: configService.get<number>(
      'ANSWER_TIME_MS',
      GAME_CONFIG.ANSWER_TIME_LIMIT,
    ),
    countdownSteps: configService.get<number>(
      'COUNTDOWN_STEPS',
      GAME_CONFIG.COUNTDOWN_STEPS,
    ),
    countdownStepMs: configService.get<number>(
      'COUNTDOWN_STEP_MS',
      GAME_CONFIG.COUNTDOWN_STEP_DURATION,
    ),
    questionMs: configService.get<number>(
      'QUESTION_TIME_MS',
      GAME_CONFIG.QUESTION_TIME_LIMIT,
    ),
    resultMs: configService.get<number>(
      'RESULT_PAUSE_MS',
      GAME_CONFIG.RESULT_PAUSE_DURATION,
    ),
  };
}

export const DEFAULT_ROUND_TIMINGS: RoundTimings = {
  readingMs: GAME_CONFIG.READING_TIME_LIMIT,
  buzzerWindowMs: null,
  buzzerPauseMs: GAME_CONFIG.BUZZER_PAUSE_DURATION,
  answerMs: GAME_CONFIG.ANSWER_TIME_LIMIT,
  countdownSteps: GAME_CONFIG.COUNTDOWN_STEPS,
  countdownStepMs: GAME_CONFIG.COUNTDOWN_STEP_DURATION,
  questionMs: GAME_CONFIG.QUESTION_TIME_LIMIT,
  resultMs: GAME_CONFIG.RESULT_PAUSE_DURATION,
};
