import { plainToInstance } from 'class-transformer';
import {
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateIf,
  validateSync,
} from 'class-validator';
import { GAME_CONFIG } from '../common/constants/game.constants';
import { GameVariant } from '../common/interfaces/game-state.interface';

export enum ActuatorMode {
  SIMULATED = 'simulated',
  REDIS = 'redis',
}

export class EnvironmentVariables {
  @IsInt()
  @Min(0)
  @Max(65535)
  PORT: number = 3000;

  @IsString()
  CORS_ORIGIN: string = '*';

  @IsEnum(GameVariant)
  GAME_VARIANT: GameVariant = GameVariant.BUZZER_RACE;

  @IsInt()
  @Min(0)
  READING_TIME_MS: number = GAME_CONFIG.READING_TIME_LIMIT;

  @IsInt()
  @Min(0)
  BUZZER_WINDOW_MS: number = GAME_CONFIG.BUZZER_WINDOW;

  @IsInt()
  @Min(0)
  BUZZER_PAUSE_MS: number = GAME_CONFIG.BUZZER_PAUSE_DURATION;

  @IsInt()
  @Min(1)
  ANSWER_TIME_MS: number = GAME_CONFIG.ANSWER_TIME_LIMIT;

  @IsInt()
  @Min(1)
  COUNTDOWN_STEPS: number = GAME_CONFIG.COUNTDOWN_STEPS;

  @IsInt()
  @Min(1)
  COUNTDOWN_STEP_MS: number = GAME_CONFIG.COUNTDOWN_STEP_DURATION;

  @IsInt()
  @Min(1)
  QUESTION_TIME_MS: number = GAME_CONFIG.QUESTION_TIME_LIMIT;

  @IsInt()
  @Min(0)
  RESULT_PAUSE_MS: number = GAME_CONFIG.RESULT_PAUSE_DURATION;

  @IsInt()
  @Min(1)
  @Max(GAME_CONFIG.FINISH_LINE)
  TRACK_INCREMENT: number = GAME_CONFIG.TRACK_INCREMENT;

  @IsInt()
  @Min(1)
  @Max(240)
  TICK_RATE_HZ: number = GAME_CONFIG.TICK_RATE_HZ;

  @IsOptional()
  @IsInt()
  RANDOM_SEED?: number;

  @IsOptional()
  @IsString()
  QUESTIONS_FILE?: string;

  @IsEnum(ActuatorMode)
  ACTUATOR_MODE: ActuatorMode = ActuatorMode.SIMULATED;

  @ValidateIf((env: EnvironmentVariables) => env.ACTUATOR_MODE === ActuatorMode.REDIS)
  @IsString()
  @IsNotEmpty()
  REDIS_URL?: string;

  @IsString()
  @IsNotEmpty()
  ROBOT_CHANNEL: string = GAME_CONFIG.ROBOT_CHANNEL;
}

export function validate(config: Record<string, unknown>): EnvironmentVariables {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig);

  if (errors.length > 0) {
    throw new Error(errors.toString());
  }
  return validatedConfig;
}
