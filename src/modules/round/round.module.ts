import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  ROUND_POLICY,
  ROUND_TIMINGS,
} from '../../common/constants/injection-tokens';
import { GameVariant } from '../../common/interfaces/game-state.interface';
import { roundTimingsFromConfig } from '../../config/round-timings';
import { createRoundPolicy } from './round-policy.factory';
import { RoundTimings } from './round-policy.interface';

@Module({
  providers: [
    {
      provide: ROUND_TIMINGS,
      inject: [ConfigService],
      useFactory: roundTimingsFromConfig,
    },
    {
      provide: ROUND_POLICY,
      inject: [ConfigService, ROUND_TIMINGS],
      useFactory: (configService: ConfigService, timings: RoundTimings) =>
        createRoundPolicy(
          configService.get<GameVariant>(
            'GAME_VARIANT',
            GameVariant.BUZZER_RACE,
          ),
          timings,
        ),
    },
  ],
  exports: [ROUND_TIMINGS, ROUND_POLICY],
})
export class RoundModule {}
