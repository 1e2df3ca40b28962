import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { GAME_CONFIG } from '../../common/constants/game.constants';
import { ACTUATOR_PORT } from '../../common/constants/injection-tokens';
import { ActuatorMode } from '../../config/env.validation';
import { ActuatorPort } from './actuator.port';
import { RedisActuator } from './redis-actuator';
import { SimulatedActuator } from './simulated-actuator';

export function createActuator(configService: ConfigService): ActuatorPort {
  const mode = configService.get<ActuatorMode>(
    'ACTUATOR_MODE',
    ActuatorMode.SIMULATED,
  );

  if (mode === ActuatorMode.REDIS) {
    const redisUrl = configService.getOrThrow<string>('REDIS_URL');
    const channel = configService.get<string>(
      'ROBOT_CHANNEL',
      GAME_CONFIG.ROBOT_CHANNEL,
    );
    new Logger('ActuatorModule').log(`Robot commands go to ${channel}`);
    return new RedisActuator(new Redis(redisUrl), channel);
  }

  return new SimulatedActuator();
}

@Module({
  providers: [
    {
      provide: ACTUATOR_PORT,
      inject: [ConfigService],
      useFactory: createActuator,
    },
  ],
  exports: [ACTUATOR_PORT],
})
export class ActuatorModule {}
