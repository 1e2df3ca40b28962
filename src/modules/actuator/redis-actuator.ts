import { Logger, OnModuleDestroy } from '@nestjs/common';
import { PlayerId } from '../../common/interfaces/player.interface';
import { ActuatorPort, RobotCommand } from './actuator.port';

/**
 * The subset of the ioredis client used to reach the robot bridge.
 */
export interface RobotPublisher {
  publish(channel: string, message: string): Promise<number>;
  disconnect(): void;
}

/**
 * Publishes robot commands on a Redis channel. A separate bridge process
 * subscribed to the channel drives the motors.
 */
export class RedisActuator implements ActuatorPort, OnModuleDestroy {
  private readonly logger = new Logger(RedisActuator.name);

  constructor(
    private readonly publisher: RobotPublisher,
    private readonly channel: string,
  ) {}

  async advance(player: PlayerId, distance: number): Promise<void> {
    await this.send({ type: 'advance', player, distance });
  }

  async celebrate(player: PlayerId): Promise<void> {
    await this.send({ type: 'celebrate', player });
  }

  onModuleDestroy() {
    this.publisher.disconnect();
  }

  private async send(command: RobotCommand): Promise<void> {
    const receivers = await this.publisher.publish(
      this.channel,
      JSON.stringify(command),
    );

    if (receivers === 0) {
      this.logger.warn(`No robot bridge listening on ${this.channel}`);
    }
  }
}
