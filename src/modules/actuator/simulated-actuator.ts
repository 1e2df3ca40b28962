import { Logger } from '@nestjs/common';
import { PlayerId } from '../../common/interfaces/player.interface';
import { ActuatorPort } from './actuator.port';

/**
 * Stands in for the robots when no hardware bridge is attached.
 */
export class SimulatedActuator implements ActuatorPort {
  private readonly logger = new Logger(SimulatedActuator.name);

  advance(player: PlayerId, distance: number): void {
    this.logger.log(`[simulated] ${player} robot advances ${distance} units`);
  }

  celebrate(player: PlayerId): void {
    this.logger.log(`[simulated] ${player} robot celebrates`);
  }
}
