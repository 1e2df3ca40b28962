import { PlayerId } from '../../common/interfaces/player.interface';

/**
 * Robot movement sink. Calls are fire-and-forget: callers never wait for the
 * returned promise, and a failure here must not affect the game.
 */
export interface ActuatorPort {
  advance(player: PlayerId, distance: number): void | Promise<void>;
  celebrate(player: PlayerId): void | Promise<void>;
}

export type RobotCommand =
  | { type: 'advance'; player: PlayerId; distance: number }
  | { type: 'celebrate'; player: PlayerId };
