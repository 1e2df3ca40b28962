import { PlayerId } from './player.interface';
import { Level } from './question.interface';

/**
 * Decoded input. Mapping keys, pads or buttons to these values happens
 * outside the server.
 */
export type PlayerAction =
  | { type: 'CLAIM_BUZZER'; player: PlayerId }
  | { type: 'SELECT_OPTION'; player: PlayerId; optionIndex: number }
  | { type: 'SKIP'; player: PlayerId }
  | { type: 'SELECT_LEVEL'; level: Level }
  | { type: 'CANCEL' }
  | { type: 'RESTART' };

export type ContestAction = Extract<
  PlayerAction,
  { type: 'CLAIM_BUZZER' | 'SELECT_OPTION' | 'SKIP' }
>;
