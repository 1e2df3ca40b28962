export type PlayerId = 'P1' | 'P2';

export const PLAYER_IDS: readonly PlayerId[] = ['P1', 'P2'];

export enum PlayerRoundStatus {
  UNATTEMPTED = 'UNATTEMPTED',
  LOCKED = 'LOCKED',
  CORRECT = 'CORRECT',
  INCORRECT = 'INCORRECT',
  SKIPPED = 'SKIPPED',
  TIMED_OUT = 'TIMED_OUT',
}

export interface PlayerMatchState {
  score: number;
  trackPosition: number;
}
