import { PlayerId, PlayerMatchState, PlayerRoundStatus } from './player.interface';
import { Level, OptionSet, Question } from './question.interface';

export enum GameVariant {
  BUZZER_RACE = 'BUZZER_RACE',
  OPEN_ANSWER = 'OPEN_ANSWER',
}

export enum Phase {
  MENU = 'MENU',
  // Lead-in
  READING = 'READING',
  COUNTDOWN = 'COUNTDOWN',
  // Contest
  BUZZER = 'BUZZER',
  BUZZER_PAUSE = 'BUZZER_PAUSE',
  ANSWERING = 'ANSWERING',
  QUESTION = 'QUESTION',
  // Resolution
  RESULT = 'RESULT',
  FINISHED = 'FINISHED',
}

export type LeadInPhase = Phase.READING | Phase.COUNTDOWN;
export type ContestPhase =
  | Phase.BUZZER
  | Phase.BUZZER_PAUSE
  | Phase.ANSWERING
  | Phase.QUESTION;
export type RoundPhase = LeadInPhase | ContestPhase | Phase.RESULT;

export enum Epoch {
  LEAD_IN = 'LEAD_IN',
  CONTEST = 'CONTEST',
  RESOLUTION = 'RESOLUTION',
}

export enum RoundOutcome {
  CORRECT = 'CORRECT',
  INCORRECT = 'INCORRECT',
  SKIPPED = 'SKIPPED',
  TIMEOUT = 'TIMEOUT',
  ALL_LOCKED = 'ALL_LOCKED',
}

export interface RoundContext {
  question: Question;
  options: OptionSet;
  players: Record<PlayerId, PlayerRoundStatus>;
  buzzerWinner: PlayerId | null;
  roundWinner: PlayerId | null;
  outcome: RoundOutcome | null;
  phaseEnteredAt: number;
}

export interface RoundResolution {
  outcome: RoundOutcome;
  roundWinner: PlayerId | null;
  /** The player whose action (or silence) ended the round, if any. */
  responder: PlayerId | null;
  correctAnswer: string;
}

export type RoundEvent =
  | { type: 'PHASE_CHANGED'; phase: RoundPhase; previous: RoundPhase | null }
  | { type: 'BUZZER_CLAIMED'; player: PlayerId }
  | { type: 'PLAYER_LOCKED'; player: PlayerId }
  | { type: 'ROUND_RESOLVED'; resolution: RoundResolution }
  | { type: 'ROUND_COMPLETE' };

export enum MatchEndReason {
  TRACK_COMPLETE = 'TRACK_COMPLETE',
  BANK_EXHAUSTED = 'BANK_EXHAUSTED',
}

export interface MatchResult {
  /** null means a draw */
  winner: PlayerId | null;
  reason: MatchEndReason;
  scores: Record<PlayerId, number>;
}

export type SessionEvent =
  | RoundEvent
  | { type: 'MATCH_STARTED'; matchId: string; level: Level; questionCount: number }
  | { type: 'QUESTION_STARTED'; questionNumber: number; questionId: string }
  | { type: 'SCORE_CHANGED'; player: PlayerId; state: PlayerMatchState }
  | { type: 'MATCH_FINISHED'; result: MatchResult }
  | { type: 'RETURNED_TO_MENU' };

export interface RoundSnapshot {
  questionId: string;
  prompt: string;
  options: OptionSet;
  phase: RoundPhase;
  epoch: Epoch;
  timeRemainingMs: number | null;
  countdown: number | null;
  buzzerWinner: PlayerId | null;
  roundWinner: PlayerId | null;
  outcome: RoundOutcome | null;
  /** Only revealed once the round is resolved. */
  correctAnswer: string | null;
}

export interface PlayerSnapshot extends PlayerMatchState {
  roundStatus: PlayerRoundStatus | null;
  locked: boolean;
}

export interface SessionSnapshot {
  matchId: string | null;
  variant: GameVariant;
  phase: Phase;
  level: Level | null;
  questionNumber: number;
  questionsRemaining: number;
  round: RoundSnapshot | null;
  players: Record<PlayerId, PlayerSnapshot>;
  result: MatchResult | null;
}
