export type Level = 1 | 2 | 3;

export const LEVELS: readonly Level[] = [1, 2, 3];

export interface Question {
  id: string;
  level: Level;
  prompt: string;
  correctAnswer: string;
  distractors: readonly [string, string];
}

/**
 * The three answer strings of one question instance, in the order shown to
 * the players.
 */
export type OptionSet = readonly [string, string, string];

/**
 * A row from a question source, before validation.
 */
export interface QuestionRecord {
  level: number;
  prompt: string;
  correctAnswer: string;
  distractor1: string;
  distractor2: string;
}

export function isLevel(value: unknown): value is Level {
  return value === 1 || value === 2 || value === 3;
}

/**
 * Exact, case-sensitive match, ignoring surrounding whitespace.
 */
export function isCorrectAnswer(question: Question, option: string): boolean {
  return option.trim() === question.correctAnswer.trim();
}
