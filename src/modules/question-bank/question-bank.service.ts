import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { QuestionRecordDto } from '../../common/dto/question-record.dto';
import {
  Level,
  LEVELS,
  OptionSet,
  Question,
  isCorrectAnswer,
  isLevel,
} from '../../common/interfaces/question.interface';
import { RANDOM_SEED } from '../../common/constants/injection-tokens';
import {
  RandomSource,
  mulberry32,
  shuffle,
} from '../../common/utils/random';

@Injectable()
export class QuestionBankService {
  private readonly logger = new Logger(QuestionBankService.name);
  private catalog: readonly Question[] = [];
  private queue: Question[] = [];
  private random: RandomSource;

  constructor(@Optional() @Inject(RANDOM_SEED) seed?: number) {
    this.random = seed === undefined ? Math.random : mulberry32(seed);
  }

  /**
   * Replace the catalog with the valid subset of `records`. Invalid records
   * are dropped with a warning.
   */
  load(records: readonly unknown[]): Question[] {
    const accepted: Question[] = [];

    records.forEach((record, index) => {
      const question = this.toQuestion(record, index);
      if (question) {
        accepted.push(question);
      }
    });

    this.catalog = accepted;
    this.queue = [];

    const rejected = records.length - accepted.length;
    this.logger.log(
      `Catalog loaded: ${accepted.length} questions${rejected > 0 ? `, ${rejected} rejected` : ''}`,
    );
    return accepted;
  }

  /**
   * Start a new draw order containing every question of `level` exactly once.
   */
  startSession(level: Level): readonly Question[] {
    const questions = this.catalog.filter((q) => q.level === level);
    this.queue = shuffle(questions, this.random);
    return [...this.queue];
  }

  drawNext(): Question | null {
    return this.queue.shift() ?? null;
  }

  shuffleOptions(question: Question): OptionSet {
    const [first, second, third] = shuffle(
      [question.correctAnswer, ...question.distractors],
      this.random,
    );
    return [first, second, third];
  }

  isCorrect(question: Question, option: string): boolean {
    return isCorrectAnswer(question, option);
  }

  reseed(seed: number): void {
    this.random = mulberry32(seed);
  }

  get remaining(): number {
    return this.queue.length;
  }

  get size(): number {
    return this.catalog.length;
  }

  countByLevel(): Record<Level, number> {
    const counts: Record<Level, number> = { 1: 0, 2: 0, 3: 0 };
    for (const level of LEVELS) {
      counts[level] = this.catalog.filter((q) => q.level === level).length;
    }
    return counts;
  }

  private toQuestion(record: unknown, index: number): Question | null {
    if (typeof record !== 'object' || record === null || Array.isArray(record)) {
      this.logger.warn(`Record ${index + 1} dropped: not an object`);
      return null;
    }

    const dto = plainToInstance(QuestionRecordDto, record);
    const errors = validateSync(dto);

    if (errors.length > 0 || !isLevel(dto.level)) {
      const reasons = errors
        .flatMap((error) => Object.values(error.constraints ?? {}))
        .join('; ');
      this.logger.warn(`Record ${index + 1} dropped: ${reasons}`);
      return null;
    }

    if (
      dto.distractor1 === dto.correctAnswer ||
      dto.distractor2 === dto.correctAnswer
    ) {
      this.logger.warn(
        `Record ${index + 1} dropped: a distractor repeats the correct answer`,
      );
      return null;
    }

    return {
      id: `q${index + 1}`,
      level: dto.level,
      prompt: dto.prompt,
      correctAnswer: dto.correctAnswer,
      distractors: [dto.distractor1, dto.distractor2],
    };
  }
}
