import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { GAME_CONFIG } from '../../common/constants/game.constants';
import {
  ACTUATOR_PORT,
  ROUND_POLICY,
  ROUND_TIMINGS,
} from '../../common/constants/injection-tokens';
import {
  GameVariant,
  MatchResult,
  Phase,
  RoundEvent,
  SessionEvent,
  SessionSnapshot,
} from '../../common/interfaces/game-state.interface';
import { PlayerAction } from '../../common/interfaces/player-action.interface';
import {
  PlayerId,
  PlayerRoundStatus,
} from '../../common/interfaces/player.interface';
import { Level } from '../../common/interfaces/question.interface';
import { errorMessage } from '../../common/utils/errors';
import { ActuatorPort } from '../actuator/actuator.port';
import { QuestionBankService } from '../question-bank/question-bank.service';
import { RoundEngine } from '../round/round-engine';
import { RoundPolicy, RoundTimings } from '../round/round-policy.interface';
import { ScoreboardService } from '../scoreboard/scoreboard.service';

type SessionStatus = 'MENU' | 'PLAYING' | 'FINISHED';

/**
 * Owns one match at a time: level selection, question progression, scoring
 * and the end of the match. Advanced only through `tick`.
 */
@Injectable()
export class SessionService {
  private readonly logger = new Logger(SessionService.name);
  private readonly engine: RoundEngine;
  private readonly trackIncrement: number;

  private status: SessionStatus = 'MENU';
  private matchId: string | null = null;
  private level: Level | null = null;
  private questionNumber = 0;

  constructor(
    private readonly questionBank: QuestionBankService,
    private readonly scoreboard: ScoreboardService,
    @Inject(ROUND_POLICY) policy: RoundPolicy,
    @Inject(ROUND_TIMINGS) timings: RoundTimings,
    @Inject(ACTUATOR_PORT) private readonly actuator: ActuatorPort,
    configService: ConfigService,
  ) {
    this.engine = new RoundEngine(policy, timings.resultMs);
    this.trackIncrement = configService.get<number>(
      'TRACK_INCREMENT',
      GAME_CONFIG.TRACK_INCREMENT,
    );
  }

  get variant(): GameVariant {
    return this.engine.variant;
  }

  get phase(): Phase {
    if (this.status === 'PLAYING') {
      return this.engine.phase ?? Phase.MENU;
    }
    return this.status === 'FINISHED' ? Phase.FINISHED : Phase.MENU;
  }

  get result(): MatchResult | null {
    return this.status === 'FINISHED' ? this.scoreboard.result : null;
  }

  /**
   * Apply this tick's actions in arrival order, then run the timers.
   */
  tick(now: number, actions: readonly PlayerAction[] = []): SessionEvent[] {
    const events: SessionEvent[] = [];

    for (const action of actions) {
      events.push(...this.handle(action, now));
    }

    if (this.status === 'PLAYING') {
      events.push(...this.afterRound(this.engine.tick(now), now));
    }

    return events;
  }

  startLevel(level: Level, now: number): SessionEvent[] {
    if (this.status !== 'MENU') {
      return [];
    }

    this.scoreboard.reset();
    this.engine.abort();
    this.status = 'PLAYING';
    this.level = level;
    this.matchId = uuidv4();
    this.questionNumber = 0;

    const order = this.questionBank.startSession(level);
    this.logger.log(
      `Match ${this.matchId} started: level ${level}, ${order.length} questions, ${this.variant}`,
    );

    return [
      {
        type: 'MATCH_STARTED',
        matchId: this.matchId,
        level,
        questionCount: order.length,
      },
      ...this.nextQuestion(now),
    ];
  }

  /**
   * Abandon whatever is running and go back to the menu.
   */
  cancel(): SessionEvent[] {
    if (this.status === 'MENU') {
      return [];
    }
    this.logger.log(`Match ${this.matchId} cancelled`);
    return this.backToMenu();
  }

  restart(): SessionEvent[] {
    if (this.status !== 'FINISHED') {
      return [];
    }
    return this.backToMenu();
  }

  snapshot(now: number): SessionSnapshot {
    const round = this.engine.context;
    const scores = this.scoreboard.snapshot();

    const player = (id: PlayerId) => ({
      ...scores[id],
      roundStatus: round ? round.players[id] : null,
      locked: round?.players[id] === PlayerRoundStatus.LOCKED,
    });

    return {
      matchId: this.matchId,
      variant: this.variant,
      phase: this.phase,
      level: this.level,
      questionNumber: this.questionNumber,
      questionsRemaining: this.status === 'PLAYING' ? this.questionBank.remaining : 0,
      round: this.engine.snapshot(now),
      players: { P1: player('P1'), P2: player('P2') },
      result: this.result,
    };
  }

  private handle(action: PlayerAction, now: number): SessionEvent[] {
    switch (action.type) {
      case 'SELECT_LEVEL':
        return this.startLevel(action.level, now);
      case 'CANCEL':
        return this.cancel();
      case 'RESTART':
        return this.restart();
      default:
        if (this.status !== 'PLAYING') {
          return [];
        }
        return this.afterRound(this.engine.handle(action, now), now);
    }
  }

  private afterRound(roundEvents: RoundEvent[], now: number): SessionEvent[] {
    const events: SessionEvent[] = [];

    for (const event of roundEvents) {
      events.push(event);

      if (event.type === 'ROUND_RESOLVED' && event.resolution.roundWinner) {
        events.push(...this.awardPoint(event.resolution.roundWinner));
      } else if (event.type === 'ROUND_COMPLETE') {
        events.push(...this.nextQuestion(now));
      }

      if (this.status !== 'PLAYING') {
        break;
      }
    }

    return events;
  }

  private nextQuestion(now: number): SessionEvent[] {
    const question = this.questionBank.drawNext();

    if (!question) {
      this.logger.log('No more questions');
      return this.finish(this.scoreboard.finalizeOnBankExhausted());
    }

    this.questionNumber += 1;
    const options = this.questionBank.shuffleOptions(question);
    this.logger.debug(
      `Question ${this.questionNumber}: ${question.prompt} [${options.join(' | ')}]`,
    );

    return [
      {
        type: 'QUESTION_STARTED',
        questionNumber: this.questionNumber,
        questionId: question.id,
      },
      ...this.engine.start(question, options, now),
    ];
  }

  private awardPoint(player: PlayerId): SessionEvent[] {
    const result = this.scoreboard.applyCorrect(player, this.trackIncrement);
    this.notifyActuator(`advance ${player}`, () =>
      this.actuator.advance(player, this.trackIncrement),
    );

    const events: SessionEvent[] = [
      { type: 'SCORE_CHANGED', player, state: { ...this.scoreboard.get(player) } },
    ];

    if (result) {
      events.push(...this.finish(result));
    }
    return events;
  }

  private finish(result: MatchResult): SessionEvent[] {
    this.engine.abort();
    this.status = 'FINISHED';

    const { winner } = result;
    if (winner) {
      this.notifyActuator(`celebrate ${winner}`, () =>
        this.actuator.celebrate(winner),
      );
    }

    this.logger.log(
      `Match ${this.matchId} finished (${result.reason}): ${winner ?? 'draw'}`,
    );
    return [{ type: 'MATCH_FINISHED', result }];
  }

  private backToMenu(): SessionEvent[] {
    this.engine.abort();
    this.scoreboard.reset();
    this.status = 'MENU';
    this.matchId = null;
    this.level = null;
    this.questionNumber = 0;
    return [{ type: 'RETURNED_TO_MENU' }];
  }

  private notifyActuator(
    description: string,
    call: () => void | Promise<void>,
  ): void {
    try {
      void Promise.resolve(call()).catch((error: unknown) =>
        this.logger.warn(`Robot ${description} failed: ${errorMessage(error)}`),
      );
    } catch (error) {
      this.logger.warn(`Robot ${description} failed: ${errorMessage(error)}`);
    }
  }
}
