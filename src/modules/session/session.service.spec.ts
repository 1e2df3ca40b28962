import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { SessionService } from './session.service';
import { QuestionBankService } from '../question-bank/question-bank.service';
import { ScoreboardService } from '../scoreboard/scoreboard.service';
import { ActuatorPort } from '../actuator/actuator.port';
import { BuzzerRacePolicy } from '../round/policies/buzzer-race.policy';
import { OpenAnswerPolicy } from '../round/policies/open-answer.policy';
import { RoundPolicy } from '../round/round-policy.interface';
import { DEFAULT_ROUND_TIMINGS } from '../../config/round-timings';
import {
  ACTUATOR_PORT,
  ROUND_POLICY,
  ROUND_TIMINGS,
} from '../../common/constants/injection-tokens';
import {
  GameVariant,
  MatchEndReason,
  Phase,
  RoundOutcome,
  SessionEvent,
} from '../../common/interfaces/game-state.interface';
import { PlayerAction } from '../../common/interfaces/player-action.interface';
import {
  PlayerId,
  PlayerRoundStatus,
} from '../../common/interfaces/player.interface';
import { QuestionRecord } from '../../common/interfaces/question.interface';

const records: QuestionRecord[] = [
  { level: 1, prompt: 'What is 1 + 1?', correctAnswer: '2', distractor1: '3', distractor2: '4' },
  { level: 1, prompt: 'What is 2 + 3?', correctAnswer: '5', distractor1: '6', distractor2: '4' },
  { level: 1, prompt: 'What is 4 + 4?', correctAnswer: '8', distractor1: '7', distractor2: '9' },
  { level: 1, prompt: 'What is 9 - 3?', correctAnswer: '6', distractor1: '5', distractor2: '7' },
  { level: 1, prompt: 'What is 10 - 7?', correctAnswer: '3', distractor1: '2', distractor2: '4' },
  { level: 1, prompt: 'What is 5 + 5?', correctAnswer: '10', distractor1: '11', distractor2: '9' },
  { level: 2, prompt: 'What is 6 x 7?', correctAnswer: '42', distractor1: '36', distractor2: '48' },
  { level: 2, prompt: 'What is 8 x 3?', correctAnswer: '24', distractor1: '21', distractor2: '27' },
];

type Answer = 'correct' | 'wrong' | 'skip';

describe('SessionService', () => {
  let session: SessionService;
  let actuator: jest.Mocked<ActuatorPort>;
  let answers: Map<string, string>;

  async function createSession(policy: RoundPolicy, trackIncrement = 20) {
    const bank = new QuestionBankService(1234);
    answers = new Map(bank.load(records).map((q) => [q.id, q.correctAnswer]));
    actuator = { advance: jest.fn(), celebrate: jest.fn() };

    const moduleRef = await Test.createTestingModule({
      providers: [
        SessionService,
        ScoreboardService,
        { provide: QuestionBankService, useValue: bank },
        { provide: ROUND_POLICY, useValue: policy },
        { provide: ROUND_TIMINGS, useValue: DEFAULT_ROUND_TIMINGS },
        { provide: ACTUATOR_PORT, useValue: actuator },
        {
          provide: ConfigService,
          useValue: new ConfigService({ TRACK_INCREMENT: trackIncrement }),
        },
      ],
    }).compile();

    session = moduleRef.get(SessionService);
  }

  /** Index of the right (or a wrong) option in the round on screen. */
  function optionIndex(now: number, correct: boolean): number {
    const round = session.snapshot(now).round;
    if (!round) {
      throw new Error('No round in progress');
    }
    const answer = answers.get(round.questionId);
    return round.options.findIndex((option) => (option === answer) === correct);
  }

  function select(player: PlayerId, now: number, correct: boolean): PlayerAction {
    return {
      type: 'SELECT_OPTION',
      player,
      optionIndex: optionIndex(now, correct),
    };
  }

  /**
   * Play a buzzer round that started reading at `start` and return the
   * events of the tick that resolves it. The result pause ends at
   * start + 14000.
   */
  function playBuzzerRound(
    start: number,
    player: PlayerId,
    answer: Answer,
  ): SessionEvent[] {
    session.tick(start + 10000);
    session.tick(start + 10100, [{ type: 'CLAIM_BUZZER', player }]);
    session.tick(start + 11600);

    const action: PlayerAction =
      answer === 'skip'
        ? { type: 'SKIP', player }
        : select(player, start + 12000, answer === 'correct');
    return session.tick(start + 12000, [action]);
  }

  describe('buzzer race', () => {
    beforeEach(async () => {
      await createSession(new BuzzerRacePolicy(DEFAULT_ROUND_TIMINGS));
    });

    it('waits in the menu until a level is selected', () => {
      expect(session.variant).toBe(GameVariant.BUZZER_RACE);
      expect(session.phase).toBe(Phase.MENU);
      expect(session.tick(5000, [{ type: 'CLAIM_BUZZER', player: 'P1' }])).toEqual([]);
      expect(session.snapshot(5000).round).toBeNull();
    });

    it('starts the first question when a level is selected', () => {
      const events = session.tick(0, [{ type: 'SELECT_LEVEL', level: 1 }]);

      expect(events).toEqual([
        {
          type: 'MATCH_STARTED',
          matchId: expect.any(String),
          level: 1,
          questionCount: 6,
        },
        {
          type: 'QUESTION_STARTED',
          questionNumber: 1,
          questionId: expect.any(String),
        },
        { type: 'PHASE_CHANGED', phase: Phase.READING, previous: null },
      ]);
      expect(session.snapshot(4000)).toMatchObject({
        phase: Phase.READING,
        level: 1,
        questionNumber: 1,
        questionsRemaining: 5,
        round: { timeRemainingMs: 6000, correctAnswer: null },
        players: {
          P1: {
            score: 0,
            trackPosition: 0,
            roundStatus: PlayerRoundStatus.UNATTEMPTED,
            locked: false,
          },
        },
        result: null,
      });
    });

    it('ignores a level selection while a match is running', () => {
      session.tick(0, [{ type: 'SELECT_LEVEL', level: 1 }]);
      const matchId = session.snapshot(0).matchId;

      expect(session.tick(100, [{ type: 'SELECT_LEVEL', level: 2 }])).toEqual([]);
      expect(session.snapshot(100)).toMatchObject({ matchId, level: 1 });
    });

    it('credits a correct answer and moves the robot', () => {
      session.tick(0, [{ type: 'SELECT_LEVEL', level: 1 }]);
      const events = playBuzzerRound(0, 'P2', 'correct');

      expect(events).toEqual([
        { type: 'PHASE_CHANGED', phase: Phase.RESULT, previous: Phase.ANSWERING },
        {
          type: 'ROUND_RESOLVED',
          resolution: {
            outcome: RoundOutcome.CORRECT,
            roundWinner: 'P2',
            responder: 'P2',
            correctAnswer: expect.any(String),
          },
        },
        { type: 'SCORE_CHANGED', player: 'P2', state: { score: 1, trackPosition: 20 } },
      ]);
      expect(actuator.advance).toHaveBeenCalledWith('P2', 20);
    });

    it('leaves the scores alone on a wrong answer or a skip', () => {
      session.tick(0, [{ type: 'SELECT_LEVEL', level: 1 }]);
      playBuzzerRound(0, 'P1', 'wrong');
      session.tick(14000);
      playBuzzerRound(14000, 'P2', 'skip');

      const { players } = session.snapshot(27000);
      expect(players.P1.score).toBe(0);
      expect(players.P2).toMatchObject({
        score: 0,
        roundStatus: PlayerRoundStatus.SKIPPED,
      });
      expect(actuator.advance).not.toHaveBeenCalled();
    });

    it('moves to the next question after the result pause', () => {
      session.tick(0, [{ type: 'SELECT_LEVEL', level: 1 }]);
      playBuzzerRound(0, 'P1', 'correct');

      expect(session.snapshot(13000).round?.correctAnswer).toEqual(expect.any(String));
      expect(session.tick(13999)).toEqual([]);
      expect(session.tick(14000)).toEqual([
        { type: 'ROUND_COMPLETE' },
        {
          type: 'QUESTION_STARTED',
          questionNumber: 2,
          questionId: expect.any(String),
        },
        { type: 'PHASE_CHANGED', phase: Phase.READING, previous: null },
      ]);
      expect(session.snapshot(14000).players.P1).toMatchObject({
        score: 1,
        roundStatus: PlayerRoundStatus.UNATTEMPTED,
      });
    });

    it('applies actions before timers within a tick', () => {
      session.tick(0, [{ type: 'SELECT_LEVEL', level: 1 }]);
      session.tick(10000);
      session.tick(10100, [{ type: 'CLAIM_BUZZER', player: 'P1' }]);
      session.tick(11600);

      // Answer window ends at 11600 + 15000
      const events = session.tick(26600, [select('P1', 26600, true)]);

      expect(events).toContainEqual({
        type: 'SCORE_CHANGED',
        player: 'P1',
        state: { score: 1, trackPosition: 20 },
      });
    });

    it('ends the match as soon as a robot crosses the finish line', () => {
      session.tick(0, [{ type: 'SELECT_LEVEL', level: 1 }]);
      for (let round = 0; round < 4; round++) {
        playBuzzerRound(round * 14000, 'P1', 'correct');
        session.tick(round * 14000 + 14000);
      }

      const events = playBuzzerRound(56000, 'P1', 'correct');

      expect(events.slice(2)).toEqual([
        { type: 'SCORE_CHANGED', player: 'P1', state: { score: 5, trackPosition: 100 } },
        {
          type: 'MATCH_FINISHED',
          result: {
            winner: 'P1',
            reason: MatchEndReason.TRACK_COMPLETE,
            scores: { P1: 5, P2: 0 },
          },
        },
      ]);
      expect(session.phase).toBe(Phase.FINISHED);
      expect(session.snapshot(68000)).toMatchObject({
        phase: Phase.FINISHED,
        round: null,
        questionsRemaining: 0,
      });
      expect(session.tick(70000)).toEqual([]);
      expect(actuator.advance).toHaveBeenCalledTimes(5);
      expect(actuator.celebrate).toHaveBeenCalledTimes(1);
      expect(actuator.celebrate).toHaveBeenCalledWith('P1');
    });

    it('decides the match on score when the level runs out of questions', () => {
      session.tick(0, [{ type: 'SELECT_LEVEL', level: 2 }]);
      playBuzzerRound(0, 'P1', 'correct');
      session.tick(14000);
      playBuzzerRound(14000, 'P2', 'wrong');

      expect(session.tick(28000)).toEqual([
        { type: 'ROUND_COMPLETE' },
        {
          type: 'MATCH_FINISHED',
          result: {
            winner: 'P1',
            reason: MatchEndReason.BANK_EXHAUSTED,
            scores: { P1: 1, P2: 0 },
          },
        },
      ]);
      expect(session.result?.winner).toBe('P1');
      expect(actuator.celebrate).toHaveBeenCalledWith('P1');
    });

    it('declares a draw without celebrating', () => {
      session.tick(0, [{ type: 'SELECT_LEVEL', level: 2 }]);
      playBuzzerRound(0, 'P1', 'skip');
      session.tick(14000);
      playBuzzerRound(14000, 'P2', 'skip');
      session.tick(28000);

      expect(session.result).toEqual({
        winner: null,
        reason: MatchEndReason.BANK_EXHAUSTED,
        scores: { P1: 0, P2: 0 },
      });
      expect(actuator.celebrate).not.toHaveBeenCalled();
    });

    it('finishes a level with no questions immediately as a draw', () => {
      expect(session.tick(0, [{ type: 'SELECT_LEVEL', level: 3 }])).toEqual([
        {
          type: 'MATCH_STARTED',
          matchId: expect.any(String),
          level: 3,
          questionCount: 0,
        },
        {
          type: 'MATCH_FINISHED',
          result: {
            winner: null,
            reason: MatchEndReason.BANK_EXHAUSTED,
            scores: { P1: 0, P2: 0 },
          },
        },
      ]);
      expect(session.phase).toBe(Phase.FINISHED);
    });

    it('cancels a running match back to the menu', () => {
      session.tick(0, [{ type: 'SELECT_LEVEL', level: 1 }]);
      playBuzzerRound(0, 'P1', 'correct');

      expect(session.tick(12500, [{ type: 'CANCEL' }])).toEqual([
        { type: 'RETURNED_TO_MENU' },
      ]);
      expect(session.snapshot(12500)).toMatchObject({
        matchId: null,
        phase: Phase.MENU,
        level: null,
        questionNumber: 0,
        round: null,
        players: { P1: { score: 0, trackPosition: 0, roundStatus: null } },
        result: null,
      });
      expect(session.tick(14000)).toEqual([]);
    });

    it('ignores cancel in the menu', () => {
      expect(session.tick(0, [{ type: 'CANCEL' }])).toEqual([]);
    });

    it('only restarts a finished match', () => {
      session.tick(0, [{ type: 'SELECT_LEVEL', level: 3 }]);
      expect(session.phase).toBe(Phase.FINISHED);

      expect(session.tick(100, [{ type: 'RESTART' }])).toEqual([
        { type: 'RETURNED_TO_MENU' },
      ]);
      expect(session.phase).toBe(Phase.MENU);

      session.tick(200, [{ type: 'SELECT_LEVEL', level: 1 }]);
      expect(session.tick(300, [{ type: 'RESTART' }])).toEqual([]);
      expect(session.phase).toBe(Phase.READING);
    });

    it('lets a new level start after a restart', () => {
      session.tick(0, [{ type: 'SELECT_LEVEL', level: 3 }]);
      const events = session.tick(100, [
        { type: 'RESTART' },
        { type: 'SELECT_LEVEL', level: 2 },
      ]);

      expect(events.map((event) => event.type)).toEqual([
        'RETURNED_TO_MENU',
        'MATCH_STARTED',
        'QUESTION_STARTED',
        'PHASE_CHANGED',
      ]);
      expect(session.snapshot(100).questionsRemaining).toBe(1);
    });

    it('keeps scoring when the robot throws', () => {
      actuator.advance.mockImplementation(() => {
        throw new Error('bridge offline');
      });
      session.tick(0, [{ type: 'SELECT_LEVEL', level: 1 }]);

      const events = playBuzzerRound(0, 'P1', 'correct');

      expect(events).toContainEqual({
        type: 'SCORE_CHANGED',
        player: 'P1',
        state: { score: 1, trackPosition: 20 },
      });
    });

    it('keeps scoring when a robot command is rejected', async () => {
      actuator.advance.mockRejectedValue(new Error('publish timed out'));
      session.tick(0, [{ type: 'SELECT_LEVEL', level: 1 }]);

      playBuzzerRound(0, 'P1', 'correct');
      await Promise.resolve();

      expect(session.snapshot(12000).players.P1.score).toBe(1);
      expect(session.phase).toBe(Phase.RESULT);
    });
  });

  describe('open answer', () => {
    beforeEach(async () => {
      await createSession(new OpenAnswerPolicy(DEFAULT_ROUND_TIMINGS));
    });

    it('locks out a wrong answer and scores the other player', () => {
      session.tick(0, [{ type: 'SELECT_LEVEL', level: 2 }]);
      expect(session.snapshot(1500).round?.countdown).toBe(2);
      session.tick(3000);

      expect(session.tick(4000, [select('P1', 4000, false)])).toEqual([
        { type: 'PLAYER_LOCKED', player: 'P1' },
      ]);
      expect(session.snapshot(4000).players.P1).toMatchObject({
        roundStatus: PlayerRoundStatus.LOCKED,
        locked: true,
      });

      expect(session.tick(5000, [select('P2', 5000, true)])).toEqual([
        { type: 'PHASE_CHANGED', phase: Phase.RESULT, previous: Phase.QUESTION },
        {
          type: 'ROUND_RESOLVED',
          resolution: {
            outcome: RoundOutcome.CORRECT,
            roundWinner: 'P2',
            responder: 'P2',
            correctAnswer: expect.any(String),
          },
        },
        { type: 'SCORE_CHANGED', player: 'P2', state: { score: 1, trackPosition: 20 } },
      ]);
    });

    it('reveals the answer when both players are locked out', () => {
      session.tick(0, [{ type: 'SELECT_LEVEL', level: 2 }]);
      session.tick(3000);

      const events = session.tick(4000, [
        select('P1', 4000, false),
        select('P2', 4000, false),
      ]);
      const snapshot = session.snapshot(4000);

      expect(events.map((event) => event.type)).toEqual([
        'PLAYER_LOCKED',
        'PHASE_CHANGED',
        'ROUND_RESOLVED',
      ]);
      expect(events[2]).toMatchObject({
        resolution: { outcome: RoundOutcome.ALL_LOCKED, roundWinner: null },
      });
      expect(snapshot.round?.correctAnswer).toBe(
        answers.get(snapshot.round?.questionId ?? ''),
      );
      expect(snapshot.players.P1.score).toBe(0);
      expect(snapshot.players.P2.score).toBe(0);
    });

    it('gives the point to the first of two same-tick answers', () => {
      session.tick(0, [{ type: 'SELECT_LEVEL', level: 2 }]);
      session.tick(3000);

      const events = session.tick(4000, [
        select('P2', 4000, true),
        select('P1', 4000, true),
      ]);

      expect(events.filter((event) => event.type === 'SCORE_CHANGED')).toEqual([
        { type: 'SCORE_CHANGED', player: 'P2', state: { score: 1, trackPosition: 20 } },
      ]);
    });

    it('plays through timeouts to the end of the level', () => {
      session.tick(0, [{ type: 'SELECT_LEVEL', level: 2 }]);
      session.tick(3000);
      session.tick(5000, [select('P2', 5000, true)]);

      expect(session.tick(7000)).toEqual([
        { type: 'ROUND_COMPLETE' },
        {
          type: 'QUESTION_STARTED',
          questionNumber: 2,
          questionId: expect.any(String),
        },
        { type: 'PHASE_CHANGED', phase: Phase.COUNTDOWN, previous: null },
      ]);

      session.tick(10000);
      expect(session.tick(40000)).toEqual([
        { type: 'PHASE_CHANGED', phase: Phase.RESULT, previous: Phase.QUESTION },
        {
          type: 'ROUND_RESOLVED',
          resolution: {
            outcome: RoundOutcome.TIMEOUT,
            roundWinner: null,
            responder: null,
            correctAnswer: expect.any(String),
          },
        },
      ]);
      expect(session.snapshot(40000).players.P1.roundStatus).toBe(
        PlayerRoundStatus.TIMED_OUT,
      );

      expect(session.tick(42000)).toEqual([
        { type: 'ROUND_COMPLETE' },
        {
          type: 'MATCH_FINISHED',
          result: {
            winner: 'P2',
            reason: MatchEndReason.BANK_EXHAUSTED,
            scores: { P1: 0, P2: 1 },
          },
        },
      ]);
    });

    it('uses the configured track increment', async () => {
      await createSession(new OpenAnswerPolicy(DEFAULT_ROUND_TIMINGS), 50);
      session.tick(0, [{ type: 'SELECT_LEVEL', level: 2 }]);
      session.tick(3000);
      session.tick(4000, [select('P1', 4000, true)]);
      session.tick(6000);
      session.tick(9000);

      const events = session.tick(10000, [select('P1', 10000, true)]);

      expect(events.slice(2)).toEqual([
        { type: 'SCORE_CHANGED', player: 'P1', state: { score: 2, trackPosition: 100 } },
        {
          type: 'MATCH_FINISHED',
          result: {
            winner: 'P1',
            reason: MatchEndReason.TRACK_COMPLETE,
            scores: { P1: 2, P2: 0 },
          },
        },
      ]);
      expect(actuator.advance).toHaveBeenCalledWith('P1', 50);
    });
  });
});
