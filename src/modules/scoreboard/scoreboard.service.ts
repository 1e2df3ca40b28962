import { Injectable, Logger } from '@nestjs/common';
import { GAME_CONFIG } from '../../common/constants/game.constants';
import {
  MatchEndReason,
  MatchResult,
} from '../../common/interfaces/game-state.interface';
import {
  PLAYER_IDS,
  PlayerId,
  PlayerMatchState,
} from '../../common/interfaces/player.interface';

@Injectable()
export class ScoreboardService {
  private readonly logger = new Logger(ScoreboardService.name);
  private players: Record<PlayerId, PlayerMatchState> = this.emptyPlayers();
  private matchResult: MatchResult | null = null;

  reset(): void {
    this.players = this.emptyPlayers();
    this.matchResult = null;
  }

  get(player: PlayerId): Readonly<PlayerMatchState> {
    return this.players[player];
  }

  get result(): MatchResult | null {
    return this.matchResult;
  }

  /**
   * Credit a correct answer. Returns the match result when this answer
   * carries the player over the finish line, otherwise null.
   */
  applyCorrect(player: PlayerId, increment: number): MatchResult | null {
    if (this.matchResult) {
      return null;
    }

    const state = this.players[player];
    state.score += 1;
    state.trackPosition = Math.min(
      GAME_CONFIG.FINISH_LINE,
      state.trackPosition + Math.max(0, increment),
    );

    this.logger.log(
      `${player}: ${state.score} points, track at ${state.trackPosition}`,
    );

    if (state.trackPosition >= GAME_CONFIG.FINISH_LINE) {
      this.matchResult = this.buildResult(player, MatchEndReason.TRACK_COMPLETE);
      this.logger.log(`${player} reached the finish line`);
    }

    return this.matchResult;
  }

  /**
   * Decide the match once the question bank has run dry: higher score wins,
   * equal scores draw.
   */
  finalizeOnBankExhausted(): MatchResult {
    if (this.matchResult) {
      return this.matchResult;
    }

    const { P1, P2 } = this.players;
    let winner: PlayerId | null = null;
    if (P1.score > P2.score) {
      winner = 'P1';
    } else if (P2.score > P1.score) {
      winner = 'P2';
    }

    this.matchResult = this.buildResult(winner, MatchEndReason.BANK_EXHAUSTED);
    this.logger.log(
      winner
        ? `${winner} wins on score (${P1.score} - ${P2.score})`
        : `Draw (${P1.score} - ${P2.score})`,
    );
    return this.matchResult;
  }

  snapshot(): Record<PlayerId, PlayerMatchState> {
    return {
      P1: { ...this.players.P1 },
      P2: { ...this.players.P2 },
    };
  }

  private buildResult(
    winner: PlayerId | null,
    reason: MatchEndReason,
  ): MatchResult {
    const scores = { P1: 0, P2: 0 };
    for (const id of PLAYER_IDS) {
      scores[id] = this.players[id].score;
    }
    return { winner, reason, scores };
  }

  private emptyPlayers(): Record<PlayerId, PlayerMatchState> {
    return {
      P1: { score: 0, trackPosition: 0 },
      P2: { score: 0, trackPosition: 0 },
    };
  }
}
