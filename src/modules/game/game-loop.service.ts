import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { Server } from 'socket.io';
import { GAME_CONFIG } from '../../common/constants/game.constants';
import {
  SessionEvent,
  SessionSnapshot,
} from '../../common/interfaces/game-state.interface';
import { PlayerAction } from '../../common/interfaces/player-action.interface';
import { errorMessage } from '../../common/utils/errors';
import { SessionService } from '../session/session.service';

const LOOP_NAME = 'game-loop';

export type Broadcaster = Pick<Server, 'emit'>;

/**
 * Fixed-rate host loop. Socket handlers only queue actions; everything that
 * changes the match happens here, one tick at a time.
 */
@Injectable()
export class GameLoopService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(GameLoopService.name);
  private pending: PlayerAction[] = [];
  private server: Broadcaster | null = null;
  private lastBroadcastAt = Number.NEGATIVE_INFINITY;

  constructor(
    private readonly sessionService: SessionService,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly configService: ConfigService,
  ) {}

  onApplicationBootstrap() {
    const tickRate = this.configService.get<number>(
      'TICK_RATE_HZ',
      GAME_CONFIG.TICK_RATE_HZ,
    );
    const interval = setInterval(
      () => this.runTick(performance.now()),
      Math.round(1000 / tickRate),
    );
    this.schedulerRegistry.addInterval(LOOP_NAME, interval);
    this.logger.log(
      `Game loop running at ${tickRate} Hz (${this.sessionService.variant})`,
    );
  }

  onModuleDestroy() {
    if (this.schedulerRegistry.doesExist('interval', LOOP_NAME)) {
      this.schedulerRegistry.deleteInterval(LOOP_NAME);
    }
  }

  attach(server: Broadcaster): void {
    this.server = server;
  }

  enqueue(action: PlayerAction): void {
    this.pending.push(action);
  }

  snapshot(): SessionSnapshot {
    return this.sessionService.snapshot(performance.now());
  }

  /**
   * Advance the session with everything queued since the last tick.
   */
  runTick(now: number): SessionEvent[] {
    const actions = this.pending;
    this.pending = [];

    try {
      const events = this.sessionService.tick(now, actions);
      this.broadcast(events, now);
      return events;
    } catch (error) {
      this.logger.error(`Tick failed: ${errorMessage(error)}`);
      return [];
    }
  }

  private broadcast(events: SessionEvent[], now: number): void {
    if (!this.server) {
      return;
    }

    for (const event of events) {
      this.server.emit(GAME_CONFIG.EVENTS.GAME_EVENT, event);
    }

    const due =
      now - this.lastBroadcastAt >= GAME_CONFIG.STATE_BROADCAST_INTERVAL;
    if (events.length > 0 || due) {
      this.server.emit(
        GAME_CONFIG.EVENTS.STATE,
        this.sessionService.snapshot(now),
      );
      this.lastBroadcastAt = now;
    }
  }
}
