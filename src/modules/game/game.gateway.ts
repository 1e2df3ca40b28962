import {
  WebSocketGateway,
  SubscribeMessage,
  OnGatewayInit,
  OnGatewayConnection,
  OnGatewayDisconnect,
  MessageBody,
  ConnectedSocket,
} from '@nestjs/websockets';
import { Logger, UsePipes, ValidationPipe } from '@nestjs/common';
import { Server, Socket } from 'socket.io';
import { GameLoopService } from './game-loop.service';
import { GAME_CONFIG } from '../../common/constants/game.constants';
import { PlayerAction } from '../../common/interfaces/player-action.interface';
import {
  PlayerActionDto,
  SelectLevelDto,
  SelectOptionDto,
} from '../../common/dto/player-action.dto';

type Client = Pick<Socket, 'id' | 'emit'>;

/**
 * Bridge to the presentation screen and the input decoder. Clients receive
 * session snapshots and events; decoded actions are queued for the next
 * tick.
 */
@WebSocketGateway({
  cors: {
    origin: '*',
    credentials: true,
  },
  transports: ['websocket', 'polling'],
  pingTimeout: 60000,
  pingInterval: 25000,
})
@UsePipes(new ValidationPipe())
export class GameGateway
  implements OnGatewayInit, OnGatewayConnection, OnGatewayDisconnect
{
  private readonly logger = new Logger(GameGateway.name);

  constructor(private readonly gameLoop: GameLoopService) {}

  afterInit(server: Server) {
    this.gameLoop.attach(server);
  }

  handleConnection(client: Client) {
    this.logger.log(`Client connected: ${client.id}`);
    client.emit(GAME_CONFIG.EVENTS.CONNECTED, { clientId: client.id });
    client.emit(GAME_CONFIG.EVENTS.STATE, this.gameLoop.snapshot());
  }

  handleDisconnect(client: Pick<Socket, 'id'>) {
    this.logger.log(`Client disconnected: ${client.id}`);
  }

  @SubscribeMessage(GAME_CONFIG.EVENTS.SELECT_LEVEL)
  handleSelectLevel(@MessageBody() data: SelectLevelDto) {
    return this.queue({ type: 'SELECT_LEVEL', level: data.level });
  }

  @SubscribeMessage(GAME_CONFIG.EVENTS.CLAIM_BUZZER)
  handleClaimBuzzer(@MessageBody() data: PlayerActionDto) {
    return this.queue({ type: 'CLAIM_BUZZER', player: data.player });
  }

  @SubscribeMessage(GAME_CONFIG.EVENTS.SELECT_OPTION)
  handleSelectOption(@MessageBody() data: SelectOptionDto) {
    return this.queue({
      type: 'SELECT_OPTION',
      player: data.player,
      optionIndex: data.optionIndex,
    });
  }

  @SubscribeMessage(GAME_CONFIG.EVENTS.SKIP)
  handleSkip(@MessageBody() data: PlayerActionDto) {
    return this.queue({ type: 'SKIP', player: data.player });
  }

  @SubscribeMessage(GAME_CONFIG.EVENTS.CANCEL)
  handleCancel(@ConnectedSocket() client: Pick<Socket, 'id'>) {
    this.logger.log(`Cancel requested by ${client.id}`);
    return this.queue({ type: 'CANCEL' });
  }

  @SubscribeMessage(GAME_CONFIG.EVENTS.RESTART)
  handleRestart() {
    return this.queue({ type: 'RESTART' });
  }

  private queue(action: PlayerAction) {
    this.gameLoop.enqueue(action);
    return { success: true };
  }
}
