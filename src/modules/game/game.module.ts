import { Module } from '@nestjs/common';
import { GameGateway } from './game.gateway';
import { GameLoopService } from './game-loop.service';
import { SessionModule } from '../session/session.module';

@Module({
  imports: [SessionModule],
  providers: [GameGateway, GameLoopService],
  exports: [GameLoopService],
})
export class GameModule {}
