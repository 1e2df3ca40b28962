import { Controller, Get } from '@nestjs/common';
import { GameLoopService } from './modules/game/game-loop.service';

@Controller()
export class AppController {
  constructor(private readonly gameLoop: GameLoopService) {}

  @Get('/health')
  healthCheck() {
    const snapshot = this.gameLoop.snapshot();
    return {
      status: 'healthy',
      variant: snapshot.variant,
      phase: snapshot.phase,
      matchId: snapshot.matchId,
      uptime: process.uptime(),
      memory: process.memoryUsage(),
    };
  }
}
