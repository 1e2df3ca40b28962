import { Module } from '@nestjs/common';
import { ScoreboardService } from './scoreboard.service';

@Module({
  providers: [ScoreboardService],
  exports: [ScoreboardService],
})
export class ScoreboardModule {}
