import { Module } from '@nestjs/common';
import { SessionService } from './session.service';
import { QuestionBankModule } from '../question-bank/question-bank.module';
import { ScoreboardModule } from '../scoreboard/scoreboard.module';
import { RoundModule } from '../round/round.module';
import { ActuatorModule } from '../actuator/actuator.module';

@Module({
  imports: [QuestionBankModule, ScoreboardModule, RoundModule, ActuatorModule],
  providers: [SessionService],
  exports: [SessionService],
})
export class SessionModule {}
