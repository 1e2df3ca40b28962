import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { QuestionBankService } from './question-bank.service';
import { QuestionSourceService } from './question-source.service';
import { RANDOM_SEED } from '../../common/constants/injection-tokens';

@Module({
  providers: [
    {
      provide: RANDOM_SEED,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        configService.get<number>('RANDOM_SEED'),
    },
    QuestionBankService,
    QuestionSourceService,
  ],
  exports: [QuestionBankService],
})
export class QuestionBankModule {}
