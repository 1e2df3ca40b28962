import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'fs/promises';
import { QuestionBankService } from './question-bank.service';
import { Question } from '../../common/interfaces/question.interface';
import { errorMessage } from '../../common/utils/errors';
import defaultQuestions from '../../data/default-questions.json';

@Injectable()
export class QuestionSourceService implements OnModuleInit {
  private readonly logger = new Logger(QuestionSourceService.name);

  constructor(
    private readonly questionBank: QuestionBankService,
    private readonly configService: ConfigService,
  ) {}

  async onModuleInit(): Promise<void> {
    await this.loadCatalog();
  }

  /**
   * Load the configured question file into the bank, or the bundled
   * defaults when the file is missing, unreadable or has no valid rows.
   */
  async loadCatalog(): Promise<Question[]> {
    const file = this.configService.get<string>('QUESTIONS_FILE');

    if (file) {
      const records = await this.readRecords(file);
      if (records) {
        const catalog = this.questionBank.load(records);
        if (catalog.length > 0) {
          this.logSummary(file);
          return catalog;
        }
        this.logger.warn(`No valid questions in ${file}`);
      }
    } else {
      this.logger.log('No QUESTIONS_FILE configured');
    }

    const catalog = this.questionBank.load(defaultQuestions);
    this.logSummary('default questions');
    return catalog;
  }

  private async readRecords(file: string): Promise<unknown[] | null> {
    try {
      const parsed: unknown = JSON.parse(await readFile(file, 'utf8'));

      if (!Array.isArray(parsed)) {
        this.logger.warn(`${file} does not contain a list of questions`);
        return null;
      }

      return parsed;
    } catch (error) {
      this.logger.error(
        `Error reading question file ${file}: ${errorMessage(error)}`,
      );
      return null;
    }
  }

  private logSummary(source: string): void {
    const counts = this.questionBank.countByLevel();
    this.logger.log(
      `Using ${this.questionBank.size} questions from ${source} (level 1: ${counts[1]}, level 2: ${counts[2]}, level 3: ${counts[3]})`,
    );
  }
}
