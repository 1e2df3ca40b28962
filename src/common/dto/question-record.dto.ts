import { Transform, Type } from 'class-transformer';
import { IsIn, IsInt, IsNotEmpty, IsString } from 'class-validator';
import { LEVELS } from '../interfaces/question.interface';

// Spreadsheet exports often carry numeric answers as numbers
const toTrimmedString = ({ value }: { value: unknown }): unknown => {
  if (typeof value === 'number') {
    return String(value);
  }
  return typeof value === 'string' ? value.trim() : value;
};

export class QuestionRecordDto {
  @Type(() => Number)
  @IsInt()
  @IsIn(LEVELS)
  level!: number;

  @Transform(toTrimmedString)
  @IsString()
  @IsNotEmpty()
  prompt!: string;

  @Transform(toTrimmedString)
  @IsString()
  @IsNotEmpty()
  correctAnswer!: string;

  @Transform(toTrimmedString)
  @IsString()
  @IsNotEmpty()
  distractor1!: string;

  @Transform(toTrimmedString)
  @IsString()
  @IsNotEmpty()
  distractor2!: string;
}
