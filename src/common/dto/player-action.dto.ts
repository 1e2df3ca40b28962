import { IsIn, IsInt } from 'class-validator';
import { PLAYER_IDS, PlayerId } from '../interfaces/player.interface';
import { LEVELS, Level } from '../interfaces/question.interface';

export class SelectLevelDto {
  @IsIn(LEVELS)
  level!: Level;
}

export class PlayerActionDto {
  @IsIn(PLAYER_IDS)
  player!: PlayerId;
}

export class SelectOptionDto extends PlayerActionDto {
  // Range is checked by the round rules, not here
  @IsInt()
  optionIndex!: number;
}
