import { RoundContext } from '../../../common/interfaces/game-state.interface';

export function selectedOption(
  round: RoundContext,
  optionIndex: number,
): string | null {
  if (
    !Number.isInteger(optionIndex) ||
    optionIndex < 0 ||
    optionIndex >= round.options.length
  ) {
    return null;
  }
  return round.options[optionIndex];
}
