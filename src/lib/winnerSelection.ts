/**
 * Index of the winning entry for a random word.
 * Words are unsigned 256-bit values, so the modulo runs on bigint.
 */
export function pickWinnerIndex(randomWord: bigint, participantCount: number): number {
  if (!Number.isInteger(participantCount) || participantCount <= 0) {
    throw new RangeError(`Cannot pick a winner among ${participantCount} players`);
  }
  if (randomWord < 0n) {
    throw new RangeError("Random word must be unsigned");
  }
  return Number(randomWord % BigInt(participantCount));
}
