import { RaffleState, type RaffleStateType } from "./constants.js";

export type UpkeepInput = {
  state: RaffleStateType;
  elapsedSec: number;
  intervalSec: number;
  balance: bigint;
  participantCount: number;
};

export type UpkeepBlocker =
  | "interval_not_elapsed"
  | "not_open"
  | "empty_pot"
  | "no_participants";

export function describeUpkeep(input: UpkeepInput): UpkeepBlocker[] {
  const blockers: UpkeepBlocker[] = [];
  if (input.elapsedSec < input.intervalSec) blockers.push("interval_not_elapsed");
  if (input.state !== RaffleState.Open) blockers.push("not_open");
  if (input.balance <= 0n) blockers.push("empty_pot");
  if (input.participantCount <= 0) blockers.push("no_participants");
  return blockers;
}

export function isUpkeepNeeded(input: UpkeepInput): boolean {
  return describeUpkeep(input).length === 0;
}
