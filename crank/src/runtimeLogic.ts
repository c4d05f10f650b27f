import { RaffleState, type RaffleStateType } from "../../src/lib/constants.js";

export type StuckThresholds = {
  calculatingSec: number;
};

export type UpkeepRetryScheduleInput = {
  nowSec: number;
  reason: string;
  minDelaySec: number;
  maxDelaySec: number;
  currentDelaySec?: number;
  retryCount?: number;
};

export type UpkeepRetryScheduleUpdate = {
  nextDelaySec: number;
  nextAttemptAtSec: number;
  nextRetryCount: number;
  lastReason: string;
};

export type UpkeepFailure =
  | { kind: "not_needed"; message: string }
  | { kind: "oracle_unavailable"; message: string }
  | { kind: "unexpected"; message: string };

/** Raced another trigger, or the round changed between check and perform. */
export function isBenignUpkeepFailure(failure: UpkeepFailure): boolean {
  return failure.kind === "not_needed";
}

export function classifyUpkeepError(code: string | undefined, message: string): UpkeepFailure {
  switch (code) {
    case "UPKEEP_NOT_NEEDED":
      return { kind: "not_needed", message };
    case "RANDOMNESS_REQUEST_FAILED":
      return { kind: "oracle_unavailable", message };
    default:
      return { kind: "unexpected", message };
  }
}

export function computeRetryDelay(args: {
  currentDelaySec?: number;
  minDelaySec: number;
  maxDelaySec: number;
}): number {
  const currentDelaySec = args.currentDelaySec ?? args.minDelaySec;
  return Math.min(
    args.maxDelaySec,
    Math.max(args.minDelaySec, currentDelaySec * 2)
  );
}

export function buildUpkeepRetryScheduleUpdate(
  args: UpkeepRetryScheduleInput
): UpkeepRetryScheduleUpdate {
  const nextDelaySec =
    args.currentDelaySec === undefined
      ? args.minDelaySec
      : computeRetryDelay({
          currentDelaySec: args.currentDelaySec,
          minDelaySec: args.minDelaySec,
          maxDelaySec: args.maxDelaySec,
        });

  return {
    nextDelaySec,
    nextAttemptAtSec: args.nowSec + nextDelaySec,
    nextRetryCount: (args.retryCount ?? 0) + 1,
    lastReason: args.reason,
  };
}

export function getStuckThresholdSec(
  state: RaffleStateType,
  thresholds: StuckThresholds
): number | null {
  switch (state) {
    case RaffleState.Calculating:
      return thresholds.calculatingSec;
    default:
      return null;
  }
}

export function shouldEmitStuckWarning(args: {
  nowSec: number;
  observedState: RaffleStateType;
  targetState: RaffleStateType;
  observedSinceSec: number;
  thresholdSec: number | null;
  lastWarnSec?: number;
  repeatSec: number;
}): boolean {
  if (args.thresholdSec == null || args.thresholdSec <= 0) {
    return false;
  }

  if (args.observedState !== args.targetState) {
    return false;
  }

  const ageSec = args.nowSec - args.observedSinceSec;
  if (ageSec < args.thresholdSec) {
    return false;
  }

  const lastWarnSec = args.lastWarnSec ?? 0;
  return args.nowSec - lastWarnSec >= args.repeatSec;
}
