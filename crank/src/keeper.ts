/**
 * Raffle keeper: the external scheduler for upkeep.
 *
 * Every tick:
 *   - Open        → checkUpkeep, and performUpkeep when it says so
 *   - Calculating → wait for the oracle; warn (throttled) if it takes too long
 *
 * Failed triggers back off exponentially between retryMinSec and retryMaxSec.
 * A stalled request is only reported, never cancelled.
 */
import { RaffleState, raffleStateName, type RaffleStateType } from "../../src/lib/constants.js";
import { RaffleError } from "../../src/lib/errors.js";
import { formatDuration, formatSol } from "../../src/lib/format.js";
import { createLogger, type Logger } from "../../src/lib/log.js";
import type { Raffle } from "../../src/lib/raffle.js";
import { unixNow, type Clock } from "../../src/lib/roundClock.js";
import {
  buildUpkeepRetryScheduleUpdate,
  classifyUpkeepError,
  getStuckThresholdSec,
  isBenignUpkeepFailure,
  shouldEmitStuckWarning,
} from "./runtimeLogic.js";

export interface KeeperOptions {
  pollIntervalMs: number;
  retryMinSec: number;
  retryMaxSec: number;
  stuckCalculatingSec: number;
  stuckWarnRepeatSec: number;
  healthLogIntervalSec: number;
  clock?: Clock;
  logger?: Logger;
}

export type TickOutcome =
  | { kind: "triggered"; requestId: bigint }
  | { kind: "idle" }
  | { kind: "awaiting_oracle"; requestId: bigint | null }
  | { kind: "backoff"; nextAttemptAtSec: number }
  | { kind: "failed"; reason: string };

export interface KeeperStats {
  ticks: number;
  triggers: number;
  failures: number;
  stuckWarnings: number;
}

export interface Keeper {
  tick(): Promise<TickOutcome>;
  start(): void;
  stop(): void;
  stats(): KeeperStats;
}

export function createKeeper(raffle: Raffle, options: KeeperOptions): Keeper {
  const now = options.clock ?? unixNow;
  const log = options.logger ?? createLogger("keeper");

  let timer: NodeJS.Timeout | undefined;
  let running = false;
  let observed: { state: RaffleStateType; requestId: bigint | null; sinceSec: number } | undefined;
  let lastStuckWarnSec: number | undefined;
  let lastHealthLogSec = 0;
  let retry: { delaySec: number; count: number; nextAttemptAtSec: number } | undefined;
  const counters: KeeperStats = { ticks: 0, triggers: 0, failures: 0, stuckWarnings: 0 };

  // A new request id is a new round even when both ticks saw Calculating.
  function observe(state: RaffleStateType, requestId: bigint | null, sinceSec: number) {
    if (!observed || observed.state !== state || observed.requestId !== requestId) {
      observed = { state, requestId, sinceSec };
      lastStuckWarnSec = undefined;
    }
  }

  function maybeWarnStuck(nowSec: number, pendingRequestId: bigint | null) {
    if (!observed) return;
    const threshold = getStuckThresholdSec(observed.state, {
      calculatingSec: options.stuckCalculatingSec,
    });
    if (
      !shouldEmitStuckWarning({
        nowSec,
        observedState: observed.state,
        targetState: RaffleState.Calculating,
        observedSinceSec: observed.sinceSec,
        thresholdSec: threshold,
        lastWarnSec: lastStuckWarnSec,
        repeatSec: options.stuckWarnRepeatSec,
      })
    ) {
      return;
    }
    lastStuckWarnSec = nowSec;
    counters.stuckWarnings++;
    log.warn(
      `⚠ Randomness request #${pendingRequestId ?? "?"} unanswered for ` +
        `${formatDuration(nowSec - observed.sinceSec)} (threshold=${threshold}s); round stays locked`
    );
  }

  function maybeLogHealth(nowSec: number) {
    if (options.healthLogIntervalSec <= 0) return;
    if (nowSec - lastHealthLogSec < options.healthLogIntervalSec) return;
    lastHealthLogSec = nowSec;
    const snap = raffle.snapshot();
    log.info(
      `♥ state=${raffleStateName(snap.state)} players=${snap.players.length}` +
        ` pot=${formatSol(snap.balance)} SOL round_age=${formatDuration(nowSec - snap.lastTimestamp)}` +
        ` triggers=${counters.triggers} failures=${counters.failures}` +
        (retry ? ` retry_in=${Math.max(0, retry.nextAttemptAtSec - nowSec)}s` : "")
    );
  }

  async function tick(): Promise<TickOutcome> {
    counters.ticks++;
    const nowSec = now();
    const snap = raffle.snapshot();
    observe(snap.state, snap.pendingRequestId, snap.calculatingSince ?? nowSec);
    maybeWarnStuck(nowSec, snap.pendingRequestId);
    maybeLogHealth(nowSec);

    if (snap.state === RaffleState.Calculating) {
      return { kind: "awaiting_oracle", requestId: snap.pendingRequestId };
    }

    if (retry && nowSec < retry.nextAttemptAtSec) {
      return { kind: "backoff", nextAttemptAtSec: retry.nextAttemptAtSec };
    }

    if (!raffle.checkUpkeep().upkeepNeeded) {
      return { kind: "idle" };
    }

    try {
      const requestId = await raffle.performUpkeep();
      counters.triggers++;
      retry = undefined;
      log.info(`✓ Upkeep performed, randomness request #${requestId}`);
      return { kind: "triggered", requestId };
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      const failure = classifyUpkeepError(e instanceof RaffleError ? e.code : undefined, message);
      if (isBenignUpkeepFailure(failure)) {
        log.info(`→ Upkeep skipped: ${message}`);
        return { kind: "idle" };
      }

      counters.failures++;
      const update = buildUpkeepRetryScheduleUpdate({
        nowSec,
        reason: message,
        minDelaySec: options.retryMinSec,
        maxDelaySec: options.retryMaxSec,
        currentDelaySec: retry?.delaySec,
        retryCount: retry?.count,
      });
      retry = {
        delaySec: update.nextDelaySec,
        count: update.nextRetryCount,
        nextAttemptAtSec: update.nextAttemptAtSec,
      };
      log.error(`✗ Upkeep failed (${failure.kind}): ${message}`);
      log.info(`↻ Upkeep retry #${update.nextRetryCount} in ${update.nextDelaySec}s`);
      return { kind: "failed", reason: update.lastReason };
    }
  }

  function schedule() {
    if (!running) return;
    timer = setTimeout(() => {
      tick()
        .catch((e: unknown) => {
          log.error("✗ Tick error", e);
        })
        .finally(schedule);
    }, options.pollIntervalMs);
  }

  return {
    tick,
    start() {
      if (running) return;
      running = true;
      schedule();
    },
    stop() {
      running = false;
      if (timer) clearTimeout(timer);
      timer = undefined;
    },
    stats() {
      return { ...counters };
    },
  };
}
