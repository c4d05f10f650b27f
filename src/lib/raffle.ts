/**
 * Raffle: the round state machine.
 *
 *   Open ──performUpkeep──▶ Calculating ──fulfillRandomWords──▶ Open
 *
 * Entries are accepted only while Open. Triggering moves to Calculating before the
 * oracle is called, so a second trigger cannot issue a duplicate request. The
 * pending request id is kept and every callback is checked against it.
 *
 * On fulfilment every internal effect (winner, state, player list, clock, pot) is
 * committed before the payout transfer runs. A failed transfer is reported as
 * PayoutTransferFailedError and recorded in `getFailedPayouts()`; the round is
 * not reopened for the same players.
 */
import type { PublicKey } from "@solana/web3.js";
import { shortenAddr } from "./addressUtils.js";
import { validateRaffleConfig, type RaffleConfig } from "./config.js";
import { RaffleState, raffleStateName, type RaffleStateType } from "./constants.js";
import { EntryLedger } from "./entryLedger.js";
import {
  InvalidRandomWordsError,
  NoPendingRequestError,
  NotOpenError,
  PayoutTransferFailedError,
  RandomnessRequestFailedError,
  UnknownRequestError,
  UpkeepNotNeededError,
} from "./errors.js";
import { RaffleEventBus, type RaffleEventName, type RaffleEvents } from "./events.js";
import { formatSol } from "./format.js";
import { createLogger, type Logger } from "./log.js";
import type { RandomnessOracle } from "./oracle.js";
import { executePayout, type PayoutTransport } from "./payout.js";
import { RoundClock, unixNow, type Clock } from "./roundClock.js";
import { describeUpkeep, isUpkeepNeeded, type UpkeepBlocker, type UpkeepInput } from "./upkeep.js";
import { pickWinnerIndex } from "./winnerSelection.js";

type Phase =
  | { kind: "open" }
  | { kind: "calculating"; requestId: bigint | null; requestedAt: number };

export interface FailedPayout {
  requestId: bigint;
  winner: PublicKey;
  amount: bigint;
  at: number;
  reason: string;
}

export interface RaffleSnapshot {
  state: RaffleStateType;
  entranceFee: bigint;
  intervalSec: number;
  balance: bigint;
  players: readonly PublicKey[];
  lastTimestamp: number;
  recentWinner: PublicKey | null;
  pendingRequestId: bigint | null;
  calculatingSince: number | null;
}

export interface UpkeepCheck {
  upkeepNeeded: boolean;
  blockers: UpkeepBlocker[];
}

export interface RaffleDeps {
  oracle: RandomnessOracle;
  payout: PayoutTransport;
  clock?: Clock;
  logger?: Logger;
}

export class Raffle {
  private readonly config: RaffleConfig;
  private readonly oracle: RandomnessOracle;
  private readonly payout: PayoutTransport;
  private readonly ledger: EntryLedger;
  private readonly clock: RoundClock;
  private readonly logger: Logger;
  private readonly events: RaffleEventBus;

  private phase: Phase = { kind: "open" };
  private recentWinner: PublicKey | null = null;
  private readonly failedPayouts: FailedPayout[] = [];

  constructor(config: RaffleConfig, deps: RaffleDeps) {
    this.config = validateRaffleConfig(config);
    this.oracle = deps.oracle;
    this.payout = deps.payout;
    this.logger = deps.logger ?? createLogger("raffle");
    this.ledger = new EntryLedger(config.entranceFee);
    this.clock = new RoundClock(config.intervalSec, deps.clock ?? unixNow);
    this.events = new RaffleEventBus((event, err) => {
      this.logger.error(`✗ "${event}" listener threw`, err);
    });
  }

  on<E extends RaffleEventName>(event: E, fn: (payload: RaffleEvents[E]) => void): () => void {
    return this.events.on(event, fn);
  }

  // ─── Entry ────────────────────────────────────────────────

  enter(player: PublicKey, amount: bigint): void {
    if (this.phase.kind !== "open") {
      throw new NotOpenError(this.getRaffleState());
    }
    this.ledger.record(player, amount);
    this.events.emit("entered", { player, amount });
  }

  // ─── Upkeep ───────────────────────────────────────────────

  checkUpkeep(): UpkeepCheck {
    const input: UpkeepInput = {
      state: this.getRaffleState(),
      elapsedSec: this.clock.elapsed(),
      intervalSec: this.config.intervalSec,
      balance: this.ledger.balance,
      participantCount: this.ledger.count,
    };
    return { upkeepNeeded: isUpkeepNeeded(input), blockers: describeUpkeep(input) };
  }

  /** Locks the round and asks the oracle for a word. Resolves with the oracle's request id. */
  async performUpkeep(): Promise<bigint> {
    if (!this.checkUpkeep().upkeepNeeded) {
      throw new UpkeepNotNeededError(
        this.ledger.balance,
        this.ledger.count,
        this.getRaffleState()
      );
    }

    const phase: Phase = {
      kind: "calculating",
      requestId: null,
      requestedAt: this.clock.current,
    };
    this.phase = phase;

    let requestId: bigint;
    try {
      requestId = await this.oracle.requestRandomWords({
        keyHash: this.config.keyHash,
        subId: this.config.subscriptionId,
        requestConfirmations: this.config.requestConfirmations,
        callbackGasLimit: this.config.callbackGasLimit,
        numWords: this.config.numWords,
        nativePayment: this.config.nativePayment,
      });
    } catch (e) {
      // The request never left; reopen so the round can be triggered again.
      if (this.phase === phase) this.phase = { kind: "open" };
      throw new RandomnessRequestFailedError(e);
    }

    phase.requestId = requestId;
    this.logger.info(
      `→ Requested randomness #${requestId} (players=${this.ledger.count}, pot=${formatSol(this.ledger.balance)} SOL)`
    );
    this.events.emit("requestedWinner", { requestId });
    return requestId;
  }

  // ─── Fulfilment ───────────────────────────────────────────

  /**
   * Oracle callback. Resolves with the winner once the pot has been transferred.
   * Rejects with PayoutTransferFailedError after the round has already been reset.
   */
  async fulfillRandomWords(requestId: bigint, randomWords: readonly bigint[]): Promise<PublicKey> {
    const phase = this.phase;
    if (phase.kind !== "calculating") {
      throw new NoPendingRequestError(requestId);
    }
    // A callback may race the request promise; only a matching, known id settles the round.
    if (phase.requestId === null || phase.requestId !== requestId) {
      throw new UnknownRequestError(phase.requestId, requestId);
    }
    if (randomWords.length === 0) {
      throw new InvalidRandomWordsError(requestId);
    }

    const index = pickWinnerIndex(randomWords[0], this.ledger.count);
    const winner = this.ledger.at(index);

    this.recentWinner = winner;
    this.phase = { kind: "open" };
    const pot = this.ledger.clear();
    this.clock.reset();
    this.logger.info(
      `✓ Winner picked for #${requestId}: ${shortenAddr(winner)} (index ${index}, pot=${formatSol(pot)} SOL)`
    );
    this.events.emit("winnerPicked", { winner, requestId });

    try {
      const signature = await executePayout(this.payout, winner, pot);
      this.events.emit("payoutSent", { winner, amount: pot, signature });
      return winner;
    } catch (e) {
      if (!(e instanceof PayoutTransferFailedError)) throw e;
      this.failedPayouts.push({
        requestId,
        winner,
        amount: pot,
        at: this.clock.current,
        reason: e.reason,
      });
      this.logger.error(`✗ Payout for #${requestId} failed: ${e.message}`);
      this.events.emit("payoutFailed", { winner, amount: pot, reason: e.reason });
      throw e;
    }
  }

  // ─── Queries ──────────────────────────────────────────────

  getEntranceFee(): bigint {
    return this.config.entranceFee;
  }

  getRaffleState(): RaffleStateType {
    return this.phase.kind === "open" ? RaffleState.Open : RaffleState.Calculating;
  }

  getPlayer(index: number): PublicKey {
    return this.ledger.at(index);
  }

  getNumberOfPlayers(): number {
    return this.ledger.count;
  }

  getLastTimestamp(): number {
    return this.clock.lastReset;
  }

  getRecentWinner(): PublicKey | null {
    return this.recentWinner;
  }

  getInterval(): number {
    return this.config.intervalSec;
  }

  getBalance(): bigint {
    return this.ledger.balance;
  }

  getNumWords(): number {
    return this.config.numWords;
  }

  getRequestConfirmations(): number {
    return this.config.requestConfirmations;
  }

  getPendingRequestId(): bigint | null {
    return this.phase.kind === "calculating" ? this.phase.requestId : null;
  }

  getFailedPayouts(): readonly FailedPayout[] {
    return [...this.failedPayouts];
  }

  snapshot(): RaffleSnapshot {
    return {
      state: this.getRaffleState(),
      entranceFee: this.config.entranceFee,
      intervalSec: this.config.intervalSec,
      balance: this.ledger.balance,
      players: this.ledger.list(),
      lastTimestamp: this.clock.lastReset,
      recentWinner: this.recentWinner,
      pendingRequestId: this.getPendingRequestId(),
      calculatingSince: this.phase.kind === "calculating" ? this.phase.requestedAt : null,
    };
  }

  toString(): string {
    return `Raffle(state=${raffleStateName(this.getRaffleState())}, players=${this.ledger.count}, pot=${formatSol(this.ledger.balance)} SOL)`;
  }
}
