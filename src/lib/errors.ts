import type { PublicKey } from "@solana/web3.js";
import { raffleStateName, type RaffleStateType } from "./constants.js";

/**
 * Base class for every failure raised by the raffle core.
 * `code` is stable and safe to match on; `message` is for humans.
 */
export class RaffleError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class NotOpenError extends RaffleError {
  constructor(readonly state: RaffleStateType) {
    super("RAFFLE_NOT_OPEN", `Raffle is not open (state=${raffleStateName(state)})`);
  }
}

export class InsufficientFeeError extends RaffleError {
  constructor(
    readonly required: bigint,
    readonly received: bigint
  ) {
    super(
      "INSUFFICIENT_FEE",
      `Entrance fee is ${required} lamports, received ${received}`
    );
  }
}

export class UpkeepNotNeededError extends RaffleError {
  constructor(
    readonly balance: bigint,
    readonly participantCount: number,
    readonly state: RaffleStateType
  ) {
    super(
      "UPKEEP_NOT_NEEDED",
      `Upkeep not needed (balance=${balance}, players=${participantCount}, state=${raffleStateName(state)})`
    );
  }
}

export class RandomnessRequestFailedError extends RaffleError {
  constructor(cause: unknown) {
    super(
      "RANDOMNESS_REQUEST_FAILED",
      `Randomness request failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
  }
}

export class NoPendingRequestError extends RaffleError {
  constructor(readonly requestId: bigint) {
    super("NO_PENDING_REQUEST", `No randomness request pending (got callback for #${requestId})`);
  }
}

export class UnknownRequestError extends RaffleError {
  constructor(
    readonly expected: bigint | null,
    readonly received: bigint
  ) {
    super(
      "UNKNOWN_REQUEST",
      expected === null
        ? `Callback for request #${received} before the pending request id is known`
        : `Callback for request #${received}, pending request is #${expected}`
    );
  }
}

export class InvalidRandomWordsError extends RaffleError {
  constructor(readonly requestId: bigint) {
    super("INVALID_RANDOM_WORDS", `Request #${requestId} fulfilled without random words`);
  }
}

export class PayoutTransferFailedError extends RaffleError {
  constructor(
    readonly winner: PublicKey,
    readonly amount: bigint,
    readonly reason: string,
    cause?: unknown
  ) {
    super(
      "PAYOUT_TRANSFER_FAILED",
      `Transfer of ${amount} lamports to ${winner.toBase58()} failed: ${reason}`,
      { cause }
    );
  }
}

export class InvalidConfigError extends RaffleError {
  constructor(readonly field: string, reason: string) {
    super("INVALID_CONFIG", `Invalid raffle config: ${field} ${reason}`);
  }
}
